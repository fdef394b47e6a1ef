/**
 * Type definitions for the Jira XML to JSONL converter
 */

// ============================================
// XML Tree Types
// ============================================

/**
 * Order-preserving node as produced by fast-xml-parser with `preserveOrder`.
 * Kept alongside each element so the original item can be re-serialized.
 */
export type PreservedOrderNode = Record<string, unknown>;

/**
 * Generic labeled tree node built from a parsed XML document
 */
export interface XmlElement {
  /** Tag as written in the document, prefix included (e.g. "jira:key") */
  name: string;
  attributes: Record<string, string>;
  /** Text before the first child element, or null when there is none */
  text: string | null;
  children: XmlElement[];
  raw: PreservedOrderNode;
}

// ============================================
// Issue Types
// ============================================

/**
 * Project reference carried by an item
 */
export interface ProjectRef {
  id: string;
  key: string;
  name: string;
}

/**
 * Custom field name mapped to its distinct, normalized values
 */
export type CustomFields = Record<string, string[]>;

/**
 * Normalized issue written as one JSONL line
 */
export interface Issue {
  key: string;
  type: string;
  summary: string;
  title: string;
  status: string;
  priority: string;
  assignee: string;
  reporter: string;
  created: string;
  updated: string;
  /** Empty object when the item has no project node */
  project: Partial<ProjectRef>;
  /** Parent issue key, or "" when there is none */
  parent: string;
  subtasks: string[];
  description_text: string;
  comments_text: string;
  /** Base name of the export file this version came from */
  source_file: string;
  customfields?: CustomFields;
  raw_item_xml?: string;
  /** Canonical search text */
  text: string;
}

/**
 * Issue before its search text is rendered
 */
export type IssueFields = Omit<Issue, "text">;

/**
 * Switches that shape each extracted issue
 */
export interface ExtractionOptions {
  includeCustomFields: boolean;
  includeRawItemXml: boolean;
}

// ============================================
// Document & Conversion Types
// ============================================

/**
 * Outcome of reading one export document
 */
export type DocumentResult =
  | { ok: true; fileName: string; items: XmlElement[] }
  | { ok: false; fileName: string; error: string };

/**
 * Per-document failure reported at the end of a run
 */
export interface ConversionError {
  file: string;
  message: string;
}

/**
 * Everything the driver needs for one conversion run
 */
export interface ConversionRequest extends ExtractionOptions {
  inputFolder: string;
  outputPath: string;
  recursive: boolean;
  sort: boolean;
  beautify: boolean;
  failFast: boolean;
}

export type ConversionStatus = "ok" | "completed-with-errors" | "no-input";

/**
 * Result of a conversion run
 */
export interface ConversionResult {
  status: ConversionStatus;
  /** XML files discovered in the input folder */
  filesFound: number;
  /** Files actually scanned; fewer than filesFound after a fail-fast stop */
  filesRead: number;
  issuesWritten: number;
  outputPath: string;
  prettyPath?: string;
  errors: ConversionError[];
}
