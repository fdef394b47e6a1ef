/**
 * Extractors for the structured parts of a Jira RSS `<item>`
 *
 * Each extractor is total: a missing sub-structure yields an empty value
 * ("", [], {}) and never an exception.
 */

import type { CustomFields, ProjectRef, XmlElement } from "../types";
import { normalizeWhitespace, stripHtml } from "./html-sanitizer";
import { isIssueKey } from "./validation";
import {
  findChild,
  findDescendants,
  findText,
  localName,
  textOf,
  walkElements,
} from "./xml-navigator";

/**
 * Scalar fields read straight from an item's children
 */
export interface ScalarFields {
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
  description: string;
}

/**
 * Reads the single-valued fields of an item.
 * Title, summary and description are sanitized; the rest are only trimmed.
 */
export function extractScalarFields(item: XmlElement): ScalarFields {
  const title = stripHtml(findText(item, "title"));
  const summary = stripHtml(findText(item, "summary"));

  return {
    key: findText(item, "key"),
    type: findText(item, "type"),
    summary: summary || title,
    title,
    status: findText(item, "status"),
    priority: findText(item, "priority"),
    assignee: findText(item, "assignee"),
    reporter: findText(item, "reporter"),
    created: findText(item, "created"),
    updated: findText(item, "updated"),
    description: stripHtml(findText(item, "description")),
  };
}

/**
 * Reads `<project id="…" key="…">Name</project>`
 * @returns Empty object when the item has no project
 */
export function extractProject(item: XmlElement): Partial<ProjectRef> {
  const project = findChild(item, "project");
  if (!project) {
    return {};
  }

  return {
    id: (project.attributes.id ?? "").trim(),
    key: (project.attributes.key ?? "").trim(),
    name: textOf(project),
  };
}

/**
 * Resolves the parent issue key from a nested `<key>` or the node's own text
 * @returns The key, or "" when absent or not a valid key
 */
export function extractParentKey(item: XmlElement): string {
  const parent = findChild(item, "parent");
  if (!parent) {
    return "";
  }

  const parentKey = findText(parent, "key") || textOf(parent);
  return isIssueKey(parentKey) ? parentKey.trim() : "";
}

/**
 * Collects valid subtask keys in document order (duplicates kept)
 */
export function extractSubtasks(item: XmlElement): string[] {
  const subtasks = findChild(item, "subtasks");
  if (!subtasks) {
    return [];
  }

  return subtasks.children
    .filter((child) => localName(child.name) === "subtask")
    .map((subtask) => findText(subtask, "key"))
    .filter((key) => isIssueKey(key))
    .map((key) => key.trim());
}

/**
 * Raw values of a `<customfieldvalues>` block. A value node without its own
 * text contributes the texts of its whole subtree instead, which recovers
 * values wrapped one level deeper (e.g. cascading selects).
 */
function readCustomFieldValues(valuesNode: XmlElement): string[] {
  const values: string[] = [];

  for (const valueNode of findDescendants(valuesNode, "customfieldvalue")) {
    const own = textOf(valueNode);
    if (own) {
      values.push(own);
      continue;
    }
    for (const nested of walkElements(valueNode)) {
      const nestedText = textOf(nested);
      if (nestedText) {
        values.push(nestedText);
      }
    }
  }

  return values;
}

/**
 * Normalizes whitespace, drops empties and keeps the first occurrence of each value
 */
export function dedupeValues(values: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const value of values) {
    const normalized = normalizeWhitespace(value);
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }

  return result;
}

/**
 * Maps each named custom field to its distinct values.
 * Fields without a name are dropped along with their values.
 */
export function extractCustomFields(item: XmlElement): CustomFields {
  // Collected in a Map so names such as "__proto__" stay ordinary keys
  const customFields = new Map<string, string[]>();
  const container = findChild(item, "customfields");
  if (!container) {
    return {};
  }

  for (const field of container.children) {
    if (localName(field.name) !== "customfield") {
      continue;
    }

    let name = "";
    const values: string[] = [];

    for (const child of field.children) {
      const childName = localName(child.name);
      if (childName === "customfieldname") {
        name = textOf(child);
      } else if (childName === "customfieldvalues") {
        values.push(...readCustomFieldValues(child));
      }
    }

    if (name) {
      customFields.set(name, dedupeValues(values));
    }
  }

  return Object.fromEntries(customFields);
}

/**
 * Sanitized text of every comment, one per line
 */
export function extractCommentsText(item: XmlElement): string {
  const comments = findChild(item, "comments");
  if (!comments) {
    return "";
  }

  return findDescendants(comments, "comment")
    .map((comment) => stripHtml(textOf(comment)))
    .filter((text) => text.length > 0)
    .join("\n")
    .trim();
}
