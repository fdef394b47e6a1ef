import type {
  ExtractionOptions,
  Issue,
  IssueFields,
  XmlElement,
} from "../types";
import {
  extractCommentsText,
  extractCustomFields,
  extractParentKey,
  extractProject,
  extractScalarFields,
  extractSubtasks,
} from "./field-extractors";
import { buildSearchText } from "./search-text";
import { isIssueKey } from "./validation";
import { serializeElement } from "./xml-navigator";

/**
 * Normalizes one RSS `<item>` into an issue record
 * @param item - The `<item>` element
 * @param sourceFile - Base name of the export file the item came from
 * @param options - Whether to keep custom fields and the raw item XML
 * @returns The issue, or null when the item has no valid issue key
 */
export function itemToIssue(
  item: XmlElement,
  sourceFile: string,
  options: ExtractionOptions
): Issue | null {
  const fields = extractScalarFields(item);
  if (!isIssueKey(fields.key)) {
    return null;
  }

  const issue: IssueFields = {
    key: fields.key,
    type: fields.type,
    summary: fields.summary,
    title: fields.title,
    status: fields.status,
    priority: fields.priority,
    assignee: fields.assignee,
    reporter: fields.reporter,
    created: fields.created,
    updated: fields.updated,
    project: extractProject(item),
    parent: extractParentKey(item),
    subtasks: extractSubtasks(item),
    description_text: fields.description,
    comments_text: extractCommentsText(item),
    source_file: sourceFile,
  };

  if (options.includeCustomFields) {
    issue.customfields = extractCustomFields(item);
  }

  if (options.includeRawItemXml) {
    issue.raw_item_xml = serializeElement(item);
  }

  return {
    ...issue,
    text: buildSearchText(issue, options.includeCustomFields),
  };
}
