import type { IssueFields } from "../types";

/**
 * Issue fields rendered as "LABEL: value" lines, in output order
 */
const HEADER_FIELDS: ReadonlyArray<
  [label: string, field: keyof IssueFields]
> = [
  ["KEY", "key"],
  ["TYPE", "type"],
  ["SUMMARY", "summary"],
  ["STATUS", "status"],
  ["PRIORITY", "priority"],
  ["ASSIGNEE", "assignee"],
  ["REPORTER", "reporter"],
  ["CREATED", "created"],
  ["UPDATED", "updated"],
];

/**
 * Builds the canonical, line-oriented text of an issue used for search and
 * embeddings. Empty values never produce a line, and the same issue always
 * renders to the same string.
 *
 * @example
 * ```
 * KEY: PROJ-1
 * SUMMARY: Hello World
 *
 * DESCRIPTION:
 * Steps to reproduce...
 * ```
 */
export function buildSearchText(
  issue: IssueFields,
  includeCustomFields: boolean
): string {
  const lines: string[] = [];

  const add = (label: string, value: string | undefined): void => {
    if (value === undefined || value.trim() === "") {
      return;
    }
    lines.push(`${label}: ${value}`);
  };

  for (const [label, field] of HEADER_FIELDS) {
    const value = issue[field];
    add(label, typeof value === "string" ? value : undefined);
  }

  add("PROJECT", issue.project.key);
  add("PROJECT_NAME", issue.project.name);
  add("PARENT", issue.parent);
  add("SUBTASKS", issue.subtasks.join(", "));

  if (includeCustomFields) {
    const customFields = issue.customfields ?? {};
    const names = Object.keys(customFields);
    if (names.length > 0) {
      lines.push("", "CUSTOMFIELDS:");
      const sorted = [...names].sort((a, b) => {
        const left = a.toLowerCase();
        const right = b.toLowerCase();
        return left < right ? -1 : left > right ? 1 : 0;
      });
      for (const name of sorted) {
        const values = customFields[name];
        if (values.length > 0) {
          lines.push(`- ${name}: ${values.join(", ")}`);
        }
      }
    }
  }

  if (issue.description_text) {
    lines.push("", "DESCRIPTION:", issue.description_text);
  }

  if (issue.comments_text) {
    lines.push("", "COMMENTS:", issue.comments_text);
  }

  return lines.join("\n").trim();
}
