import { load } from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";

/**
 * Collects the trimmed, non-empty text nodes below `nodes` in document order
 */
function collectText(nodes: AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const data = node.data.trim();
      if (data) {
        parts.push(data);
      }
    } else if (hasChildren(node)) {
      collectText(node.children, parts);
    }
  }
}

function stripOnce(html: string): string {
  const $ = load(html, null, false);
  const parts: string[] = [];
  collectText($.root().contents().toArray(), parts);
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

/**
 * Strips HTML markup from Jira rich-text fields (descriptions, comments)
 *
 * Text fragments between tags are joined by a single space and every run of
 * whitespace collapses to one space. Character references are decoded, and
 * decoded text that itself reads as markup is stripped again until the
 * output is stable, so `stripHtml(stripHtml(x)) === stripHtml(x)`.
 *
 * @example
 * stripHtml("<p>Hello <b>World</b></p>"); // "Hello World"
 */
export function stripHtml(input: string | null | undefined): string {
  if (!input) {
    return "";
  }

  let current = stripOnce(input);
  for (let next = stripOnce(current); next !== current; next = stripOnce(current)) {
    current = next;
  }
  return current;
}

/**
 * Collapses whitespace runs to a single space and trims
 */
export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
