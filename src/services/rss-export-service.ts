import type { DocumentResult, XmlElement } from "../types";
import { InvalidEnvelopeError, describeError } from "../types/errors";
import { localName, parseXmlDocument } from "../utils/xml-navigator";

/**
 * Service that reads the `<rss><channel><item>` envelope of Jira XML exports
 */
export class RssExportService {
  /**
   * Parses one export document into its item elements
   * @param xml - Document content
   * @param fileName - Name reported with the result
   * @returns Items on success, or the failure cause; never throws
   */
  parseDocument(xml: string, fileName: string): DocumentResult {
    try {
      return { ok: true, fileName, items: this.readItems(xml) };
    } catch (error) {
      return { ok: false, fileName, error: describeError(error) };
    }
  }

  /**
   * @throws {XmlParseError} When the document is malformed
   * @throws {InvalidEnvelopeError} When the root element is not `<rss>`
   */
  private readItems(xml: string): XmlElement[] {
    const root = parseXmlDocument(xml);
    if (localName(root.name).toLowerCase() !== "rss") {
      throw new InvalidEnvelopeError(`Not RSS (root=${root.name})`);
    }

    const channel = root.children.find(
      (child) => localName(child.name).toLowerCase() === "channel"
    );
    if (!channel) {
      return [];
    }

    return channel.children.filter((child) => localName(child.name) === "item");
  }
}
