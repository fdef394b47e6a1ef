import { describe, it, expect } from "vitest";
import { RssExportService } from "../rss-export-service";

describe("RssExportService", () => {
  const service = new RssExportService();

  it("should return the items of the channel", () => {
    const result = service.parseDocument(
      `<?xml version="1.0"?>
<rss version="0.92">
  <channel>
    <title>Export</title>
    <item><key>PRJ-1</key></item>
    <item><key>PRJ-2</key></item>
  </channel>
</rss>`,
      "export.xml"
    );

    expect(result.ok).toBe(true);
    expect(result.ok ? result.items.length : -1).toBe(2);
    expect(result.fileName).toBe("export.xml");
  });

  it("should accept prefixed and upper-case envelopes", () => {
    const prefixed = service.parseDocument(
      '<x:rss xmlns:x="urn:x"><x:channel><x:item/></x:channel></x:rss>',
      "prefixed.xml"
    );
    const upper = service.parseDocument(
      "<RSS><CHANNEL><item/></CHANNEL></RSS>",
      "upper.xml"
    );

    expect(prefixed.ok ? prefixed.items.length : -1).toBe(1);
    expect(upper.ok ? upper.items.length : -1).toBe(1);
  });

  it("should return no items when there is no channel", () => {
    expect(service.parseDocument("<rss><other/></rss>", "empty.xml")).toEqual({
      ok: true,
      fileName: "empty.xml",
      items: [],
    });
  });

  it("should report a document that is not RSS", () => {
    expect(service.parseDocument("<feed><entry/></feed>", "atom.xml")).toEqual({
      ok: false,
      fileName: "atom.xml",
      error: "InvalidEnvelopeError: Not RSS (root=feed)",
    });
  });

  it("should report malformed XML without throwing", () => {
    const result = service.parseDocument(
      "<rss><channel><item></channel></rss>",
      "broken.xml"
    );

    expect(result.ok).toBe(false);
    expect(result.ok ? "" : result.error).toMatch(/^XmlParseError: .+\(line 1\)$/);
  });
});
