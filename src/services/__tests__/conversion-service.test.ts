import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile, access } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { ConversionService } from "../conversion-service";
import { RssExportService } from "../rss-export-service";
import { StorageService } from "../storage-service";
import type { ConversionRequest, Issue } from "../../types";

const rss = (items: string) =>
  `<?xml version="1.0" encoding="UTF-8"?>\n<rss version="0.92"><channel>${items}</channel></rss>`;

const readJsonl = async (file: string): Promise<Issue[]> => {
  const content = await readFile(file, "utf-8");
  return content
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): Issue => JSON.parse(line));
};

describe("ConversionService", () => {
  let inputFolder: string;
  let outputPath: string;
  let service: ConversionService;

  const request = (overrides: Partial<ConversionRequest> = {}): ConversionRequest => ({
    inputFolder,
    outputPath,
    recursive: false,
    sort: true,
    includeCustomFields: false,
    includeRawItemXml: false,
    beautify: false,
    failFast: false,
    ...overrides,
  });

  beforeEach(async () => {
    const root = await mkdtemp(path.join(tmpdir(), "jira-jsonl-test-"));
    inputFolder = path.join(root, "exports");
    outputPath = path.join(root, "out", "agent_ready.jsonl");
    await mkdir(path.join(inputFolder, "nested"), { recursive: true });

    await writeFile(
      path.join(inputFolder, "a.xml"),
      rss(
        "<item><key>PRJ-2</key><summary>Short</summary></item>" +
          "<item><key>PRJ-1</key><summary>First issue</summary></item>"
      )
    );
    await writeFile(
      path.join(inputFolder, "b.xml"),
      rss(
        "<item><key>PRJ-2</key><summary>Short</summary>" +
          "<description>Now with details</description></item>" +
          "<item><key>not-a-key</key><summary>Filler</summary></item>"
      )
    );
    await writeFile(
      path.join(inputFolder, "c.xml"),
      "<rss><channel><item></channel></rss>"
    );
    await writeFile(
      path.join(inputFolder, "nested", "d.xml"),
      rss("<item><key>PRJ-3</key><summary>Nested</summary></item>")
    );

    service = new ConversionService(new StorageService(), new RssExportService());
  });

  afterEach(async () => {
    await rm(path.dirname(inputFolder), { recursive: true, force: true });
  });

  it("should merge duplicates, skip invalid items and report broken files", async () => {
    const result = await service.convert(request());

    expect(result.status).toBe("completed-with-errors");
    expect(result.filesRead).toBe(3);
    expect(result.issuesWritten).toBe(2);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].file).toBe("c.xml");
    expect(result.errors[0].message.startsWith("XmlParseError: ")).toBe(true);

    const issues = await readJsonl(outputPath);
    expect(issues.map((issue) => issue.key)).toEqual(["PRJ-1", "PRJ-2"]);
    expect(issues[1].source_file).toBe("b.xml");
    expect(issues[1].description_text).toBe("Now with details");
  });

  it("should write one JSON object per line", async () => {
    await service.convert(request());

    const content = await readFile(outputPath, "utf-8");
    const lines = content.split("\n");

    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    expect(JSON.parse(lines[0]).text).toBe("KEY: PRJ-1\nSUMMARY: First issue");
  });

  it("should include subfolders when recursive", async () => {
    const result = await service.convert(request({ recursive: true }));

    expect(result.filesRead).toBe(4);
    expect((await readJsonl(outputPath)).map((issue) => issue.key)).toEqual([
      "PRJ-1",
      "PRJ-2",
      "PRJ-3",
    ]);
  });

  it("should stop at the first failure with failFast", async () => {
    await writeFile(path.join(inputFolder, "0-bad.xml"), "<feed/>");

    const result = await service.convert(request({ failFast: true }));

    expect(result.filesFound).toBe(4);
    expect(result.filesRead).toBe(1);
    expect(result.issuesWritten).toBe(0);
    expect(result.errors).toEqual([
      { file: "0-bad.xml", message: "InvalidEnvelopeError: Not RSS (root=feed)" },
    ]);
    expect(await readFile(outputPath, "utf-8")).toBe("");
  });

  it("should keep the first-seen record when weights tie", async () => {
    await rm(path.join(inputFolder, "c.xml"));
    await writeFile(
      path.join(inputFolder, "e.xml"),
      rss("<item><key>PRJ-1</key><summary>First issue</summary></item>")
    );

    const result = await service.convert(request());
    const issues = await readJsonl(outputPath);

    expect(result.status).toBe("ok");
    expect(issues[0].source_file).toBe("a.xml");
  });

  it("should write an indented copy when beautify is on", async () => {
    const result = await service.convert(request({ beautify: true }));
    const prettyPath = path.join(path.dirname(outputPath), "agent_ready.pretty.json");

    expect(result.prettyPath).toBe(prettyPath);
    const pretty: Issue[] = JSON.parse(await readFile(prettyPath, "utf-8"));
    expect(pretty).toEqual(await readJsonl(outputPath));
    expect(await readFile(prettyPath, "utf-8")).toContain('\n  {\n    "key": "PRJ-1",');
  });

  it("should report when there are no XML files", async () => {
    const emptyFolder = path.join(path.dirname(inputFolder), "empty");
    await mkdir(emptyFolder);

    const result = await service.convert(request({ inputFolder: emptyFolder }));

    expect(result).toEqual({
      status: "no-input",
      filesFound: 0,
      filesRead: 0,
      issuesWritten: 0,
      outputPath,
      errors: [],
    });
    await expect(access(outputPath)).rejects.toThrow();
  });
});
