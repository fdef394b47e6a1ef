import fs from "fs/promises";
import path from "path";
import { glob } from "glob";
import type { Issue } from "../types";

/**
 * Service responsible for all file I/O operations
 * Handles export discovery, document reading and JSONL/JSON output
 */
export class StorageService {
  /**
   * Checks whether a path exists and is a directory
   */
  async isDirectory(folder: string): Promise<boolean> {
    try {
      const stats = await fs.stat(folder);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Lists the XML export files in a folder
   * @param folder - Folder to scan
   * @param recursive - Whether to descend into subfolders
   * @param sort - Whether to order by case-insensitive path (otherwise discovery order)
   * @returns Absolute file paths
   */
  async listXmlFiles(
    folder: string,
    recursive: boolean,
    sort: boolean
  ): Promise<string[]> {
    const files = await glob(recursive ? "**/*.xml" : "*.xml", {
      cwd: folder,
      absolute: true,
      nodir: true,
    });

    if (!sort) {
      return files;
    }

    return files
      .map((file) => ({ file, sortKey: file.toLowerCase() }))
      .sort((a, b) =>
        a.sortKey < b.sortKey ? -1 : a.sortKey > b.sortKey ? 1 : 0
      )
      .map(({ file }) => file);
  }

  /**
   * Reads an export document as UTF-8
   */
  async readDocument(fileName: string): Promise<string> {
    return fs.readFile(fileName, "utf-8");
  }

  /**
   * Ensures the directory that will hold a file exists
   */
  async ensureDirectory(fileName: string): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(fileName)), { recursive: true });
  }

  /**
   * Writes one JSON object per line
   */
  async writeJsonl(fileName: string, issues: Issue[]): Promise<void> {
    const content = issues.map((issue) => `${JSON.stringify(issue)}\n`).join("");
    await fs.writeFile(fileName, content, "utf-8");
  }

  /**
   * Writes the issues as an indented JSON array for human reading
   */
  async writePrettyJson(fileName: string, issues: Issue[]): Promise<void> {
    await fs.writeFile(fileName, JSON.stringify(issues, null, 2), "utf-8");
  }

  /**
   * Path of the pretty-printed companion file: the output's last extension
   * is replaced by ".pretty.json" (or it is appended when there is none)
   * @example prettyPathFor("out/agent_ready.jsonl") // "out/agent_ready.pretty.json"
   */
  prettyPathFor(outputPath: string): string {
    const { dir, name } = path.parse(outputPath);
    return path.join(dir, `${name}.pretty.json`);
  }
}
