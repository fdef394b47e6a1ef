import path from "path";
import { StorageService } from "./storage-service";
import { RssExportService } from "./rss-export-service";
import { IssueAggregator } from "./issue-aggregator";
import type {
  ConversionError,
  ConversionRequest,
  ConversionResult,
  ExtractionOptions,
} from "../types";
import { describeError } from "../types/errors";
import { itemToIssue } from "../utils/issue-builder";

/**
 * Called before each export file is scanned
 */
export type FileProgressCallback = (
  fileName: string,
  index: number,
  total: number
) => void;

/**
 * Service responsible for orchestrating a conversion run
 * Coordinates between Storage, RSS parsing and the issue aggregator
 */
export class ConversionService {
  constructor(
    private readonly storageService: StorageService,
    private readonly rssExportService: RssExportService
  ) {}

  /**
   * Converts every XML export in a folder into one deduplicated JSONL file
   *
   * Files are processed one at a time in discovery (or sorted) order; a
   * file that cannot be read or parsed is reported and skipped, and with
   * `failFast` the scan stops at the first such file.
   *
   * @param request - Input folder, output path and conversion switches
   * @param onFile - Optional progress callback
   * @returns Summary of the run, including per-file errors
   */
  async convert(
    request: ConversionRequest,
    onFile?: FileProgressCallback
  ): Promise<ConversionResult> {
    const files = await this.storageService.listXmlFiles(
      request.inputFolder,
      request.recursive,
      request.sort
    );

    if (files.length === 0) {
      return {
        status: "no-input",
        filesFound: 0,
        filesRead: 0,
        issuesWritten: 0,
        outputPath: request.outputPath,
        errors: [],
      };
    }

    await this.storageService.ensureDirectory(request.outputPath);

    const aggregator = new IssueAggregator();
    const errors: ConversionError[] = [];
    let filesRead = 0;

    for (const [index, file] of files.entries()) {
      onFile?.(path.basename(file), index, files.length);
      filesRead++;

      const error = await this.processFile(file, request, aggregator);
      if (error) {
        errors.push({
          file: path.relative(request.inputFolder, file),
          message: error,
        });
        if (request.failFast) {
          break;
        }
      }
    }

    const issues = aggregator.finalize();
    await this.storageService.writeJsonl(request.outputPath, issues);

    let prettyPath: string | undefined;
    if (request.beautify) {
      prettyPath = this.storageService.prettyPathFor(request.outputPath);
      await this.storageService.writePrettyJson(prettyPath, issues);
    }

    return {
      status: errors.length > 0 ? "completed-with-errors" : "ok",
      filesFound: files.length,
      filesRead,
      issuesWritten: issues.length,
      outputPath: request.outputPath,
      prettyPath,
      errors,
    };
  }

  /**
   * Reads one file and offers its issues to the aggregator
   * @returns The failure cause, or undefined on success
   */
  private async processFile(
    file: string,
    options: ExtractionOptions,
    aggregator: IssueAggregator
  ): Promise<string | undefined> {
    const fileName = path.basename(file);

    let xml: string;
    try {
      xml = await this.storageService.readDocument(file);
    } catch (error) {
      return describeError(error);
    }

    const result = this.rssExportService.parseDocument(xml, fileName);
    if (!result.ok) {
      return result.error;
    }

    for (const item of result.items) {
      const issue = itemToIssue(item, fileName, options);
      if (issue) {
        aggregator.offer(issue);
      }
    }

    return undefined;
  }
}
