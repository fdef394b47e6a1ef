#!/usr/bin/env node

import { createInterface, type Interface } from "readline/promises";
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import dotenv from "dotenv";
import { getConfig, validateConfig, type Config } from "./config/config";
import { StorageService } from "./services/storage-service";
import { RssExportService } from "./services/rss-export-service";
import { ConversionService } from "./services/conversion-service";
import {
  loadLanguagePacks,
  makeTranslator,
  type TranslateFn,
} from "./services/i18n-service";
import type { ConversionRequest } from "./types";
import {
  displayConversionErrors,
  displayConversionSummary,
  displayError,
  displayHeader,
  displayWarning,
} from "./utils/display-utils";
import {
  normalizeUserPath,
  promptBoolean,
  promptLanguage,
  promptPath,
} from "./utils/prompt-utils";

// Load environment variables
dotenv.config();

/**
 * Exit codes reported to the shell
 */
const EXIT_OK = 0;
const EXIT_COMPLETED_WITH_ERRORS = 1;
const EXIT_NO_INPUT = 2;

interface CliOptions {
  recursive?: boolean;
  sort?: boolean;
  includeCustomfields?: boolean;
  includeRawItemXml?: boolean;
  beautify?: boolean;
  failFast?: boolean;
  lang?: string;
}

/**
 * Main CLI program
 */
const program = new Command();

program
  .name("jira-xml-jsonl")
  .description(
    "Convert a folder of Jira RSS XML exports into agent-ready JSONL (one issue per line)"
  )
  .version("1.0.0")
  .argument("[input_folder]", "Folder containing XML files")
  .argument("[output_jsonl]", "Output JSONL path (used exactly as given)")
  .option("--recursive", "Also read XML files in subfolders")
  .option("--sort", "Process files in case-insensitive path order")
  .option("--include-customfields", "Include custom fields in records and text")
  .option("--include-raw-item-xml", "Keep the original <item> XML in each record")
  .option("--beautify", "Also write <output>.pretty.json (indented)")
  .option("--fail-fast", "Stop at the first file that cannot be processed")
  .option("--lang <lang>", "Language: en or pt-BR")
  .action(
    async (
      inputFolder: string | undefined,
      outputJsonl: string | undefined,
      options: CliOptions
    ) => {
      try {
        // Validate configuration before starting
        validateConfig();
        const config = getConfig();
        if (config.app.noColor) {
          chalk.level = 0;
        }

        process.exitCode = await runConversion(
          config,
          inputFolder,
          outputJsonl,
          options
        );
      } catch (error) {
        console.error(
          chalk.red("\n❌ Error:"),
          error instanceof Error ? error.message : "Unknown error"
        );
        process.exit(1);
      }
    }
  );

/**
 * Resolves the request (asking interactively when a path is missing),
 * runs the conversion and reports the outcome
 * @returns The process exit code
 */
async function runConversion(
  config: Config,
  inputFolder: string | undefined,
  outputJsonl: string | undefined,
  options: CliOptions
): Promise<number> {
  const { packs, warnings } = await loadLanguagePacks(config.app.i18nDirectory);

  if (Object.keys(packs).length === 0) {
    displayWarning(
      `Language files not found in ${config.app.i18nDirectory}. Falling back to message keys.`
    );
  }
  warnings.forEach((warning) => displayWarning(warning));

  let lang = options.lang || config.app.lang;
  let request: ConversionRequest;

  if (inputFolder === undefined || outputJsonl === undefined) {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      if (!lang) {
        lang = await promptLanguage(rl);
      }
      const { t } = makeTranslator(packs, lang);
      request = await promptForRequest(rl, t);
    } finally {
      rl.close();
    }
  } else {
    request = {
      inputFolder: normalizeUserPath(inputFolder),
      outputPath: normalizeUserPath(outputJsonl),
      recursive: options.recursive ?? config.conversion.recursive,
      sort: options.sort ?? config.conversion.sort,
      includeCustomFields:
        options.includeCustomfields ?? config.conversion.includeCustomFields,
      includeRawItemXml:
        options.includeRawItemXml ?? config.conversion.includeRawItemXml,
      beautify: options.beautify ?? config.conversion.beautify,
      failFast: options.failFast ?? config.conversion.failFast,
    };
  }

  const { t } = makeTranslator(packs, lang);

  // Initialize all services with dependency injection
  const storageService = new StorageService();
  const conversionService = new ConversionService(
    storageService,
    new RssExportService()
  );

  if (!(await storageService.isDirectory(request.inputFolder))) {
    displayError(t("ui.invalid_folder", { path: request.inputFolder }));
    return EXIT_NO_INPUT;
  }

  const spinner = ora(t("ui.processing")).start();
  const result = await conversionService.convert(
    request,
    (file, index, total) => {
      spinner.text = t("ui.scanning", { file, current: index + 1, total });
    }
  );

  if (result.status === "no-input") {
    spinner.warn(t("ui.no_xml"));
    return EXIT_NO_INPUT;
  }

  spinner.succeed(t("ui.done"));
  displayConversionSummary(result, t);
  displayConversionErrors(result.errors, t);

  return result.status === "completed-with-errors"
    ? EXIT_COMPLETED_WITH_ERRORS
    : EXIT_OK;
}

/**
 * Walks the user through every conversion setting
 */
async function promptForRequest(
  rl: Interface,
  t: TranslateFn
): Promise<ConversionRequest> {
  displayHeader(t);

  const inputFolder = await promptPath(rl, t, {
    title: t("step.input.title"),
    howto: t("step.input.howto"),
    example: t("step.input.example"),
    defaultValue: "./exports",
    mustExist: true,
    mustBeDirectory: true,
  });

  const outputPath = await promptPath(rl, t, {
    title: t("step.output.title"),
    howto: t("step.output.howto"),
    example: t("step.output.example"),
    defaultValue: "./agent_ready.jsonl",
    mustExist: false,
    mustBeDirectory: false,
  });

  const ask = (step: string, defaultValue: boolean): Promise<boolean> =>
    promptBoolean(
      rl,
      t,
      t(`step.${step}.title`),
      t(`step.${step}.howto`),
      defaultValue
    );

  return {
    inputFolder,
    outputPath,
    recursive: await ask("recursive", true),
    sort: await ask("sort", true),
    includeCustomFields: await ask("customfields", true),
    includeRawItemXml: await ask("rawxml", false),
    beautify: await ask("beautify", true),
    failFast: await ask("failfast", false),
  };
}

// Parse command line arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof Error) {
    displayError(error.message, error);
  } else {
    displayError(String(error));
  }
  process.exit(1);
});
