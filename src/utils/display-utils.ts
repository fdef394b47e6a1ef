import path from "path";
import chalk from "chalk";
import type { ConversionError, ConversionResult } from "../types";
import type { TranslateFn } from "../services/i18n-service";

/**
 * Number of per-file errors listed before the rest are summarized
 */
const MAX_LISTED_ERRORS = 15;

/**
 * Displays the interactive-mode banner
 */
export function displayHeader(t: TranslateFn): void {
  const bar = "═".repeat(72);

  console.log(chalk.magenta(bar));
  console.log(chalk.bold.magenta(`  ${t("header.title")}`));
  console.log(chalk.dim(`  ${t("header.subtitle")}`));
  console.log("");
  for (const feature of ["html", "jsonl", "raw", "pretty"]) {
    console.log(`  ${chalk.green("•")} ✅ ${t(`header.feature.${feature}`)}`);
  }
  console.log(chalk.magenta(bar));
  console.log(chalk.dim(t("header.tip")) + "\n");
}

/**
 * Displays what a conversion run produced
 */
export function displayConversionSummary(
  result: ConversionResult,
  t: TranslateFn
): void {
  console.log(chalk.bold(t("ui.summary")));
  console.log(`  • ${t("ui.xml_read", { n: result.filesFound })}`);
  console.log(`  • ${t("ui.issues_written", { n: result.issuesWritten })}`);
  console.log(`  • ${t("ui.jsonl", { path: path.resolve(result.outputPath) })}`);

  if (result.prettyPath) {
    console.log(`  • ${t("ui.pretty", { path: path.resolve(result.prettyPath) })}`);
  }
}

/**
 * Lists per-file failures, summarizing the tail of long lists
 */
export function displayConversionErrors(
  errors: ConversionError[],
  t: TranslateFn
): void {
  if (errors.length === 0) {
    return;
  }

  console.log(chalk.yellow(t("ui.errors", { n: errors.length })));
  errors.slice(0, MAX_LISTED_ERRORS).forEach(({ file, message }) => {
    console.log(chalk.yellow(`  - ${file}: ${message}`));
  });

  if (errors.length > MAX_LISTED_ERRORS) {
    console.log(
      chalk.yellow(t("ui.errors_more", { n: errors.length - MAX_LISTED_ERRORS }))
    );
  }
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error): void {
  console.error(chalk.red("❌ Error:"), message);
  if (error && process.env.NODE_ENV === "development") {
    console.error(chalk.gray(error.stack));
  }
}

/**
 * Displays warning messages in a consistent format
 */
export function displayWarning(message: string): void {
  console.log(chalk.yellow("⚠️"), message);
}
