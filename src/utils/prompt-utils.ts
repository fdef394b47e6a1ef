/**
 * Interactive prompts used when the CLI runs without positional arguments
 */

import os from "os";
import path from "path";
import fs from "fs/promises";
import type { Interface } from "readline/promises";
import chalk from "chalk";
import type { TranslateFn } from "../services/i18n-service";

const YES_ANSWERS = ["y", "yes", "s", "sim", "true", "1"];
const NO_ANSWERS = ["n", "no", "nao", "não", "false", "0"];

/**
 * Removes one pair of surrounding quotes and expands a leading "~"
 * @example normalizeUserPath("'~/exports'") // "/home/me/exports"
 */
export function normalizeUserPath(input: string): string {
  let value = input.trim();
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    value = value.slice(1, -1);
  }

  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

/**
 * Interprets a yes/no answer (English or Portuguese)
 * @returns The default for an empty answer, undefined when unrecognized
 */
export function parseYesNo(answer: string, defaultValue: boolean): boolean | undefined {
  const value = answer.trim().toLowerCase();
  if (!value) {
    return defaultValue;
  }
  if (YES_ANSWERS.includes(value)) {
    return true;
  }
  if (NO_ANSWERS.includes(value)) {
    return false;
  }
  return undefined;
}

export interface PathPrompt {
  title: string;
  howto: string;
  example: string;
  defaultValue: string;
  mustExist: boolean;
  mustBeDirectory: boolean;
}

/**
 * Asks for a path until the answer satisfies the prompt's constraints
 */
export async function promptPath(
  rl: Interface,
  t: TranslateFn,
  prompt: PathPrompt
): Promise<string> {
  console.log(chalk.cyan.bold(prompt.title));
  console.log(chalk.dim(prompt.howto));
  console.log(chalk.dim(t("prompt.example", { example: prompt.example })));
  console.log(chalk.dim(t("prompt.default", { default: prompt.defaultValue })));

  for (;;) {
    const answer = await rl.question("> ");
    const candidate = normalizeUserPath(answer.trim() || prompt.defaultValue);
    const stats = await fs.stat(candidate).catch(() => undefined);

    if (prompt.mustExist && !stats) {
      console.log(chalk.yellow(t("ui.retry")));
      continue;
    }
    if (prompt.mustBeDirectory && !stats?.isDirectory()) {
      console.log(chalk.yellow(t("ui.must_dir")));
      continue;
    }
    return candidate;
  }
}

/**
 * Asks a yes/no question until a recognizable answer is given
 */
export async function promptBoolean(
  rl: Interface,
  t: TranslateFn,
  title: string,
  howto: string,
  defaultValue: boolean
): Promise<boolean> {
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim(howto));
  const hint = defaultValue ? "Y/n" : "y/N";

  for (;;) {
    const answer = parseYesNo(await rl.question(`( ${hint} ) > `), defaultValue);
    if (answer !== undefined) {
      return answer;
    }
    console.log(chalk.yellow(t("ui.answer_sn")));
  }
}

/**
 * Asks for the UI language: 1 = pt-BR (default), 2 = en
 */
export async function promptLanguage(rl: Interface): Promise<string> {
  console.log("Language / Idioma");
  console.log("  1) pt-BR (Português)");
  console.log("  2) en (English)");
  const choice = (await rl.question("[1/2] (default=1): ")).trim() || "1";
  return choice === "2" ? "en" : "pt-BR";
}
