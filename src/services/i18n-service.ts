import fs from "fs/promises";
import path from "path";
import { glob } from "glob";
import { describeError } from "../types/errors";

/**
 * UI strings of one language, keyed by dotted ids (e.g. "ui.done")
 */
export type LanguagePack = Record<string, string>;

export type LanguagePacks = Record<string, LanguagePack>;

export type TranslateFn = (
  key: string,
  vars?: Record<string, string | number>
) => string;

export interface Translator {
  t: TranslateFn;
  /** Language actually in use after normalization and fallback */
  lang: string;
}

export interface LoadedLanguagePacks {
  packs: LanguagePacks;
  /** Files that could not be read or were not a flat string map */
  warnings: string[];
}

export const DEFAULT_LANG = "en";

const PT_BR_ALIASES = ["pt", "ptbr", "pt-br", "pt_br", "ptbrasil"];
const EN_ALIASES = ["en", "en-us", "en_us", "english"];

/**
 * Default location of the bundled language packs (`<package root>/i18n`)
 */
export const DEFAULT_I18N_DIRECTORY = path.resolve(__dirname, "..", "..", "i18n");

function toLanguagePack(value: unknown): LanguagePack | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const pack: LanguagePack = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      pack[key] = entry;
    }
  }
  return pack;
}

/**
 * Loads every `<lang>.json` file in a directory
 * @param directory - Folder holding the language packs
 * @returns The packs keyed by file stem, plus warnings for skipped files
 */
export async function loadLanguagePacks(
  directory: string
): Promise<LoadedLanguagePacks> {
  const packs: LanguagePacks = {};
  const warnings: string[] = [];

  const files = await glob("*.json", { cwd: directory, absolute: true, nodir: true });

  for (const file of files.sort()) {
    const lang = path.basename(file, ".json");
    try {
      const pack = toLanguagePack(JSON.parse(await fs.readFile(file, "utf-8")));
      if (pack) {
        packs[lang] = pack;
      } else {
        warnings.push(`${path.basename(file)}: expected an object of strings`);
      }
    } catch (error) {
      warnings.push(`${path.basename(file)}: ${describeError(error)}`);
    }
  }

  return { packs, warnings };
}

/**
 * Maps common spellings of the supported languages to their canonical code
 * @example normalizeLang("PT_BR") // "pt-BR"
 */
export function normalizeLang(raw: string | undefined): string {
  const value = (raw ?? "").trim();
  if (!value) {
    return "";
  }

  const lower = value.toLowerCase();
  if (PT_BR_ALIASES.includes(lower)) {
    return "pt-BR";
  }
  if (EN_ALIASES.includes(lower)) {
    return "en";
  }
  return value;
}

/**
 * Creates a translator for a language, falling back to English for unknown
 * languages and to the key itself for missing strings
 */
export function makeTranslator(packs: LanguagePacks, rawLang: string): Translator {
  const normalized = normalizeLang(rawLang);
  const lang = normalized in packs ? normalized : DEFAULT_LANG;

  const t: TranslateFn = (key, vars = {}) => {
    const template = packs[lang]?.[key] ?? packs[DEFAULT_LANG]?.[key] ?? key;
    return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
      name in vars ? String(vars[name]) : placeholder
    );
  };

  return { t, lang };
}
