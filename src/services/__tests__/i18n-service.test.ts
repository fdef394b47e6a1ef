import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import {
  DEFAULT_I18N_DIRECTORY,
  loadLanguagePacks,
  makeTranslator,
  normalizeLang,
} from "../i18n-service";

describe("loadLanguagePacks", () => {
  let folder: string;

  beforeEach(async () => {
    folder = await mkdtemp(path.join(tmpdir(), "jira-jsonl-i18n-"));
    await writeFile(
      path.join(folder, "en.json"),
      JSON.stringify({ greet: "Hello {name}", "only.en": "EN" })
    );
    await writeFile(path.join(folder, "pt-BR.json"), JSON.stringify({ greet: "Olá {name}" }));
    await writeFile(path.join(folder, "broken.json"), "{not json");
    await writeFile(path.join(folder, "list.json"), "[1, 2]");
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  it("should load every valid pack and warn about the rest", async () => {
    const { packs, warnings } = await loadLanguagePacks(folder);

    expect(Object.keys(packs).sort()).toEqual(["en", "pt-BR"]);
    expect(warnings).toHaveLength(2);
    expect(warnings[0].startsWith("broken.json: SyntaxError: ")).toBe(true);
    expect(warnings[1]).toBe("list.json: expected an object of strings");
  });

  it("should return no packs for a missing folder", async () => {
    const { packs } = await loadLanguagePacks(path.join(folder, "missing"));

    expect(packs).toEqual({});
  });

  it("should ship matching English and Portuguese packs", async () => {
    const { packs, warnings } = await loadLanguagePacks(DEFAULT_I18N_DIRECTORY);

    expect(warnings).toEqual([]);
    expect(Object.keys(packs["pt-BR"]).sort()).toEqual(Object.keys(packs.en).sort());
  });
});

describe("normalizeLang", () => {
  it.each([
    ["pt", "pt-BR"],
    ["PT_BR", "pt-BR"],
    ["ptbrasil", "pt-BR"],
    ["en-US", "en"],
    ["English", "en"],
    [" fr ", "fr"],
    ["", ""],
  ])("should map %j to %j", (raw, expected) => {
    expect(normalizeLang(raw)).toBe(expected);
  });
});

describe("makeTranslator", () => {
  const packs = {
    en: { greet: "Hello {name}", "only.en": "EN", count: "{n} files" },
    "pt-BR": { greet: "Olá {name}" },
  };

  it("should translate with placeholder substitution", () => {
    const { t, lang } = makeTranslator(packs, "pt");

    expect(lang).toBe("pt-BR");
    expect(t("greet", { name: "Ana" })).toBe("Olá Ana");
  });

  it("should fall back to English, then to the key", () => {
    const { t } = makeTranslator(packs, "pt-BR");

    expect(t("only.en")).toBe("EN");
    expect(t("count", { n: 3 })).toBe("3 files");
    expect(t("missing.key")).toBe("missing.key");
  });

  it("should use English for unknown languages", () => {
    expect(makeTranslator(packs, "fr").lang).toBe("en");
    expect(makeTranslator(packs, "").lang).toBe("en");
  });

  it("should leave unknown placeholders untouched", () => {
    const { t } = makeTranslator(packs, "en");

    expect(t("greet")).toBe("Hello {name}");
  });
});
