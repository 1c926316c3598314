import path from "node:path";
import { describe, expect, it } from "vitest";
import { LOCAL_WORD_FILE, createDictionary, createWordSetDictionary } from "../dictionary";
import { DictionaryUnavailableError } from "../errors";
import { silentLogger } from "./helpers";

const MISSING_FILE = path.join(__dirname, "no-such-words.txt");

describe("createDictionary", () => {
  it("accepts every word when disabled", async () => {
    const dictionary = createDictionary(false);

    expect(dictionary.enabled).toBe(false);
    expect(await dictionary.isValid("qwzx")).toBe(true);
  });

  it("loads word lists on first lookup", async () => {
    const dictionary = createDictionary(true, { logger: silentLogger, sources: [LOCAL_WORD_FILE] });
    expect(dictionary.size).toBe(0);

    expect(await dictionary.isValid("Selfie")).toBe(true);
    expect(await dictionary.isValid("qwzx")).toBe(false);
    expect(dictionary.size).toBe(10);
  });

  it("skips lists it cannot read", async () => {
    const dictionary = createDictionary(true, { logger: silentLogger, sources: [MISSING_FILE, LOCAL_WORD_FILE] });

    expect(await dictionary.isValid("podcast")).toBe(true);
  });

  it("reports itself unavailable when nothing loads, and tries again next time", async () => {
    const dictionary = createDictionary(true, { logger: silentLogger, sources: [MISSING_FILE] });

    await expect(dictionary.isValid("cat")).rejects.toBeInstanceOf(DictionaryUnavailableError);
    await expect(dictionary.isValid("cat")).rejects.toThrow("No word list could be loaded.");
  });
});

describe("createWordSetDictionary", () => {
  it("matches case-insensitively", async () => {
    const dictionary = createWordSetDictionary(["Cat", "tree"]);

    expect(dictionary.size).toBe(2);
    expect(await dictionary.isValid("CAT")).toBe(true);
    expect(await dictionary.isValid("dog")).toBe(false);
  });
});
