import fs from "node:fs/promises";
import path from "node:path";
import wordListPath from "word-list";
import type { Logger } from "pino";
import { DictionaryUnavailableError, describeError } from "./errors";

export interface Dictionary {
  readonly enabled: boolean;
  /** Number of known words; 0 until the list has loaded. */
  readonly size: number;
  isValid(word: string): Promise<boolean>;
}

export interface DictionaryOptions {
  logger?: Logger;
  /** Word list files, read and merged on first lookup. */
  sources?: string[];
}

export const LOCAL_WORD_FILE = path.join(__dirname, "..", "wordlist.txt");

function parseWords(raw: string): Set<string> {
  const words = raw
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter((line) => /^[a-z]+$/.test(line));
  return new Set(words);
}

async function readWordFile(filePath: string): Promise<Set<string>> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseWords(raw);
}

const permissiveDictionary: Dictionary = {
  enabled: false,
  size: 0,
  isValid: async () => true,
};

export function createWordSetDictionary(words: Iterable<string>): Dictionary {
  const known = new Set<string>();
  for (const word of words) {
    known.add(word.toLowerCase());
  }

  return {
    enabled: true,
    size: known.size,
    isValid: async (word: string) => known.has(word.toLowerCase()),
  };
}

/**
 * Word-list backed dictionary. The lists load lazily; a failed load
 * surfaces as {@link DictionaryUnavailableError} and is retried on the
 * next lookup.
 */
export function createDictionary(enabled: boolean, options: DictionaryOptions = {}): Dictionary {
  if (!enabled) {
    return permissiveDictionary;
  }

  const sources = options.sources ?? [wordListPath, LOCAL_WORD_FILE];
  const logger = options.logger;
  let words: Set<string> | null = null;
  let loading: Promise<Set<string>> | null = null;

  const load = async (): Promise<Set<string>> => {
    const merged = new Set<string>();
    for (const source of sources) {
      try {
        for (const word of await readWordFile(source)) {
          merged.add(word);
        }
      } catch (error) {
        logger?.warn({ source, err: describeError(error) }, "skipping unreadable word list");
      }
    }

    if (merged.size === 0) {
      throw new DictionaryUnavailableError("No word list could be loaded.");
    }

    logger?.info({ size: merged.size }, "dictionary loaded");
    return merged;
  };

  const ensureLoaded = async (): Promise<Set<string>> => {
    if (words) {
      return words;
    }

    loading ??= load();
    try {
      words = await loading;
      return words;
    } catch (error) {
      loading = null;
      if (error instanceof DictionaryUnavailableError) {
        throw error;
      }
      throw new DictionaryUnavailableError("Dictionary failed to load.", error);
    }
  };

  return {
    enabled: true,
    get size() {
      return words?.size ?? 0;
    },
    isValid: async (word: string) => {
      const known = await ensureLoaded();
      return known.has(word.toLowerCase());
    },
  };
}
