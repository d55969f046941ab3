import fs from 'node:fs/promises';
import JSON5 from 'json5';
import { z } from 'zod';

/**
 * Maps a word to its dictionary form. Implementations are called synchronously from
 * concurrent workers sharing one event loop, so calls never overlap.
 */
export interface Normalizer {
  normalize: (word: string) => string;
}

const LemmaTableSchema = z.record(z.string(), z.string());

export const createTableNormalizer = (table: Record<string, string>): Normalizer => {
  const lemmas = new Map<string, string>();
  for (const [form, lemma] of Object.entries(table)) {
    lemmas.set(form.toLowerCase(), lemma.toLowerCase());
  }
  return {
    normalize: (word) => {
      const key = word.toLowerCase();
      return lemmas.get(key) ?? key;
    },
  };
};

/** Loads a JSON5 `{ "form": "lemma" }` table; unknown words normalize to themselves. */
export const createDictionaryNormalizer = async (filePath: string): Promise<Normalizer> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to read lemma dictionary ${filePath}`, { cause: error });
  }
  const parsed = LemmaTableSchema.safeParse(JSON5.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid lemma dictionary ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return createTableNormalizer(parsed.data);
};
