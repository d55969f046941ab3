import fs from 'node:fs/promises';
import path from 'node:path';
import type { ChargedLexicon } from './scoring';

export const parseWordList = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter(Boolean);

export const loadChargedWords = async (dir: string): Promise<ChargedLexicon> => {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    throw new Error(`Charged words directory is not readable: ${dir}`, { cause: error });
  }

  const files = entries.filter((name) => name.endsWith('.txt')).sort();
  if (!files.length) {
    throw new Error(`No charged word lists (*.txt) found in ${dir}`);
  }

  const words = new Set<string>();
  for (const file of files) {
    const content = await fs.readFile(path.join(dir, file), 'utf-8');
    for (const word of parseWordList(content)) {
      words.add(word);
    }
  }
  return words;
};
