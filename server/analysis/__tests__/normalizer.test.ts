import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDictionaryNormalizer, createTableNormalizer } from '../normalizer';

describe('createTableNormalizer', () => {
  it('looks words up case-insensitively and keeps unknown ones', () => {
    const normalizer = createTableNormalizer({ Стало: 'Стать' });
    expect(normalizer.normalize('СТАЛО')).toBe('стать');
    expect(normalizer.normalize('Побег')).toBe('побег');
  });
});

describe('createDictionaryNormalizer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lemmas-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a JSON5 table with comments and trailing commas', async () => {
    const file = path.join(dir, 'lemmas.json5');
    await fs.writeFile(file, "// forms\n{ 'хочет': 'хотеть', 'началом': 'начало', }\n", 'utf-8');

    const normalizer = await createDictionaryNormalizer(file);

    expect(normalizer.normalize('хочет')).toBe('хотеть');
    expect(normalizer.normalize('началом')).toBe('начало');
  });

  it('rejects tables with non-string lemmas', async () => {
    const file = path.join(dir, 'lemmas.json5');
    await fs.writeFile(file, '{ "хочет": 1 }', 'utf-8');

    await expect(createDictionaryNormalizer(file)).rejects.toThrow(`Invalid lemma dictionary ${file}`);
  });

  it('rejects a missing file', async () => {
    const file = path.join(dir, 'absent.json5');
    await expect(createDictionaryNormalizer(file)).rejects.toThrow(`Failed to read lemma dictionary ${file}`);
  });
});
