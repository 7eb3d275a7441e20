import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { countWords, getDefaultStopwords, loadStopwords, tokenizeLyrics } from '../wordFrequency';

describe('tokenizeLyrics', () => {
  const stopwords = new Set(['the', 'oh']);

  it('drops section headers, punctuation, stopwords and one-letter words', () => {
    const lyrics = '[Verse 1: Artist1]\nOh, the Sunny days!\nA sunny NIGHT\n[Chorus]\nCafé - café';

    expect(tokenizeLyrics(lyrics, stopwords)).toEqual(['sunny', 'days', 'sunny', 'night', 'café', 'café']);
  });

  it('returns nothing for empty lyrics', () => {
    expect(tokenizeLyrics('  \n ', stopwords)).toEqual([]);
  });
});

describe('getDefaultStopwords', () => {
  it('loads the bundled list', () => {
    const stopwords = getDefaultStopwords();

    expect(stopwords.has('the')).toBe(true);
    expect(stopwords.has('yeah')).toBe(true);
    expect(stopwords.has('sunny')).toBe(false);
  });
});

describe('loadStopwords', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'stopwords-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('lowercases the listed words', async () => {
    const file = path.join(directory, 'words.json');
    await fs.writeFile(file, JSON.stringify({ description: 'test list', words: ['The', 'OH'] }));

    expect([...loadStopwords(file)]).toEqual(['the', 'oh']);
  });

  it('rejects a file whose words are not all strings', async () => {
    const file = path.join(directory, 'broken.json');
    await fs.writeFile(file, JSON.stringify({ words: ['the', 3] }));

    expect(() => loadStopwords(file)).toThrow(`Stopword file ${file} is invalid`);
  });

  it('rejects a file without a word list', async () => {
    const file = path.join(directory, 'empty.json');
    await fs.writeFile(file, JSON.stringify({ description: 'no words' }));

    expect(() => loadStopwords(file)).toThrow(/is invalid: Required/);
  });
});

describe('countWords', () => {
  it('ranks by count, then alphabetically', () => {
    expect(countWords(['night', 'sunny', 'days', 'sunny', 'night', 'sunny', 'alpha'])).toEqual([
      { word: 'sunny', count: 3 },
      { word: 'night', count: 2 },
      { word: 'alpha', count: 1 },
      { word: 'days', count: 1 },
    ]);
  });

  it('applies the limit after ranking', () => {
    expect(countWords(['b', 'a', 'b'], 1)).toEqual([{ word: 'b', count: 2 }]);
  });
});
