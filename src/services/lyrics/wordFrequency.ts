import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { WordWeight } from '../../rendering/ChartRenderer';

export const STOPWORDS_PATH = path.resolve(__dirname, '../../../data/stopwords.json');

// Matches "[Chorus]", "[Verse 2: Artist]" and similar section markers.
const SECTION_HEADER = /\[[^\]]*\]/g;
const NON_WORD = /[^\p{L}\p{N}_]/gu;
const MIN_WORD_LENGTH = 2;

let defaultStopwords: ReadonlySet<string> | null = null;

const stopwordFileSchema = z.object({
  words: z.array(z.string()),
});

export function loadStopwords(filePath = STOPWORDS_PATH): ReadonlySet<string> {
  const parsed = stopwordFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  if (!parsed.success) {
    throw new Error(`Stopword file ${filePath} is invalid: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`);
  }
  return new Set(parsed.data.words.map((word) => word.toLowerCase()));
}

export function getDefaultStopwords(): ReadonlySet<string> {
  if (!defaultStopwords) {
    defaultStopwords = loadStopwords();
  }
  return defaultStopwords;
}

export function tokenizeLyrics(text: string, stopwords: ReadonlySet<string> = getDefaultStopwords()): string[] {
  return text
    .replace(SECTION_HEADER, ' ')
    .split(/\s+/)
    .map((raw) => raw.replace(NON_WORD, '').toLowerCase())
    .filter((word) => word.length >= MIN_WORD_LENGTH && !stopwords.has(word));
}

/** Most frequent first; ties broken alphabetically so output is stable. */
export function countWords(words: readonly string[], limit?: number): WordWeight[] {
  const counts = new Map<string, number>();
  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  const ranked = [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
  return limit === undefined ? ranked : ranked.slice(0, limit);
}
