import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { PromptFields } from '../domain/types.js';

const StopWordsSchema = z.object({ stopWords: z.array(z.string()) });

const STOP_WORDS_PATH = fileURLToPath(new URL('../../assets/keyword-stopwords.json', import.meta.url));

let stopWords: ReadonlySet<string> | null = null;

/** Stop-words plus generic production jargon ("cinematic", "4k", …), loaded once. */
export function loadStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    const raw: unknown = JSON.parse(fs.readFileSync(STOP_WORDS_PATH, 'utf-8'));
    stopWords = new Set(StopWordsSchema.parse(raw).stopWords.map((w) => w.toLowerCase()));
  }
  return stopWords;
}

/**
 * Lower-case alphabetic tokens longer than two characters from narration
 * and prompt fields, minus stop-words.
 */
export function extractKeywords(narration: string, prompt: Readonly<PromptFields>): Set<string> {
  const text = [narration, prompt.objects, prompt.action, prompt.atmosphere].join(' ').toLowerCase();
  const stop = loadStopWords();
  const out = new Set<string>();
  for (const word of text.match(/[a-z]+/g) ?? []) {
    if (word.length > 2 && !stop.has(word)) out.add(word);
  }
  return out;
}
