import { describe, expect, it } from 'vitest';
import { extractKeywords, loadStopWords } from './keywords.js';

const EMPTY_PROMPT = { objects: '', action: '', atmosphere: '' };

describe('extractKeywords', () => {
  it('keeps content words longer than two letters', () => {
    expect(extractKeywords("The giant roared a curse at Israel's army.", EMPTY_PROMPT)).toEqual(
      new Set(['giant', 'roared', 'curse', 'israel', 'army']),
    );
  });

  it('drops production jargon from prompts', () => {
    expect(
      extractKeywords('', { objects: 'cinematic 4k shot of a sword', action: '', atmosphere: 'ultra detailed' }),
    ).toEqual(new Set(['sword']));
  });

  it('reads every prompt field', () => {
    expect(
      extractKeywords('Shepherd', { objects: 'sling', action: 'running', atmosphere: 'dusk' }),
    ).toEqual(new Set(['shepherd', 'sling', 'running', 'dusk']));
  });
});

describe('loadStopWords', () => {
  it('loads the word list once', () => {
    const words = loadStopWords();
    expect(words.has('the')).toBe(true);
    expect(words.has('cinematic')).toBe(true);
    expect(loadStopWords()).toBe(words);
  });
});
