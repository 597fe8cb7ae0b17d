/**
 * Scene matcher — assigns one existing source scene to each target slot.
 *
 * Per slot, in order:
 *   1. a manual entry whose source footage exists wins outright
 *   2. otherwise every candidate is scored
 *        text        sequence ratio of the lower-cased narrations
 *        characters  Jaccard of lower-cased character ids (flat bonus when both are empty)
 *        keywords    Jaccard of narration + prompt keywords (only when both sides have some)
 *      and candidates already assigned lose the reuse penalty
 *   3. the highest score wins; ties go to the earliest candidate
 *
 * Pure and deterministic: no I/O, no randomness.
 */
import { MATCHING } from '../config.js';
import type { MatchRecord, PromptFields } from '../domain/types.js';
import { extractKeywords } from '../text/keywords.js';
import { jaccard, sequenceRatio } from '../text/similarity.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface MatchText {
  narration: string;
  characters: readonly string[];
  prompt: Readonly<PromptFields>;
}

export interface Slot extends MatchText {
  id: number;
}

export interface Candidate extends MatchText {
  sourceUnit: string;
  sourceSceneId: number;
}

export interface ManualEntry {
  sourceUnit: string;
  sourceSceneId: number;
  rationale?: string;
}

export interface MatchWeights {
  text: number;
  characters: number;
  keywords: number;
  sceneryBonus: number;
  reusePenalty: number;
}

export type ScoreFn = (slot: MatchText, candidate: MatchText, weights: MatchWeights) => number;

export interface MatchOptions {
  manualMap?: ReadonlyMap<number, ManualEntry>;
  /** Whether a manual entry's source footage is present; entries are ignored when false. */
  sourceExists?: (sourceUnit: string, sourceSceneId: number) => boolean;
  weights?: Partial<MatchWeights>;
  score?: ScoreFn;
}

export const DEFAULT_WEIGHTS: MatchWeights = {
  text:         MATCHING.weights.text,
  characters:   MATCHING.weights.characters,
  keywords:     MATCHING.weights.keywords,
  sceneryBonus: MATCHING.sceneryBonus,
  reusePenalty: MATCHING.reusePenalty,
};

const DEFAULT_RATIONALE = 'manual override';

// ── Scoring ───────────────────────────────────────────────────────────────────

const lowerSet = (values: readonly string[]): Set<string> => new Set(values.map((v) => v.toLowerCase()));

export const scoreMatch: ScoreFn = (slot, candidate, weights) => {
  let score = weights.text * sequenceRatio(slot.narration.toLowerCase(), candidate.narration.toLowerCase());

  const slotChars = lowerSet(slot.characters);
  const candChars = lowerSet(candidate.characters);
  if (slotChars.size > 0 && candChars.size > 0) score += weights.characters * jaccard(slotChars, candChars);
  else if (slotChars.size === 0 && candChars.size === 0) score += weights.sceneryBonus;

  const slotWords = extractKeywords(slot.narration, slot.prompt);
  const candWords = extractKeywords(candidate.narration, candidate.prompt);
  if (slotWords.size > 0 && candWords.size > 0) score += weights.keywords * jaccard(slotWords, candWords);

  return score;
};

const round3 = (n: number): number => Math.round(n * 1000) / 1000;

const sourceKey = (unit: string, sceneId: number): string => `${unit}#${sceneId}`;

// ── Assignment ────────────────────────────────────────────────────────────────

export function matchScenes(
  slots: readonly Slot[],
  candidates: readonly Candidate[],
  opts: MatchOptions = {},
): MatchRecord[] {
  const weights: MatchWeights = { ...DEFAULT_WEIGHTS, ...opts.weights };
  const score = opts.score ?? scoreMatch;
  const sourceExists = opts.sourceExists ?? (() => true);
  const used = new Set<string>();
  const records: MatchRecord[] = [];

  for (const slot of slots) {
    const manual = opts.manualMap?.get(slot.id);
    if (manual && sourceExists(manual.sourceUnit, manual.sourceSceneId)) {
      used.add(sourceKey(manual.sourceUnit, manual.sourceSceneId));
      records.push({
        slotId: slot.id,
        sourceUnit: manual.sourceUnit,
        sourceSceneId: manual.sourceSceneId,
        method: 'manual',
        rationale: manual.rationale ?? DEFAULT_RATIONALE,
      });
      continue;
    }

    let best: Candidate | null = null;
    let bestScore = -Infinity;
    for (const candidate of candidates) {
      const penalty = used.has(sourceKey(candidate.sourceUnit, candidate.sourceSceneId)) ? weights.reusePenalty : 0;
      const s = score(slot, candidate, weights) - penalty;
      if (s > bestScore) {
        bestScore = s;
        best = candidate;
      }
    }

    if (!best) {
      records.push({ slotId: slot.id, sourceUnit: null, sourceSceneId: null, method: 'unassigned' });
      continue;
    }
    used.add(sourceKey(best.sourceUnit, best.sourceSceneId));
    records.push({
      slotId: slot.id,
      sourceUnit: best.sourceUnit,
      sourceSceneId: best.sourceSceneId,
      method: 'auto',
      score: round3(bestScore),
    });
  }
  return records;
}
