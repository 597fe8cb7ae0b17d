import type { FrameFormat } from '../config.js';
import type { UnitPaths } from '../store/paths.js';

export type { FrameFormat };

// ── Audio Priority ────────────────────────────────────────────────────────────

export const AudioPriority = {
  Tts:    'tts',
  Source: 'source',
  Mix:    'mix',
} as const;

export type AudioPriority = typeof AudioPriority[keyof typeof AudioPriority];

// ── Scene ─────────────────────────────────────────────────────────────────────

/** Free-text prompt fields; only used as a matching signal. */
export interface PromptFields {
  objects: string;
  action: string;
  atmosphere: string;
}

export interface Scene {
  readonly id: number;
  readonly narration: string;
  readonly characters: readonly string[];
  readonly durationTarget: number | null;
  readonly audioPriority: AudioPriority;
  readonly prompt: Readonly<PromptFields>;
}

// ── Work Unit ─────────────────────────────────────────────────────────────────

export const UNIT_STATUSES = [
  'pending',
  'scripted',
  'tts_done',
  'scenes_ready',
  'rendered',
  'merged',
] as const;

export type UnitStatus = typeof UNIT_STATUSES[number];

/** A chapter or standalone run, with the paths every stage resolves against. */
export interface WorkUnit {
  readonly id: string;
  /** Chapter index within a project; null for standalone runs. */
  readonly index: number | null;
  readonly title: string;
  readonly format: FrameFormat;
  readonly status: UnitStatus;
  /** Shorts and the introduction chapter close on the CTA end card. */
  readonly endCard: boolean;
  readonly paths: UnitPaths;
}

// ── Matching ──────────────────────────────────────────────────────────────────

export type MatchMethod = 'manual' | 'auto' | 'unassigned';

export interface MatchRecord {
  slotId: number;
  sourceUnit: string | null;
  sourceSceneId: number | null;
  method: MatchMethod;
  score?: number;
  rationale?: string;
}
