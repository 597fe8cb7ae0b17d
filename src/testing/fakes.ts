/**
 * Deterministic stand-ins for the transcoding engine and duration probe,
 * plus work-unit builders for tests.
 */
import type { FrameFormat } from '../config.js';
import type { Scene, WorkUnit } from '../domain/types.js';
import { AudioPriority } from '../domain/types.js';
import type { EngineJob, EngineResult, MediaEngine } from '../media/engine.js';
import type { DurationProbe } from '../media/probe.js';
import type { MemoryArtifactStore } from '../store/memory.js';
import { runPaths } from '../store/paths.js';
import { MediaEngineError } from '../utils/errors.js';

export const MIB = 1024 * 1024;

export interface FakeEngineOptions {
  /** Size of every output written on success. */
  outputBytes?: number;
  /** Jobs matching this fail with a non-zero exit and write nothing. */
  failWhen?: (job: EngineJob) => boolean;
}

/** Records submitted jobs and writes their outputs into a memory store. */
export class FakeMediaEngine implements MediaEngine {
  readonly jobs: EngineJob[] = [];

  constructor(
    private readonly store: MemoryArtifactStore,
    private readonly opts: FakeEngineOptions = {},
  ) {}

  async run(job: EngineJob): Promise<EngineResult> {
    this.jobs.push(job);
    if (this.opts.failWhen?.(job)) {
      return { ok: false, error: new MediaEngineError(job.label, 1, `simulated failure: ${job.label}`) };
    }
    this.store.writeBytes(job.output, this.opts.outputBytes ?? 2 * MIB);
    return { ok: true };
  }

  labels(): string[] {
    return this.jobs.map((j) => j.label);
  }

  job(label: string): EngineJob | undefined {
    return this.jobs.find((j) => j.label === label);
  }
}

/** Durations by path; unknown paths probe as 0 (unreadable). */
export class FakeDurationProbe implements DurationProbe {
  private readonly table: Map<string, number>;

  constructor(entries: Iterable<readonly [string, number]> = []) {
    this.table = new Map(entries);
  }

  set(filePath: string, seconds: number): void {
    this.table.set(filePath, seconds);
  }

  async duration(filePath: string): Promise<number> {
    return this.table.get(filePath) ?? 0;
  }
}

// ── Builders ──────────────────────────────────────────────────────────────────

export const TEST_DATA_DIR = '/srv/clipsmith-test';

export function testUnit(
  runId = 'test-run',
  overrides: Partial<Omit<WorkUnit, 'paths'>> = {},
): WorkUnit {
  const format: FrameFormat = overrides.format ?? 'landscape';
  return {
    id: runId,
    index: null,
    title: runId,
    status: 'scenes_ready',
    endCard: false,
    ...overrides,
    format,
    paths: runPaths(TEST_DATA_DIR, runId),
  };
}

export function testScene(id: number, overrides: Partial<Scene> = {}): Scene {
  return {
    id,
    narration: `Scene ${id} narration`,
    characters: [],
    durationTarget: null,
    audioPriority: AudioPriority.Tts,
    prompt: { objects: '', action: '', atmosphere: '' },
    ...overrides,
  };
}
