/**
 * Media transcoding engine. Every composition, normalization, concat and
 * overlay step is one `EngineJob`: inputs, a filter graph, stream maps and
 * output options. `FfmpegEngine` turns a job into an ffmpeg argument vector
 * and runs it to completion before returning; tests swap in a fake that
 * records jobs instead.
 */
import { spawnSync } from 'child_process';
import { env } from '../config.js';
import { MediaEngineError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ── Job description ───────────────────────────────────────────────────────────

export interface EngineInput {
  path: string;
  /** Loop the input indefinitely (`-stream_loop -1`). */
  loop?: boolean;
  /** Read the input as a concat-demuxer list. */
  concatList?: boolean;
}

export interface EngineJob {
  /** Short identifier used in logs and errors, e.g. `scene-3:base`. */
  label: string;
  inputs: EngineInput[];
  filterComplex?: string;
  videoFilter?: string;
  audioFilter?: string;
  maps?: string[];
  outputOptions?: string[];
  output: string;
}

export type EngineResult =
  | { ok: true }
  | { ok: false; error: MediaEngineError };

export interface MediaEngine {
  run(job: EngineJob): Promise<EngineResult>;
}

// ── ffmpeg ────────────────────────────────────────────────────────────────────

const STDERR_TAIL = 2000;

export function buildFfmpegArgs(job: EngineJob): string[] {
  const args = ['-y', '-nostdin'];
  for (const input of job.inputs) {
    if (input.loop) args.push('-stream_loop', '-1');
    if (input.concatList) args.push('-f', 'concat', '-safe', '0');
    args.push('-i', input.path);
  }
  if (job.filterComplex) args.push('-filter_complex', job.filterComplex);
  if (job.videoFilter) args.push('-vf', job.videoFilter);
  if (job.audioFilter) args.push('-af', job.audioFilter);
  for (const map of job.maps ?? []) args.push('-map', map);
  args.push(...(job.outputOptions ?? []), job.output);
  return args;
}

export class FfmpegEngine implements MediaEngine {
  constructor(private readonly binary: string = env.FFMPEG_PATH) {}

  async run(job: EngineJob): Promise<EngineResult> {
    const args = buildFfmpegArgs(job);
    logger.debug(`FFmpeg [${job.label}]`, { args });

    const proc = spawnSync(this.binary, args, {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    });

    if (proc.error) {
      return { ok: false, error: new MediaEngineError(job.label, null, proc.error.message, proc.error) };
    }
    if (proc.status !== 0) {
      const stderr = (proc.stderr ?? '').slice(-STDERR_TAIL);
      return { ok: false, error: new MediaEngineError(job.label, proc.status, stderr) };
    }
    return { ok: true };
  }
}
