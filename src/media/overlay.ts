/**
 * CTA end-card compositor — keys a green-screen end card over the last
 * five seconds of a merged video.
 *
 * Never fails the caller: every problem is logged and reported in the
 * returned outcome, and the input video is left untouched unless the
 * composite succeeded.
 */
import { END_CARD, type FrameFormat } from '../config.js';
import type { ArtifactKey, ArtifactStore } from '../store/artifacts.js';
import { logger } from '../utils/logger.js';
import type { MediaEngine } from './engine.js';
import { endCardGraph, videoEncodeOptions } from './filters.js';
import type { DurationProbe } from './probe.js';

export interface OverlayDeps {
  engine: MediaEngine;
  probe: DurationProbe;
  store: ArtifactStore;
}

export interface OverlayRequest {
  video: ArtifactKey;
  endCard: ArtifactKey;
  /** Working file; replaces `video` on success. */
  draft: ArtifactKey;
  format: FrameFormat;
}

export type OverlayOutcome =
  | { status: 'applied'; start: number; end: number }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

/** Overlay window `[max(0, D - 5), D]`. */
export function endCardWindow(duration: number): { start: number; end: number } {
  return { start: Math.max(0, duration - END_CARD.windowSeconds), end: duration };
}

export async function applyEndCard(req: OverlayRequest, deps: OverlayDeps): Promise<OverlayOutcome> {
  const { engine, probe, store } = deps;

  if (!store.exists(req.endCard)) {
    logger.warn('Overlay: end card not found, skipping', { endCard: req.endCard.path });
    return { status: 'skipped', reason: 'end card missing' };
  }

  const duration = await probe.duration(req.video.path);
  if (duration <= 0) {
    logger.error('Overlay: video duration unreadable', { video: req.video.path });
    return { status: 'failed', reason: 'video duration unreadable' };
  }
  const { start, end } = endCardWindow(duration);

  logger.info('Overlay: applying end card', { video: req.video.path, format: req.format, start, end });
  store.prepare(req.draft);
  const result = await engine.run({
    label: 'overlay:end-card',
    inputs: [{ path: req.video.path }, { path: req.endCard.path, loop: true }],
    filterComplex: endCardGraph(req.format, start, end),
    maps: ['[v]', '0:a?'],
    outputOptions: [...videoEncodeOptions(), '-c:a', 'copy', '-shortest'],
    output: req.draft.path,
  });

  if (!result.ok || !store.exists(req.draft)) {
    store.remove(req.draft);
    const reason = result.ok ? 'overlay produced no output' : result.error.message;
    logger.error('Overlay: failed, keeping merged video', {
      video: req.video.path,
      ...(result.ok ? {} : { error: result.error }),
    });
    return { status: 'failed', reason };
  }

  store.move(req.draft, req.video);
  logger.info('Overlay: end card applied', { video: req.video.path });
  return { status: 'applied', start, end };
}
