import { RETIME_MIN_FACTOR } from '../config.js';

export type NarrationTiming =
  /** Narration sped up by `factor` to fit the video; clip cut at `duration`. */
  | { retime: true; factor: number; duration: number }
  /** Narration played as is; the shorter stream ends the clip. */
  | { retime: false; factor: number; duration: number };

/**
 * Reconcile narration against footage for the TTS policy. Narration is
 * time-compressed only when the video is shorter and the required speed-up
 * exceeds RETIME_MIN_FACTOR. An unreadable video duration (0) never retimes.
 */
export function planNarrationTiming(
  videoSeconds: number,
  audioSeconds: number,
  minFactor: number = RETIME_MIN_FACTOR,
): NarrationTiming {
  if (videoSeconds > 0 && videoSeconds < audioSeconds) {
    const factor = audioSeconds / videoSeconds;
    if (factor > minFactor) return { retime: true, factor, duration: videoSeconds };
    return { retime: false, factor, duration: audioSeconds };
  }
  return { retime: false, factor: 1, duration: audioSeconds };
}
