/**
 * Subtitle compositor — burns a WebVTT track into an already composed clip
 * with the fixed caption style. Audio is stream-copied.
 */
import * as path from 'path';
import type { ArtifactKey, ArtifactStore } from '../store/artifacts.js';
import type { EngineResult, MediaEngine } from './engine.js';
import { subtitlesFilter, videoEncodeOptions } from './filters.js';

const WEBVTT_HEADER = 'WEBVTT';

/** A caption track is usable when it is non-trivially sized and carries the WebVTT header. */
export function hasCaptionTrack(store: ArtifactStore, caption: ArtifactKey): boolean {
  if (!store.exists(caption)) return false;
  const text = store.open(caption)?.toString('utf-8') ?? '';
  return text.replace(/^\uFEFF/, '').trimStart().startsWith(WEBVTT_HEADER);
}

export async function burnCaptions(
  engine: MediaEngine,
  label: string,
  input: string,
  caption: string,
  output: string,
): Promise<EngineResult> {
  return engine.run({
    label,
    inputs: [{ path: input }],
    videoFilter: subtitlesFilter(path.resolve(caption)),
    outputOptions: [...videoEncodeOptions(), '-c:a', 'copy'],
    output,
  });
}
