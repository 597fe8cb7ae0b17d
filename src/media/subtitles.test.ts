import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { MemoryArtifactStore } from '../store/memory.js';
import { FakeMediaEngine } from '../testing/fakes.js';
import { subtitlesFilter } from './filters.js';
import { burnCaptions, hasCaptionTrack } from './subtitles.js';

const caption = { kind: 'caption', path: '/srv/run/assets/audio_001.vtt' } as const;

describe('hasCaptionTrack', () => {
  it('accepts a WebVTT file', () => {
    const store = new MemoryArtifactStore();
    store.writeFile(caption.path, 'WEBVTT\n\n00:00.000 --> 00:02.000\nHello\n');
    expect(hasCaptionTrack(store, caption)).toBe(true);
  });

  it('accepts a byte-order mark and leading blank lines', () => {
    const store = new MemoryArtifactStore();
    store.writeFile(caption.path, '\uFEFF\n\nWEBVTT\n\n00:00.000 --> 00:02.000\nHello\n');
    expect(hasCaptionTrack(store, caption)).toBe(true);
  });

  it('rejects SRT content and near-empty files', () => {
    const store = new MemoryArtifactStore();
    store.writeFile(caption.path, '1\n00:00:00,000 --> 00:00:02,000\nHello\n');
    expect(hasCaptionTrack(store, caption)).toBe(false);

    store.writeFile(caption.path, 'WEBVTT\n');
    expect(hasCaptionTrack(store, caption)).toBe(false);
  });

  it('rejects a missing file', () => {
    expect(hasCaptionTrack(new MemoryArtifactStore(), caption)).toBe(false);
  });
});

describe('burnCaptions', () => {
  it('re-encodes video and copies audio', async () => {
    const store = new MemoryArtifactStore();
    const engine = new FakeMediaEngine(store);

    const result = await burnCaptions(engine, 'scene-1:captions', 'in.mp4', 'assets/audio_001.vtt', 'out.mp4');

    expect(result).toEqual({ ok: true });
    expect(engine.jobs[0]).toEqual({
      label: 'scene-1:captions',
      inputs: [{ path: 'in.mp4' }],
      videoFilter: subtitlesFilter(path.resolve('assets/audio_001.vtt')),
      outputOptions: ['-c:v', 'libx264', '-preset', 'fast', '-crf', '18', '-pix_fmt', 'yuv420p', '-c:a', 'copy'],
      output: 'out.mp4',
    });
    expect(store.has('out.mp4')).toBe(true);
  });
});
