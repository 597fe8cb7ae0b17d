import { describe, expect, it } from 'vitest';
import { buildFfmpegArgs, FfmpegEngine } from './engine.js';
import { FfprobeDurationProbe } from './probe.js';

const MISSING_BINARY = '/nonexistent/clipsmith-ffmpeg';

describe('buildFfmpegArgs', () => {
  it('orders inputs, graphs, maps and output options', () => {
    expect(
      buildFfmpegArgs({
        label: 'scene-1:base',
        inputs: [{ path: 'in.mp4' }, { path: 'narration.mp3' }],
        filterComplex: '[0:v]null[v]',
        maps: ['[v]', '1:a'],
        outputOptions: ['-t', '5', '-shortest'],
        output: 'out.mp4',
      }),
    ).toEqual([
      '-y', '-nostdin',
      '-i', 'in.mp4',
      '-i', 'narration.mp3',
      '-filter_complex', '[0:v]null[v]',
      '-map', '[v]',
      '-map', '1:a',
      '-t', '5', '-shortest',
      'out.mp4',
    ]);
  });

  it('flags looped and concat-list inputs before their -i', () => {
    expect(
      buildFfmpegArgs({
        label: 'overlay',
        inputs: [{ path: 'list.txt', concatList: true }, { path: 'card.mp4', loop: true }],
        output: 'out.mp4',
      }),
    ).toEqual([
      '-y', '-nostdin',
      '-f', 'concat', '-safe', '0', '-i', 'list.txt',
      '-stream_loop', '-1', '-i', 'card.mp4',
      'out.mp4',
    ]);
  });

  it('emits simple video and audio filters', () => {
    expect(
      buildFfmpegArgs({
        label: 'filters',
        inputs: [{ path: 'a.mp4' }],
        videoFilter: 'scale=2:2',
        audioFilter: 'aresample=48000',
        output: 'b.mp4',
      }),
    ).toEqual(['-y', '-nostdin', '-i', 'a.mp4', '-vf', 'scale=2:2', '-af', 'aresample=48000', 'b.mp4']);
  });
});

describe('FfmpegEngine', () => {
  it('reports a binary that cannot be spawned', async () => {
    const result = await new FfmpegEngine(MISSING_BINARY).run({
      label: 'scene-1:base',
      inputs: [{ path: 'in.mp4' }],
      output: 'out.mp4',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.exitCode).toBeNull();
    expect(result.error.label).toBe('scene-1:base');
    expect(result.error.message).toBe('Media job scene-1:base failed (exit n/a)');
  });
});

describe('FfprobeDurationProbe', () => {
  it('reads an unavailable probe as zero', async () => {
    expect(await new FfprobeDurationProbe(MISSING_BINARY).duration('missing.mp4')).toBe(0);
  });
});
