import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { normalizeSceneFiles, parseSceneNumber } from './scene-files.js';

describe('parseSceneNumber', () => {
  it.each([
    ['scene_004.mp4', 4],
    ['P01_scene_3_1080p.mp4', 3],
    ['Scene 12 objects.mov', 12],
    ['scene-07.webm', 7],
    ['04.mkv', 4],
    ['2_wide.avi', 2],
  ])('reads %s as scene %i', (name, id) => {
    expect(parseSceneNumber(name)).toBe(id);
  });

  it.each(['notes.txt', 'scene_001.vtt', 'thumbnail.mp4', '2024_recap.mp4'])('ignores %s', (name) => {
    expect(parseSceneNumber(name)).toBeNull();
  });
});

describe('normalizeSceneFiles', () => {
  let dir: string;

  const write = (name: string, body = name) => fs.writeFileSync(path.join(dir, name), body);
  const read = (name: string) => fs.readFileSync(path.join(dir, name), 'utf-8');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipsmith-scenes-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('copies uploads to canonical names', () => {
    write('P01_scene_2_1080p.mp4');
    write('Scene 1 objects.mov');

    const copies = normalizeSceneFiles(dir);

    expect(copies.map((c) => [c.sceneId, path.basename(c.from), path.basename(c.to)])).toEqual([
      [1, 'Scene 1 objects.mov', 'scene_001.mp4'],
      [2, 'P01_scene_2_1080p.mp4', 'scene_002.mp4'],
    ]);
    expect(read('scene_002.mp4')).toBe('P01_scene_2_1080p.mp4');
    expect(fs.existsSync(path.join(dir, 'P01_scene_2_1080p.mp4'))).toBe(true);
  });

  it('never overwrites a canonical file', () => {
    write('scene_001.mp4', 'original');
    write('scene 1 retake.mp4');

    expect(normalizeSceneFiles(dir)).toEqual([]);
    expect(read('scene_001.mp4')).toBe('original');
  });

  it('takes the first upload in name order for a scene', () => {
    write('scene_3_b.mp4');
    write('scene_3_a.mp4');

    normalizeSceneFiles(dir);

    expect(read('scene_003.mp4')).toBe('scene_3_a.mp4');
  });

  it('returns nothing for a missing directory', () => {
    expect(normalizeSceneFiles(path.join(dir, 'absent'))).toEqual([]);
  });
});
