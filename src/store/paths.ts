/**
 * Directory layouts. A `UnitPaths` value is built once per work unit and
 * passed to every stage; nothing here touches the filesystem.
 *
 *   {DATA_DIR}/runs/{runId}/                  standalone run
 *   {DATA_DIR}/projects/{slug}/               project
 *     ├── project.json
 *     ├── ch{NN}_{chapterSlug}/               chapter work unit
 *     └── final/master_{slug}.mp4
 */
import * as path from 'path';
import type { FrameFormat } from '../config.js';

export interface UnitPaths {
  readonly root: string;
  readonly assetsDir: string;
  readonly scenesDir: string;
  readonly clipsDir: string;
  readonly normalizedDir: string;
  readonly concatList: string;
  readonly output: string;
  readonly outputDraft: string;
  readonly overlayDraft: string;
  readonly script: string;
  readonly manualMap: string;
  readonly matchAudit: string;
  sceneVideo(sceneId: number): string;
  narration(sceneId: number): string;
  caption(sceneId: number): string;
  clip(sceneId: number): string;
  clipDraft(sceneId: number): string;
  normalizedClip(sceneId: number): string;
}

export interface ProjectPaths {
  readonly root: string;
  readonly projectFile: string;
  readonly finalDir: string;
  readonly master: string;
  readonly masterDraft: string;
  readonly masterList: string;
  chapterDir(index: number, chapterSlug: string): string;
}

export const pad3 = (n: number): string => String(n).padStart(3, '0');
const pad2 = (n: number): string => String(n).padStart(2, '0');

export const sceneFileName = (sceneId: number, ext = 'mp4'): string => `scene_${pad3(sceneId)}.${ext}`;
export const clipFileName  = (sceneId: number): string => `clip_${pad3(sceneId)}.mp4`;

/** Swap a `.mp4` suffix for `{suffix}.mp4`. */
function withSuffix(file: string, suffix: string): string {
  return file.replace(/\.mp4$/, `${suffix}.mp4`);
}

interface LayoutDirs {
  root: string;
  scenesDir: string;
  clipsDir: string;
  output: string;
}

function buildUnitPaths(dirs: LayoutDirs): UnitPaths {
  const assetsDir = path.join(dirs.root, 'assets');
  const normalizedDir = path.join(dirs.clipsDir, '_normalized');
  return {
    root: dirs.root,
    assetsDir,
    scenesDir: dirs.scenesDir,
    clipsDir: dirs.clipsDir,
    normalizedDir,
    concatList:   path.join(normalizedDir, 'concat_list.txt'),
    output:       dirs.output,
    outputDraft:  withSuffix(dirs.output, '.partial'),
    overlayDraft: withSuffix(dirs.output, '_cta'),
    script:       path.join(dirs.root, 'script.json'),
    manualMap:    path.join(dirs.root, 'manual_map.json'),
    matchAudit:   path.join(dirs.root, 'assembly_map.json'),
    sceneVideo:     (id) => path.join(dirs.scenesDir, sceneFileName(id)),
    narration:      (id) => path.join(assetsDir, `audio_${pad3(id)}.mp3`),
    caption:        (id) => path.join(assetsDir, `audio_${pad3(id)}.vtt`),
    clip:           (id) => path.join(dirs.clipsDir, clipFileName(id)),
    clipDraft:      (id) => path.join(dirs.clipsDir, withSuffix(clipFileName(id), '_temp')),
    normalizedClip: (id) => path.join(normalizedDir, clipFileName(id)),
  };
}

export function runPaths(dataDir: string, runId: string): UnitPaths {
  const root = path.resolve(dataDir, 'runs', runId);
  return buildUnitPaths({
    root,
    scenesDir: path.join(root, 'scenes'),
    clipsDir:  path.join(root, 'clips'),
    output:    path.join(root, 'final', `master_${runId}.mp4`),
  });
}

export function projectPaths(dataDir: string, slug: string): ProjectPaths {
  const root = path.resolve(dataDir, 'projects', slug);
  const finalDir = path.join(root, 'final');
  const master = path.join(finalDir, `master_${slug}.mp4`);
  return {
    root,
    projectFile: path.join(root, 'project.json'),
    finalDir,
    master,
    masterDraft: withSuffix(master, '.partial'),
    masterList:  path.join(finalDir, 'concat_chapters.txt'),
    chapterDir:  (index, chapterSlug) => path.join(root, `ch${pad2(index)}_${chapterSlug}`),
  };
}

/** Portrait ("shorts") chapters keep separate scene/clip dirs but share assets. */
export function chapterPaths(
  project: ProjectPaths,
  index: number,
  chapterSlug: string,
  format: FrameFormat,
): UnitPaths {
  const root = project.chapterDir(index, chapterSlug);
  const shorts = format === 'portrait';
  return buildUnitPaths({
    root,
    scenesDir: path.join(root, shorts ? 'scenes_shorts' : 'scenes'),
    clipsDir:  path.join(root, shorts ? 'clips_shorts' : 'clips'),
    output:    path.join(root, shorts ? 'chapter_shorts.mp4' : 'chapter.mp4'),
  });
}
