/**
 * Chapter pipeline — the scene-input gate, render-all and merge, in order.
 *
 * A chapter only merges when every scene has a clip; a partial render is
 * reported and the unit stays where it was so a later run resumes it.
 */
import type { Scene, WorkUnit } from '../domain/types.js';
import { parseScript } from '../domain/scenes.js';
import { artifact, readJson, type ArtifactStore } from '../store/artifacts.js';
import { ManifestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { mergeUnit, type MergeDeps, type MergeResult } from './merger.js';
import { renderScenes, type RenderSummary } from './renderer.js';

export interface SceneInputReport {
  present: number[];
  missing: number[];
}

export interface ChapterRunResult {
  inputs: SceneInputReport;
  render: RenderSummary;
  /** Absent when some scene has no clip. */
  merge?: MergeResult;
}

export function loadScenes(store: ArtifactStore, unit: WorkUnit): Scene[] {
  const key = artifact.script(unit);
  const data = readJson(store, key);
  if (data === null) throw new ManifestError(key.path, 'script not found');
  return parseScript(data, key.path);
}

/** Which scenes have their source footage in place. */
export function checkSceneInputs(store: ArtifactStore, unit: WorkUnit, scenes: readonly Scene[]): SceneInputReport {
  const present: number[] = [];
  const missing: number[] = [];
  for (const s of [...scenes].sort((a, b) => a.id - b.id)) {
    (store.exists(artifact.sceneVideo(unit, s.id)) ? present : missing).push(s.id);
  }
  if (missing.length > 0) logger.warn('Pipeline: missing scene videos', { unit: unit.id, missing });
  else logger.info('Pipeline: all scene videos present', { unit: unit.id, count: present.length });
  return { present, missing };
}

export async function runChapter(unit: WorkUnit, scenes: readonly Scene[], deps: MergeDeps): Promise<ChapterRunResult> {
  logger.info('Pipeline: chapter run starting', { unit: unit.id, scenes: scenes.length, format: unit.format });

  const inputs = checkSceneInputs(deps.store, unit, scenes);
  const render = await renderScenes(unit, scenes, deps);

  if (render.failed.length > 0) {
    logger.warn('Pipeline: render incomplete, merge skipped', { unit: unit.id, failed: render.failed });
    return { inputs, render };
  }

  const merge = await mergeUnit(unit, scenes.map((s) => s.id), deps);
  return { inputs, render, merge };
}
