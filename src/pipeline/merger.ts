/**
 * Chapter merger — normalizes every clip's audio and stream-copies the
 * clips, in ascending scene id order, into the unit's output video.
 *
 * All or nothing: every expected scene must have a valid clip, and any
 * failed step leaves no output behind. Shorts and the introduction chapter
 * then receive the CTA end card, whose failure never fails the merge.
 */
import type { WorkUnit } from '../domain/types.js';
import type { MediaEngine } from '../media/engine.js';
import { normalizeAudioFilter } from '../media/filters.js';
import { applyEndCard } from '../media/overlay.js';
import type { DurationProbe } from '../media/probe.js';
import { artifact, type ArtifactKey, type ArtifactStore } from '../store/artifacts.js';
import { clipFileName } from '../store/paths.js';
import { RENDER } from '../config.js';
import { MergeError, type MergeFailureReason } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface MergeDeps {
  engine: MediaEngine;
  probe: DurationProbe;
  store: ArtifactStore;
  /** CTA end card; only read for units flagged `endCard`. */
  endCard: ArtifactKey;
}

export type EndCardStatus = 'applied' | 'skipped' | 'failed' | 'not_required';

export type MergeResult =
  | { ok: true; outputPath: string; sceneIds: number[]; durationSeconds: number; endCard: EndCardStatus }
  | { ok: false; error: MergeError };

/** Concat-demuxer list; entries are relative to the list's own directory. */
export function buildConcatList(fileNames: readonly string[]): string {
  return fileNames.map((name) => `file '${name.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

/** Scene ids with a valid clip, and those without, both ascending. */
export function partitionClips(
  unit: WorkUnit,
  sceneIds: readonly number[],
  store: ArtifactStore,
): { present: number[]; missing: number[] } {
  const ids = [...new Set(sceneIds)].sort((a, b) => a - b);
  const present: number[] = [];
  const missing: number[] = [];
  for (const id of ids) (store.exists(artifact.clip(unit, id)) ? present : missing).push(id);
  return { present, missing };
}

export async function mergeUnit(
  unit: WorkUnit,
  sceneIds: readonly number[],
  deps: MergeDeps,
): Promise<MergeResult> {
  const { engine, probe, store } = deps;
  const output = artifact.output(unit);
  const draft = artifact.outputDraft(unit);
  const workDir = artifact.normalizedDir(unit);

  const fail = (reason: MergeFailureReason, message: string, missing: readonly number[] = [], cause?: unknown): MergeResult => {
    const error = new MergeError(unit.id, reason, message, missing, cause);
    logger.error('Merger: merge failed', { unit: unit.id, reason, missing, error });
    return { ok: false, error };
  };

  // Any earlier output was built from a different clip set.
  store.remove(output);
  store.remove(draft);

  const { present, missing } = partitionClips(unit, sceneIds, store);
  if (present.length === 0) return fail('no_clips', 'no valid clips', missing);
  if (missing.length > 0) {
    return fail('incomplete', `${missing.length} of ${present.length + missing.length} clips missing`, missing);
  }

  logger.info('Merger: normalizing clip audio', { unit: unit.id, clips: present.length });
  store.remove(workDir);
  for (const id of present) {
    const normalized = artifact.normalizedClip(unit, id);
    store.prepare(normalized);
    const result = await engine.run({
      label: `merge:normalize:${id}`,
      inputs: [{ path: artifact.clip(unit, id).path }],
      audioFilter: normalizeAudioFilter(),
      outputOptions: ['-c:v', 'copy', '-c:a', 'aac', '-b:a', RENDER.audioBitrate],
      output: normalized.path,
    });
    if (!result.ok) return fail('normalize_failed', `audio normalization failed for scene ${id}`, [], result.error);
    if (!store.exists(normalized)) return fail('normalize_failed', `normalization produced no output for scene ${id}`);
  }

  const list = artifact.concatList(unit);
  store.put(list, buildConcatList(present.map(clipFileName)));

  logger.info('Merger: concatenating', { unit: unit.id, clips: present.length, output: output.path });
  store.prepare(draft);
  const concat = await engine.run({
    label: 'merge:concat',
    inputs: [{ path: list.path, concatList: true }],
    outputOptions: ['-c', 'copy'],
    output: draft.path,
  });
  if (!concat.ok || !store.exists(draft)) {
    store.remove(draft);
    return fail('concat_failed', 'concatenation failed', [], concat.ok ? undefined : concat.error);
  }

  store.move(draft, output);
  store.remove(workDir);

  let endCard: EndCardStatus = 'not_required';
  if (unit.endCard) {
    const overlay = await applyEndCard(
      { video: output, endCard: deps.endCard, draft: artifact.overlayDraft(unit), format: unit.format },
      { engine, probe, store },
    );
    endCard = overlay.status;
  }

  const durationSeconds = await probe.duration(output.path);
  logger.info('Merger: output created', { unit: unit.id, output: output.path, durationSeconds, endCard });
  return { ok: true, outputPath: output.path, sceneIds: present, durationSeconds, endCard };
}
