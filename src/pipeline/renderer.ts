/**
 * Scene renderer — composes one scene's footage, audio and captions into a
 * clip.
 *
 * Audio policy per scene:
 *   tts    narration replaces the footage audio; sped up when it overruns
 *   source footage audio passes through; narration ignored
 *   mix    footage 0.8 + narration 0.2; falls back to source without narration
 *
 * Each scene is rendered into `clip_NNN_temp.mp4` first. With a caption track
 * that draft is re-encoded with burned-in subtitles; without one it becomes
 * the clip as is. A failed step leaves its working files in place.
 */
import { MIN_ARTIFACT_BYTES } from '../config.js';
import { AudioPriority, type Scene, type WorkUnit } from '../domain/types.js';
import type { EngineJob, MediaEngine } from '../media/engine.js';
import { atempoChain, clipEncodeOptions, formatNumber, mixGraph, videoNormalizeChain } from '../media/filters.js';
import type { DurationProbe } from '../media/probe.js';
import { burnCaptions, hasCaptionTrack } from '../media/subtitles.js';
import { artifact, type ArtifactStore } from '../store/artifacts.js';
import { SceneRenderError, type SceneFailureReason } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { planNarrationTiming } from './timing.js';

export interface RenderDeps {
  engine: MediaEngine;
  probe: DurationProbe;
  store: ArtifactStore;
}

export type SceneOutcome =
  | { sceneId: number; status: 'skipped'; clipPath: string }
  | {
      sceneId: number;
      status: 'rendered';
      clipPath: string;
      policy: AudioPriority;
      retimeFactor: number | null;
      captioned: boolean;
    }
  | { sceneId: number; status: 'failed'; error: SceneRenderError };

export interface RenderSummary {
  unitId: string;
  outcomes: SceneOutcome[];
  rendered: number[];
  skipped: number[];
  failed: number[];
}

// ── Base composition ──────────────────────────────────────────────────────────

interface BasePlan {
  job: Omit<EngineJob, 'label' | 'output'>;
  policy: AudioPriority;
  retimeFactor: number | null;
}

type PlanResult = { ok: true; plan: BasePlan } | { ok: false; reason: SceneFailureReason; message: string };

async function planBase(unit: WorkUnit, scene: Scene, deps: RenderDeps): Promise<PlanResult> {
  const { probe, store } = deps;
  const video = artifact.sceneVideo(unit, scene.id);
  const narration = artifact.narration(unit, scene.id);
  const hasNarration = store.exists(narration);
  const videoChain = videoNormalizeChain(unit.format);

  let policy = scene.audioPriority;
  if (policy === AudioPriority.Mix && !hasNarration) {
    logger.warn('Renderer: narration missing for mix, using source audio', { unit: unit.id, sceneId: scene.id });
    policy = AudioPriority.Source;
  }

  switch (policy) {
    case AudioPriority.Source:
      return {
        ok: true,
        plan: {
          policy,
          retimeFactor: null,
          job: {
            inputs: [{ path: video.path }],
            filterComplex: videoChain,
            maps: ['[v]', '0:a?'],
            outputOptions: clipEncodeOptions(),
          },
        },
      };

    case AudioPriority.Mix:
      return {
        ok: true,
        plan: {
          policy,
          retimeFactor: null,
          job: {
            inputs: [{ path: video.path }, { path: narration.path }],
            filterComplex: `${videoChain};${mixGraph()}`,
            maps: ['[v]', '[a]'],
            outputOptions: [...clipEncodeOptions(), '-shortest'],
          },
        },
      };

    case AudioPriority.Tts: {
      if (!hasNarration) {
        return { ok: false, reason: 'missing_narration', message: `narration not found: ${narration.path}` };
      }
      const audioSeconds = await probe.duration(narration.path);
      if (audioSeconds <= 0) {
        return { ok: false, reason: 'invalid_duration', message: `invalid narration duration: ${narration.path}` };
      }
      const videoSeconds = await probe.duration(video.path);
      const timing = planNarrationTiming(videoSeconds, audioSeconds);

      logger.info('Renderer: scene timing', {
        sceneId: scene.id,
        video: videoSeconds,
        audio: audioSeconds,
        ...(timing.retime ? { atempo: formatNumber(timing.factor) } : {}),
      });

      return {
        ok: true,
        plan: {
          policy,
          retimeFactor: timing.retime ? timing.factor : null,
          job: {
            inputs: [{ path: video.path }, { path: narration.path }],
            filterComplex: timing.retime
              ? `[1:a]${atempoChain(timing.factor)}[a_adj];${videoChain}`
              : videoChain,
            maps: ['[v]', timing.retime ? '[a_adj]' : '1:a'],
            outputOptions: [...clipEncodeOptions(), '-t', formatNumber(timing.duration, 3), '-shortest'],
          },
        },
      };
    }
  }
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Render one scene. Does no work when a valid clip already exists; never
 * throws for a missing input or a failed transcode.
 */
export async function renderScene(unit: WorkUnit, scene: Scene, deps: RenderDeps): Promise<SceneOutcome> {
  const { engine, store } = deps;
  const clip = artifact.clip(unit, scene.id);
  const fail = (reason: SceneFailureReason, message: string, cause?: unknown): SceneOutcome => {
    const error = new SceneRenderError(scene.id, reason, message, cause);
    logger.error('Renderer: scene failed', { unit: unit.id, sceneId: scene.id, reason, error });
    return { sceneId: scene.id, status: 'failed', error };
  };

  if (store.exists(clip)) {
    logger.info('Renderer: clip exists, skipping', { unit: unit.id, sceneId: scene.id });
    return { sceneId: scene.id, status: 'skipped', clipPath: clip.path };
  }

  const video = artifact.sceneVideo(unit, scene.id);
  if (!store.exists(video)) return fail('missing_video', `video not found: ${video.path}`);

  const planned = await planBase(unit, scene, deps);
  if (!planned.ok) return fail(planned.reason, planned.message);
  const { plan } = planned;

  const draft = artifact.clipDraft(unit, scene.id);
  store.prepare(draft);
  logger.info('Renderer: rendering scene', { unit: unit.id, sceneId: scene.id, policy: plan.policy, format: unit.format });

  const base = await engine.run({ ...plan.job, label: `scene-${scene.id}:base`, output: draft.path });
  if (!base.ok) return fail('transcode_failed', 'base render failed', base.error);
  if (!store.exists(draft)) return fail('transcode_failed', 'base render produced no output');

  const caption = artifact.caption(unit, scene.id);
  let captioned = false;
  if (hasCaptionTrack(store, caption)) {
    const burned = await burnCaptions(engine, `scene-${scene.id}:captions`, draft.path, caption.path, clip.path);
    if (!burned.ok || store.size(clip) === null) {
      store.remove(clip);
      return fail('caption_failed', 'subtitle burn-in failed', burned.ok ? undefined : burned.error);
    }
    store.remove(draft);
    captioned = true;
  } else {
    store.move(draft, clip);
  }

  // Left in place for inspection; the next run renders over it.
  if (!store.exists(clip)) {
    return fail('undersized_clip', `clip is ${store.size(clip) ?? 0} bytes, at or under the ${MIN_ARTIFACT_BYTES.clip} byte minimum`);
  }

  logger.info('Renderer: scene rendered', { unit: unit.id, sceneId: scene.id, policy: plan.policy, captioned });
  return {
    sceneId: scene.id,
    status: 'rendered',
    clipPath: clip.path,
    policy: plan.policy,
    retimeFactor: plan.retimeFactor,
    captioned,
  };
}

/** Render every scene in ascending id order, one at a time. A failure never stops its siblings. */
export async function renderScenes(
  unit: WorkUnit,
  scenes: readonly Scene[],
  deps: RenderDeps,
): Promise<RenderSummary> {
  const ordered = [...scenes].sort((a, b) => a.id - b.id);
  const summary: RenderSummary = { unitId: unit.id, outcomes: [], rendered: [], skipped: [], failed: [] };

  for (const scene of ordered) {
    const outcome = await renderScene(unit, scene, deps);
    summary.outcomes.push(outcome);
    summary[outcome.status].push(scene.id);
  }

  logger.info('Renderer: summary', {
    unit: unit.id,
    rendered: summary.rendered.length,
    skipped: summary.skipped.length,
    failed: summary.failed,
  });
  return summary;
}
