/**
 * Scene ingestion — the one place where loosely-typed script records become
 * typed `Scene` values.
 *
 * Accepts `{ "scenes": [...] }` or an object keyed by scene id. Legacy audio
 * flags are migrated here so nothing downstream ever sees them:
 *   audio_priority "veo"                  → source
 *   skip_tts: true (with tts or no value) → source
 */
import { z } from 'zod';
import { ManifestError } from '../utils/errors.js';
import { AudioPriority, type Scene } from './types.js';

// ── Schemas ───────────────────────────────────────────────────────────────────

const PromptSchema = z.object({
  objects:    z.string().default(''),
  action:     z.string().default(''),
  atmosphere: z.string().default(''),
});

const SceneFields = {
  narration:      z.string().default(''),
  characters:     z.array(z.string()).default([]),
  duration:       z.number().positive().optional(),
  // Unrecognised values fall through to the skip_tts / tts default.
  audio_priority: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(['tts', 'source', 'veo', 'mix']))
    .optional()
    .catch(undefined),
  skip_tts:       z.boolean().optional(),
  video_prompt:   PromptSchema.optional(),
};

const SceneId = z.coerce.number().int().nonnegative();

const ListedSceneSchema = z.object({ id: SceneId, ...SceneFields });
const KeyedSceneSchema  = z.object({ id: SceneId.optional(), ...SceneFields });

const ListedScriptSchema = z.object({ scenes: z.array(ListedSceneSchema) });
const KeyedScriptSchema  = z.record(z.string().regex(/^\d+$/), KeyedSceneSchema);

type RawScene = z.infer<typeof ListedSceneSchema>;

// ── Conversion ────────────────────────────────────────────────────────────────

function resolvePriority(raw: RawScene): AudioPriority {
  switch (raw.audio_priority) {
    case 'mix':    return AudioPriority.Mix;
    case 'source':
    case 'veo':    return AudioPriority.Source;
    default:       return raw.skip_tts ? AudioPriority.Source : AudioPriority.Tts;
  }
}

function toScene(raw: RawScene): Scene {
  return {
    id:             raw.id,
    narration:      raw.narration,
    characters:     [...raw.characters],
    durationTarget: raw.duration ?? null,
    audioPriority:  resolvePriority(raw),
    prompt: {
      objects:    raw.video_prompt?.objects ?? '',
      action:     raw.video_prompt?.action ?? '',
      atmosphere: raw.video_prompt?.atmosphere ?? '',
    },
  };
}

function readRawScenes(data: unknown, filePath: string): RawScene[] {
  const listed = ListedScriptSchema.safeParse(data);
  if (listed.success) return listed.data.scenes;

  const keyed = KeyedScriptSchema.safeParse(data);
  if (keyed.success) {
    return Object.entries(keyed.data).map(([key, value]) => ({ ...value, id: Number(key) }));
  }

  const where = listed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
  throw new ManifestError(filePath, `invalid script (${where})`, listed.error);
}

/**
 * Parse script JSON into scenes, in file order.
 * Throws ManifestError on schema failure or duplicate scene ids.
 */
export function parseScript(data: unknown, filePath: string): Scene[] {
  const raws = readRawScenes(data, filePath);

  const seen = new Set<number>();
  for (const raw of raws) {
    if (seen.has(raw.id)) throw new ManifestError(filePath, `duplicate scene id ${raw.id}`);
    seen.add(raw.id);
  }
  return raws.map(toScene);
}

/** Write scenes back in the on-disk script shape. */
export function serializeScript(scenes: readonly Scene[]): { scenes: Record<string, unknown>[] } {
  return {
    scenes: scenes.map((s) => ({
      id:             s.id,
      narration:      s.narration,
      characters:     [...s.characters],
      ...(s.durationTarget !== null ? { duration: s.durationTarget } : {}),
      audio_priority: s.audioPriority,
      video_prompt:   { ...s.prompt },
    })),
  };
}

/** Return a copy of `scenes` with `priority` set on the selected ids. */
export function setAudioPriority(
  scenes: readonly Scene[],
  ids: readonly number[] | 'all',
  priority: AudioPriority,
): Scene[] {
  const targets = ids === 'all' ? null : new Set(ids);
  return scenes.map((s) =>
    targets === null || targets.has(s.id) ? { ...s, audioPriority: priority } : s,
  );
}
