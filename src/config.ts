import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const numberList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .map((s) => Number(s)),
  )
  .pipe(z.array(z.number().int().nonnegative()));

const EnvSchema = z.object({
  // Local storage
  DATA_DIR:                      z.string().default('data'),
  END_CARD_PATH:                 z.string().default('data/assets/cta/end_card.mp4'),

  // Transcoding binaries
  FFMPEG_PATH:                   z.string().default('ffmpeg'),
  FFPROBE_PATH:                  z.string().default('ffprobe'),

  // Render settings
  RENDER_FPS:                    z.coerce.number().int().positive().default(24),
  RENDER_CRF:                    z.coerce.number().int().min(0).max(51).default(18),
  RENDER_PRESET:                 z.string().default('fast'),
  AUDIO_BITRATE:                 z.string().default('192k'),

  // Scene matcher
  MATCH_WEIGHT_TEXT:             z.coerce.number().min(0).default(0.4),
  MATCH_WEIGHT_CHARACTERS:       z.coerce.number().min(0).default(0.25),
  MATCH_WEIGHT_KEYWORDS:         z.coerce.number().min(0).default(0.35),
  MATCH_SCENERY_BONUS:           z.coerce.number().min(0).default(0.1),
  MATCH_REUSE_PENALTY:           z.coerce.number().min(0).default(0.3),

  // Project layout
  ASSEMBLY_EXCLUDED_CHAPTERS:    numberList,
  INTRO_CHAPTER_INDEX:           z.coerce.number().int().nonnegative().default(0),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Frame Presets ─────────────────────────────────────────────────────────────

export const FRAME_PRESETS = {
  landscape: { width: 1920, height: 1080 },
  portrait:  { width: 1080, height: 1920 },
} as const;

export type FrameFormat = keyof typeof FRAME_PRESETS;

// ── Render ────────────────────────────────────────────────────────────────────

export const RENDER = {
  fps:          env.RENDER_FPS,
  crf:          env.RENDER_CRF,
  preset:       env.RENDER_PRESET,
  audioBitrate: env.AUDIO_BITRATE,
} as const;

/** Narration is only time-compressed when it must run faster than this. */
export const RETIME_MIN_FACTOR = 1.05;

export const AUDIO_MIX = {
  source:    0.8,
  narration: 0.2,
} as const;

export const NORMALIZED_AUDIO = {
  sampleRate:    48_000,
  channelLayout: 'stereo',
} as const;

// ── Captions ──────────────────────────────────────────────────────────────────
// ASS colours are &HAABBGGRR; alpha 0x80 is ~50% transparent.

export const CAPTION_STYLE = {
  fontName:      'Arial',
  fontSize:      14,
  primaryColour: '&H80FFFFFF',
  outlineColour: '&H80000000',
  borderStyle:   1,
  outline:       1,
  shadow:        0,
  alignment:     2,   // bottom centre
  marginV:       20,
} as const;

// ── End Card ──────────────────────────────────────────────────────────────────

export const END_CARD = {
  windowSeconds:   5,
  keyColor:        '0x00FF00',
  keySimilarity:   0.33,
  keyBlend:        0.0,
  layout: {
    portrait:  { width: 860, y: 'H-h-550' },  // clears captions and the shorts UI
    landscape: { width: 640, y: 'H-h-140' },  // sits just above captions
  },
} as const;

// ── Artifact Validity ─────────────────────────────────────────────────────────
// An artifact counts as present only when its size is strictly above these.

export const MIN_ARTIFACT_BYTES = {
  sceneVideo:     0,
  narration:      1024,
  caption:        10,
  clip:           1024 * 1024,
  clipDraft:      1024,
  normalizedClip: 1024,
  normalizedDir:  0,
  concatList:     0,
  output:         1024,
  outputDraft:    1024,
  overlayDraft:   1024,
  script:         0,
  manualMap:      0,
  matchAudit:     0,
  endCard:        1024,
  projectFile:    0,
  master:         1024,
  masterDraft:    1024,
  masterList:     0,
} as const;

// ── Scene Matching ────────────────────────────────────────────────────────────

export const MATCHING = {
  weights: {
    text:       env.MATCH_WEIGHT_TEXT,
    characters: env.MATCH_WEIGHT_CHARACTERS,
    keywords:   env.MATCH_WEIGHT_KEYWORDS,
  },
  sceneryBonus:  env.MATCH_SCENERY_BONUS,
  reusePenalty:  env.MATCH_REUSE_PENALTY,
} as const;

export const PROJECT = {
  introChapterIndex:  env.INTRO_CHAPTER_INDEX,
  excludedChapters:   env.ASSEMBLY_EXCLUDED_CHAPTERS,
} as const;
