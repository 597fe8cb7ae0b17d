/**
 * Filter-graph and encoder-option builders. Pure string functions; the
 * renderer, compositors and merger assemble jobs from these.
 */
import {
  AUDIO_MIX,
  CAPTION_STYLE,
  END_CARD,
  FRAME_PRESETS,
  NORMALIZED_AUDIO,
  RENDER,
  type FrameFormat,
} from '../config.js';

// ── Numbers ───────────────────────────────────────────────────────────────────

/** Compact decimal for filter arguments: 1.6 → "1.6", 1.052631… → "1.0526". */
export function formatNumber(value: number, digits = 4): string {
  return String(Number(value.toFixed(digits)));
}

// ── Video ─────────────────────────────────────────────────────────────────────

/**
 * Fixed frame rate, aspect-fill scale, centre crop, restamped timestamps.
 * Reads `[0:v]`, writes `[v]`.
 */
export function videoNormalizeChain(format: FrameFormat, fps: number = RENDER.fps): string {
  const { width: w, height: h } = FRAME_PRESETS[format];
  const restamp = `fps=${fps},setpts=N/(${fps}*TB)`;
  return (
    `[0:v]${restamp},` +
    `scale=${w}:${h}:force_original_aspect_ratio=increase,` +
    `crop=${w}:${h}:(iw-ow)/2:(ih-oh)/2,` +
    `${restamp}[v]`
  );
}

/** x264/AAC encode used for every freshly composed clip. */
export function clipEncodeOptions(): string[] {
  return [
    '-c:v', 'libx264',
    '-preset', RENDER.preset,
    '-crf', String(RENDER.crf),
    '-r', String(RENDER.fps),
    '-fps_mode', 'cfr',
    '-c:a', 'aac',
    '-b:a', RENDER.audioBitrate,
    '-pix_fmt', 'yuv420p',
  ];
}

/** Video-only re-encode for passes that copy the audio stream. */
export function videoEncodeOptions(): string[] {
  return ['-c:v', 'libx264', '-preset', RENDER.preset, '-crf', String(RENDER.crf), '-pix_fmt', 'yuv420p'];
}

// ── Audio ─────────────────────────────────────────────────────────────────────

/**
 * atempo accepts 0.5–2.0 per stage, so larger speed-ups are chained:
 * 1.6 → "atempo=1.6", 3 → "atempo=2.0,atempo=1.5".
 */
export function atempoChain(factor: number): string {
  const stages: string[] = [];
  let rest = factor;
  while (rest > 2) {
    stages.push('atempo=2.0');
    rest /= 2;
  }
  stages.push(`atempo=${formatNumber(rest)}`);
  return stages.join(',');
}

/** Source and narration summed at fixed weights; writes `[a]`. */
export function mixGraph(source: number = AUDIO_MIX.source, narration: number = AUDIO_MIX.narration): string {
  return (
    `[0:a]volume=${formatNumber(source)}[src_a];` +
    `[1:a]volume=${formatNumber(narration)}[nar_a];` +
    `[src_a][nar_a]amix=inputs=2:duration=longest[a]`
  );
}

export function normalizeAudioFilter(): string {
  return (
    `aresample=${NORMALIZED_AUDIO.sampleRate},` +
    `aformat=sample_fmts=fltp:channel_layouts=${NORMALIZED_AUDIO.channelLayout}`
  );
}

// ── Captions ──────────────────────────────────────────────────────────────────

/** Escape a path for a single-quoted filter argument. */
export function escapeFilterPath(filePath: string): string {
  return filePath.replace(/\\/g, '\\\\').replace(/:/g, '\\:').replace(/'/g, "'\\\\''");
}

export function captionForceStyle(): string {
  const s = CAPTION_STYLE;
  return [
    `Fontname=${s.fontName}`,
    `FontSize=${s.fontSize}`,
    `PrimaryColour=${s.primaryColour}`,
    `OutlineColour=${s.outlineColour}`,
    `BorderStyle=${s.borderStyle}`,
    `Outline=${s.outline}`,
    `Shadow=${s.shadow}`,
    `Alignment=${s.alignment}`,
    `MarginV=${s.marginV}`,
  ].join(',');
}

export function subtitlesFilter(captionPath: string): string {
  return `subtitles='${escapeFilterPath(captionPath)}':force_style='${captionForceStyle()}'`;
}

// ── End card ──────────────────────────────────────────────────────────────────

/**
 * Keyed end card over the last window of the main video. Input 0 is the
 * video, input 1 the looped end card; writes `[v]`.
 */
export function endCardGraph(format: FrameFormat, start: number, end: number): string {
  const { width, y } = END_CARD.layout[format];
  const s = formatNumber(start, 3);
  const d = formatNumber(end, 3);
  return (
    `[1:v]scale=${width}:-1[cta_sized];` +
    `[cta_sized]chromakey=${END_CARD.keyColor}:${END_CARD.keySimilarity}:${END_CARD.keyBlend.toFixed(1)}[cta_keyed];` +
    `[cta_keyed]setpts=PTS-STARTPTS+${s}/TB[cta_final];` +
    `[0:v][cta_final]overlay=(W-w)/2:${y}:enable='between(t,${s},${d})':shortest=1[v]`
  );
}
