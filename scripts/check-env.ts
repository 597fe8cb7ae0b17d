#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for clipsmith.
 * Checks the env schema, the ffmpeg/ffprobe binaries and filters, the data
 * directory and the end-card asset.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { spawnSync } from 'child_process';
import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import type { env as envShape } from '../src/config.js';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string) => console.log(`  ${YELLOW}○${RESET} ${label}`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkBinary(label: string, binary: string, hint: string): string | null {
  const proc = spawnSync(binary, ['-hide_banner', '-version'], { encoding: 'utf-8' });
  if (proc.error || proc.status !== 0) {
    fail(label, hint);
    anyRequiredFailed = true;
    return null;
  }
  const firstLine = proc.stdout.split('\n')[0] ?? '';
  pass(label, firstLine.trim());
  return binary;
}

// ── Section: Environment ──────────────────────────────────────────────────────

console.log(`\n${BOLD}=== clipsmith — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Environment variables${RESET}`);

type Env = typeof envShape;

// config.ts validates on import and throws on a bad environment.
async function loadEnv(): Promise<Env | null> {
  try {
    const { env } = await import('../src/config.js');
    pass('env schema', 'all variables valid');
    return env;
  } catch (err) {
    fail('env schema', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
    return null;
  }
}

const env = await loadEnv();

if (env) {
  for (const [key, value] of Object.entries(env)) {
    const shown = Array.isArray(value) ? value.join(',') || '(none)' : String(value);
    note(`${key}  ${shown}${process.env[key] === undefined ? '  (default)' : ''}`);
  }
}

// ── Section: Transcoding binaries ─────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Transcoding binaries${RESET}`);

const ffmpeg = checkBinary('ffmpeg', env?.FFMPEG_PATH ?? 'ffmpeg', 'Install ffmpeg or set FFMPEG_PATH');
checkBinary('ffprobe', env?.FFPROBE_PATH ?? 'ffprobe', 'Install ffprobe or set FFPROBE_PATH');

if (ffmpeg) {
  const filters = spawnSync(ffmpeg, ['-hide_banner', '-filters'], { encoding: 'utf-8' }).stdout ?? '';
  for (const name of ['subtitles', 'chromakey', 'atempo', 'amix']) {
    if (new RegExp(`\\s${name}\\s`).test(filters)) {
      pass(`filter ${name}`);
    } else {
      fail(`filter ${name}`, name === 'subtitles' ? 'ffmpeg must be built with libass' : 'Use a full ffmpeg build');
      anyRequiredFailed = true;
    }
  }
  const encoders = spawnSync(ffmpeg, ['-hide_banner', '-encoders'], { encoding: 'utf-8' }).stdout ?? '';
  if (/\slibx264\s/.test(encoders)) pass('encoder libx264');
  else {
    fail('encoder libx264', 'ffmpeg must be built with libx264');
    anyRequiredFailed = true;
  }
}

// ── Section: Data and assets ──────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Data directory and assets${RESET}`);

const dataDir = resolve(env?.DATA_DIR ?? 'data');
if (existsSync(dataDir)) {
  pass('data directory', dataDir);
} else {
  fail('data directory', `Create: mkdir -p "${dataDir}"`);
  anyRequiredFailed = true;
}

// The end card is optional: overlays are skipped without it.
const endCard = resolve(env?.END_CARD_PATH ?? 'data/assets/cta/end_card.mp4');
if (existsSync(endCard) && statSync(endCard).size > 1024) {
  pass('end card', endCard);
} else {
  note(`end card  (missing — shorts and intro chapters will render without it: ${endCard})`);
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- status <project>${RESET}\n`);
}
