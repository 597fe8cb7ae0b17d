/**
 * Scene upload normalization. Footage arrives under whatever name the
 * generator or download produced; the renderer only looks for
 * `scene_{id:03d}.mp4`, so uploads are copied to that name first.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { sceneFileName } from './paths.js';

const VIDEO_EXTS = new Set(['.mp4', '.mov', '.avi', '.mkv', '.webm']);

const CANONICAL = /^scene_(\d{3})\.(mp4|mov|avi|mkv|webm)$/i;

// Tried in order against the name without extension; first match wins.
const NAME_PATTERNS = [
  /P\d+[_\s-]*scene[_\s-]*(\d+)/i,  // P01_scene_1_1080p
  /scene[_\s-]*(\d+)/i,             // Scene_1_objects, scene 1, scene-01
  /^(\d{1,3})(?:\D|$)/,             // 1.mp4, 04.mov
];

export interface SceneFileCopy {
  sceneId: number;
  from: string;
  to: string;
}

/** Scene number encoded in an upload's file name, or null if it is not a scene video. */
export function parseSceneNumber(fileName: string): number | null {
  const ext = path.extname(fileName).toLowerCase();
  if (!VIDEO_EXTS.has(ext)) return null;

  const canonical = CANONICAL.exec(fileName);
  if (canonical?.[1] !== undefined) return Number(canonical[1]);

  const stem = fileName.slice(0, fileName.length - ext.length);
  for (const pattern of NAME_PATTERNS) {
    const m = pattern.exec(stem);
    if (m?.[1] !== undefined) return Number(m[1]);
  }
  return null;
}

/**
 * Copy uploads in `scenesDir` to their canonical names. An existing canonical
 * file is never overwritten; when several uploads claim one scene, an already
 * canonical name wins, then the first in name order.
 */
export function normalizeSceneFiles(scenesDir: string): SceneFileCopy[] {
  if (!fs.existsSync(scenesDir)) return [];

  const names = fs
    .readdirSync(scenesDir, { withFileTypes: true })
    .filter((d) => d.isFile())
    .map((d) => d.name)
    .sort();

  const sources = new Map<number, string>();
  for (const name of names) {
    if (!CANONICAL.test(name)) continue;
    const id = parseSceneNumber(name);
    if (id !== null) sources.set(id, name);
  }
  for (const name of names) {
    const id = parseSceneNumber(name);
    if (id !== null && !sources.has(id)) sources.set(id, name);
  }

  const copies: SceneFileCopy[] = [];
  for (const [sceneId, name] of [...sources.entries()].sort((a, b) => a[0] - b[0])) {
    const from = path.join(scenesDir, name);
    const to = path.join(scenesDir, sceneFileName(sceneId));
    if (from === to || fs.existsSync(to)) continue;

    fs.copyFileSync(from, to);
    logger.info('Scenes: upload renamed', { from: name, to: path.basename(to) });
    copies.push({ sceneId, from, to });
  }
  if (copies.length > 0) logger.info('Scenes: uploads normalized', { count: copies.length });
  return copies;
}
