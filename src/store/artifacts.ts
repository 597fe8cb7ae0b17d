/**
 * Artifact store — the pipeline's only recovery mechanism.
 *
 * Every stage asks `exists(key)` before doing expensive work, so re-running
 * after a partial run recomputes only what is missing. A key pairs an
 * artifact kind (which fixes its minimum valid size) with its canonical path;
 * the constructors in `artifact` are the only place keys are built.
 */
import * as fs from 'fs';
import * as path from 'path';
import { MIN_ARTIFACT_BYTES } from '../config.js';
import type { WorkUnit } from '../domain/types.js';
import type { ProjectPaths } from './paths.js';

export type ArtifactKind = keyof typeof MIN_ARTIFACT_BYTES;

export interface ArtifactKey {
  readonly kind: ArtifactKind;
  readonly path: string;
}

export interface ArtifactStore {
  /** Present and strictly larger than the kind's minimum size. */
  exists(key: ArtifactKey): boolean;
  /** Size in bytes, or null when absent. */
  size(key: ArtifactKey): number | null;
  open(key: ArtifactKey): Buffer | null;
  put(key: ArtifactKey, data: Buffer | string): void;
  copy(from: ArtifactKey, to: ArtifactKey): void;
  /** Rename, replacing any existing target. */
  move(from: ArtifactKey, to: ArtifactKey): void;
  /** Remove a file, or a directory tree. Absent keys are ignored. */
  remove(key: ArtifactKey): void;
  /** Create the key's parent directory. */
  prepare(key: ArtifactKey): void;
}

// ── Key constructors ──────────────────────────────────────────────────────────

const key = (kind: ArtifactKind, p: string): ArtifactKey => ({ kind, path: p });

export const artifact = {
  sceneVideo:     (u: WorkUnit, id: number) => key('sceneVideo', u.paths.sceneVideo(id)),
  narration:      (u: WorkUnit, id: number) => key('narration', u.paths.narration(id)),
  caption:        (u: WorkUnit, id: number) => key('caption', u.paths.caption(id)),
  clip:           (u: WorkUnit, id: number) => key('clip', u.paths.clip(id)),
  clipDraft:      (u: WorkUnit, id: number) => key('clipDraft', u.paths.clipDraft(id)),
  normalizedClip: (u: WorkUnit, id: number) => key('normalizedClip', u.paths.normalizedClip(id)),
  normalizedDir:  (u: WorkUnit) => key('normalizedDir', u.paths.normalizedDir),
  concatList:     (u: WorkUnit) => key('concatList', u.paths.concatList),
  output:         (u: WorkUnit) => key('output', u.paths.output),
  outputDraft:    (u: WorkUnit) => key('outputDraft', u.paths.outputDraft),
  overlayDraft:   (u: WorkUnit) => key('overlayDraft', u.paths.overlayDraft),
  script:         (u: WorkUnit) => key('script', u.paths.script),
  manualMap:      (u: WorkUnit) => key('manualMap', u.paths.manualMap),
  matchAudit:     (u: WorkUnit) => key('matchAudit', u.paths.matchAudit),
  endCard:        (p: string) => key('endCard', p),
  projectFile:    (p: ProjectPaths) => key('projectFile', p.projectFile),
  master:         (p: ProjectPaths) => key('master', p.master),
  masterDraft:    (p: ProjectPaths) => key('masterDraft', p.masterDraft),
  masterList:     (p: ProjectPaths) => key('masterList', p.masterList),
} as const;

export function isValidSize(kind: ArtifactKind, size: number | null): boolean {
  return size !== null && size > MIN_ARTIFACT_BYTES[kind];
}

/** Reads a JSON artifact; null when absent. Parse errors propagate. */
export function readJson(store: ArtifactStore, k: ArtifactKey): unknown {
  const buf = store.open(k);
  return buf === null ? null : JSON.parse(buf.toString('utf-8'));
}

export function writeJson(store: ArtifactStore, k: ArtifactKey, value: unknown): void {
  store.put(k, JSON.stringify(value, null, 2) + '\n');
}

// ── Filesystem implementation ─────────────────────────────────────────────────

export class FsArtifactStore implements ArtifactStore {
  exists(k: ArtifactKey): boolean {
    return isValidSize(k.kind, this.size(k));
  }

  size(k: ArtifactKey): number | null {
    try {
      return fs.statSync(k.path).size;
    } catch {
      return null;
    }
  }

  open(k: ArtifactKey): Buffer | null {
    if (!fs.existsSync(k.path)) return null;
    return fs.readFileSync(k.path);
  }

  put(k: ArtifactKey, data: Buffer | string): void {
    this.prepare(k);
    fs.writeFileSync(k.path, data);
  }

  copy(from: ArtifactKey, to: ArtifactKey): void {
    this.prepare(to);
    fs.copyFileSync(from.path, to.path);
  }

  move(from: ArtifactKey, to: ArtifactKey): void {
    this.prepare(to);
    fs.renameSync(from.path, to.path);
  }

  remove(k: ArtifactKey): void {
    fs.rmSync(k.path, { recursive: true, force: true });
  }

  prepare(k: ArtifactKey): void {
    fs.mkdirSync(path.dirname(k.path), { recursive: true });
  }
}
