#!/usr/bin/env node
/**
 * clipsmith — entry point.
 *
 *   chapter <project> <index> [--shorts]   render and merge one chapter
 *   assemble <project> [index]             fill a chapter from other chapters' footage
 *   merge-project <project>                join every chapter into the master video
 *   status <project>                       print chapter statuses
 *   run <runId> [--shorts]                 render and merge a standalone run
 */
import { env, PROJECT } from './config.js';
import { isAtLeast } from './domain/status.js';
import type { Scene, UnitStatus, WorkUnit } from './domain/types.js';
import { FfmpegEngine } from './media/engine.js';
import { FfprobeDurationProbe } from './media/probe.js';
import { assembleHighlights, type SourceUnit } from './pipeline/assembler.js';
import { checkSceneInputs, loadScenes, runChapter } from './pipeline/index.js';
import type { MergeDeps } from './pipeline/merger.js';
import { ProjectManager, mergeProject } from './pipeline/project.js';
import { artifact, FsArtifactStore } from './store/artifacts.js';
import { runPaths } from './store/paths.js';
import { normalizeSceneFiles } from './store/scene-files.js';
import { ManifestError } from './utils/errors.js';
import { logger } from './utils/logger.js';

// ── Wiring ────────────────────────────────────────────────────────────────────

export function createDeps(): MergeDeps {
  return {
    engine: new FfmpegEngine(),
    probe: new FfprobeDurationProbe(),
    store: new FsArtifactStore(),
    endCard: artifact.endCard(env.END_CARD_PATH),
  };
}

function advanceChapter(project: ProjectManager, index: number, status: UnitStatus): void {
  const ch = project.chapter(index);
  if (ch && !isAtLeast(ch.status, status)) project.updateChapterStatus(index, status);
}

function parseIndex(raw: string | undefined, label: string): number {
  const n = Number(raw);
  if (raw === undefined || !Number.isInteger(n) || n < 0) throw new Error(`${label} must be a non-negative integer`);
  return n;
}

function requireArg(raw: string | undefined, label: string): string {
  if (!raw) throw new Error(`missing ${label}`);
  return raw;
}

// ── Commands ──────────────────────────────────────────────────────────────────

export async function runChapterCommand(slug: string, index: number, shorts: boolean): Promise<boolean> {
  const deps = createDeps();
  const project = ProjectManager.load(deps.store, env.DATA_DIR, slug);
  const unit = project.chapterUnit(index, shorts ? 'portrait' : 'landscape');
  const scenes = loadScenes(deps.store, unit);

  normalizeSceneFiles(unit.paths.scenesDir);
  const result = await runChapter(unit, scenes, deps);

  if (!shorts) {
    if (result.inputs.missing.length === 0) advanceChapter(project, index, 'scenes_ready');
    if (result.merge?.ok) advanceChapter(project, index, 'rendered');
  }
  return result.merge?.ok ?? false;
}

export function runAssembleCommand(slug: string, index?: number): boolean {
  const { store } = createDeps();
  const project = ProjectManager.load(store, env.DATA_DIR, slug);
  const targetIndex = index ?? PROJECT.introChapterIndex;
  const target = project.chapterUnit(targetIndex);

  const sources: SourceUnit[] = [];
  for (const ch of project.sourceChapters()) {
    if (ch.index === targetIndex) continue;
    const unit = project.chapterUnit(ch.index);
    if (!store.exists(artifact.script(unit))) continue;
    sources.push({ unit, scenes: loadScenes(store, unit) });
  }

  const slots = loadScenes(store, target);
  const summary = assembleHighlights({ target, slots, sources, lookupUnit: project.unitLookup() }, store);

  if (summary.unassigned.length === 0) advanceChapter(project, targetIndex, 'scenes_ready');
  return summary.unassigned.length === 0;
}

export async function runMergeProjectCommand(slug: string): Promise<boolean> {
  const deps = createDeps();
  const project = ProjectManager.load(deps.store, env.DATA_DIR, slug);
  const result = await mergeProject(project, deps);
  return result.ok;
}

export function printStatus(slug: string): void {
  const { store } = createDeps();
  const project = ProjectManager.load(store, env.DATA_DIR, slug);
  logger.info('Project status', { project: project.slug, status: project.status });
  for (const ch of project.chapters()) {
    const unit = project.chapterUnit(ch.index);
    const scenes: Scene[] = store.exists(artifact.script(unit)) ? loadScenes(store, unit) : [];
    const inputs = checkSceneInputs(store, unit, scenes);
    logger.info(`ch${String(ch.index).padStart(2, '0')} ${ch.title}`, {
      status: ch.status,
      scenes: scenes.length,
      missing: inputs.missing.length,
      output: store.exists(artifact.output(unit)),
    });
  }
}

export async function runStandalone(runId: string, shorts: boolean): Promise<boolean> {
  const deps = createDeps();
  const format = shorts ? 'portrait' : 'landscape';
  const unit: WorkUnit = {
    id: runId,
    index: null,
    title: runId,
    format,
    status: 'scenes_ready',
    endCard: shorts,
    paths: runPaths(env.DATA_DIR, runId),
  };
  const scenes = loadScenes(deps.store, unit);
  normalizeSceneFiles(unit.paths.scenesDir);
  const result = await runChapter(unit, scenes, deps);
  return result.merge?.ok ?? false;
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

async function main(argv: string[]): Promise<boolean> {
  const shorts = argv.includes('--shorts');
  const [command, ...args] = argv.filter((a) => !a.startsWith('--'));
  logger.info('clipsmith: starting', { command: command ?? 'help' });

  switch (command) {
    case 'chapter':
      return runChapterCommand(requireArg(args[0], 'project'), parseIndex(args[1], 'chapter index'), shorts);

    case 'assemble':
      return runAssembleCommand(
        requireArg(args[0], 'project'),
        args[1] === undefined ? undefined : parseIndex(args[1], 'chapter index'),
      );

    case 'merge-project':
      return runMergeProjectCommand(requireArg(args[0], 'project'));

    case 'status':
      printStatus(requireArg(args[0], 'project'));
      return true;

    case 'run':
      return runStandalone(requireArg(args[0], 'run id'), shorts);

    default:
      logger.error('Unknown command', { command, usage: 'chapter | assemble | merge-project | status | run' });
      return false;
  }
}

main(process.argv.slice(2))
  .then((ok) => {
    process.exitCode = ok ? 0 : 1;
  })
  .catch((err: unknown) => {
    logger.error(err instanceof ManifestError ? 'Invalid input file' : 'Fatal error', { err });
    process.exitCode = 1;
  });
