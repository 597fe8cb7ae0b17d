/**
 * Project manifest and project-level merge.
 *
 * A project is an ordered list of chapters, each a work unit with its own
 * status. Chapters are produced in index order except the introduction,
 * which is built last from footage the other chapters already produced.
 */
import { z } from 'zod';
import { PROJECT, type FrameFormat } from '../config.js';
import { advanceStatus } from '../domain/status.js';
import { UNIT_STATUSES, type UnitStatus, type WorkUnit } from '../domain/types.js';
import type { MediaEngine } from '../media/engine.js';
import type { DurationProbe } from '../media/probe.js';
import { artifact, readJson, writeJson, type ArtifactStore } from '../store/artifacts.js';
import { chapterPaths, projectPaths, type ProjectPaths } from '../store/paths.js';
import { ManifestError, MergeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { buildConcatList } from './merger.js';

// ── Manifest ──────────────────────────────────────────────────────────────────

const ChapterSchema = z
  .object({
    index:  z.number().int().nonnegative(),
    title:  z.string(),
    slug:   z.string().min(1),
    status: z.enum(UNIT_STATUSES).default('pending'),
  })
  .passthrough();

const ProjectSchema = z
  .object({
    title:    z.string(),
    slug:     z.string().min(1),
    status:   z.string().default('created'),
    chapters: z.array(ChapterSchema).default([]),
  })
  .passthrough();

export type ChapterEntry = z.infer<typeof ChapterSchema>;
export type ProjectData = z.infer<typeof ProjectSchema>;

export interface ChapterPlan {
  title: string;
  slug?: string;
}

/** Filesystem-safe slug: "The Forgotten Son!" → "the_forgotten_son". */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, '')
    .replace(/[\s-]+/g, '_');
}

export const isIntroChapter = (index: number): boolean => index === PROJECT.introChapterIndex;

// ── Manager ───────────────────────────────────────────────────────────────────

export class ProjectManager {
  private constructor(
    readonly paths: ProjectPaths,
    private data: ProjectData,
    private readonly store: ArtifactStore,
  ) {}

  static load(store: ArtifactStore, dataDir: string, slug: string): ProjectManager {
    const paths = projectPaths(dataDir, slug);
    const key = artifact.projectFile(paths);
    const raw = readJson(store, key);
    if (raw === null) throw new ManifestError(key.path, 'project not found');

    const parsed = ProjectSchema.safeParse(raw);
    if (!parsed.success) {
      const where = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
      throw new ManifestError(key.path, `invalid project (${where})`, parsed.error);
    }
    return new ProjectManager(paths, parsed.data, store);
  }

  /** Create a project with its chapter plan; every chapter starts pending. */
  static create(
    store: ArtifactStore,
    dataDir: string,
    init: { title: string; slug?: string; chapters: readonly ChapterPlan[] },
  ): ProjectManager {
    const slug = init.slug ?? slugify(init.title);
    const data: ProjectData = {
      title: init.title,
      slug,
      status: 'planned',
      chapters: init.chapters.map((c, index) => ({
        index,
        title: c.title,
        slug: c.slug ?? slugify(c.title),
        status: 'pending',
      })),
    };
    const manager = new ProjectManager(projectPaths(dataDir, slug), data, store);
    manager.save();
    logger.info('Project: created', { slug, chapters: data.chapters.length });
    return manager;
  }

  save(): void {
    writeJson(this.store, artifact.projectFile(this.paths), this.data);
  }

  get slug(): string {
    return this.data.slug;
  }

  get status(): string {
    return this.data.status;
  }

  chapters(): readonly ChapterEntry[] {
    return this.data.chapters;
  }

  chapter(index: number): ChapterEntry | null {
    return this.data.chapters.find((c) => c.index === index) ?? null;
  }

  /** The chapter as a work unit; portrait units close on the end card, as does the intro. */
  chapterUnit(index: number, format: FrameFormat = 'landscape'): WorkUnit {
    const ch = this.chapter(index);
    if (!ch) throw new ManifestError(this.paths.projectFile, `chapter ${index} not found`);
    return {
      id: `ch${String(ch.index).padStart(2, '0')}_${ch.slug}`,
      index: ch.index,
      title: ch.title,
      format,
      status: ch.status,
      endCard: format === 'portrait' || isIntroChapter(ch.index),
      paths: chapterPaths(this.paths, ch.index, ch.slug, format),
    };
  }

  /** Unit id → work unit over every chapter, for manual-map lookups. */
  unitLookup(format: FrameFormat = 'landscape'): (unitId: string) => WorkUnit | null {
    const units = new Map(this.data.chapters.map((c) => {
      const unit = this.chapterUnit(c.index, format);
      return [unit.id, unit] as const;
    }));
    return (unitId) => units.get(unitId) ?? null;
  }

  updateChapterStatus(index: number, status: UnitStatus, opts: { reentry?: boolean } = {}): void {
    const ch = this.chapter(index);
    if (!ch) throw new ManifestError(this.paths.projectFile, `chapter ${index} not found`);
    ch.status = advanceStatus(ch.status, status, opts);
    this.save();
    logger.info('Project: chapter status', { index, title: ch.title, status });
  }

  /** Next pending chapter; the introduction only once every other chapter has started. */
  nextPending(): ChapterEntry | null {
    const pending = this.data.chapters.filter((c) => c.status === 'pending');
    return pending.find((c) => !isIntroChapter(c.index)) ?? pending[0] ?? null;
  }

  /** Chapters whose footage may feed highlight assembly. */
  sourceChapters(): ChapterEntry[] {
    const excluded = new Set<number>(PROJECT.excludedChapters);
    return this.data.chapters.filter((c) => !isIntroChapter(c.index) && !excluded.has(c.index));
  }

  /** Mark rendered chapters merged and the project complete. */
  markComplete(): void {
    for (const ch of this.data.chapters) {
      if (ch.status === 'rendered') ch.status = 'merged';
    }
    this.data.status = 'complete';
    this.save();
  }
}

// ── Master merge ──────────────────────────────────────────────────────────────

export interface ProjectMergeDeps {
  engine: MediaEngine;
  probe: DurationProbe;
  store: ArtifactStore;
}

export type ProjectMergeResult =
  | { ok: true; outputPath: string; chapters: number[]; durationSeconds: number }
  | { ok: false; error: MergeError };

/**
 * Stream-copy every chapter video, in index order, into the project master.
 * Every chapter must have a valid chapter video.
 */
export async function mergeProject(project: ProjectManager, deps: ProjectMergeDeps): Promise<ProjectMergeResult> {
  const { engine, probe, store } = deps;
  const master = artifact.master(project.paths);
  const draft = artifact.masterDraft(project.paths);
  const list = artifact.masterList(project.paths);

  const fail = (reason: MergeError['reason'], message: string, missing: readonly number[] = [], cause?: unknown): ProjectMergeResult => {
    const error = new MergeError(project.slug, reason, message, missing, cause);
    logger.error('Project: master merge failed', { project: project.slug, reason, missing, error });
    return { ok: false, error };
  };

  const chapters = [...project.chapters()].sort((a, b) => a.index - b.index);
  const outputs = chapters.map((c) => ({ index: c.index, key: artifact.output(project.chapterUnit(c.index)) }));
  const missing = outputs.filter((o) => !store.exists(o.key)).map((o) => o.index);

  if (outputs.length === missing.length) return fail('no_clips', 'no chapter videos found', missing);
  if (missing.length > 0) return fail('incomplete', `${missing.length} chapter videos missing`, missing);

  logger.info('Project: merging chapters', { project: project.slug, chapters: outputs.length });
  store.remove(draft);
  store.put(list, buildConcatList(outputs.map((o) => o.key.path)));
  store.prepare(draft);

  const result = await engine.run({
    label: 'project:concat',
    inputs: [{ path: list.path, concatList: true }],
    outputOptions: ['-c', 'copy'],
    output: draft.path,
  });
  if (!result.ok || !store.exists(draft)) {
    store.remove(draft);
    return fail('concat_failed', 'chapter concatenation failed', [], result.ok ? undefined : result.error);
  }

  store.move(draft, master);
  store.remove(list);
  project.markComplete();

  const durationSeconds = await probe.duration(master.path);
  logger.info('Project: master video created', {
    output: master.path,
    durationSeconds,
    minutes: Number((durationSeconds / 60).toFixed(1)),
  });
  return { ok: true, outputPath: master.path, chapters: outputs.map((o) => o.index), durationSeconds };
}
