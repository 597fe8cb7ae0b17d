import { beforeEach, describe, expect, it } from 'vitest';
import { artifact } from '../store/artifacts.js';
import { MemoryArtifactStore } from '../store/memory.js';
import { FakeDurationProbe, FakeMediaEngine, MIB, TEST_DATA_DIR } from '../testing/fakes.js';
import { ManifestError } from '../utils/errors.js';
import { mergeProject, ProjectManager, slugify } from './project.js';

const PLAN = {
  title: 'The Shepherd King',
  chapters: [{ title: 'Introduction' }, { title: 'The Forgotten Son' }, { title: 'Giant Slayer!' }],
};

describe('slugify', () => {
  it('lower-cases, strips punctuation and joins words with underscores', () => {
    expect(slugify('The Forgotten Son!')).toBe('the_forgotten_son');
    expect(slugify('  Giant - Slayer ')).toBe('giant_slayer');
  });
});

describe('ProjectManager', () => {
  let store: MemoryArtifactStore;
  let project: ProjectManager;

  beforeEach(() => {
    store = new MemoryArtifactStore();
    project = ProjectManager.create(store, TEST_DATA_DIR, PLAN);
  });

  it('creates and persists the chapter plan', () => {
    expect(project.slug).toBe('the_shepherd_king');
    expect(project.status).toBe('planned');

    const loaded = ProjectManager.load(store, TEST_DATA_DIR, 'the_shepherd_king');
    expect(loaded.chapters().map((c) => [c.index, c.slug, c.status])).toEqual([
      [0, 'introduction', 'pending'],
      [1, 'the_forgotten_son', 'pending'],
      [2, 'giant_slayer', 'pending'],
    ]);
  });

  it('builds chapter work units', () => {
    const intro = project.chapterUnit(0);
    const chapter = project.chapterUnit(1);
    const short = project.chapterUnit(2, 'portrait');

    expect(intro).toMatchObject({ id: 'ch00_introduction', index: 0, endCard: true, format: 'landscape' });
    expect(chapter).toMatchObject({ id: 'ch01_the_forgotten_son', endCard: false });
    expect(chapter.paths.output).toBe(`${TEST_DATA_DIR}/projects/the_shepherd_king/ch01_the_forgotten_son/chapter.mp4`);
    expect(short).toMatchObject({ id: 'ch02_giant_slayer', endCard: true, format: 'portrait' });
    expect(short.paths.scenesDir).toBe(`${TEST_DATA_DIR}/projects/the_shepherd_king/ch02_giant_slayer/scenes_shorts`);
  });

  it('resolves any chapter unit by id', () => {
    const lookup = project.unitLookup();
    expect(lookup('ch02_giant_slayer')?.index).toBe(2);
    expect(lookup('ch07_missing')).toBeNull();
  });

  it('rejects an unknown chapter', () => {
    expect(() => project.chapterUnit(9)).toThrow(ManifestError);
  });

  it('only moves chapter status forward unless re-entering', () => {
    project.updateChapterStatus(1, 'rendered');
    expect(() => project.updateChapterStatus(1, 'scripted')).toThrow(
      'Cannot move status backwards from rendered to scripted',
    );

    project.updateChapterStatus(1, 'scripted', { reentry: true });
    expect(ProjectManager.load(store, TEST_DATA_DIR, project.slug).chapter(1)?.status).toBe('scripted');
  });

  it('leaves the introduction for last', () => {
    expect(project.nextPending()?.index).toBe(1);

    project.updateChapterStatus(1, 'scripted');
    project.updateChapterStatus(2, 'scripted');
    expect(project.nextPending()?.index).toBe(0);

    project.updateChapterStatus(0, 'scripted');
    expect(project.nextPending()).toBeNull();
  });

  it('excludes the introduction from assembly sources', () => {
    expect(project.sourceChapters().map((c) => c.index)).toEqual([1, 2]);
  });

  it('reports a missing or malformed project file', () => {
    expect(() => ProjectManager.load(store, TEST_DATA_DIR, 'nope')).toThrow(
      `${TEST_DATA_DIR}/projects/nope/project.json: project not found`,
    );

    store.writeFile(`${TEST_DATA_DIR}/projects/broken/project.json`, JSON.stringify({ title: 'Broken', chapters: [] }));
    expect(() => ProjectManager.load(store, TEST_DATA_DIR, 'broken')).toThrow('invalid project (slug)');
  });
});

describe('mergeProject', () => {
  let store: MemoryArtifactStore;
  let engine: FakeMediaEngine;
  let probe: FakeDurationProbe;
  let project: ProjectManager;

  const seedChapters = (...indexes: number[]) => {
    for (const i of indexes) store.writeBytes(project.chapterUnit(i).paths.output, 4 * MIB);
  };

  beforeEach(() => {
    store = new MemoryArtifactStore();
    engine = new FakeMediaEngine(store);
    probe = new FakeDurationProbe();
    project = ProjectManager.create(store, TEST_DATA_DIR, PLAN);
  });

  it('fails without chapter videos', async () => {
    const result = await mergeProject(project, { engine, probe, store });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('no_clips');
    expect(result.error.missing).toEqual([0, 1, 2]);
  });

  it('refuses to merge while a chapter is missing', async () => {
    seedChapters(0, 2);

    const result = await mergeProject(project, { engine, probe, store });

    expect(result.ok ? null : [result.error.reason, result.error.missing]).toEqual(['incomplete', [1]]);
    expect(engine.jobs).toHaveLength(0);
  });

  it('joins chapters in index order and completes the project', async () => {
    seedChapters(0, 1, 2);
    project.updateChapterStatus(1, 'rendered');
    probe.set(project.paths.master, 1530);

    const result = await mergeProject(project, { engine, probe, store });

    expect(result).toEqual({ ok: true, outputPath: project.paths.master, chapters: [0, 1, 2], durationSeconds: 1530 });
    expect(engine.job('project:concat')).toEqual({
      label: 'project:concat',
      inputs: [{ path: project.paths.masterList, concatList: true }],
      outputOptions: ['-c', 'copy'],
      output: project.paths.masterDraft,
    });
    expect(store.has(project.paths.master)).toBe(true);
    expect(store.has(project.paths.masterList)).toBe(false);

    const saved = ProjectManager.load(store, TEST_DATA_DIR, project.slug);
    expect(saved.status).toBe('complete');
    expect(saved.chapters().map((c) => c.status)).toEqual(['pending', 'merged', 'pending']);
  });

  it('lists chapter videos by absolute path and keeps the list on failure', async () => {
    seedChapters(0, 1, 2);
    engine = new FakeMediaEngine(store, { failWhen: () => true });

    const result = await mergeProject(project, { engine, probe, store });

    expect(result.ok ? null : result.error.reason).toBe('concat_failed');
    expect(store.has(project.paths.master)).toBe(false);
    const root = `${TEST_DATA_DIR}/projects/the_shepherd_king`;
    expect(store.open(artifact.masterList(project.paths))?.toString('utf-8')).toBe(
      `file '${root}/ch00_introduction/chapter.mp4'\n` +
        `file '${root}/ch01_the_forgotten_son/chapter.mp4'\n` +
        `file '${root}/ch02_giant_slayer/chapter.mp4'\n`,
    );
  });
});
