import { beforeEach, describe, expect, it } from 'vitest';
import type { WorkUnit } from '../domain/types.js';
import { artifact, writeJson } from '../store/artifacts.js';
import { MemoryArtifactStore } from '../store/memory.js';
import { FakeDurationProbe, FakeMediaEngine, testUnit } from '../testing/fakes.js';
import { checkSceneInputs, loadScenes, runChapter } from './index.js';
import type { MergeDeps } from './merger.js';

const SCRIPT = {
  scenes: [
    { id: 2, narration: 'The lion came at night.', audio_priority: 'source' },
    { id: 1, narration: 'David kept the flock.', audio_priority: 'veo' },
  ],
};

describe('chapter pipeline', () => {
  let store: MemoryArtifactStore;
  let engine: FakeMediaEngine;
  let unit: WorkUnit;
  let deps: MergeDeps;

  beforeEach(() => {
    store = new MemoryArtifactStore();
    engine = new FakeMediaEngine(store);
    unit = testUnit('ch01_the_forgotten_son');
    deps = { engine, probe: new FakeDurationProbe(), store, endCard: artifact.endCard('/srv/assets/end_card.mp4') };
    writeJson(store, artifact.script(unit), SCRIPT);
  });

  it('loads scenes in file order', () => {
    expect(loadScenes(store, unit).map((s) => [s.id, s.audioPriority])).toEqual([
      [2, 'source'],
      [1, 'source'],
    ]);
  });

  it('reports a missing script', () => {
    const other = testUnit('ch05_empty');
    expect(() => loadScenes(store, other)).toThrow(`${other.paths.script}: script not found`);
  });

  it('reports which scene videos are present', () => {
    store.writeBytes(unit.paths.sceneVideo(2), 64 * 1024);

    expect(checkSceneInputs(store, unit, loadScenes(store, unit))).toEqual({ present: [2], missing: [1] });
  });

  it('renders every scene then merges the chapter', async () => {
    store.writeBytes(unit.paths.sceneVideo(1), 64 * 1024);
    store.writeBytes(unit.paths.sceneVideo(2), 64 * 1024);

    const result = await runChapter(unit, loadScenes(store, unit), deps);

    expect(result.inputs).toEqual({ present: [1, 2], missing: [] });
    expect(result.render.rendered).toEqual([1, 2]);
    expect(result.merge).toMatchObject({ ok: true, sceneIds: [1, 2], outputPath: unit.paths.output });
    expect(engine.labels()).toEqual([
      'scene-1:base',
      'scene-2:base',
      'merge:normalize:1',
      'merge:normalize:2',
      'merge:concat',
    ]);
  });

  it('skips the merge when a scene fails to render', async () => {
    store.writeBytes(unit.paths.sceneVideo(1), 64 * 1024);

    const result = await runChapter(unit, loadScenes(store, unit), deps);

    expect(result.inputs.missing).toEqual([2]);
    expect(result.render.failed).toEqual([2]);
    expect(result.merge).toBeUndefined();
    expect(engine.labels()).toEqual(['scene-1:base']);
    expect(store.has(unit.paths.output)).toBe(false);
  });
});
