/**
 * Highlight auto-assembly — fills a unit's scene slots with footage from
 * scenes already produced in other units.
 *
 * Steps:
 * 1. Read the target's optional manual map (`manual_map.json`).
 * 2. Collect candidates: source scenes whose footage is present, in unit
 *    order then scene order.
 * 3. Match every slot (manual entries first, then scoring).
 * 4. Copy each assigned footage file to the target's `scene_NNN.mp4`.
 * 5. Write the audit trail (`assembly_map.json`), unassigned slots included.
 */
import { z } from 'zod';
import type { MatchRecord, Scene, WorkUnit } from '../domain/types.js';
import { artifact, readJson, writeJson, type ArtifactStore } from '../store/artifacts.js';
import { ManifestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { matchScenes, type Candidate, type ManualEntry, type MatchOptions } from './matcher.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SourceUnit {
  unit: WorkUnit;
  scenes: readonly Scene[];
}

export interface AssembleRequest {
  target: WorkUnit;
  slots: readonly Scene[];
  sources: readonly SourceUnit[];
  /** Resolves units a manual entry may name beyond `sources`. */
  lookupUnit?: (unitId: string) => WorkUnit | null;
  weights?: MatchOptions['weights'];
}

export interface AssemblySummary {
  records: MatchRecord[];
  manual: number;
  auto: number;
  unassigned: number[];
  auditPath: string;
}

// ── Manual map ────────────────────────────────────────────────────────────────

const ManualMapSchema = z.array(
  z.object({
    slot_id:         z.number().int().nonnegative(),
    source_unit:     z.string().min(1),
    source_scene_id: z.number().int().nonnegative(),
    rationale:       z.string().optional(),
  }),
);

export function readManualMap(store: ArtifactStore, target: WorkUnit): Map<number, ManualEntry> {
  const key = artifact.manualMap(target);
  const data = readJson(store, key);
  const map = new Map<number, ManualEntry>();
  if (data === null) return map;

  const parsed = ManualMapSchema.safeParse(data);
  if (!parsed.success) {
    const where = parsed.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    throw new ManifestError(key.path, `invalid manual map (${where})`, parsed.error);
  }
  for (const e of parsed.data) {
    map.set(e.slot_id, {
      sourceUnit: e.source_unit,
      sourceSceneId: e.source_scene_id,
      ...(e.rationale !== undefined ? { rationale: e.rationale } : {}),
    });
  }
  return map;
}

// ── Audit trail ───────────────────────────────────────────────────────────────

export function toAuditRecord(r: MatchRecord): Record<string, unknown> {
  return {
    slot_id:          r.slotId,
    source_work_unit: r.sourceUnit,
    source_scene_id:  r.sourceSceneId,
    method:           r.method,
    ...(r.score !== undefined ? { score: r.score } : {}),
    ...(r.rationale !== undefined ? { rationale: r.rationale } : {}),
  };
}

// ── Public API ────────────────────────────────────────────────────────────────

export function assembleHighlights(req: AssembleRequest, store: ArtifactStore): AssemblySummary {
  const { target } = req;
  const units = new Map(req.sources.map((s) => [s.unit.id, s.unit]));
  const resolve = (id: string): WorkUnit | null => units.get(id) ?? req.lookupUnit?.(id) ?? null;
  const footagePresent = (unitId: string, sceneId: number): boolean => {
    const unit = resolve(unitId);
    return unit !== null && store.exists(artifact.sceneVideo(unit, sceneId));
  };

  const candidates: Candidate[] = [];
  for (const source of req.sources) {
    for (const scene of source.scenes) {
      if (!store.exists(artifact.sceneVideo(source.unit, scene.id))) continue;
      candidates.push({
        sourceUnit: source.unit.id,
        sourceSceneId: scene.id,
        narration: scene.narration,
        characters: scene.characters,
        prompt: scene.prompt,
      });
    }
  }
  logger.info('Assembler: source catalog built', {
    target: target.id,
    candidates: candidates.length,
    units: new Set(candidates.map((c) => c.sourceUnit)).size,
  });

  const manualMap = readManualMap(store, target);
  for (const [slotId, entry] of manualMap) {
    if (!footagePresent(entry.sourceUnit, entry.sourceSceneId)) {
      logger.warn('Assembler: manual source footage missing, falling back to auto', {
        slotId,
        sourceUnit: entry.sourceUnit,
        sourceSceneId: entry.sourceSceneId,
      });
    }
  }

  const records = matchScenes(req.slots, candidates, {
    manualMap,
    sourceExists: footagePresent,
    ...(req.weights ? { weights: req.weights } : {}),
  });

  for (const record of records) {
    if (record.sourceUnit === null || record.sourceSceneId === null) {
      logger.warn('Assembler: no match for slot', { target: target.id, slotId: record.slotId });
      continue;
    }
    const sourceUnit = resolve(record.sourceUnit);
    if (!sourceUnit) continue;
    store.copy(artifact.sceneVideo(sourceUnit, record.sourceSceneId), artifact.sceneVideo(target, record.slotId));
    logger.info('Assembler: slot assigned', {
      slotId: record.slotId,
      sourceUnit: record.sourceUnit,
      sourceSceneId: record.sourceSceneId,
      method: record.method,
      ...(record.score !== undefined ? { score: record.score } : { rationale: record.rationale }),
    });
  }

  const audit = artifact.matchAudit(target);
  writeJson(store, audit, records.map(toAuditRecord));

  const summary: AssemblySummary = {
    records,
    manual: records.filter((r) => r.method === 'manual').length,
    auto: records.filter((r) => r.method === 'auto').length,
    unassigned: records.filter((r) => r.method === 'unassigned').map((r) => r.slotId),
    auditPath: audit.path,
  };
  logger.info('Assembler: assembly complete', {
    target: target.id,
    slots: records.length,
    manual: summary.manual,
    auto: summary.auto,
    unassigned: summary.unassigned,
  });
  return summary;
}
