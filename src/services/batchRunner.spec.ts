import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ModelConfig } from '../models/ModelConfig.js';
import { collectionOutputDir, planBatches, runBatch, runBatches, summarize } from './batchRunner.js';

const model = (id: string, overrides: Partial<ModelConfig> = {}): ModelConfig => ({
  id,
  group: 'G',
  editId: `E${id}`,
  code: 'C1',
  sourceDir: `/src/${id}`,
  destDir: `/dest/${id}`,
  collectionName: `TS_${id}_Collection`,
  collectionFileName: `ts_${id}.json`,
  origin: 'static',
  ...overrides,
});

const counter = () => {
  let n = 0;
  return () => `uid-${++n}`;
};

describe('batchRunner', () => {
  describe('planBatches', () => {
    const catalog = [model('01'), model('02'), model('100')];
    const lookup = (group: string) => (group === 'G' ? catalog : []);

    it('turns every request into a failure when the group is missing', () => {
      expect(planBatches({ ids: ['01', '02'], all: false }, lookup)).toEqual({
        batches: [],
        failures: [
          { id: '01', kind: 'missing_required_flag', message: '--group is required to select model 01' },
          { id: '02', kind: 'missing_required_flag', message: '--group is required to select model 02' },
        ],
      });
      expect(planBatches({ ids: [], all: true }, lookup).failures).toEqual([
        { id: 'all', kind: 'missing_required_flag', message: '--group is required to select all models' },
      ]);
    });

    it('selects every model of the group with all', () => {
      expect(planBatches({ group: 'G', ids: [], all: true }, lookup).batches).toBe(catalog);
    });

    it('reports a failure when all finds no models for the group', () => {
      expect(planBatches({ group: 'typo', ids: [], all: true }, lookup)).toEqual({
        batches: [],
        failures: [{ id: 'all', group: 'typo', kind: 'unknown_model', message: 'no models found for group typo' }],
      });
    });

    it('normalizes and deduplicates requested ids', () => {
      const plan = planBatches({ group: 'G', ids: ['1', 'TS01', '100', '02'], all: false }, lookup);
      expect(plan.batches.map((m) => m.id)).toEqual(['01', '100', '02']);
      expect(plan.failures).toEqual([]);
    });

    it('reports unknown ids and keeps the rest', () => {
      const plan = planBatches({ group: 'G', ids: ['01', '99'], all: false }, lookup);
      expect(plan.batches.map((m) => m.id)).toEqual(['01']);
      expect(plan.failures).toEqual([{ id: '99', group: 'G', kind: 'unknown_model', message: 'no model TS_99 in group G' }]);
    });
  });

  describe('running batches', () => {
    let tmp: string;
    let collectionsRoot: string;

    const put = (dir: string, name: string, body = '{}') => {
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(path.join(dir, name), body, 'utf8');
    };

    const localModel = (id: string) =>
      model(id, { sourceDir: path.join(tmp, 'src', id), destDir: path.join(tmp, 'dest', id, 'regression') });

    beforeEach(() => {
      tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-'));
      collectionsRoot = path.join(tmp, 'collections');
    });

    afterEach(() => {
      fs.rmSync(tmp, { recursive: true, force: true });
    });

    it('renames and then writes the collection', () => {
      const m = localModel('01');
      put(m.sourceDir, 'TC#01#deny.json');
      put(m.sourceDir, 'TC#02#bypass.json');

      const summary = runBatch(m, { collectionsRoot, assemble: { newUid: counter() } });

      const outPath = path.join(collectionsRoot, 'G', 'TS_01_Collection', 'ts_01.json');
      expect(summary).toEqual({
        id: '01',
        group: 'G',
        editId: 'E01',
        code: 'C1',
        status: 'succeeded',
        renamed: 2,
        unchanged: 0,
        skipped: [],
        failed: [],
        collection: { path: outPath, items: 2, warnings: [] },
      });
      expect(collectionOutputDir(m, collectionsRoot)).toBe(path.dirname(outPath));
      expect(fs.readFileSync(outPath, 'utf8')).toContain('"name": "TC#01#E01#C1#LR"');
    });

    it('skips the collection when asked to', () => {
      const m = localModel('01');
      put(m.sourceDir, 'TC#01#deny.json');

      const summary = runBatch(m, { collectionsRoot, generateCollection: false });

      expect(summary.collection).toBeUndefined();
      expect(fs.existsSync(collectionsRoot)).toBe(false);
    });

    it('writes nothing on a dry run', () => {
      const m = localModel('01');
      put(m.sourceDir, 'TC#01#deny.json');

      const summary = runBatch(m, { collectionsRoot, dryRun: true });

      expect(summary.renamed).toBe(1);
      expect(summary.collection).toBeUndefined();
      expect(fs.existsSync(m.destDir)).toBe(false);
    });

    it('marks a batch with a missing source as failed', () => {
      const m = localModel('03');

      const summary = runBatch(m, { collectionsRoot });

      expect(summary.status).toBe('failed');
      expect(summary.error).toEqual({ kind: 'missing_source_directory', message: `source directory not found: ${m.sourceDir}` });
    });

    it('keeps going after a failed batch and totals the run', () => {
      const good = localModel('01');
      put(good.sourceDir, 'TC#01#deny.json');
      put(good.sourceDir, 'TC#02#date.json');
      put(good.sourceDir, 'broken.json');
      const missing = localModel('02');

      const summary = runBatches(
        { batches: [missing, good], failures: [{ id: '99', group: 'G', kind: 'unknown_model', message: 'no model TS_99 in group G' }] },
        { collectionsRoot },
      );

      expect(summary.batches.map((b) => [b.id, b.status])).toEqual([
        ['02', 'failed'],
        ['01', 'succeeded'],
      ]);
      expect(summary.totals).toEqual({
        batches: 3,
        succeeded: 1,
        failed: 2,
        filesRenamed: 2,
        filesSkipped: 1,
        filesFailed: 0,
      });
    });
  });

  it('summarizes an empty run', () => {
    expect(summarize([], [])).toEqual({
      batches: [],
      failures: [],
      totals: { batches: 0, succeeded: 0, failed: 0, filesRenamed: 0, filesSkipped: 0, filesFailed: 0 },
    });
  });
});
