import path from 'path';
import { BatchError, errorMessage, type ErrorKind, type FileIssue } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { SuffixTable } from '../lib/suffixTable.js';
import type { ModelConfig } from '../models/ModelConfig.js';
import { assembleCollection, writeCollection, type AssembleOptions } from './collectionAssembler.js';
import { normalizeSuiteNumber } from './modelCatalog.js';
import { renameBatch } from './renamer.js';

export interface BatchSelection {
  group?: string;
  ids: string[];
  all: boolean;
}

export interface BatchFailure {
  id: string;
  group?: string;
  kind: ErrorKind;
  message: string;
}

export interface BatchPlan {
  batches: ModelConfig[];
  failures: BatchFailure[];
}

export type ModelLookup = (group: string) => ModelConfig[];

export interface BatchSummary {
  id: string;
  group: string;
  editId: string;
  code: string;
  status: 'succeeded' | 'failed';
  renamed: number;
  unchanged: number;
  skipped: FileIssue[];
  failed: FileIssue[];
  collection?: { path: string; items: number; warnings: FileIssue[] };
  error?: { kind: ErrorKind; message: string };
}

export interface RunTotals {
  batches: number;
  succeeded: number;
  failed: number;
  filesRenamed: number;
  filesSkipped: number;
  filesFailed: number;
}

export interface RunSummary {
  batches: BatchSummary[];
  failures: BatchFailure[];
  totals: RunTotals;
}

export interface RunOptions {
  collectionsRoot: string;
  generateCollection?: boolean;
  dryRun?: boolean;
  table?: SuffixTable;
  assemble?: AssembleOptions;
}

/**
 * Resolves the requested batch ids against the catalog. Each id that cannot
 * be resolved becomes a failure of its own so the others still run.
 */
export function planBatches(selection: BatchSelection, lookup: ModelLookup): BatchPlan {
  const failures: BatchFailure[] = [];
  const { group } = selection;

  if (!group) {
    const ids = selection.all ? ['all'] : selection.ids;
    for (const id of ids) {
      failures.push({ id, kind: 'missing_required_flag', message: `--group is required to select ${id === 'all' ? 'all models' : `model ${id}`}` });
    }
    return { batches: [], failures };
  }

  const models = lookup(group);
  if (selection.all) {
    if (!models.length) failures.push({ id: 'all', group, kind: 'unknown_model', message: `no models found for group ${group}` });
    return { batches: models, failures };
  }

  const batches: ModelConfig[] = [];
  const seen = new Set<string>();
  for (const requested of selection.ids) {
    const id = normalizeSuiteNumber(requested) ?? requested;
    if (seen.has(id)) continue;
    seen.add(id);
    const model = models.find((m) => m.id === id);
    if (!model) {
      failures.push({ id, group, kind: 'unknown_model', message: `no model TS_${id} in group ${group}` });
      continue;
    }
    batches.push(model);
  }
  return { batches, failures };
}

export function collectionOutputDir(model: ModelConfig, collectionsRoot: string): string {
  return path.join(collectionsRoot, model.group, model.collectionName);
}

/** Rename, then build the collection from the destination. Never throws. */
export function runBatch(model: ModelConfig, options: RunOptions): BatchSummary {
  const summary: BatchSummary = {
    id: model.id,
    group: model.group,
    editId: model.editId,
    code: model.code,
    status: 'succeeded',
    renamed: 0,
    unchanged: 0,
    skipped: [],
    failed: [],
  };

  try {
    const renamed = renameBatch(model, { table: options.table, dryRun: options.dryRun });
    summary.renamed = renamed.renamed.length;
    summary.unchanged = renamed.unchanged.length;
    summary.skipped = renamed.skipped;
    summary.failed = renamed.failed;

    if (options.generateCollection !== false && !options.dryRun) {
      const assembled = assembleCollection(model.destDir, model.collectionName, options.assemble);
      const outPath = writeCollection(assembled.collection, collectionOutputDir(model, options.collectionsRoot), model.collectionFileName);
      summary.collection = { path: outPath, items: assembled.collection.items.length, warnings: assembled.warnings };
    }
  } catch (e) {
    summary.status = 'failed';
    summary.error = e instanceof BatchError
      ? { kind: e.kind, message: e.message }
      : { kind: 'unreadable_file', message: errorMessage(e) };
    logger.error({ batch: model.id, group: model.group, kind: summary.error.kind }, summary.error.message);
  }

  return summary;
}

export function summarize(batches: BatchSummary[], failures: BatchFailure[]): RunSummary {
  const totals: RunTotals = {
    batches: batches.length + failures.length,
    succeeded: batches.filter((b) => b.status === 'succeeded').length,
    failed: batches.filter((b) => b.status === 'failed').length + failures.length,
    filesRenamed: 0,
    filesSkipped: 0,
    filesFailed: 0,
  };
  for (const b of batches) {
    totals.filesRenamed += b.renamed;
    totals.filesSkipped += b.skipped.length;
    totals.filesFailed += b.failed.length;
  }
  return { batches, failures, totals };
}

/** Batches run strictly one after another; a failed batch does not stop the rest. */
export function runBatches(plan: BatchPlan, options: RunOptions): RunSummary {
  const results: BatchSummary[] = [];
  plan.batches.forEach((model, idx) => {
    logger.info({ batch: model.id, group: model.group, n: idx + 1, of: plan.batches.length }, 'processing batch');
    results.push(runBatch(model, options));
  });
  for (const f of plan.failures) logger.error({ batch: f.id, kind: f.kind }, f.message);
  return summarize(results, plan.failures);
}
