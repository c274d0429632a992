import fs from 'fs';
import path from 'path';
import { BatchError, errorMessage, type FileIssue } from '../lib/errors.js';
import { parseRenamedFilename, transformFilename } from '../lib/filenames.js';
import { isDirectory, isFile, listJsonFiles, moveFileVerified, sameContent } from '../lib/files.js';
import { logger } from '../lib/logger.js';
import { DEFAULT_SUFFIX_TABLE, type SuffixTable } from '../lib/suffixTable.js';
import type { ModelConfig } from '../models/ModelConfig.js';

export interface RenamedFile {
  from: string;
  to: string;
  testType: string;
}

export interface RenameBatchResult {
  sourceDir: string;
  destDir: string;
  renamed: RenamedFile[];
  unchanged: RenamedFile[];
  skipped: FileIssue[];
  failed: FileIssue[];
}

export interface RenameOptions {
  table?: SuffixTable;
  dryRun?: boolean;
}

export type RenamePlan =
  | { action: 'rename'; newFilename: string; testType: string }
  | { action: 'relocate'; newFilename: string; testType: string }
  | { action: 'skip'; issue: FileIssue };

type RenameTarget = Pick<ModelConfig, 'editId' | 'code'>;

/** Decides what to do with one source file without touching the filesystem. */
export function planRename(filename: string, model: RenameTarget, table: SuffixTable = DEFAULT_SUFFIX_TABLE): RenamePlan {
  const renamed = parseRenamedFilename(filename);
  if (renamed.ok) {
    const { editId, code, testType } = renamed.value;
    if (editId === model.editId && code === model.code) {
      return { action: 'relocate', newFilename: filename, testType };
    }
    return {
      action: 'skip',
      issue: {
        file: filename,
        kind: 'model_mismatch',
        message: `already renamed for ${editId}_${code}, expected ${model.editId}_${model.code}`,
      },
    };
  }

  const transformed = transformFilename(filename, model, table);
  if (!transformed.ok) {
    const { expected, actual } = transformed.error;
    return {
      action: 'skip',
      issue: { file: filename, kind: 'wrong_field_count', message: `expected ${expected} fields, found ${actual}` },
    };
  }
  return { action: 'rename', ...transformed.value };
}

/**
 * Renames every payload of one batch into `model.destDir`.
 * Files are handled one at a time in name order; a bad file never stops the batch.
 */
export function renameBatch(model: ModelConfig, options: RenameOptions = {}): RenameBatchResult {
  const table = options.table ?? DEFAULT_SUFFIX_TABLE;
  const { sourceDir, destDir } = model;

  if (!isDirectory(sourceDir)) {
    throw new BatchError('missing_source_directory', `source directory not found: ${sourceDir}`);
  }
  if (!options.dryRun) fs.mkdirSync(destDir, { recursive: true });

  const result: RenameBatchResult = { sourceDir, destDir, renamed: [], unchanged: [], skipped: [], failed: [] };
  const samePlace = path.resolve(sourceDir) === path.resolve(destDir);
  const claimed = new Set<string>();

  for (const filename of listJsonFiles(sourceDir)) {
    const plan = planRename(filename, model, table);
    if (plan.action === 'skip') {
      logger.warn({ file: filename, kind: plan.issue.kind, batch: model.id }, plan.issue.message);
      result.skipped.push(plan.issue);
      continue;
    }

    const entry: RenamedFile = { from: filename, to: plan.newFilename, testType: plan.testType };
    if (claimed.has(plan.newFilename)) {
      const issue: FileIssue = { file: filename, kind: 'name_collision', message: `${plan.newFilename} already produced in this batch` };
      logger.warn({ file: filename, kind: issue.kind, batch: model.id }, issue.message);
      result.skipped.push(issue);
      continue;
    }
    claimed.add(plan.newFilename);
    if (plan.action === 'relocate' && samePlace) {
      result.unchanged.push(entry);
      continue;
    }

    // A payload left by an earlier run is never replaced.
    const from = path.join(sourceDir, filename);
    const to = path.join(destDir, plan.newFilename);
    if (isFile(to)) {
      if (sameContent(from, to)) {
        result.unchanged.push(entry);
        continue;
      }
      const issue: FileIssue = { file: filename, kind: 'name_collision', message: `${plan.newFilename} already exists in ${destDir}` };
      logger.warn({ file: filename, kind: issue.kind, batch: model.id }, issue.message);
      result.skipped.push(issue);
      continue;
    }
    if (options.dryRun) {
      result.renamed.push(entry);
      continue;
    }

    try {
      moveFileVerified(from, to);
      logger.debug({ from: filename, to: plan.newFilename, batch: model.id }, 'renamed');
      result.renamed.push(entry);
    } catch (e) {
      const issue: FileIssue = { file: filename, kind: 'unreadable_file', message: errorMessage(e) };
      logger.warn({ file: filename, kind: issue.kind, batch: model.id }, issue.message);
      result.failed.push(issue);
    }
  }

  return result;
}
