import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import type { Roots } from '../lib/config.js';
import type { FileIssue } from '../lib/errors.js';
import { isDirectory, listSubdirectories, REGRESSION_DIR } from '../lib/files.js';
import { logger } from '../lib/logger.js';
import {
  freezeModel,
  StaticModelsFileSchema,
  type ModelConfig,
  type StaticModel,
} from '../models/ModelConfig.js';

export interface DiscoveryResult {
  models: ModelConfig[];
  warnings: FileIssue[];
}

export interface ParsedFolderName {
  id: string;
  rawId: string;
  description: string;
  editId: string;
  code: string;
  destFolderName: string;
}

export type StaticCatalog = Record<string, ModelConfig[]>;

// Source folder suffix -> destination folder suffix, most specific first.
const FOLDER_SUFFIXES: ReadonlyArray<readonly [string, string]> = [
  ['_payloads_sur', '_payloads_dis'],
  ['_ayloads_sur', '_payloads_dis'],
  ['_sur', '_dis'],
];

const FOLDER_PATTERN = /^TS_(\d{1,3})_(.+)_([A-Za-z0-9]+)_([A-Za-z0-9]+)$/;

/** `1` -> `01`, `10` -> `10`, `100` -> `100`; accepts `TS01` / `TS_01` too. */
export function normalizeSuiteNumber(raw: string): string | null {
  const digits = raw.trim().replace(/^TS_?/i, '');
  if (!/^\d{1,3}$/.test(digits)) return null;
  const n = Number(digits);
  if (n >= 1 && n <= 99) return String(n).padStart(2, '0');
  if (n >= 100 && n <= 999) return String(n);
  return digits;
}

export function destinationFolderName(folderName: string): string {
  for (const [from, to] of FOLDER_SUFFIXES) {
    if (folderName.endsWith(from)) return folderName.slice(0, -from.length) + to;
  }
  return folderName;
}

const slug = (s: string) => s.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');

export const defaultCollectionName = (id: string, description?: string): string =>
  description ? `TS_${id}_${description}_Collection` : `ts_${id}_collection`;

export const defaultCollectionFileName = (prefix: string, editId: string, code: string): string =>
  `${slug(prefix)}_${editId}_${code.toLowerCase()}.json`;

/**
 * `TS_01_Covid_WGS_CSBD_RULEEM000001_W04_sur` ->
 * `{ id: '01', description: 'Covid_WGS_CSBD', editId: 'RULEEM000001', code: 'W04' }`.
 * The last two underscore-separated tokens are the edit id and the code.
 */
export function parseModelFolderName(folderName: string): ParsedFolderName | null {
  const suffix = FOLDER_SUFFIXES.find(([from]) => folderName.endsWith(from));
  if (!suffix) return null;
  const core = folderName.slice(0, -suffix[0].length);
  const match = FOLDER_PATTERN.exec(core);
  if (!match) return null;
  const [, rawId, description, editId, code] = match;
  const id = normalizeSuiteNumber(rawId);
  if (!id) return null;
  return { id, rawId, description, editId, code, destFolderName: destinationFolderName(folderName) };
}

/** Scans `{sourceRoot}/{group}` for model folders. Bad folders are warnings, never fatal. */
export function discoverModels(group: string, roots: Roots): DiscoveryResult {
  const base = path.join(roots.sourceRoot, group);
  const models: ModelConfig[] = [];
  const warnings: FileIssue[] = [];

  if (!isDirectory(base)) {
    warnings.push({ file: base, kind: 'missing_source_directory', message: `group folder not found: ${base}` });
    return { models, warnings };
  }

  for (const folderName of listSubdirectories(base)) {
    if (!folderName.startsWith('TS_')) continue;
    const parsed = parseModelFolderName(folderName);
    if (!parsed) {
      const issue: FileIssue = { file: folderName, kind: 'malformed_folder_name', message: `could not parse folder name: ${folderName}` };
      logger.warn({ folder: folderName, group }, issue.message);
      warnings.push(issue);
      continue;
    }
    const sourceDir = path.join(base, folderName, REGRESSION_DIR);
    if (!isDirectory(sourceDir)) {
      const issue: FileIssue = { file: folderName, kind: 'missing_source_directory', message: `regression folder not found in ${folderName}` };
      logger.warn({ folder: folderName, group }, issue.message);
      warnings.push(issue);
      continue;
    }
    models.push(
      freezeModel({
        id: parsed.id,
        group,
        editId: parsed.editId,
        code: parsed.code,
        sourceDir,
        destDir: path.join(roots.destRoot, group, parsed.destFolderName, REGRESSION_DIR),
        collectionName: defaultCollectionName(parsed.id, parsed.description),
        collectionFileName: defaultCollectionFileName(parsed.description, parsed.editId, parsed.code),
        origin: 'discovered',
        folderName,
      }),
    );
  }

  logger.debug({ group, found: models.length }, 'model discovery finished');
  return { models, warnings };
}

function fromStatic(group: string, entry: StaticModel, roots: Roots): ModelConfig {
  const id = normalizeSuiteNumber(entry.ts) ?? entry.ts;
  const parsed = parseModelFolderName(entry.folder);
  const destFolder = entry.destFolder ?? destinationFolderName(entry.folder);
  return freezeModel({
    id,
    group,
    editId: entry.editId,
    code: entry.code,
    sourceDir: path.join(roots.sourceRoot, group, entry.folder, REGRESSION_DIR),
    destDir: path.join(roots.destRoot, group, destFolder, REGRESSION_DIR),
    collectionName: entry.collectionName ?? defaultCollectionName(id, parsed?.description),
    collectionFileName: entry.collectionFileName ?? defaultCollectionFileName(parsed?.description ?? group, entry.editId, entry.code),
    origin: 'static',
    folderName: entry.folder,
  });
}

/** Reads the static model table (YAML). A missing file is an empty catalog. */
export function loadStaticModels(filePath: string, roots: Roots): StaticCatalog {
  if (!fs.existsSync(filePath)) return {};
  const doc: unknown = yaml.load(fs.readFileSync(filePath, 'utf8'));
  const file = StaticModelsFileSchema.parse(doc ?? {});
  const catalog: StaticCatalog = {};
  for (const [group, entries] of Object.entries(file.groups)) {
    catalog[group] = entries.map((e) => fromStatic(group, e, roots));
  }
  return catalog;
}

export interface ResolveOptions {
  roots: Roots;
  modelsFile: string;
}

/** Discovered models first; the static table only when discovery finds nothing. */
export function resolveModels(group: string, opts: ResolveOptions): DiscoveryResult {
  const discovered = discoverModels(group, opts.roots);
  if (discovered.models.length) return discovered;

  const fallback = loadStaticModels(opts.modelsFile, opts.roots)[group] ?? [];
  if (fallback.length) logger.info({ group, count: fallback.length }, 'no folders discovered, using static models');
  return { models: fallback, warnings: discovered.warnings };
}

export function listGroups(opts: ResolveOptions): string[] {
  const groups = new Set<string>(Object.keys(loadStaticModels(opts.modelsFile, opts.roots)));
  if (isDirectory(opts.roots.sourceRoot)) {
    for (const name of listSubdirectories(opts.roots.sourceRoot)) groups.add(name);
  }
  return [...groups].sort();
}

export interface CustomModelInput {
  editId: string;
  code: string;
  sourceDir: string;
  destDir?: string;
  collectionName?: string;
}

export function customModel(input: CustomModelInput, roots: Roots): ModelConfig {
  const key = `${input.editId}_${input.code}`;
  return freezeModel({
    id: key,
    group: 'custom',
    editId: input.editId,
    code: input.code,
    sourceDir: input.sourceDir,
    destDir: input.destDir ?? path.join(roots.destRoot, 'custom', key, REGRESSION_DIR),
    collectionName: input.collectionName ?? `${key}_Collection`,
    collectionFileName: defaultCollectionFileName('custom', input.editId, input.code),
    origin: 'custom',
  });
}
