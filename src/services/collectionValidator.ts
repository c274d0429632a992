import fs from 'fs';
import { deserializeCollection, parseJson } from '../lib/collectionDocument.js';
import { err, errorMessage, ok, type ParseError, type Result } from '../lib/errors.js';

export type CollectionFormat = 'collection' | 'postman_v2' | 'unknown';

export interface ValidationStats {
  totalRequests: number;
  byMethod: Record<string, number>;
  byTestType: Record<string, number>;
}

export interface ValidationReport {
  path: string;
  valid: boolean;
  format: CollectionFormat;
  errors: string[];
  warnings: string[];
  stats: ValidationStats;
}

const REQUIRED_TOP_LEVEL = ['version', 'name', 'type', 'items'] as const;
const REQUIRED_ITEM_FIELDS = ['name', 'method', 'url'] as const;

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

const bump = (counts: Record<string, number>, key: string) => {
  counts[key] = (counts[key] ?? 0) + 1;
};

function headerValue(item: Record<string, unknown>, name: string): string | undefined {
  const headers = item.headers;
  if (!Array.isArray(headers)) return undefined;
  for (const h of headers) {
    if (isRecord(h) && h.name === name && typeof h.value === 'string') return h.value;
  }
  return undefined;
}

function checkMinimal(doc: Record<string, unknown>, report: ValidationReport): void {
  for (const field of REQUIRED_TOP_LEVEL) {
    if (!(field in doc)) report.errors.push(`Missing required field: ${field}`);
  }
  if (!('items' in doc)) return;
  if (!Array.isArray(doc.items)) {
    report.errors.push('Field items must be an array');
    return;
  }

  const uids = new Set<string>();
  doc.items.forEach((raw: unknown, idx: number) => {
    if (!isRecord(raw)) {
      report.errors.push(`items[${idx}]: not an object`);
      return;
    }
    for (const field of REQUIRED_ITEM_FIELDS) {
      if (typeof raw[field] !== 'string' || !raw[field]) report.errors.push(`items[${idx}]: missing ${field}`);
    }
    if (typeof raw.uid === 'string') {
      if (uids.has(raw.uid)) report.errors.push(`items[${idx}]: duplicate uid ${raw.uid}`);
      uids.add(raw.uid);
    }
    if (typeof raw.method === 'string') bump(report.stats.byMethod, raw.method);
    const testType = headerValue(raw, 'X-Test-Type');
    if (testType) bump(report.stats.byTestType, testType);
  });
  report.stats.totalRequests = doc.items.length;
}

function checkPostmanV2(doc: Record<string, unknown>, report: ValidationReport): void {
  if (!isRecord(doc.info)) report.errors.push('Field info must be an object');
  if (!Array.isArray(doc.item)) {
    report.errors.push('Field item must be an array');
    return;
  }
  doc.item.forEach((raw: unknown, idx: number) => {
    if (!isRecord(raw) || typeof raw.name !== 'string') {
      report.errors.push(`item[${idx}]: missing name`);
      return;
    }
    const request = raw.request;
    if (!isRecord(request)) {
      report.errors.push(`item[${idx}]: missing request`);
      return;
    }
    if (typeof request.method !== 'string') report.errors.push(`item[${idx}]: missing method`);
    else bump(report.stats.byMethod, request.method);
    if (request.url === undefined) report.errors.push(`item[${idx}]: missing url`);
  });
  report.stats.totalRequests = doc.item.length;
}

/** Checks a collection document held in memory. */
export function validateCollectionText(text: string, filePath = '<memory>'): Result<ValidationReport, ParseError> {
  const json = parseJson(text);
  if (!json.ok) return json;

  const report: ValidationReport = {
    path: filePath,
    valid: false,
    format: 'unknown',
    errors: [],
    warnings: [],
    stats: { totalRequests: 0, byMethod: {}, byTestType: {} },
  };
  const doc = json.value;

  if (!isRecord(doc)) {
    report.errors.push('Document is not a JSON object');
    return ok(report);
  }

  if ('info' in doc && 'item' in doc) {
    report.format = 'postman_v2';
    checkPostmanV2(doc, report);
  } else {
    report.format = 'collection';
    checkMinimal(doc, report);
    if (!report.errors.length) {
      const strict = deserializeCollection(text);
      if (!strict.ok) report.errors.push(...(strict.error.issues ?? [strict.error.message]));
    }
  }

  if (report.stats.totalRequests === 0) report.warnings.push('Collection contains no requests');
  report.valid = report.errors.length === 0;
  return ok(report);
}

/** Reads and checks a collection document. Never writes to `filePath`. */
export function validateCollectionFile(filePath: string): Result<ValidationReport, ParseError> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    return err<ParseError>({ kind: 'unreadable_file', message: errorMessage(e) });
  }
  return validateCollectionText(text, filePath);
}
