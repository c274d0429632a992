import { err, ok, type FormatError, type Result } from './errors.js';
import { classifySuffix, DEFAULT_SUFFIX_TABLE, type SuffixTable } from './suffixTable.js';

export const FIELD_SEPARATOR = '#';
export const PAYLOAD_EXTENSION = '.json';

export interface RenameTarget {
  editId: string;
  code: string;
}

export interface TransformResult {
  newFilename: string;
  testType: string;
}

export interface RenamedFilename {
  caseId: string;
  testId: string;
  editId: string;
  code: string;
  testType: string;
  stem: string;
}

export const stripExtension = (filename: string): string =>
  filename.endsWith(PAYLOAD_EXTENSION) ? filename.slice(0, -PAYLOAD_EXTENSION.length) : filename;

export const splitFields = (filename: string): string[] => stripExtension(filename).split(FIELD_SEPARATOR);

const wrongFieldCount = (filename: string, expected: number, actual: number): FormatError => ({
  kind: 'wrong_field_count',
  filename,
  expected,
  actual,
});

export function buildRenamedFilename(parts: Omit<RenamedFilename, 'stem'>): string {
  return [parts.caseId, parts.testId, parts.editId, parts.code, parts.testType].join(FIELD_SEPARATOR) + PAYLOAD_EXTENSION;
}

/**
 * `TC#01_12345#deny.json` -> `TC#01_12345#{editId}#{code}#LR.json`.
 * Pure: the caller moves the file.
 */
export function transformFilename(
  filename: string,
  target: RenameTarget,
  table: SuffixTable = DEFAULT_SUFFIX_TABLE,
): Result<TransformResult, FormatError> {
  const fields = splitFields(filename);
  if (fields.length !== 3) return err(wrongFieldCount(filename, 3, fields.length));

  const [caseId, testId, rawSuffix] = fields;
  const testType = classifySuffix(rawSuffix, table);
  const newFilename = buildRenamedFilename({ caseId, testId, editId: target.editId, code: target.code, testType });
  return ok({ newFilename, testType });
}

export function parseRenamedFilename(filename: string): Result<RenamedFilename, FormatError> {
  if (!filename.endsWith(PAYLOAD_EXTENSION)) return err(wrongFieldCount(filename, 5, 0));
  const fields = splitFields(filename);
  if (fields.length !== 5) return err(wrongFieldCount(filename, 5, fields.length));

  const [caseId, testId, editId, code, testType] = fields;
  return ok({ caseId, testId, editId, code, testType, stem: stripExtension(filename) });
}
