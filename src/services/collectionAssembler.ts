import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { BatchError, errorMessage, type FileIssue } from '../lib/errors.js';
import { parseRenamedFilename, type RenamedFilename } from '../lib/filenames.js';
import { isDirectory, listJsonFiles, REGRESSION_DIR } from '../lib/files.js';
import { logger } from '../lib/logger.js';
import { serializeCollection } from '../lib/collectionDocument.js';
import {
  REQUEST_METHOD,
  REQUEST_URL_TEMPLATE,
  type Collection,
  type RequestDescriptor,
} from '../models/Collection.js';

export interface AssembleOptions {
  newUid?: () => string;
}

export interface AssembleResult {
  collection: Collection;
  warnings: FileIssue[];
  filesSeen: number;
}

export function buildRequestDescriptor(
  parsed: RenamedFilename,
  bodyRaw: string,
  newUid: () => string = randomUUID,
): RequestDescriptor {
  const header = (name: string, value: string) => ({ uid: newUid(), name, value, enabled: true });
  return {
    uid: newUid(),
    name: parsed.stem,
    method: REQUEST_METHOD,
    url: REQUEST_URL_TEMPLATE,
    headers: [
      header('Content-Type', 'application/json'),
      header('X-Edit-ID', parsed.editId),
      header('X-EOB-Code', parsed.code),
      header('X-Test-Type', parsed.testType),
    ],
    bodyRaw,
  };
}

// Top-level payloads first, then the regression subfolder; each sorted by name.
function collectPayloadPaths(directory: string): string[] {
  const paths = listJsonFiles(directory).map((f) => path.join(directory, f));
  const regression = path.join(directory, REGRESSION_DIR);
  if (isDirectory(regression)) {
    paths.push(...listJsonFiles(regression).map((f) => path.join(regression, f)));
  }
  return paths;
}

/**
 * Builds one request per renamed payload in `directory`. Bodies are embedded
 * as the file's raw text. Unparseable names and unreadable files are skipped
 * and reported in `warnings`.
 */
export function assembleCollection(directory: string, collectionName: string, options: AssembleOptions = {}): AssembleResult {
  if (!isDirectory(directory)) {
    throw new BatchError('missing_source_directory', `collection directory not found: ${directory}`);
  }
  const newUid = options.newUid ?? randomUUID;
  const files = collectPayloadPaths(directory);
  const items: RequestDescriptor[] = [];
  const warnings: FileIssue[] = [];

  for (const file of files) {
    const name = path.basename(file);
    const parsed = parseRenamedFilename(name);
    if (!parsed.ok) {
      const issue: FileIssue = {
        file,
        kind: 'wrong_field_count',
        message: `expected ${parsed.error.expected} fields, found ${parsed.error.actual}`,
      };
      logger.warn({ file, kind: issue.kind }, issue.message);
      warnings.push(issue);
      continue;
    }

    let bodyRaw: string;
    try {
      bodyRaw = fs.readFileSync(file, 'utf8');
    } catch (e) {
      const issue: FileIssue = { file, kind: 'unreadable_file', message: errorMessage(e) };
      logger.warn({ file, kind: issue.kind }, issue.message);
      warnings.push(issue);
      continue;
    }

    items.push(buildRequestDescriptor(parsed.value, bodyRaw, newUid));
  }

  if (!items.length) {
    const issue: FileIssue = { file: directory, kind: 'empty_collection', message: `no requests for collection '${collectionName}'` };
    logger.warn({ directory, kind: issue.kind }, issue.message);
    warnings.push(issue);
  }

  return { collection: { name: collectionName, items }, warnings, filesSeen: files.length };
}

export function writeCollection(collection: Collection, outputDir: string, fileName: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, fileName);
  fs.writeFileSync(filePath, serializeCollection(collection), 'utf8');
  return filePath;
}
