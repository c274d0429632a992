import path from 'path';
import { err, ok, type Result } from '../lib/errors.js';
import { parseRenamedFilename } from '../lib/filenames.js';
import { isDirectory, listJsonFilesDeep, listSubdirectories } from '../lib/files.js';

export interface DirectoryStats {
  directory: string;
  totalFiles: number;
  fileTypes: Record<string, number>;
  editIds: string[];
  codes: string[];
  suffixes: string[];
  unparsed: number;
}

export interface StatsError {
  kind: 'missing_source_directory';
  message: string;
}

const sorted = (s: Set<string>) => [...s].sort();

export function getDirectoryStats(directory: string): Result<DirectoryStats, StatsError> {
  if (!isDirectory(directory)) {
    return err<StatsError>({ kind: 'missing_source_directory', message: `Directory '${directory}' not found` });
  }

  const files = listJsonFilesDeep(directory);
  const fileTypes: Record<string, number> = {};
  const editIds = new Set<string>();
  const codes = new Set<string>();
  const suffixes = new Set<string>();
  let unparsed = 0;

  for (const file of files) {
    const parsed = parseRenamedFilename(path.basename(file));
    if (!parsed.ok) {
      unparsed++;
      continue;
    }
    const { testType, editId, code } = parsed.value;
    fileTypes[testType] = (fileTypes[testType] ?? 0) + 1;
    editIds.add(editId);
    codes.add(code);
    suffixes.add(testType);
  }

  return ok({
    directory,
    totalFiles: files.length,
    fileTypes,
    editIds: sorted(editIds),
    codes: sorted(codes),
    suffixes: sorted(suffixes),
    unparsed,
  });
}

export function listDirectories(root: string): string[] {
  if (!isDirectory(root)) return [];
  return listSubdirectories(root);
}

export function listDirectoriesWithStats(root: string): DirectoryStats[] {
  const out: DirectoryStats[] = [];
  for (const name of listDirectories(root)) {
    const stats = getDirectoryStats(path.join(root, name));
    if (stats.ok) out.push(stats.value);
  }
  return out;
}
