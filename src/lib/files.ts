import fs from 'fs';
import path from 'path';
import { PAYLOAD_EXTENSION } from './filenames.js';

export const REGRESSION_DIR = 'regression';

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/** Payload files directly inside `dir`, sorted by name (code-unit order). */
export function listJsonFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.endsWith(PAYLOAD_EXTENSION))
    .map((d) => d.name)
    .sort();
}

export function listJsonFilesDeep(dir: string): string[] {
  const out: string[] = [];
  const walk = (current: string) => {
    const entries = fs.readdirSync(current, { withFileTypes: true });
    const subdirs = new Set(entries.filter((d) => d.isDirectory()).map((d) => d.name));
    const names = entries
      .filter((d) => d.isDirectory() || (d.isFile() && d.name.endsWith(PAYLOAD_EXTENSION)))
      .map((d) => d.name)
      .sort();
    for (const name of names) {
      const full = path.join(current, name);
      if (subdirs.has(name)) walk(full);
      else out.push(full);
    }
  };
  walk(dir);
  return out;
}

export function listSubdirectories(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort();
}

export function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

export function sameContent(a: string, b: string): boolean {
  return fs.readFileSync(a).equals(fs.readFileSync(b));
}

const isAlreadyExists = (e: unknown): boolean => e instanceof Error && 'code' in e && e.code === 'EEXIST';

/**
 * Copies `from` to `to`, checks the copy, then removes `from`.
 * Never replaces an existing `to`. On any failure before the removal the
 * source is untouched and a partial destination is cleaned up. Same-path
 * moves are no-ops.
 */
export function moveFileVerified(from: string, to: string): void {
  if (path.resolve(from) === path.resolve(to)) return;
  try {
    fs.copyFileSync(from, to, fs.constants.COPYFILE_EXCL);
    const src = fs.statSync(from);
    const dst = fs.statSync(to);
    if (src.size !== dst.size) {
      throw new Error(`copy_size_mismatch: ${src.size} != ${dst.size}`);
    }
  } catch (e) {
    if (!isAlreadyExists(e)) fs.rmSync(to, { force: true });
    throw e;
  }
  fs.unlinkSync(from);
}
