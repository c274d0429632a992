import { promises as fs } from 'fs';
import path from 'path';
import type { AppConfig } from './config.js';
import type { RunSummary } from '../services/batchRunner.js';

export type ReportOptions = Pick<AppConfig, 'reportsEnabled' | 'reportsDir'>;

/**
 * Writes a run summary to `<reportsDir>/<YYYY-MM-DD>/<runId>.json`.
 * Resolves to the written path, or undefined when reports are off.
 */
export async function writeRunReport(
  options: ReportOptions,
  runId: string,
  summary: RunSummary,
  now: Date = new Date(),
): Promise<string | undefined> {
  if (!options.reportsEnabled) return undefined;
  const dir = path.join(options.reportsDir, now.toISOString().slice(0, 10));
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${runId}.json`);
  await fs.writeFile(filePath, JSON.stringify(summary, null, 2), 'utf8');
  return filePath;
}

export const newRunId = (now: Date = new Date()): string =>
  `run_${now.toISOString().replace(/[-:.]/g, '').replace('T', '_').replace('Z', '')}`;
