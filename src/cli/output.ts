import type { ModelConfig } from '../models/ModelConfig.js';
import type { BatchSummary, RunSummary } from '../services/batchRunner.js';
import type { ValidationReport } from '../services/collectionValidator.js';
import type { DirectoryStats } from '../services/directoryStats.js';

const counts = (record: Record<string, number>) =>
  Object.keys(record)
    .sort()
    .map((k) => `${k}=${record[k]}`)
    .join(', ');

export function formatBatch(b: BatchSummary): string[] {
  const label = `[${b.group}] TS_${b.id} (${b.editId}/${b.code})`;
  if (b.status === 'failed') {
    return [`FAILED ${label}: ${b.error ? `${b.error.kind}: ${b.error.message}` : 'unknown error'}`];
  }
  const lines = [
    `OK ${label}: renamed ${b.renamed}, unchanged ${b.unchanged}, skipped ${b.skipped.length}, failed ${b.failed.length}`,
  ];
  for (const issue of [...b.skipped, ...b.failed]) lines.push(`  - ${issue.file}: ${issue.kind}: ${issue.message}`);
  if (b.collection) lines.push(`  collection ${b.collection.path} (${b.collection.items} requests)`);
  return lines;
}

export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];
  for (const b of summary.batches) lines.push(...formatBatch(b));
  for (const f of summary.failures) {
    lines.push(`FAILED ${f.group ? `[${f.group}] ` : ''}${f.id}: ${f.kind}: ${f.message}`);
  }
  const t = summary.totals;
  lines.push(
    `Batches: ${t.batches} total, ${t.succeeded} succeeded, ${t.failed} failed`,
    `Files: ${t.filesRenamed} renamed, ${t.filesSkipped} skipped, ${t.filesFailed} failed`,
  );
  return lines.join('\n');
}

export function formatModels(group: string, models: ModelConfig[]): string {
  if (!models.length) return `${group}: no models`;
  const lines = [`${group}:`];
  for (const m of models) {
    lines.push(`  TS_${m.id}  ${m.editId}  ${m.code}  ${m.collectionName}  (${m.origin})`);
  }
  return lines.join('\n');
}

export function formatStats(stats: DirectoryStats): string {
  return [
    `Directory: ${stats.directory}`,
    `Files: ${stats.totalFiles} (${stats.unparsed} unparsed)`,
    `Test types: ${counts(stats.fileTypes) || '-'}`,
    `Edit ids: ${stats.editIds.join(', ') || '-'}`,
    `Codes: ${stats.codes.join(', ') || '-'}`,
  ].join('\n');
}

export function formatValidation(report: ValidationReport): string {
  const lines = [
    `${report.valid ? 'VALID' : 'INVALID'} ${report.path} (${report.format})`,
    `Requests: ${report.stats.totalRequests}`,
  ];
  const methods = counts(report.stats.byMethod);
  if (methods) lines.push(`Methods: ${methods}`);
  const types = counts(report.stats.byTestType);
  if (types) lines.push(`Test types: ${types}`);
  for (const e of report.errors) lines.push(`error: ${e}`);
  for (const w of report.warnings) lines.push(`warning: ${w}`);
  return lines.join('\n');
}
