import path from 'path';
import type { AppConfig } from '../lib/config.js';
import { newRunId, writeRunReport } from '../lib/reportStore.js';
import { assembleCollection, writeCollection } from '../services/collectionAssembler.js';
import { validateCollectionFile } from '../services/collectionValidator.js';
import { getDirectoryStats, listDirectoriesWithStats } from '../services/directoryStats.js';
import { planBatches, runBatches, type RunSummary } from '../services/batchRunner.js';
import { customModel, listGroups, resolveModels } from '../services/modelCatalog.js';
import { USAGE, type CliCommand } from './args.js';
import { formatModels, formatRunSummary, formatStats, formatValidation } from './output.js';

export interface CommandOutcome {
  exitCode: number;
  output: string;
}

const resolvePath = (p: string) => (path.isAbsolute(p) ? p : path.resolve(p));

async function finishRun(config: AppConfig, summary: RunSummary): Promise<CommandOutcome> {
  const reportPath = await writeRunReport(config, newRunId(), summary);
  const text = formatRunSummary(summary);
  return {
    exitCode: summary.totals.failed > 0 ? 1 : 0,
    output: reportPath ? `${text}\nReport: ${reportPath}` : text,
  };
}

export async function executeCommand(command: CliCommand, config: AppConfig): Promise<CommandOutcome> {
  const catalog = { roots: config, modelsFile: config.modelsFile };

  switch (command.kind) {
    case 'help':
      return { exitCode: 0, output: USAGE };

    case 'process': {
      const plan = planBatches(command.selection, (group) => resolveModels(group, catalog).models);
      const summary = runBatches(plan, {
        collectionsRoot: config.collectionsRoot,
        generateCollection: command.generateCollection,
        dryRun: command.dryRun,
      });
      return finishRun(config, summary);
    }

    case 'process-custom': {
      const model = customModel(
        {
          editId: command.editId,
          code: command.code,
          sourceDir: resolvePath(command.sourceDir),
          destDir: command.destDir ? resolvePath(command.destDir) : undefined,
          collectionName: command.collectionName,
        },
        config,
      );
      const summary = runBatches(
        { batches: [model], failures: [] },
        { collectionsRoot: config.collectionsRoot, generateCollection: command.generateCollection, dryRun: command.dryRun },
      );
      return finishRun(config, summary);
    }

    case 'list': {
      const groups = command.group ? [command.group] : listGroups(catalog);
      if (!groups.length) return { exitCode: 0, output: 'No groups found' };
      const blocks = groups.map((g) => formatModels(g, resolveModels(g, catalog).models));
      return { exitCode: 0, output: blocks.join('\n') };
    }

    case 'generate': {
      const assembled = assembleCollection(resolvePath(command.directory), command.collectionName);
      const outPath = writeCollection(
        assembled.collection,
        resolvePath(command.outputDir ?? config.collectionsRoot),
        command.fileName ?? 'collection.json',
      );
      const lines = [`Wrote ${outPath} (${assembled.collection.items.length} requests)`];
      for (const w of assembled.warnings) lines.push(`warning: ${w.file}: ${w.kind}: ${w.message}`);
      return { exitCode: 0, output: lines.join('\n') };
    }

    case 'stats': {
      const stats = getDirectoryStats(resolvePath(command.directory));
      if (!stats.ok) return { exitCode: 1, output: `${stats.error.kind}: ${stats.error.message}` };
      return { exitCode: 0, output: formatStats(stats.value) };
    }

    case 'list-directories': {
      const root = resolvePath(command.root ?? config.destRoot);
      const all = listDirectoriesWithStats(root);
      if (!all.length) return { exitCode: 0, output: `No directories under ${root}` };
      return {
        exitCode: 0,
        output: all.map((s) => `${path.basename(s.directory)}  ${s.totalFiles} files`).join('\n'),
      };
    }

    case 'validate': {
      const report = validateCollectionFile(resolvePath(command.collectionPath));
      if (!report.ok) return { exitCode: 1, output: `${report.error.kind}: ${report.error.message}` };
      return { exitCode: report.value.valid ? 0 : 1, output: formatValidation(report.value) };
    }
  }
}
