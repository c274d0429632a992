import path from 'path';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../lib/config.js';
import { newRunId, writeRunReport } from '../lib/reportStore.js';
import { registerApiAuth } from '../services/apiAuth.js';
import { planBatches, runBatches } from '../services/batchRunner.js';
import { assembleCollection, writeCollection } from '../services/collectionAssembler.js';
import { validateCollectionFile } from '../services/collectionValidator.js';
import { getDirectoryStats } from '../services/directoryStats.js';
import { listGroups, resolveModels } from '../services/modelCatalog.js';

export interface BatchRoutesOptions {
  config: AppConfig;
}

const modelsQuerySchema = z.object({ group: z.string().min(1).optional() });

const runBodySchema = z.object({
  group: z.string().min(1).optional(),
  ids: z.array(z.union([z.string(), z.number()]).transform((v) => String(v))).default([]),
  all: z.boolean().default(false),
  generateCollection: z.boolean().default(true),
  dryRun: z.boolean().default(false),
});

const generateBodySchema = z.object({
  directory: z.string().min(1),
  collectionName: z.string().min(1),
  outputDir: z.string().min(1).optional(),
  fileName: z.string().min(1).optional(),
});

const validateBodySchema = z.object({ collectionPath: z.string().min(1) });

const statsQuerySchema = z.object({ directory: z.string().min(1) });

const batchRoutes: FastifyPluginAsync<BatchRoutesOptions> = async (app, { config }) => {
  registerApiAuth(app, config.apiToken);
  const catalog = { roots: config, modelsFile: config.modelsFile };
  const abs = (p: string) => path.resolve(p);

  app.get('/internal/models', async (req) => {
    const { group } = modelsQuerySchema.parse(req.query);
    const groups = group ? [group] : listGroups(catalog);
    return {
      groups: groups.map((g) => {
        const { models, warnings } = resolveModels(g, catalog);
        return { group: g, models, warnings };
      }),
    };
  });

  app.post('/internal/batches/run', async (req, reply) => {
    const body = runBodySchema.parse(req.body);
    if (!body.ids.length && !body.all) {
      return reply.code(400).send({ error: 'no_models_selected' });
    }
    const plan = planBatches(
      { group: body.group, ids: body.ids, all: body.all },
      (group) => resolveModels(group, catalog).models,
    );
    const runId = newRunId();
    const summary = runBatches(plan, {
      collectionsRoot: config.collectionsRoot,
      generateCollection: body.generateCollection,
      dryRun: body.dryRun,
    });
    const reportPath = await writeRunReport(config, runId, summary);
    req.log.info({ runId, totals: summary.totals }, 'batch run finished');
    return { runId, reportPath, ...summary };
  });

  app.post('/internal/collections/generate', async (req, reply) => {
    const body = generateBodySchema.parse(req.body);
    const directory = abs(body.directory);
    const assembled = assembleCollection(directory, body.collectionName);
    const outPath = writeCollection(
      assembled.collection,
      body.outputDir ? abs(body.outputDir) : config.collectionsRoot,
      body.fileName ?? 'collection.json',
    );
    return reply.code(201).send({ path: outPath, items: assembled.collection.items.length, warnings: assembled.warnings });
  });

  app.post('/internal/collections/validate', async (req, reply) => {
    const body = validateBodySchema.parse(req.body);
    const report = validateCollectionFile(abs(body.collectionPath));
    if (!report.ok) return reply.code(422).send({ error: report.error.kind, message: report.error.message });
    return report.value;
  });

  app.get('/internal/stats', async (req, reply) => {
    const { directory } = statsQuerySchema.parse(req.query);
    const stats = getDirectoryStats(abs(directory));
    if (!stats.ok) return reply.code(404).send({ error: stats.error.kind, message: stats.error.message });
    return stats.value;
  });
};

export default batchRoutes;
