import { z } from 'zod';

export type ModelOrigin = 'static' | 'discovered' | 'custom';

/** One test-suite batch. Resolved once, read-only afterwards. */
export interface ModelConfig {
  readonly id: string;
  readonly group: string;
  readonly editId: string;
  readonly code: string;
  readonly sourceDir: string;
  readonly destDir: string;
  readonly collectionName: string;
  readonly collectionFileName: string;
  readonly origin: ModelOrigin;
  readonly folderName?: string;
}

const token = z.string().regex(/^[A-Za-z0-9]+$/, 'expected an alphanumeric token');

export const StaticModelSchema = z.object({
  ts: z.union([z.string(), z.number()]).transform((v) => String(v)),
  editId: token,
  code: token,
  folder: z.string().min(1),
  destFolder: z.string().min(1).optional(),
  collectionName: z.string().min(1).optional(),
  collectionFileName: z.string().min(1).optional(),
});

export const StaticModelsFileSchema = z.object({
  groups: z.record(z.array(StaticModelSchema)).default({}),
});

export type StaticModel = z.infer<typeof StaticModelSchema>;
export type StaticModelsFile = z.infer<typeof StaticModelsFileSchema>;

export const freezeModel = (m: ModelConfig): ModelConfig => Object.freeze({ ...m });
