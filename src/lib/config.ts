import path from 'path';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z.object({
  TCR_SOURCE_ROOT: z.string().min(1).default('source_folder'),
  TCR_DEST_ROOT: z.string().min(1).default('renaming_jsons'),
  TCR_COLLECTIONS_ROOT: z.string().min(1).default('collections'),
  TCR_MODELS_FILE: z.string().min(1).default('config/models.yaml'),
  TCR_API_TOKEN: z.string().default(''),
  PORT: z.coerce.number().int().positive().default(3102),
  LOG_LEVEL: LogLevelSchema.default('info'),
  TCR_REPORTS_ENABLED: z.enum(['true', 'false']).default('false'),
  TCR_REPORTS_DIR: z.string().min(1).default('reports'),
});

export interface Roots {
  sourceRoot: string;
  destRoot: string;
  collectionsRoot: string;
}

export interface AppConfig extends Roots {
  modelsFile: string;
  apiToken: string;
  port: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  reportsEnabled: boolean;
  reportsDir: string;
}

/**
 * Resolves the runtime configuration from environment variables.
 * Relative paths are anchored at `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.parse(env);
  const abs = (p: string) => (path.isAbsolute(p) ? p : path.join(cwd, p));
  return {
    sourceRoot: abs(parsed.TCR_SOURCE_ROOT),
    destRoot: abs(parsed.TCR_DEST_ROOT),
    collectionsRoot: abs(parsed.TCR_COLLECTIONS_ROOT),
    modelsFile: abs(parsed.TCR_MODELS_FILE),
    apiToken: parsed.TCR_API_TOKEN,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    reportsEnabled: parsed.TCR_REPORTS_ENABLED === 'true',
    reportsDir: abs(parsed.TCR_REPORTS_DIR),
  };
}
