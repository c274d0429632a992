import pino from 'pino';
import { LogLevelSchema } from './config.js';

export function resolveLogLevel(raw: string | undefined) {
  const parsed = LogLevelSchema.safeParse(raw);
  return parsed.success ? parsed.data : 'info';
}

// stderr keeps stdout free for command output.
export const logger = pino({ level: resolveLogLevel(process.env.LOG_LEVEL) }, pino.destination({ fd: 2, sync: true }));
