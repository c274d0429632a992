import { err, ok, type Result } from '../lib/errors.js';
import type { BatchSelection } from '../services/batchRunner.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'process'; selection: BatchSelection; generateCollection: boolean; dryRun: boolean }
  | {
      kind: 'process-custom';
      editId: string;
      code: string;
      sourceDir: string;
      destDir?: string;
      collectionName?: string;
      generateCollection: boolean;
      dryRun: boolean;
    }
  | { kind: 'list'; group?: string }
  | { kind: 'generate'; directory: string; collectionName: string; outputDir?: string; fileName?: string }
  | { kind: 'stats'; directory: string }
  | { kind: 'list-directories'; root?: string }
  | { kind: 'validate'; collectionPath: string };

export const USAGE = [
  'Usage: testcase-renamer <command> [options]',
  '',
  'Commands:',
  '  process --group <G> (--ts <id>... | --all) [--no-collection] [--dry-run]',
  '  process --edit-id <E> --code <C> --source-dir <S> [--dest-dir <D>] [--collection-name <N>]',
  '  list [--group <G>]',
  '  generate --directory <D> [--collection-name <N>] [--output-dir <O>] [--file-name <F>]',
  '  stats --directory <D>',
  '  list-directories [--root <R>]',
  '  validate --collection-path <P>',
].join('\n');

const VALUE_FLAGS = new Set([
  '--group',
  '--ts',
  '--edit-id',
  '--code',
  '--source-dir',
  '--dest-dir',
  '--collection-name',
  '--directory',
  '--output-dir',
  '--file-name',
  '--root',
  '--collection-path',
]);
const BOOLEAN_FLAGS = new Set(['--all', '--no-collection', '--dry-run']);

interface RawFlags {
  values: Map<string, string[]>;
  booleans: Set<string>;
}

function readFlags(rest: string[]): Result<RawFlags, string> {
  const values = new Map<string, string[]>();
  const booleans = new Set<string>();
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const shorthand = /^--TS_?(\d{1,3})$/i.exec(arg);
    if (shorthand) {
      values.set('--ts', [...(values.get('--ts') ?? []), shorthand[1]]);
      continue;
    }
    if (BOOLEAN_FLAGS.has(arg)) {
      booleans.add(arg);
      continue;
    }
    if (VALUE_FLAGS.has(arg)) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) return err(`Missing value for ${arg}`);
      values.set(arg, [...(values.get(arg) ?? []), value]);
      i++;
      continue;
    }
    return err(`Unknown option: ${arg}`);
  }
  return ok({ values, booleans });
}

const last = (flags: RawFlags, name: string): string | undefined => {
  const all = flags.values.get(name);
  return all ? all[all.length - 1] : undefined;
};

export function parseCliArgs(argv: string[]): Result<CliCommand, string> {
  const [cmd, ...rest] = argv;
  if (!cmd || cmd === '--help' || cmd === '-h' || cmd === 'help') return ok({ kind: 'help' });

  const flagsResult = readFlags(rest);
  if (!flagsResult.ok) return flagsResult;
  const flags = flagsResult.value;
  const generateCollection = !flags.booleans.has('--no-collection');
  const dryRun = flags.booleans.has('--dry-run');

  switch (cmd) {
    case 'process': {
      const editId = last(flags, '--edit-id');
      const code = last(flags, '--code');
      if (editId !== undefined || code !== undefined) {
        const sourceDir = last(flags, '--source-dir');
        if (!editId || !code || !sourceDir) return err('Custom processing needs --edit-id, --code and --source-dir');
        return ok({
          kind: 'process-custom',
          editId,
          code,
          sourceDir,
          destDir: last(flags, '--dest-dir'),
          collectionName: last(flags, '--collection-name'),
          generateCollection,
          dryRun,
        });
      }
      const ids = flags.values.get('--ts') ?? [];
      const all = flags.booleans.has('--all');
      if (!ids.length && !all) return err('No model specified: use --ts <id> or --all');
      return ok({ kind: 'process', selection: { group: last(flags, '--group'), ids, all }, generateCollection, dryRun });
    }
    case 'list':
      return ok({ kind: 'list', group: last(flags, '--group') });
    case 'generate': {
      const directory = last(flags, '--directory');
      if (!directory) return err('generate needs --directory');
      return ok({
        kind: 'generate',
        directory,
        collectionName: last(flags, '--collection-name') ?? 'TestCollection',
        outputDir: last(flags, '--output-dir'),
        fileName: last(flags, '--file-name'),
      });
    }
    case 'stats': {
      const directory = last(flags, '--directory');
      if (!directory) return err('stats needs --directory');
      return ok({ kind: 'stats', directory });
    }
    case 'list-directories':
      return ok({ kind: 'list-directories', root: last(flags, '--root') });
    case 'validate': {
      const collectionPath = last(flags, '--collection-path');
      if (!collectionPath) return err('validate needs --collection-path');
      return ok({ kind: 'validate', collectionPath });
    }
    default:
      return err(`Unknown command: ${cmd}`);
  }
}
