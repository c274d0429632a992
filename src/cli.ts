#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, USAGE } from './cli/args.js';
import { executeCommand } from './cli/commands.js';
import { loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }

  const outcome = await executeCommand(parsed.value, loadConfig());
  console.log(outcome.output);
  process.exit(outcome.exitCode);
}

main().catch((e) => {
  console.error('Error:', errorMessage(e));
  process.exit(1);
});
