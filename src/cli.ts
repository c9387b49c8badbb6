#!/usr/bin/env node
import { parseArgs } from './cli/args';
import { runCommand } from './cli/run';
import { errorMessage } from './errors';
import { initLogger } from './logger';

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  initLogger();
  process.exitCode = await runCommand(command);
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
