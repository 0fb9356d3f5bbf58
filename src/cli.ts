#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handlePickCommand } from './cli/pick-command.js';
import { CliUsageError } from './cli/errors.js';
import { takeSwitch } from './cli/flag-utils.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (takeSwitch(args, ['--help', '-h'])) {
    printHelp();
    return;
  }
  if (takeSwitch(args, ['--version', '-v'])) {
    printVersion(VERSION);
    return;
  }

  try {
    await handlePickCommand(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
