#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleListCommand, printListHelp } from './cli/list-command.js';
import { handleThreadsCommand, printThreadsHelp } from './cli/threads-command.js';
import { handleViewCommand, printViewHelp } from './cli/view-command.js';
import { CliUsageError } from './cli/errors.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(1);
    return;
  }

  // Global help/version flags only count before any command.
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  const command = args.shift();

  if (!command) {
    printHelp();
    process.exit(1);
    return;
  }

  const showHelp = args.includes('--help') || args.includes('-h');

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'list':
        if (showHelp) {
          printListHelp();
        } else {
          handleListCommand(args);
        }
        break;

      case 'threads':
        if (showHelp) {
          printThreadsHelp();
        } else {
          handleThreadsCommand(args);
        }
        break;

      case 'view':
      case 'v':
        if (showHelp) {
          printViewHelp();
        } else {
          await handleViewCommand(args);
        }
        break;

      default:
        printHelp(`Unknown command '${command}'.`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(`Run 'threadfold ${command} --help' for usage.`);
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

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
