import { Command } from 'commander';
import { createRepairCommand } from './commands/repair.js';
import { createStatusCommand } from './commands/status.js';
import { createShowCommand, createSessionsCommand } from './commands/show.js';
import { createCleanupCommand } from './commands/cleanup.js';

/**
 * Package version - keep in sync with package.json
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('autopatch')
    .description('Run Python programs in a Docker sandbox and repair them until they succeed')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRepairCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createSessionsCommand());
  program.addCommand(createCleanupCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}
