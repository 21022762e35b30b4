import { Command } from 'commander';
import { SessionStore } from '../../artifacts/index.js';
import { loadConfig } from '../../config/index.js';
import { createDockerSandboxExecutor } from '../../sandbox/index.js';
import { print, printError, formatError, formatSuccess, formatWarning } from '../formatter.js';
import { cleanupCommandOptionsSchema, validateOrThrow } from '../validators.js';

/**
 * Create the cleanup command.
 */
export function createCleanupCommand(): Command {
  const command = new Command('cleanup')
    .description('Prune old sessions and remove orphaned sandbox containers')
    .option('--max-age-days <days>', 'Delete sessions older than this', '30')
    .option('--max-count <count>', 'Keep at most this many sessions', '100')
    .option('--no-containers', 'Leave sandbox containers alone')
    .action(async (rawOptions: unknown) => {
      try {
        await executeCleanup(rawOptions);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the cleanup command.
 */
async function executeCleanup(rawOptions: unknown): Promise<void> {
  const options = validateOrThrow(cleanupCommandOptionsSchema, rawOptions);
  const config = loadConfig();

  const pruned = await new SessionStore(config.dataDir).prune({
    maxAgeDays: options.maxAgeDays,
    maxCount: options.maxCount,
  });
  print(formatSuccess(`Removed ${pruned} stored session${pruned === 1 ? '' : 's'}`));

  if (!options.containers) {
    return;
  }

  const executor = createDockerSandboxExecutor(config.sandbox);
  if (!(await executor.isAvailable())) {
    print(formatWarning('Docker is not available; skipped container cleanup'));
    return;
  }

  const removed = await executor.cleanup();
  print(formatSuccess(`Removed ${removed} orphaned container${removed === 1 ? '' : 's'}`));
}
