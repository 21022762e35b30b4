import { Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import { createInferenceClient } from '../../patch/index.js';
import { createDockerSandboxExecutor } from '../../sandbox/index.js';
import { checkSystemStatus } from '../../status/index.js';
import { print, printError, formatError, formatJson, formatReadiness } from '../formatter.js';
import { statusCommandOptionsSchema, validateOrThrow } from '../validators.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Check that Docker and the inference backend are ready')
    .option('--json', 'Output result as JSON', false)
    .action(async (rawOptions: unknown) => {
      try {
        await executeStatus(rawOptions);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the status command.
 */
async function executeStatus(rawOptions: unknown): Promise<void> {
  const options = validateOrThrow(statusCommandOptionsSchema, rawOptions);
  const config = loadConfig();

  const status = await checkSystemStatus({
    sandbox: createDockerSandboxExecutor(config.sandbox),
    inference: createInferenceClient(config.inference),
  });

  print(options.json ? formatJson(status) : formatReadiness(status));

  if (!status.ready) {
    process.exitCode = 1;
  }
}
