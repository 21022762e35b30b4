import { Command } from 'commander';
import { SessionStore } from '../../artifacts/index.js';
import { loadConfig } from '../../config/index.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSessionDetail,
  formatSessionList,
} from '../formatter.js';
import { sessionIdSchema, showCommandOptionsSchema, validate, validateOrThrow } from '../validators.js';

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  const command = new Command('show')
    .description('Show a stored repair session')
    .argument('<sessionId>', 'Session ID')
    .option('--json', 'Output the session as JSON', false)
    .option('--code', 'Include the final code', false)
    .action(async (sessionId: string, rawOptions: unknown) => {
      try {
        await executeShow(sessionId, rawOptions);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Create the sessions command.
 */
export function createSessionsCommand(): Command {
  const command = new Command('sessions')
    .description('List stored repair sessions, newest first')
    .action(async () => {
      try {
        const store = new SessionStore(loadConfig().dataDir);
        print(formatSessionList(await store.list()));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the show command.
 */
async function executeShow(sessionId: string, rawOptions: unknown): Promise<void> {
  const id = validate(sessionIdSchema, sessionId);
  if (!id.success) {
    printError(formatError(id.errors.map((e) => e.message).join('; ')));
    process.exitCode = 1;
    return;
  }
  const options = validateOrThrow(showCommandOptionsSchema, rawOptions);

  const store = new SessionStore(loadConfig().dataDir);
  const session = await store.load(id.data);

  if (!session) {
    printError(formatError(`Session not found: ${id.data}`));
    process.exitCode = 1;
    return;
  }

  print(options.json ? formatJson(session) : formatSessionDetail(session, options.code));
}
