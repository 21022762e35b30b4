import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { SessionStore } from '../../artifacts/index.js';
import { loadConfig } from '../../config/index.js';
import { createRepairOrchestrator, type RepairHooks } from '../../orchestrator/index.js';
import { TerminalState } from '../../types/index.js';
import {
  print,
  printError,
  bold,
  formatError,
  formatExecution,
  formatInfo,
  formatJson,
  formatPatch,
  formatSessionSummary,
  formatWarning,
} from '../formatter.js';
import { repairCommandOptionsSchema, validate, type RepairCommandOptions } from '../validators.js';

/**
 * Create the repair command.
 */
export function createRepairCommand(): Command {
  const command = new Command('repair')
    .description('Run a Python program in the sandbox and repair it until it succeeds')
    .argument('<file>', 'Path to the Python program')
    .option('-n, --max-iterations <n>', 'Maximum number of sandbox runs')
    .option('--no-ai', 'Use rule-based fixes only')
    .option('--json', 'Output the session as JSON', false)
    .option('--no-save', 'Do not store the session')
    .action(async (file: string, rawOptions: unknown) => {
      try {
        await executeRepair(file, rawOptions);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the repair command.
 */
async function executeRepair(file: string, rawOptions: unknown): Promise<void> {
  const validation = validate(repairCommandOptionsSchema, rawOptions);
  if (!validation.success) {
    for (const error of validation.errors) {
      printError(formatError(`${error.path}: ${error.message}`));
    }
    process.exitCode = 1;
    return;
  }
  const options: RepairCommandOptions = validation.data;

  const code = await readFile(file, 'utf-8');
  if (code.trim().length === 0) {
    printError(formatError(`${file} is empty`));
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const maxIterations = options.maxIterations ?? config.maxIterations;

  const hooks: RepairHooks = options.json
    ? {}
    : {
        onExecution: (result, artifact) => print(formatExecution(result, artifact)),
        onPatch: (patch) => print(formatPatch(patch)),
      };

  const orchestrator = createRepairOrchestrator(config, {
    ...(options.ai ? {} : { inference: null }),
    hooks,
  });

  if (!options.json) {
    print(bold(`Repairing ${file} (up to ${maxIterations} runs)`));
    if (!options.ai || !config.inference.enabled) {
      print(formatWarning('AI fixes disabled; using rule-based fixes only'));
    }
    print('');
  }

  const session = await orchestrator.repair(code, maxIterations);

  let savedPath: string | null = null;
  if (options.save) {
    savedPath = await new SessionStore(config.dataDir).save(session);
  }

  if (options.json) {
    print(formatJson(session));
  } else {
    print('');
    print(formatSessionSummary(session));
    if (session.terminalState === TerminalState.SUCCESS && session.patches.length > 0) {
      print('');
      print(bold('Final code:'));
      print(session.finalCode);
    }
    if (savedPath) {
      print('');
      print(formatInfo(`Session saved to ${savedPath}`));
    }
  }

  if (session.terminalState !== TerminalState.SUCCESS) {
    process.exitCode = 1;
  }
}
