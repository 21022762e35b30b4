import pino, { type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';

// CLI output owns stdout; keep the log quiet unless asked
const level = process.env['AUTOPATCH_LOG_LEVEL'] ?? 'warn';

const options: LoggerOptions = {
  level,
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only when developing; production emits plain JSON lines
if (isDev && level !== 'silent') {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

// Logs go to stderr so `--json` output stays machine-readable
export const logger = options.transport ? pino(options) : pino(options, pino.destination(2));

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
