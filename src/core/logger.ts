import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Diagnostics go to stderr; stdout is reserved for command output.
 */
export function createLogger(
  name: string = 'kernelgen',
  verbose: boolean = false,
  level: LogLevel = verbose ? 'debug' : 'warn',
): pino.Logger {
  if (verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({ name, level }, pino.destination(2));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
