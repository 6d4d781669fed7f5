import pino from 'pino';

export type LogFormat = 'pretty' | 'json';

export interface LoggerOptions {
  verbose?: boolean;
  level?: pino.LevelWithSilent;
  format?: LogFormat;
}

export function createLogger(name: string = 'release-gate', options: LoggerOptions = {}): pino.Logger {
  const level = options.verbose ? 'debug' : (options.level ?? 'info');

  // CI logs are read in the job console, so everything goes to stderr and
  // stdout stays free for --json output.
  if (options.format === 'json') {
    return pino({ name, level }, pino.destination(2));
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, destination: 2, ignore: 'pid,hostname' },
    },
  });
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
