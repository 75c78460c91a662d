import { pino, type Logger } from 'pino';
import { loadConfig } from './config.js';
import type { LogLevel } from './types.js';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(name: string = 'stipulate', options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  return pino({ name, level });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    try {
      const { logging } = loadConfig();
      _logger = createLogger('stipulate', logging);
    } catch (err) {
      _logger = createLogger('stipulate');
      _logger.warn({ err }, 'invalid logging configuration, using defaults');
    }
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
