import pino from 'pino';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

export function createLogger(name: string = 'thoughtline', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? process.env.THOUGHTLINE_LOG_LEVEL ?? 'info';

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

/**
 * Child logger bound to a component name. Resolved lazily so that a logger
 * installed with setLogger() after import still takes effect.
 */
export function componentLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}
