export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(component: string, message: string, data?: object): void;
  info(component: string, message: string, data?: object): void;
  warn(component: string, message: string, data?: object): void;
  error(component: string, message: string, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function formatEntry(
  level: LogLevel,
  component: string,
  message: string,
  extra?: object | Error,
): string {
  let entry = `[${level.toUpperCase().padEnd(5)}] ${component}: ${message}`;

  if (extra) {
    if (extra instanceof Error) {
      entry += `\n  Error: ${extra.message}`;
    } else {
      entry += `\n  ${JSON.stringify(extra)}`;
    }
  }

  return entry;
}

/**
 * Logger that writes to stderr, so stdout stays reserved for reports.
 * Entries below `minLevel` are dropped.
 */
export function createConsoleLogger(minLevel: LogLevel = 'warn'): Logger {
  const threshold = LEVEL_ORDER[minLevel];

  function write(level: LogLevel, entry: string): void {
    if (LEVEL_ORDER[level] >= threshold) {
      console.error(entry);
    }
  }

  return {
    debug(component, message, data) {
      write('debug', formatEntry('debug', component, message, data));
    },
    info(component, message, data) {
      write('info', formatEntry('info', component, message, data));
    },
    warn(component, message, data) {
      write('warn', formatEntry('warn', component, message, data));
    },
    error(component, message, error) {
      write('error', formatEntry('error', component, message, error));
    },
  };
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
  return {
    debug() {},
    info() {},
    warn() {},
    error() {},
  };
}
