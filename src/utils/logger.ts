export interface LogSink {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  sink?: LogSink;
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

// Diagnostics go to stderr so answers on stdout stay machine-readable.
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, sink = console } = options;
  const prefix = `[${scope}]`;
  return {
    debug: (message) => {
      if (verbose && !quiet) sink.error(`${prefix} ${message}`);
    },
    info: (message) => {
      if (!quiet) sink.error(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (!quiet) sink.error(`${prefix} warn: ${message}`);
    },
    error: (message) => sink.error(`${prefix} error: ${message}`),
  };
}
