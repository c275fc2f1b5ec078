/**
 * Console Logger
 *
 * Progress lines go to stdout, diagnostics to stderr.
 */

export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Prefix for every line, e.g. "[Render]" */
  prefix?: string;
  /** Suppress info lines */
  quiet?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const format = (message: string) =>
    options.prefix ? `${options.prefix} ${message}` : message;

  return {
    info(message) {
      if (!options.quiet) console.log(format(message));
    },
    error(message) {
      console.error(format(message));
    },
  };
}

/**
 * Logger that keeps lines in memory
 */
export interface RecordingLogger extends Logger {
  lines: Array<{ level: 'info' | 'error'; message: string }>;
  messages(): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  return {
    lines,
    info(message) {
      lines.push({ level: 'info', message });
    },
    error(message) {
      lines.push({ level: 'error', message });
    },
    messages() {
      return lines.map(l => l.message);
    },
  };
}
