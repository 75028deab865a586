/**
 * Leveled logger for suite progress and trial diagnostics.
 *
 * Text output is colored with chalk; `json` mode emits one object per line.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Show debug messages. */
  verbose?: boolean;
  /** Only show errors. */
  quiet?: boolean;
  noColor?: boolean;
  /** Emit one JSON object per line instead of text. */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/** Destination for formatted lines. Defaults to process stdout/stderr. */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const processSink: LogSink = {
  stdout(line) {
    process.stdout.write(`${line}\n`);
  },
  stderr(line) {
    process.stderr.write(`${line}\n`);
  },
};

function shouldOutput(options: LoggerOptions, level: LogLevel): boolean {
  if (options.quiet) return level === 'error';
  if (!options.verbose && level === 'debug') return false;
  return true;
}

function formatText(options: LoggerOptions, level: LogLevel, message: string): string {
  if (options.noColor) {
    switch (level) {
      case 'debug':
        return `[debug] ${message}`;
      case 'info':
        return message;
      case 'warn':
        return `warning: ${message}`;
      case 'error':
        return `error: ${message}`;
    }
  }

  switch (level) {
    case 'debug':
      return chalk.gray(`[debug] ${message}`);
    case 'info':
      return message;
    case 'warn':
      return chalk.yellow(`${chalk.bold('warning:')} ${message}`);
    case 'error':
      return chalk.red(`${chalk.bold('error:')} ${message}`);
  }
}

/**
 * Create a logger. Each instance keeps its own options.
 */
export function createLogger(options: LoggerOptions = {}, sink: LogSink = processSink): Logger {
  let current: LoggerOptions = { ...options };

  const output = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (!shouldOutput(current, level)) return;

    if (current.json) {
      const entry: JsonLogEntry = { level, message, timestamp: new Date().toISOString() };
      if (data) entry.data = data;
      sink.stdout(JSON.stringify(entry));
      return;
    }

    const line = formatText(current, level, message);
    if (level === 'error' || level === 'warn') {
      sink.stderr(line);
    } else {
      sink.stdout(line);
    }

    if (data && current.verbose) {
      const dump = JSON.stringify(data, null, 2);
      sink.stdout(current.noColor ? dump : chalk.gray(dump));
    }
  };

  return {
    debug: (message, data) => output('debug', message, data),
    info: (message, data) => output('info', message, data),
    warn: (message, data) => output('warn', message, data),
    error: (message, data) => output('error', message, data),
    configure(next) {
      current = { ...current, ...next };
    },
    getOptions() {
      return { ...current };
    },
  };
}

/** Default logger, used when a run is not given one. */
export const logger = createLogger();
