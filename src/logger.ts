/**
 * The subset of `console` the logger writes to. Tests pass a recorder.
 */
export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export interface Logger {
  /** Per-reference decisions; only printed with --verbose */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A logger that prefixes every line with `[tag]` */
  child(tag: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
  tag?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, sink = console, tag } = options;
  const prefix = tag ? `[${tag}] ` : '';

  return {
    debug(message) {
      if (verbose) sink.log(`${prefix}${message}`);
    },
    info(message) {
      sink.log(`${prefix}${message}`);
    },
    warn(message) {
      sink.warn(`${prefix}${message}`);
    },
    error(message) {
      sink.error(`${prefix}${message}`);
    },
    child(childTag) {
      return createLogger({ verbose, sink, tag: tag ? `${tag}:${childTag}` : childTag });
    }
  };
}

/**
 * Logger that drops everything. Default for library calls.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  }
};
