import pino, { type Logger as PinoLogger, type LoggerOptions, type TransportTargetOptions } from "pino";

/**
 * Context attached to every entry written by a logger and its children.
 */
export interface LogContext {
  /** Identifier for the whole run */
  runId?: string;
  /** Account folder name of the archive being processed */
  account?: string;
  component?: string;
  [key: string]: string | undefined;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Leveled logging sink used by every component. Each call produces one line.
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger whose entries also carry `context`. */
  child(context: LogContext): Logger;

  getContext(): LogContext;
}

class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  private formatError(error?: unknown): Record<string, unknown> {
    if (error === undefined) return {};
    if (error instanceof Error) {
      return { err: { type: error.name, message: error.message } };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug({ ...data }, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info({ ...data }, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn({ ...data }, msg);
  }

  error(msg: string, error?: unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...data, ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...data, ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    return new ContextLogger(this.pino.child(context), { ...this.context, ...context });
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

export interface CreateLoggerOptions {
  service: string;
  /** Log level (default: LOG_LEVEL env, then 'info') */
  level?: LogLevel;
  /** File every entry is appended to, without colours */
  logFile?: string;
  /** Mirror entries to the console (default: true) */
  console?: boolean;
  context?: LogContext;
}

// One line per entry: "[timestamp] LEVEL: [account] message"
const PRETTY_OPTIONS = {
  translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
  ignore: "pid,hostname,service",
  messageFormat: "{if account}[{account}] {end}{msg}",
  hideObject: true,
};

/**
 * Create the run logger: pretty, colourised console output plus an
 * append-only plain-text copy in `logFile`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'takeout-merge', logFile: 'run.log' });
 * logger.child({ account: 'alice' }).info('Extracting archive');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const targets: TransportTargetOptions[] = [];

  if (options.console ?? true) {
    targets.push({
      target: "pino-pretty",
      level,
      options: { ...PRETTY_OPTIONS, colorize: true, destination: 1 },
    });
  }
  if (options.logFile) {
    targets.push({
      target: "pino-pretty",
      level,
      options: {
        ...PRETTY_OPTIONS,
        colorize: false,
        destination: options.logFile,
        mkdir: true,
        append: true,
      },
    });
  }

  const pinoOptions: LoggerOptions = {
    level,
    base: { service: options.service },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const pinoInstance =
    targets.length > 0
      ? pino(pinoOptions, pino.transport({ targets }))
      : pino({ ...pinoOptions, enabled: false });
  const context = options.context ?? {};
  return new ContextLogger(
    Object.keys(context).length > 0 ? pinoInstance.child(context) : pinoInstance,
    context,
  );
}

/**
 * No-op logger for library use without a sink
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};
