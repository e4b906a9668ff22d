export interface LogContext {
  prId?: number;
  path?: string;
  folder?: string;
  phase?: string;
  dryRun?: boolean;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(ctx: LogContext): Logger;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Where formatted lines go. Errors use `stderr`, everything else `stdout`. */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const processSink: LogSink = {
  stdout: (line) => process.stdout.write(line + "\n"),
  stderr: (line) => process.stderr.write(line + "\n"),
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

export function createLogger(baseCtx: LogContext = {}, minLevel: LogLevel = "info", sink: LogSink = processSink): Logger {
  const minPriority = LEVEL_PRIORITY[minLevel];

  function emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: Record<string, unknown> = {
      level,
      ts: new Date().toISOString(),
      msg,
      ...baseCtx,
      ...ctx,
    };

    for (const key of Object.keys(entry)) {
      if (entry[key] === undefined) delete entry[key];
    }

    const line = JSON.stringify(entry);

    if (level === "error") {
      sink.stderr(line);
    } else {
      sink.stdout(line);
    }
  }

  return {
    debug: (msg, ctx) => emit("debug", msg, ctx),
    info: (msg, ctx) => emit("info", msg, ctx),
    warn: (msg, ctx) => emit("warn", msg, ctx),
    error: (msg, ctx) => emit("error", msg, ctx),
    child(ctx: LogContext): Logger {
      return createLogger({ ...baseCtx, ...ctx }, minLevel, sink);
    },
  };
}

export function createRootLogger(minLevel?: LogLevel): Logger {
  const envLevel = process.env.LOG_LEVEL;
  return createLogger({}, minLevel ?? (isLogLevel(envLevel) ? envLevel : "info"));
}

/** Logger that drops everything; for library callers that pass none. */
export const silentLogger: Logger = createLogger({}, "error", {
  stdout: () => {},
  stderr: () => {},
});
