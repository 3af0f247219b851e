export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

export type LogSink = (level: EmitLevel, line: string) => void;

export type SubsystemLogger = {
  readonly subsystem: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(name: string): SubsystemLogger;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.info(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
  }
};

let activeSink: LogSink = consoleSink;
let levelOverride: LogLevel | undefined;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (levelOverride) {
    return levelOverride;
  }
  const raw = env.SCREENPACT_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

export function formatTimestamp(date = new Date()): string {
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");
  const milliseconds = String(date.getMilliseconds()).padStart(3, "0");
  return `[${hours}:${minutes}:${seconds}.${milliseconds}]`;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: EmitLevel, message: string) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[resolveLogLevel()]) {
      return;
    }
    activeSink(level, `${formatTimestamp()} [${subsystem}] ${message}`);
  };

  return {
    subsystem,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message, error) => emit("error", error === undefined ? message : `${message}: ${formatError(error)}`),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}

/** Redirects every logger to `sink` until the returned restore function runs. */
export function setLogSink(sink: LogSink, level?: LogLevel): () => void {
  const previousSink = activeSink;
  const previousLevel = levelOverride;
  activeSink = sink;
  levelOverride = level;
  return () => {
    activeSink = previousSink;
    levelOverride = previousLevel;
  };
}
