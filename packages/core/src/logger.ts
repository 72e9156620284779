export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
};

export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_RANK;
}

export function parseLogThreshold(raw: string | null | undefined, fallback: LogThreshold = "info"): LogThreshold {
  const normalized = (raw ?? "").trim().toLowerCase();
  return isThreshold(normalized) ? normalized : fallback;
}

let threshold: LogThreshold = parseLogThreshold(process.env.LOG_LEVEL);
// JSON line for log collectors / Docker logs
let sink: LogSink = (line) => console.log(line);

export function setLogThreshold(next: LogThreshold) {
  threshold = next;
}

export function setLogSink(next: LogSink) {
  sink = next;
}

export function serializeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { errorName: error.name, err: error.message };
  }
  return { err: String(error) };
}

function write(level: LogLevel, bindings: LogMeta, msg: string, meta?: LogMeta) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const entry = {
    level,
    msg,
    time: Date.now(),
    ...bindings,
    ...(meta ?? {})
  };
  sink(JSON.stringify(entry));
}

function build(bindings: LogMeta): Logger {
  return {
    debug: (msg, meta) => write("debug", bindings, msg, meta),
    info: (msg, meta) => write("info", bindings, msg, meta),
    warn: (msg, meta) => write("warn", bindings, msg, meta),
    error: (msg, meta) => write("error", bindings, msg, meta),
    child: (extra) => build({ ...bindings, ...extra })
  };
}

export function createLogger(scope: string, bindings: LogMeta = {}): Logger {
  return build({ scope, ...bindings });
}
