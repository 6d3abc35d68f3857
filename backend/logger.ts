import type { LogLevelName } from "./config";

type Fields = Record<string, unknown>;

const ORDER: Record<LogLevelName, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type Logger = {
  debug(msg: string, fields?: Fields): void;
  info(msg: string, fields?: Fields): void;
  warn(msg: string, fields?: Fields): void;
  error(msg: string, fields?: Fields): void;
  child(fields: Fields): Logger;
};

// One JSON line per event on stdout/stderr.
export function createLogger(level: LogLevelName = "info", base: Fields = {}): Logger {
  const threshold = ORDER[level];

  function write(lvl: LogLevelName, msg: string, fields?: Fields) {
    if (ORDER[lvl] < threshold) return;
    const line = JSON.stringify({ level: lvl, timestamp: new Date().toISOString(), msg, ...base, ...fields });
    if (lvl === "error" || lvl === "warn") console.error(line);
    else console.log(line);
  }

  return {
    debug: (msg, fields) => write("debug", msg, fields),
    info: (msg, fields) => write("info", msg, fields),
    warn: (msg, fields) => write("warn", msg, fields),
    error: (msg, fields) => write("error", msg, fields),
    child: fields => createLogger(level, { ...base, ...fields }),
  };
}

export function errorFields(error: unknown) {
  if (error instanceof Error) {
    return { name: error.name || "Error", message: error.message, stack: error.stack ?? null };
  }
  return { name: "UnknownError", message: String(error), stack: null };
}
