export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  /** Returns a logger that adds `bindings` to every line it writes. */
  child(bindings: Record<string, unknown>): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Output sink. Defaults to console.log. */
  output?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "info",
    pretty = process.env.NODE_ENV !== "production",
    output = console.log,
  } = options;

  return build(LEVEL_RANK[level], pretty, output, {});
}

function build(
  minRank: number,
  pretty: boolean,
  output: (line: string) => void,
  bindings: Record<string, unknown>
): Logger {
  function write(msgLevel: LogLevel, msg: string, meta?: Record<string, unknown>) {
    if (LEVEL_RANK[msgLevel] < minRank) return;
    const ts = new Date().toISOString();
    const fields = { ...bindings, ...meta };
    if (pretty) {
      const entries = Object.entries(fields);
      const metaStr = entries.length
        ? " " + entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ")
        : "";
      output(`[${ts}] ${msgLevel.toUpperCase().padEnd(5)} ${msg}${metaStr}`);
    } else {
      output(JSON.stringify({ ts, level: msgLevel, msg, ...fields }));
    }
  }

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    child: (extra) => build(minRank, pretty, output, { ...bindings, ...extra }),
  };
}
