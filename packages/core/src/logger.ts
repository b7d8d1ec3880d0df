export type Level = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

export interface LogContext {
  service?: string;
  document?: string;
  doctype?: string;
  run_id?: string;
  request_id?: string;
}

export interface LogOptions {
  level?: Level;
  format?: LogFormat;
}

type Fields = Record<string, unknown>;

export interface Logger {
  child(ctx: LogContext): Logger;
  trace(msg: string, ctx?: Fields): void;
  debug(msg: string, ctx?: Fields): void;
  info(msg: string, ctx?: Fields): void;
  warn(msg: string, ctx?: Fields): void;
  error(msg: string, ctx?: Fields): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function isLevel(v: string | undefined): v is Level {
  return v !== undefined && (LEVELS as string[]).includes(v);
}

function nowISO() { return new Date().toISOString(); }

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const env = process.env;
  const lvl: Level = opts.level ?? (isLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info");
  const fmt: LogFormat = opts.format ?? (env.LOG_FORMAT === "json" ? "json" : "pretty");

  function emit(base: LogContext, level: Level, msg: string, extra?: Fields) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    if (fmt === "json") {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ ts: nowISO(), level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx = { ...rest, ...(extra || {}) };
    const head = `[${nowISO()}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    // eslint-disable-next-line no-console
    console.log(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: LogContext): Logger {
    return {
      child(ctx: LogContext) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
