export type Level = "trace" | "debug" | "info" | "warn" | "error";

export interface BaseCtx {
  service?: string;
  request_id?: string;
  tool?: string;
  filename?: string;
}

export interface LogOptions {
  level?: Level;
  format?: "json" | "pretty";
  sink?: (line: string) => void;
}

export type LogCtx = Record<string, unknown>;

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogCtx): void;
  debug(msg: string, ctx?: LogCtx): void;
  info(msg: string, ctx?: LogCtx): void;
  warn(msg: string, ctx?: LogCtx): void;
  error(msg: string, ctx?: LogCtx): void;
}

const LEVELS: readonly Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function isLevel(v: unknown): v is Level {
  return typeof v === "string" && (LEVELS as readonly string[]).includes(v);
}

function nowISO() { return new Date().toISOString(); }

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const env = process.env;
  const lvl: Level = opts.level ?? (isLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info");
  const fmt = opts.format ?? (env.LOG_FORMAT === "json" ? "json" : "pretty");
  // eslint-disable-next-line no-console
  const sink = opts.sink ?? ((line: string) => console.log(line));

  function emit(base: BaseCtx, level: Level, msg: string, extra?: LogCtx) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    if (fmt === "json") {
      sink(JSON.stringify({ ts: nowISO(), level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx: LogCtx = { ...rest, ...(extra || {}) };
    const head = `[${nowISO()}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    sink(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
