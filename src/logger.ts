/** Tiny logger wrapper for consistent tags */
type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function threshold(): number {
  const raw = process.env.LOG_LEVEL;
  if (raw === "silent") return Number.POSITIVE_INFINITY;
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error"
    ? LEVEL_ORDER[raw]
    : LEVEL_ORDER.info;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold();

export const log = {
  debug: (...a: unknown[]) => {
    if (enabled("debug")) {
      console.debug(new Date().toISOString(), "[DEBUG]", ...a);
    }
  },
  info: (...a: unknown[]) => {
    if (enabled("info")) console.log(new Date().toISOString(), "[INFO]", ...a);
  },
  warn: (...a: unknown[]) => {
    if (enabled("warn")) console.warn(new Date().toISOString(), "[WARN]", ...a);
  },
  error: (...a: unknown[]) => {
    if (enabled("error")) {
      console.error(new Date().toISOString(), "[ERROR]", ...a);
    }
  },
};

/** Error → short string; axios/ioredis error objects stay out of the log */
export function errMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
