// src/config.ts
export type LogLevel = "silent" | "warn" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "warn", "debug"];

function env(name: string, def: string) {
  const v = process.env[name];
  if (v == null || v === "") {
    return def;
  }
  return v;
}

function parseQuality(raw: string): number {
  const value = Number(raw);
  return Number.isFinite(value) ? Math.min(100, Math.max(0, Math.round(value))) : 90;
}

function parseLogLevel(raw: string): LogLevel {
  const normalized = raw.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "warn";
}

export const CONFIG = {
  DEFAULT_QUALITY: parseQuality(env("IMG_FIT_DEFAULT_QUALITY", "90")),
  LOG_LEVEL: parseLogLevel(env("IMG_FIT_LOG_LEVEL", "warn")),
} as const;

export const __test__ = {
  env,
  parseQuality,
  parseLogLevel,
};
