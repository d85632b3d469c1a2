//depthcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  WEB: "info",
  PROFILE: "info",
  INTERP: "info",
  CHART: "info",
  ENCODER: "info",
};

// Allow env overrides like LOG_SCOPE_PROFILE=debug, LOG_SCOPE_WEB=warn, etc.
// Read on every call so tests and late dotenv loads take effect.
export function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Global env level, when set, beats the table
  const global = parseLevel(process.env.LOG_LEVEL);
  if (global) return global;

  // 3) Default table, then "info"
  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
