import "dotenv/config";
import type { Config, LogFormat, LogLevel } from "./types.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number, min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  if (n < min || n > max) throw new Error(`Out of range for ${name}: ${v} (expected ${min}..${max})`);
  return n;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((a) => a === v.toLowerCase());
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  return {
    paths: {
      db: opt("MIXCUE_DB_PATH") ?? "./mix/show.tmix",
      script: opt("MIXCUE_SCRIPT_PATH") ?? "./scripts/show.fountain",
      cast: opt("MIXCUE_CAST_PATH") ?? "./cast.yml",
    },

    dca: {
      lookahead: optInt("DCA_LOOKAHEAD", 7, 1),
      slotCount: optInt("DCA_SLOT_COUNT", 12, 1, 12),
      previewLength: optInt("DCA_PREVIEW_LENGTH", 30, 1),
      labelLength: optInt("DCA_LABEL_LENGTH", 12, 1),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

export function printConfigSnapshot(config: Config): void {
  const snap = {
    MIXCUE_DB_PATH: config.paths.db,
    MIXCUE_SCRIPT_PATH: config.paths.script,
    MIXCUE_CAST_PATH: config.paths.cast,
    DCA_LOOKAHEAD: config.dca.lookahead,
    DCA_SLOT_COUNT: config.dca.slotCount,
    DCA_PREVIEW_LENGTH: config.dca.previewLength,
    DCA_LABEL_LENGTH: config.dca.labelLength,
    LOG_LEVEL: config.logging.level,
    LOG_SCOPES: config.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: config.logging.format,
  };
  console.log("[config]", JSON.stringify(snap, null, 2));
}

export const cfg: Config = loadConfig();
