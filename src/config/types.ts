import type { LogFormat, LogLevel } from "../utils/logger.js";

export type { LogFormat, LogLevel };

export interface Config {
  paths: {
    db: string;
    script: string;
    cast: string;
  };

  dca: {
    lookahead: number; // dialogue blocks
    slotCount: number; // 1..12
    previewLength: number;
    labelLength: number;
  };

  logging: {
    level: LogLevel;
    scopes?: string[];
    format: LogFormat;
  };
}
