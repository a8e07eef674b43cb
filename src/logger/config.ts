// 日志配置：每次输出时从环境变量读取，测试里 stubEnv 即时生效

import { isDebugEnabled } from "../config/flags.js";
import type { LogLevel } from "./types.js";


const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };


export interface LogSettings {
  /** 控制台最低级别 */
  console: LogLevel;
  /** 落库最低级别；null 表示不落库 */
  db: LogLevel | null;
}


const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return LEVELS.some((l) => l === s);
}

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  const v = s?.trim().toLowerCase();
  return v && isLogLevel(v) ? v : fallback;
}


/** FEEDLINE_DEBUG 优先于 LOG_LEVEL（默认 info）；LOG_TO_DB=0/false 关闭落库，否则按 LOG_DB_LEVEL（默认 warn） */
export function logSettings(): LogSettings {
  const dbOff = process.env.LOG_TO_DB === "0" || process.env.LOG_TO_DB === "false";
  return {
    console: isDebugEnabled() ? "debug" : parseLevel(process.env.LOG_LEVEL, "info"),
    db: dbOff ? null : parseLevel(process.env.LOG_DB_LEVEL, "warn"),
  };
}


export function atLeast(level: LogLevel, min: LogLevel | null): boolean {
  return min != null && RANK[level] >= RANK[min];
}
