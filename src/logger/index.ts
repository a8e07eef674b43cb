// 统一日志：控制台按级别过滤，warn 以上可落 logs 表便于按信源排查

import { insertLog } from "../db/index.js";
import { atLeast, logSettings } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogMeta } from "./types.js";

export type { LogCategory, LogEntry, LogLevel, LogMeta } from "./types.js";


const CONSOLE: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
};


/** 控制台行：[分类] 消息 <信源> {上下文} */
export function formatLine(entry: LogEntry): string {
  const source = entry.source_url ? ` <${entry.source_url}>` : "";
  const payload = entry.payload ? ` ${JSON.stringify(entry.payload)}` : "";
  return `[${entry.category}] ${entry.message}${source}${payload}`;
}


function emit(level: LogLevel, category: LogCategory, message: string, meta: LogMeta = {}): void {
  const settings = logSettings();
  const toConsole = atLeast(level, settings.console);
  const toDb = atLeast(level, settings.db);
  if (!toConsole && !toDb) return;

  const { source_url, ...rest } = meta;
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: Object.keys(rest).length > 0 ? rest : undefined,
    source_url,
    created_at: new Date().toISOString(),
  };
  if (toConsole) CONSOLE[level](formatLine(entry));
  if (toDb) {
    insertLog(entry).catch((err) => {
      // 不能再走 logger，否则落库失败会递归
      process.stderr.write(`[logger] 写入日志表失败: ${errMessage(err)}\n`);
    });
  }
}


/** 把任意异常转成可序列化的短消息 */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


export const logger = {
  error: (category: LogCategory, message: string, meta?: LogMeta) => emit("error", category, message, meta),
  warn: (category: LogCategory, message: string, meta?: LogMeta) => emit("warn", category, message, meta),
  info: (category: LogCategory, message: string, meta?: LogMeta) => emit("info", category, message, meta),
  debug: (category: LogCategory, message: string, meta?: LogMeta) => emit("debug", category, message, meta),
};
