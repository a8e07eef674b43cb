// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info，FEEDLINE_DEBUG 打开时为 debug）；error/warn 可落库便于按信源排查。

/** 日志级别：控制输出与落库策略（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "feeder"   // 抓取编排、错误降级
  | "parser"   // RSS/Atom 解析
  | "image"    // 图片候选提取与 CDN 规整
  | "enrich"   // 后台补图抓取与限流
  | "local"    // 本地 feed 列表读写
  | "db"       // 数据库写入
  | "app"      // HTTP 服务、启动
  | "config";  // 配置加载

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、item_url 等），落库时存为 JSON */
  payload?: Record<string, unknown>;
  /** 信源 URL，便于按信源查日志 */
  source_url?: string;
  created_at: string;
}

/** logger 方法第三个参数：source_url 单独落列，其余进 payload */
export interface LogMeta {
  source_url?: string;
  [k: string]: unknown;
}
