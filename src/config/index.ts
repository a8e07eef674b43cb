// 应用配置：读取 .feedline/config.json，缺失字段用环境变量或默认值补全，zod 校验

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CONFIG_PATH } from "./paths.js";


export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}


const ConfigSchema = z.object({
  enrich: z.object({
    /** 同时进行的补图抓取上限 */
    maxConcurrent: z.number().int().positive().default(6),
    /** 单个 feed 最多排队的 CDN 高清图抓取数 */
    maxUpgradesPerFeed: z.number().int().nonnegative().default(8),
    /** 达到上限时重新调度的随机延迟区间（ms） */
    retryDelayMinMs: z.number().int().nonnegative().default(200),
    retryDelayMaxMs: z.number().int().positive().default(1000),
  }).default({}),
  categories: z.object({
    /** 高条目量的聚合分类（本地新闻）：限量 + 分批渲染 + 失效 URL 清理 */
    highVolume: z.string().min(1).default("local_news"),
    /** 个人订阅聚合分类：解析时顺带回写站点图标 */
    aggregation: z.string().min(1).default("myfeed"),
    highVolumeItemCap: z.number().int().positive().default(12),
  }).default({}),
  batch: z.object({
    size: z.number().int().positive().default(6),
    intervalMs: z.number().int().positive().default(60),
  }).default({}),
  loading: z.object({
    /** 安全定时器：超时仍无条目则强制进入终态 */
    initialMaxWaitMs: z.number().int().positive().default(15000),
  }).default({}),
  imageCache: z.object({
    capacity: z.number().int().positive().default(12),
    highVolumeCapacity: z.number().int().positive().default(6),
  }).default({}),
  http: z.object({
    timeoutMs: z.number().int().positive().default(15000),
  }).default({}),
  server: z.object({
    port: z.number().int().positive().default(3751),
  }).default({}),
}).refine((c) => c.enrich.retryDelayMaxMs >= c.enrich.retryDelayMinMs, {
  message: "enrich.retryDelayMaxMs 不能小于 retryDelayMinMs",
});


export type FeedlineConfig = z.infer<typeof ConfigSchema>;


function asRecord(v: unknown): Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v) ? { ...v } : {};
}


function envNumber(name: string): number | undefined {
  const v = process.env[name];
  if (v == null || v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}


/** 校验原始配置对象；环境变量只补文件里缺失的字段 */
export function parseConfig(raw: unknown): FeedlineConfig {
  const file = asRecord(raw);
  const merged = {
    ...file,
    enrich: { maxConcurrent: envNumber("ENRICH_CONCURRENCY"), ...asRecord(file.enrich) },
    loading: { initialMaxWaitMs: envNumber("INITIAL_MAX_WAIT_MS"), ...asRecord(file.loading) },
    http: { timeoutMs: envNumber("HTTP_TIMEOUT_MS"), ...asRecord(file.http) },
    server: { port: envNumber("PORT"), ...asRecord(file.server) },
  };
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`配置无效: ${detail}`);
  }
  return result.data;
}


/** 读取 config.json；文件不存在时全部走默认值，JSON 损坏或校验失败抛 ConfigError */
export async function loadConfig(path = CONFIG_PATH): Promise<FeedlineConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return parseConfig({});
    throw new ConfigError(`读取配置失败: ${err instanceof Error ? err.message : String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`config.json 不是合法 JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(parsed);
}


/** 全默认配置（测试与未初始化场景使用） */
export function defaultConfig(): FeedlineConfig {
  return parseConfig({});
}
