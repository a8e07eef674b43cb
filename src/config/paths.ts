// 路径配置：集中管理所有运行时路径，区分项目文件与用户数据

import { mkdir } from "node:fs/promises";
import { join } from "node:path";


/** 用户数据根目录：.feedline/（不纳入版本管理，存放所有运行时用户数据），可用 FEEDLINE_HOME 覆盖 */
export const USER_DIR = process.env.FEEDLINE_HOME ?? join(process.cwd(), ".feedline");


/** SQLite 数据库目录：.feedline/data/ */
export const DATA_DIR = join(USER_DIR, "data");


/** 应用配置：.feedline/config.json */
export const CONFIG_PATH = join(USER_DIR, "config.json");


/** 本地新闻 feed 列表：.feedline/local_feeds（每行一个 URL，空行忽略） */
export const LOCAL_FEEDS_PATH = join(USER_DIR, "local_feeds");


/** 初始化用户数据目录 */
export async function initUserDir(): Promise<void> {
  await mkdir(USER_DIR, { recursive: true });
  await mkdir(DATA_DIR, { recursive: true });
}
