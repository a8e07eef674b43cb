// 本地新闻 feed 列表：纯文本，每行一个 URL，空行忽略；失效 URL 以读-改-写方式剔除

import { readFile, writeFile } from "node:fs/promises";
import { LOCAL_FEEDS_PATH } from "../config/paths.js";
import { logger, errMessage } from "../logger/index.js";


function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}


function parseLines(contents: string): string[] {
  return contents
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}


/** 读取列表；文件不存在或读取失败返回空数组 */
export async function readLocalFeeds(path = LOCAL_FEEDS_PATH): Promise<string[]> {
  try {
    return parseLines(await readFile(path, "utf-8"));
  } catch (err) {
    if (!isNotFound(err)) logger.warn("local", "读取本地 feed 列表失败", { path, err: errMessage(err) });
    return [];
  }
}


/** 从列表中删除与 url 完全相同的行，其余行保持顺序；返回是否删除了内容 */
export async function pruneLocalFeed(url: string, path = LOCAL_FEEDS_PATH): Promise<boolean> {
  let contents: string;
  try {
    contents = await readFile(path, "utf-8");
  } catch (err) {
    if (!isNotFound(err)) logger.warn("local", "读取本地 feed 列表失败，跳过清理", { path, err: errMessage(err) });
    return false;
  }
  const lines = parseLines(contents);
  const kept = lines.filter((l) => l !== url);
  if (kept.length === lines.length) return false;
  try {
    await writeFile(path, kept.map((l) => `${l}\n`).join(""), "utf-8");
  } catch (err) {
    logger.warn("local", "写回本地 feed 列表失败", { path, err: errMessage(err) });
    return false;
  }
  logger.warn("local", "已剔除失效的本地 feed", { source_url: url });
  return true;
}
