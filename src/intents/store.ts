/**
 * 意图存储：从本地 JSON 读取意图定义（默认使用随包的 intents.json）
 * 只负责读取原始记录，校验与编译在构造 resolver 时完成
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join, resolve } from "path";
import { IntentConfigError } from "../errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_INTENTS_FILE = join(__dirname, "intents.json");

const cache = new Map<string, unknown[]>();

/** 从本地文件加载意图列表（按路径缓存） */
export function loadIntentsFromFile(filePath: string = DEFAULT_INTENTS_FILE): unknown[] {
  const path = resolve(filePath);
  const cached = cache.get(path);
  if (cached) return cached;

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (e) {
    throw new IntentConfigError(`读取意图文件失败 ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new IntentConfigError(`意图文件 JSON 解析失败 ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!Array.isArray(data)) {
    throw new IntentConfigError(`意图文件 ${path} 的内容必须是 JSON 数组`);
  }

  cache.set(path, data);
  return data;
}

/** 清除缓存（文件修改后重新加载） */
export function clearIntentsCache(): void {
  cache.clear();
}

/** 获取所有意图原始记录（供管理/展示） */
export function getAllIntents(filePath?: string): unknown[] {
  return loadIntentsFromFile(filePath);
}
