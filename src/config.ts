/**
 * 服务配置（环境变量）
 * 支持 .env / .env.local
 */

import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_KEYWORD_THRESHOLD } from "./intents/definition.js";
import { DEFAULT_INTENTS_FILE } from "./intents/store.js";

dotenv.config();
dotenv.config({ path: ".env.local" });

export interface ResolverConfig {
  keywordThreshold: number;
  intentsFile: string;
}

export interface ServerConfig {
  port: number;
}

export interface AppConfig {
  resolver: ResolverConfig;
  server: ServerConfig;
}

const envSchema = z.object({
  INTENT_KEYWORD_THRESHOLD: z.coerce.number().int().min(0).max(100).default(DEFAULT_KEYWORD_THRESHOLD),
  INTENTS_FILE: z.string().min(1).default(DEFAULT_INTENTS_FILE),
  PORT: z.coerce.number().int().positive().default(3002),
});

/** 空字符串视为未设置 */
function pickEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key];
  return v != null && v.trim() !== "" ? v.trim() : undefined;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse({
    INTENT_KEYWORD_THRESHOLD: pickEnv(env, "INTENT_KEYWORD_THRESHOLD"),
    INTENTS_FILE: pickEnv(env, "INTENTS_FILE"),
    PORT: pickEnv(env, "PORT"),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`环境变量配置非法: ${detail}`);
  }
  const e = parsed.data;
  return {
    resolver: { keywordThreshold: e.INTENT_KEYWORD_THRESHOLD, intentsFile: e.INTENTS_FILE },
    server: { port: e.PORT },
  };
}
