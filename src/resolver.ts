/**
 * 意图解析器：按优先级顺序逐条匹配，首个通过「正则 + 相似度确认」的意图胜出
 * 不做全局最优搜索；确认失败时继续尝试后续定义
 */

import { normalize } from "./nlp/normalize.js";
import { tokenSetRatio } from "./nlp/similarity.js";
import {
  DEFAULT_KEYWORD_THRESHOLD,
  UNKNOWN_INTENT,
  compileIntents,
  parseKeywordThreshold,
} from "./intents/definition.js";
import type { CompiledIntent, ResolveResult, StructuredCommand } from "./intents/types.js";

export interface ResolverOptions {
  /** 有序意图定义，顺序即优先级 */
  definitions: readonly unknown[];
  /** 相似度确认阈值（0-100），默认 75 */
  keywordThreshold?: number;
}

/** 对外传输格式：未识别时 intent 为 "unknown" */
export interface CommandResponse extends StructuredCommand {
  matched: boolean;
}

/** 关键词最高分；意图无关键词时返回 null（不需要确认） */
export function scoreKeywords(intent: CompiledIntent, normalizedText: string): number | null {
  if (!intent.keywords.length) return null;
  let best = 0;
  for (const keyword of intent.keywords) {
    const score = tokenSetRatio(normalizedText, keyword.toLowerCase());
    if (score > best) best = score;
  }
  return best;
}

/**
 * 捕获组按顺序去掉未参与匹配的组后，与 entityKeys 逐个配对
 * 注意：可选组未参与时会导致后续值错位到前面的 key 上
 */
export function extractParams(match: RegExpExecArray, entityKeys: readonly string[]): Record<string, string> {
  const params: Record<string, string> = {};
  const groups = match.slice(1).filter((g): g is string => g != null);
  const n = Math.min(groups.length, entityKeys.length);
  for (let i = 0; i < n; i++) {
    params[entityKeys[i]] = groups[i].trim();
  }
  return params;
}

export class IntentResolver {
  readonly keywordThreshold: number;
  private readonly intents: readonly CompiledIntent[];

  constructor(options: ResolverOptions) {
    this.keywordThreshold = parseKeywordThreshold(options.keywordThreshold ?? DEFAULT_KEYWORD_THRESHOLD);
    this.intents = Object.freeze(compileIntents(options.definitions));
  }

  /** 编译后的定义（只读，按优先级排列） */
  getDefinitions(): readonly CompiledIntent[] {
    return this.intents;
  }

  resolve(text: unknown): ResolveResult {
    const normalized = normalize(text);
    if (!normalized) return null;

    for (const intent of this.intents) {
      const match = intent.matcher.exec(normalized);
      if (!match) continue;

      const score = scoreKeywords(intent, normalized);
      if (score !== null && score < this.keywordThreshold) continue;

      return { intent: intent.name, params: extractParams(match, intent.entityKeys) };
    }
    return null;
  }
}

export function createIntentResolver(options: ResolverOptions): IntentResolver {
  return new IntentResolver(options);
}

export function toCommandResponse(result: ResolveResult): CommandResponse {
  if (!result) return { intent: UNKNOWN_INTENT, params: {}, matched: false };
  return { intent: result.intent, params: { ...result.params }, matched: true };
}
