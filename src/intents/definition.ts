/**
 * 意图定义校验与编译
 */

import { z } from "zod";
import { IntentConfigError } from "../errors.js";
import type { CompiledIntent, IntentDefinition } from "./types.js";

/** 未识别时对外展示的保留 intent 名 */
export const UNKNOWN_INTENT = "unknown";

export const DEFAULT_KEYWORD_THRESHOLD = 75;

export const intentDefinitionSchema = z.object({
  name: z.string().trim().min(1, "name 不能为空"),
  pattern: z.string().min(1, "pattern 不能为空"),
  entityKeys: z
    .array(z.string().min(1).refine((k) => k !== "__proto__", "entityKeys 不能包含 __proto__"))
    .default([]),
  keywords: z.array(z.string()).default([]),
});

export type IntentDefinitionInput = z.input<typeof intentDefinitionSchema>;

export const keywordThresholdSchema = z
  .number()
  .int("keywordThreshold 必须是整数")
  .min(0, "keywordThreshold 必须在 0-100 之间")
  .max(100, "keywordThreshold 必须在 0-100 之间");

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

function readName(input: unknown): string | undefined {
  if (typeof input === "object" && input !== null && "name" in input && typeof input.name === "string") {
    return input.name;
  }
  return undefined;
}

/** 校验单条定义（字段缺失、类型错误均为配置错误） */
export function parseIntentDefinition(input: unknown): IntentDefinition {
  const parsed = intentDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const label = readName(input);
    throw new IntentConfigError(
      `意图定义非法${label ? ` (${label})` : ""}: ${describeIssues(parsed.error)}`,
      label
    );
  }
  return parsed.data;
}

/**
 * 编译正则：忽略大小写，并锚定在文本开头
 * 先单独编译源码，避免形如 "a)|(b" 的源码在包裹后逃出锚定分组
 */
export function compileIntent(def: IntentDefinition): CompiledIntent {
  let matcher: RegExp;
  try {
    new RegExp(def.pattern, "i");
    matcher = new RegExp(`^(?:${def.pattern})`, "i");
  } catch (e) {
    throw new IntentConfigError(
      `意图 "${def.name}" 的正则非法: ${e instanceof Error ? e.message : String(e)}`,
      def.name
    );
  }
  return Object.freeze({
    name: def.name,
    pattern: def.pattern,
    entityKeys: Object.freeze([...def.entityKeys]),
    keywords: Object.freeze([...def.keywords]),
    matcher,
  });
}

/** 校验 + 编译整组定义；顺序即优先级 */
export function compileIntents(inputs: readonly unknown[]): CompiledIntent[] {
  if (!inputs.length) throw new IntentConfigError("意图定义列表不能为空");
  const seen = new Set<string>();
  return inputs.map((input) => {
    const def = parseIntentDefinition(input);
    if (def.name === UNKNOWN_INTENT) {
      throw new IntentConfigError(`意图名 "${UNKNOWN_INTENT}" 为保留值`, def.name);
    }
    if (seen.has(def.name)) throw new IntentConfigError(`意图名重复: ${def.name}`, def.name);
    seen.add(def.name);
    return compileIntent(def);
  });
}

export function parseKeywordThreshold(value: unknown): number {
  const parsed = keywordThresholdSchema.safeParse(value);
  if (!parsed.success) throw new IntentConfigError(describeIssues(parsed.error));
  return parsed.data;
}
