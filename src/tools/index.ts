/**
 * 工具注册
 */

import type { IntentResolver } from "../resolver.js";
import { createResolveIntentTool } from "./resolve-intent.js";

export function createTools(resolver: Pick<IntentResolver, "resolve">) {
  return [createResolveIntentTool(resolver)];
}

export const toolNameMap: Record<string, string> = {
  resolve_intent: "意图解析",
};

export { createResolveIntentTool } from "./resolve-intent.js";
