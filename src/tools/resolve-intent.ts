/**
 * 意图解析工具：供 LangChain Agent 调用，返回结构化命令 JSON
 */

import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { toCommandResponse, type IntentResolver } from "../resolver.js";

export function createResolveIntentTool(resolver: Pick<IntentResolver, "resolve">) {
  return tool(
    async ({ text }) => JSON.stringify(toCommandResponse(resolver.resolve(text))),
    {
      name: "resolve_intent",
      description:
        "将一句用户指令解析为结构化命令：返回 intent 名与参数；无法识别时 intent 为 unknown、matched 为 false。",
      schema: z.object({
        text: z.string().describe("用户原始指令，如 open chrome"),
      }),
    }
  );
}
