/**
 * npm 包入口
 * 使用方式：import { createIntentResolver } from 'voice-intent-server';
 */

export {
  IntentResolver,
  createIntentResolver,
  toCommandResponse,
  scoreKeywords,
  extractParams,
  type ResolverOptions,
  type CommandResponse,
} from "./resolver.js";
export { IntentConfigError } from "./errors.js";
export { normalize } from "./nlp/normalize.js";
export { tokenSetRatio, ratio } from "./nlp/similarity.js";
export * from "./intents/index.js";
export { IntentService } from "./service.js";
export { createApp } from "./app.js";
export { getConfig, type AppConfig, type ResolverConfig, type ServerConfig } from "./config.js";
export { createTools, createResolveIntentTool, toolNameMap } from "./tools/index.js";
