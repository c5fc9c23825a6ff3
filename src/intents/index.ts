/**
 * 意图模块入口
 */

export type {
  IntentDefinition,
  CompiledIntent,
  StructuredCommand,
  NoMatch,
  ResolveResult,
} from "./types.js";
export {
  UNKNOWN_INTENT,
  DEFAULT_KEYWORD_THRESHOLD,
  intentDefinitionSchema,
  parseIntentDefinition,
  compileIntent,
  compileIntents,
  parseKeywordThreshold,
  type IntentDefinitionInput,
} from "./definition.js";
export { DEFAULT_INTENTS_FILE, loadIntentsFromFile, clearIntentsCache, getAllIntents } from "./store.js";
