/**
 * 解析服务：持有当前 resolver，重新加载时整体替换（不修改运行中的定义）
 */

import { IntentResolver } from "./resolver.js";
import { clearIntentsCache, loadIntentsFromFile } from "./intents/store.js";
import type { ResolverConfig } from "./config.js";
import type { ResolveResult } from "./intents/types.js";

export class IntentService {
  private resolver: IntentResolver;

  constructor(private readonly config: ResolverConfig) {
    this.resolver = this.build();
  }

  private build(): IntentResolver {
    return new IntentResolver({
      definitions: loadIntentsFromFile(this.config.intentsFile),
      keywordThreshold: this.config.keywordThreshold,
    });
  }

  get current(): IntentResolver {
    return this.resolver;
  }

  resolve(text: unknown): ResolveResult {
    return this.resolver.resolve(text);
  }

  listIntents(): string[] {
    return this.resolver.getDefinitions().map((d) => d.name);
  }

  /** 重新读取意图文件；失败时保留旧 resolver 并抛出错误 */
  reload(): IntentResolver {
    clearIntentsCache();
    const next = this.build();
    this.resolver = next;
    return next;
  }
}
