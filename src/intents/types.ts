/**
 * 意图定义类型
 * 与本地 JSON 字段对齐；构造 resolver 时校验并编译，之后只读
 */

/** 意图定义（校验后的记录） */
export interface IntentDefinition {
  /** 唯一标识，resolve 结果中的 intent */
  name: string;
  /** 结构匹配正则源码：作用于规范化后的文本，忽略大小写，从开头匹配（前缀匹配即可） */
  pattern: string;
  /** 参数名，按顺序与非空捕获组配对；可以比捕获组少，多出的组忽略 */
  entityKeys: readonly string[];
  /** 相似度确认用的示例短语；为空表示只要正则命中即可 */
  keywords: readonly string[];
}

/** 编译后的意图：源码与编译结果放在一起 */
export interface CompiledIntent extends IntentDefinition {
  matcher: RegExp;
}

/** resolve 的输出：intent 名 + 参数（顺序与 entityKeys 一致） */
export interface StructuredCommand {
  intent: string;
  params: Record<string, string>;
}

/** 未识别，属于正常返回而非错误 */
export type NoMatch = null;

export type ResolveResult = StructuredCommand | NoMatch;
