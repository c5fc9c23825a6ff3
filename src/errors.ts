/**
 * 配置错误：意图定义或阈值非法时在构造/加载阶段抛出，resolve 阶段不会出现
 */

export class IntentConfigError extends Error {
  /** 出错的意图名（与单条定义无关时为空） */
  readonly intentName?: string;

  constructor(message: string, intentName?: string) {
    super(message);
    this.name = "IntentConfigError";
    this.intentName = intentName;
  }
}
