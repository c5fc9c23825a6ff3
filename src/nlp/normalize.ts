/**
 * 输入规范化：小写 + 去首尾空白
 * 非字符串（如 HTTP body 里的脏数据）视为空串
 */
export function normalize(text: unknown): string {
  if (typeof text !== "string") return "";
  return text.toLowerCase().trim();
}
