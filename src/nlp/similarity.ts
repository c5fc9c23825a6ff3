/**
 * token-set 相似度（0-100）：与词序、重复词无关，多出/缺少的词只按公共部分打分
 */

const NON_WORD_REG = /[^\p{L}\p{N}_]+/gu;
/** Latin-1 补充区（U+0080-U+00FF）在分词前直接删除，如 "café" -> "caf" */
const LATIN1_REG = /[\u0080-\u00ff]/g;

function tokenize(text: string): Set<string> {
  const cleaned = text.replace(LATIN1_REG, "").toLowerCase().replace(NON_WORD_REG, " ").trim();
  return new Set(cleaned ? cleaned.split(/\s+/) : []);
}

/** 最长公共子序列长度（按字符） */
function lcsLength(a: string, b: string): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const cur = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      cur[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], cur[j - 1]);
    }
    prev = cur;
  }
  return prev[b.length];
}

/** 四舍六入五成双：62.5 -> 62，63.5 -> 64 */
function roundHalfEven(v: number): number {
  const f = Math.floor(v);
  if (v - f !== 0.5) return Math.round(v);
  return f % 2 === 0 ? f : f + 1;
}

/** 基础相似度：2 * LCS / (|a| + |b|)，换算为 0-100 的整数 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  if (!a || !b) return 0;
  return roundHalfEven((200 * lcsLength(a, b)) / total);
}

export function tokenSetRatio(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);
  if (!tokensA.size || !tokensB.size) return 0;

  const intersection = [...tokensA].filter((t) => tokensB.has(t)).sort();
  const diffAB = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const diffBA = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  // 一方的词全部包含在另一方中
  if (intersection.length && (!diffAB.length || !diffBA.length)) return 100;

  const sect = intersection.join(" ");
  const combinedAB = `${sect} ${diffAB.join(" ")}`.trim();
  const combinedBA = `${sect} ${diffBA.join(" ")}`.trim();

  return Math.max(
    sect ? ratio(sect, combinedAB) : 0,
    sect ? ratio(sect, combinedBA) : 0,
    ratio(combinedAB, combinedBA)
  );
}
