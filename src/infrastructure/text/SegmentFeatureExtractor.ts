import { squashWhitespace } from './TextNormalizer.js';

/** 檔名 token：路徑 + 常見原始碼 / 設定檔副檔名 */
const FILE_TOKEN_RE =
  /\b[\w./-]+\.(?:py|md|txt|json|toml|ya?ml|sh|zsh|bash|ts|js|tsx|jsx|go|rs|swift|java|kt|rb|php)\b/gi;
const WORD_RE = /[A-Za-z0-9_./-]{4,}/g;
const JA_RUN_RE = /[\u3040-\u30ff\u4e00-\u9faf]{2,}/g;
/** 換行已在 stage 1 壓掉，以句末標點當作行界 */
const SNIPPET_BOUNDARY_RE = /(?<=[.!?])\s+|(?<=[。！？])\s*/;

export const SEGMENT_KEYWORD_LIMIT = 8;
export const SEGMENT_SNIPPET_LIMIT = 3;
const SNIPPET_MAX_CHARS = 120;

function shorten(s: string, maxLen: number): string {
  const t = squashWhitespace(s);
  if (t.length <= maxLen) return t;
  return t.slice(0, maxLen - 1).trimEnd() + '…';
}

/**
 * 依出現次數排序取前 limit 個；同分維持第一次出現的順序
 */
export function mostCommon(counts: ReadonlyMap<string, number>, limit: number): string[] {
  return [...counts]
    .filter(([key]) => key)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([key]) => key);
}

export function addCounts(counts: Map<string, number>, items: readonly string[]): void {
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
}

/**
 * 從單一事件的 primary text 抽出 segment 特徵
 *
 * keywords 以檔名 token 優先；完全沒有檔名時才退回 4 字以上的英數 token 與日文片段。
 * snippets 是前幾個句子，截斷到 120 字並去重。
 */
export class SegmentFeatureExtractor {
  keywords(text: string, limit: number = SEGMENT_KEYWORD_LIMIT): string[] {
    if (!text) return [];
    let hits: string[] = text.match(FILE_TOKEN_RE) ?? [];
    if (hits.length === 0) {
      hits = [...(text.match(WORD_RE) ?? []), ...(text.match(JA_RUN_RE) ?? [])];
    }
    const counts = new Map<string, number>();
    addCounts(counts, hits);
    return mostCommon(counts, limit);
  }

  snippets(text: string, limit: number = SEGMENT_SNIPPET_LIMIT): string[] {
    const lines = text.split(SNIPPET_BOUNDARY_RE).map((l) => l.trim()).filter(Boolean);
    const out: string[] = [];
    for (const line of lines.slice(0, limit * 2)) {
      const s = shorten(line, SNIPPET_MAX_CHARS);
      if (s && !out.includes(s)) out.push(s);
      if (out.length >= limit) break;
    }
    return out;
  }
}
