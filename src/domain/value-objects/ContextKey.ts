/** 分段判斷用的脈絡鍵：(app, domain, window title) */
export interface ContextKey {
  app: string;
  domain: string;
  windowTitle: string;
}

/** label 中 window title 的最大長度 */
const LABEL_TITLE_MAX = 80;

/** 嚴格 tuple 相等，不做任何模糊比對 */
export function contextKeyEquals(a: ContextKey, b: ContextKey): boolean {
  return a.app === b.app && a.domain === b.domain && a.windowTitle === b.windowTitle;
}

/** 可當 Map key 使用的穩定字串 */
export function contextKeyId(key: ContextKey): string {
  return JSON.stringify([key.app, key.domain, key.windowTitle]);
}

function shorten(s: string, maxLen: number): string {
  const t = s.split(/\s+/).filter(Boolean).join(' ');
  if (t.length <= maxLen) return t;
  return t.slice(0, maxLen - 1).trimEnd() + '…';
}

/**
 * 人類可讀 label："app / domain / title"
 * 空欄位略過、與前面重複的欄位不重複顯示；全部為空時回傳 "(unknown)"
 */
export function contextKeyLabel(key: ContextKey): string {
  const parts: string[] = [];
  const candidates = [key.app.trim(), key.domain.trim(), shorten(key.windowTitle, LABEL_TITLE_MAX)];
  for (const part of candidates) {
    if (part && !parts.includes(part)) parts.push(part);
  }
  return parts.length > 0 ? parts.join(' / ') : '(unknown)';
}
