const QUOTES_BRACKETS_RE = /["'“”‘’（）()【】[\]<>]/g;
const PUNCT_GLYPHS_RE = /[、。.!?！？・|•▶→]+/g;

/** 只壓縮含換行的空白序列，其他內容不動 */
export function collapseLineBreaks(text: string): string {
  return text.replace(/\s*[\r\n]\s*/g, ' ');
}

/** 所有空白壓成單一空白並 trim */
export function squashWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * 去重用的比較鍵：小寫、去引號括號與句讀符號。
 * 只有標點的 chunk 會得到空字串，呼叫端應略過。
 */
export function normalizeForDedupe(chunk: string): string {
  return squashWhitespace(chunk)
    .toLowerCase()
    .replace(QUOTES_BRACKETS_RE, '')
    .replace(PUNCT_GLYPHS_RE, '')
    .trim();
}

/**
 * 小時層級 common text 排名用的比較鍵：
 * 再去除所有空白，並只取前 prefixChars 字，避免長 OCR 區塊的細微差異各自計數
 */
export function normalizeCommonText(text: string, prefixChars: number): string {
  const t = normalizeForDedupe(text).replace(/\s+/g, '');
  return t.length > prefixChars ? t.slice(0, prefixChars) : t;
}
