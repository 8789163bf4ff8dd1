import { squashWhitespace } from './TextNormalizer.js';

/** 句末標點：半形後需接空白，全形可直接相連 */
const SENTENCE_BOUNDARY_RE = /(?<=[.!?])\s+|(?<=[。！？])\s*/;
/** 次要分隔符：箭頭、項目符號、pipe 類 */
const SECONDARY_DELIMITER_RE = /\s*[▶→・|•›»]\s*/;

function splitNonEmpty(text: string, re: RegExp): string[] {
  return text.split(re).map((p) => p.trim()).filter(Boolean);
}

/**
 * OCR 文字切分：句末標點 → 次要分隔符 → 空白，逐級細化。
 * 只有較粗的切法切不出多於一個 chunk 時才往下一級，
 * 有標點時保留多子句的上下文。
 */
export class OcrChunkingStrategy {
  split(text: string): string[] {
    const t = squashWhitespace(text);
    if (!t) return [];

    const sentences = splitNonEmpty(t, SENTENCE_BOUNDARY_RE);
    if (sentences.length > 1) return sentences;

    const pieces = splitNonEmpty(t, SECONDARY_DELIMITER_RE);
    if (pieces.length > 1) return pieces;

    return t.split(' ');
  }
}
