import type { ContextKey } from '../value-objects/ContextKey.js';

/** 同一 context key 的最大連續事件區段 */
export interface Segment {
  segmentId: number;
  contextKey: ContextKey;
  label: string;
  eventIds: string[];
  /** 第一個成員的 ts */
  startTs: string;
  /** 最後一個成員的 ts */
  endTs: string;
  startMs: number;
  endMs: number;
  captures: number;
  /** 成員取樣間隔總和（估計值） */
  estimatedSec: number;
  /** 成員 primary text 中最常見的 token，最多 8 個 */
  keywords: string[];
  /** 成員 primary text 中最常見的句子片段，最多 3 個 */
  ocrSnippets: string[];
}
