import type { ContextKey } from '../value-objects/ContextKey.js';

export interface TimelineEntry {
  ts: string;
  segmentId: number;
  eventId: string;
  text: string;
}

export interface Cluster {
  contextKey: ContextKey;
  label: string;
  segmentIds: number[];
  /** 最早成員 segment 的起點，用於同分排序 */
  startTs: string;
  /** 成員 segment wall-clock 長度總和（秒） */
  activeSec: number;
  /** 只含 active display 的 residual，依時間排序 */
  activeTimeline: TimelineEntry[];
  /** 成員 segment 的 keywords 合併計數後取前 8 個 */
  keywords: string[];
  /** 成員 segment 的 ocrSnippets 合併計數後取前 3 個 */
  ocrSnippets: string[];
}

export interface RankedCommonText {
  text: string;
  /** 出現於幾個不同的 (segment, display) */
  count: number;
}

/** 一小時 [start, end) 的摘要輸入單位 */
export interface HourPack {
  hourStartTs: string;
  hourEndTs: string;
  hourStartMs: number;
  hourEndMs: number;
  activeSecEst: number;
  commonTexts: RankedCommonText[];
  clusters: Cluster[];
}
