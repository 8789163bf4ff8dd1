import type { ContextKey } from '../../domain/value-objects/ContextKey.js';
import type { RankedCommonText, TimelineEntry } from '../../domain/entities/HourPack.js';

export interface SummaryCluster {
  contextKey: ContextKey;
  label: string;
  segmentIds: number[];
  activeTimeline: TimelineEntry[];
  /** timeline 為空時的佐證線索 */
  keywords: string[];
  ocrSnippets: string[];
}

/** 交給外部 summarizer 的單小時輸入 */
export interface SummaryHour {
  hourStartTs: string;
  hourEndTs: string;
  activeSecEst: number;
  /** 僅作背景參考，不應大段照抄 */
  commonTexts: RankedCommonText[];
  clusters: SummaryCluster[];
}

export interface SummaryInputOptions {
  minActiveSec: number;
  maxHours: number;
}
