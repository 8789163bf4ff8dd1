import type { Segment } from './Segment.js';

/** 單一事件在某 display 上「新出現」的文字 */
export interface EventResidual {
  eventId: string;
  ts: string;
  tsMs: number;
  isActiveDisplay: boolean;
  chunks: string[];
  /** chunks 以 " / " 串接 */
  residualText: string;
}

/** 段內出現於 ≥2 個事件的 chunk */
export interface CommonText {
  text: string;
  count: number;
}

export interface DisplayResiduals {
  display: number;
  residuals: EventResidual[];
  commonTexts: CommonText[];
}

export interface CompactedSegment extends Segment {
  displays: DisplayResiduals[];
}
