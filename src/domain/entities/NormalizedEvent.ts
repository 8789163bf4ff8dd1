import type { ContextKey } from '../value-objects/ContextKey.js';
import type { DisplayObservation } from './CaptureEvent.js';

export type PrimaryTextSource = 'active_display' | 'fallback_all_displays' | 'fallback_empty';

export interface NormalizedEvent {
  eventId: string;
  ts: string;
  /** epoch ms；timestamp 無法解析時為 null（Segmenter 會拒絕） */
  tsMs: number | null;
  intervalSec: number;
  contextKey: ContextKey;
  primaryText: string;
  primarySource: PrimaryTextSource;
  /** 換行已壓成單一空白，其餘內容不變 */
  displays: DisplayObservation[];
  /** 以空字串補上的 context 欄位名稱 */
  missingFields: string[];
}
