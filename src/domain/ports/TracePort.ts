import type { NormalizedEvent } from '../entities/NormalizedEvent.js';
import type { Segment } from '../entities/Segment.js';
import type { CompactedSegment } from '../entities/CompactedSegment.js';
import type { HourPack } from '../entities/HourPack.js';

/** 各 stage 的單筆紀錄型別 */
export interface StageRecordMap {
  normalized: NormalizedEvent;
  segmented: Segment;
  compacted: CompactedSegment;
  hour_packed: HourPack;
}

export interface TraceRunInfo {
  runId: string;
  startedAt: string;
  source: string;
}

/** 單一 run 的寫入端；同時進行的 run 各自持有一個 */
export interface TraceRun {
  readonly runId: string;
  writeStage<S extends keyof StageRecordMap>(stage: S, records: StageRecordMap[S][]): Promise<void>;
}

/** 中間產物的 append-only 紀錄 */
export interface TracePort {
  startRun(info: TraceRunInfo): Promise<TraceRun>;
}
