import type { NormalizedEvent } from '../../domain/entities/NormalizedEvent.js';
import type { Segment } from '../../domain/entities/Segment.js';
import type { CompactedSegment } from '../../domain/entities/CompactedSegment.js';
import type { HourPack } from '../../domain/entities/HourPack.js';
import type { StageRecordMap } from '../../domain/ports/TracePort.js';

export type PipelineStage = keyof StageRecordMap;

/** stage 執行順序；呼叫端可要求任意前綴 */
export const PIPELINE_STAGES: readonly PipelineStage[] = ['normalized', 'segmented', 'compacted', 'hour_packed'];

export function isPipelineStage(value: string): value is PipelineStage {
  return (PIPELINE_STAGES as readonly string[]).includes(value);
}

/** stage 的 1-based 序號，對應 trace 檔名與 stageMax */
export function stageNumber(stage: PipelineStage): number {
  return PIPELINE_STAGES.indexOf(stage) + 1;
}

interface NormalizedOutput {
  stage: 'normalized';
  events: NormalizedEvent[];
}

interface SegmentedOutput {
  stage: 'segmented';
  events: NormalizedEvent[];
  segments: Segment[];
}

interface CompactedOutput {
  stage: 'compacted';
  events: NormalizedEvent[];
  segments: Segment[];
  compacted: CompactedSegment[];
}

interface HourPackedOutput {
  stage: 'hour_packed';
  events: NormalizedEvent[];
  segments: Segment[];
  compacted: CompactedSegment[];
  hourPacks: HourPack[];
}

/** 各 stage 的輸出，包含該 stage 之前所有 stage 的結果 */
export type PipelineOutput = NormalizedOutput | SegmentedOutput | CompactedOutput | HourPackedOutput;

export interface DistillResult {
  output: PipelineOutput;
  warnings: string[];
  durationMs: number;
}
