import type { LogLevel } from '../shared/Logger.js';
import type { PipelineStage } from '../application/dto/PipelineOutput.js';

/** Pipeline 設定 */
export interface PipelineConfig {
  /** 事件未標示取樣間隔時使用的秒數 */
  defaultIntervalSec: number;
  /** 預設執行到哪個 stage */
  stage: PipelineStage;
}

/** Hour pack 上限設定（不可超過 3 個 cluster、20 個 common text） */
export interface HourPackConfig {
  maxClusters: number;
  maxCommonTexts: number;
  /** common text 比較鍵前綴長度 */
  commonTextPrefixChars: number;
}

/** 交給 summarizer 前的小時篩選 */
export interface SummaryConfig {
  minActiveSec: number;
  maxHours: number;
}

/** 中間產物 trace 設定 */
export interface TraceConfig {
  enabled: boolean;
  dir: string;
  /** 只寫出序號 ≤ stageMax 的 stage；null 表示全部 */
  stageMax: number | null;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface CaptureDistillConfig {
  version: number;
  pipeline: PipelineConfig;
  hourPack: HourPackConfig;
  summary: SummaryConfig;
  trace: TraceConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof CaptureDistillConfig]?: CaptureDistillConfig[K] extends object
    ? Partial<CaptureDistillConfig[K]>
    : CaptureDistillConfig[K];
};
