export type { CaptureEvent, DisplayObservation } from './domain/entities/CaptureEvent.js';
export type { NormalizedEvent, PrimaryTextSource } from './domain/entities/NormalizedEvent.js';
export type { Segment } from './domain/entities/Segment.js';
export type { CompactedSegment, CommonText, DisplayResiduals, EventResidual } from './domain/entities/CompactedSegment.js';
export type { Cluster, HourPack, RankedCommonText, TimelineEntry } from './domain/entities/HourPack.js';
export type { ContextKey } from './domain/value-objects/ContextKey.js';
export { contextKeyEquals, contextKeyLabel } from './domain/value-objects/ContextKey.js';
export { Timestamp } from './domain/value-objects/Timestamp.js';
export * from './domain/errors/DomainErrors.js';

export { EventNormalizer } from './application/EventNormalizer.js';
export { Segmenter } from './application/Segmenter.js';
export { SegmentCompactor } from './application/SegmentCompactor.js';
export { HourPacker, type HourPackerOptions } from './application/HourPacker.js';
export { DistillUseCase, type DistillDependencies, type DistillRunOptions } from './application/DistillUseCase.js';
export { buildSummaryInput } from './application/SummaryInputBuilder.js';
export * from './application/dto/PipelineOutput.js';
export type * from './application/dto/SummaryInput.js';

export { OcrChunkingStrategy } from './infrastructure/text/OcrChunkingStrategy.js';
export { SegmentFeatureExtractor } from './infrastructure/text/SegmentFeatureExtractor.js';
export { JsonlEventSource } from './infrastructure/jsonl/JsonlEventSource.js';
export { JsonlTraceRun, JsonlTraceWriter } from './infrastructure/jsonl/JsonlTraceWriter.js';
export { readStageRecords } from './infrastructure/jsonl/TraceReader.js';
export { loadConfig } from './config/ConfigLoader.js';
