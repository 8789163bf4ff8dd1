import path from 'node:path';
import { DistillUseCase } from '../../application/DistillUseCase.js';
import { EventNormalizer } from '../../application/EventNormalizer.js';
import { HourPacker } from '../../application/HourPacker.js';
import { JsonlEventSource } from '../../infrastructure/jsonl/JsonlEventSource.js';
import { JsonlTraceWriter } from '../../infrastructure/jsonl/JsonlTraceWriter.js';
import type { CaptureDistillConfig } from '../../config/ConfigLoader.js';
import { isOutputFormat, type OutputFormat } from '../formatters/OutputFormatter.js';

/** 依設定組出 DistillUseCase 所需的所有依賴 */
export function createDistillUseCase(
  rootDir: string,
  config: CaptureDistillConfig,
  traceEnabled: boolean = config.trace.enabled,
): DistillUseCase {
  return new DistillUseCase({
    normalizer: new EventNormalizer(config.pipeline.defaultIntervalSec),
    packer: new HourPacker(config.hourPack),
    eventSource: new JsonlEventSource(config.pipeline.defaultIntervalSec),
    trace: traceEnabled ? new JsonlTraceWriter(path.resolve(rootDir, config.trace.dir)) : undefined,
    traceStageMax: config.trace.stageMax,
  });
}

export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new Error(`Unknown format "${value}" (expected json or text)`);
  }
  return value;
}
