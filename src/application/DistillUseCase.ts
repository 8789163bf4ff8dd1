import type { CaptureEvent } from '../domain/entities/CaptureEvent.js';
import type { EventSourcePort } from '../domain/ports/EventSourcePort.js';
import type { StageRecordMap, TracePort } from '../domain/ports/TracePort.js';
import { MalformedEventError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';
import { EventNormalizer } from './EventNormalizer.js';
import { Segmenter } from './Segmenter.js';
import { SegmentCompactor } from './SegmentCompactor.js';
import { HourPacker } from './HourPacker.js';
import { stageNumber, type DistillResult, type PipelineOutput, type PipelineStage } from './dto/PipelineOutput.js';

export interface DistillDependencies {
  normalizer?: EventNormalizer;
  segmenter?: Segmenter;
  compactor?: SegmentCompactor;
  packer?: HourPacker;
  eventSource?: EventSourcePort;
  trace?: TracePort;
  /** 只寫出序號 ≤ stageMax 的 stage；null 表示全部 */
  traceStageMax?: number | null;
  logger?: Logger;
}

export interface DistillRunOptions {
  stage?: PipelineStage;
  /** 寫入 trace run.json 的來源描述 */
  source?: string;
  runId?: string;
}

/**
 * Distill 用例：raw events → normalized → segments → compacted → hour packs
 *
 * 四個 stage 依序執行，每個 stage 只讀前一個 stage 的完整輸出。
 * 可要求任意前綴（例如只到 segmented），並選擇性把每個 stage 寫入 trace。
 */
export class DistillUseCase {
  private readonly normalizer: EventNormalizer;
  private readonly segmenter: Segmenter;
  private readonly compactor: SegmentCompactor;
  private readonly packer: HourPacker;
  private readonly logger: Logger;

  constructor(private readonly deps: DistillDependencies = {}) {
    this.normalizer = deps.normalizer ?? new EventNormalizer();
    this.segmenter = deps.segmenter ?? new Segmenter();
    this.compactor = deps.compactor ?? new SegmentCompactor();
    this.packer = deps.packer ?? new HourPacker();
    this.logger = deps.logger ?? new Logger('DistillUseCase');
  }

  /** 純轉換：不寫檔、不記錄 log */
  distill(input: readonly CaptureEvent[], stage: PipelineStage = 'hour_packed'): PipelineOutput {
    const events = this.normalizer.normalizeAll(input);
    if (stage === 'normalized') return { stage, events };

    const segments = this.segmenter.segment(events);
    if (stage === 'segmented') return { stage, events, segments };

    const compacted = this.compactor.compactAll(segments, events);
    if (stage === 'compacted') return { stage, events, segments, compacted };

    const hourPacks = this.packer.packAll(compacted);
    return { stage, events, segments, compacted, hourPacks };
  }

  async run(input: readonly CaptureEvent[], options: DistillRunOptions = {}): Promise<DistillResult> {
    const start = Date.now();
    const stage = options.stage ?? 'hour_packed';

    const output = this.distill(input, stage);

    const warnings: string[] = [];
    for (const event of output.events) {
      if (event.missingFields.length === 0) continue;
      const err = new MalformedEventError(event.eventId, event.missingFields);
      warnings.push(err.message);
      this.logger.warn('Recovered malformed event', { code: err.code, eventId: event.eventId });
    }

    if (this.deps.trace) {
      await this.writeTrace(this.deps.trace, output, options);
    }

    const durationMs = Date.now() - start;
    this.logger.info('Distill completed', {
      stage,
      events: output.events.length,
      segments: output.stage === 'normalized' ? undefined : output.segments.length,
      hourPacks: output.stage === 'hour_packed' ? output.hourPacks.length : undefined,
      durationMs,
    });

    return { output, warnings, durationMs };
  }

  /** 從 JSONL 擷取紀錄讀入事件後執行 */
  async runFromFile(filePath: string, options: DistillRunOptions = {}): Promise<DistillResult> {
    if (!this.deps.eventSource) {
      throw new Error('DistillUseCase.runFromFile requires an event source');
    }
    const { events, warnings } = await this.deps.eventSource.readEvents(filePath);
    this.logger.debug('Events loaded', { filePath, events: events.length, skipped: warnings.length });

    const result = await this.run(events, { source: filePath, ...options });
    return { ...result, warnings: [...warnings, ...result.warnings] };
  }

  private async writeTrace(trace: TracePort, output: PipelineOutput, options: DistillRunOptions): Promise<void> {
    const runId = options.runId ?? new Date().toISOString().replace(/[:.]/g, '-');
    const run = await trace.startRun({
      runId,
      startedAt: new Date().toISOString(),
      source: options.source ?? 'memory',
    });

    const write = async <S extends PipelineStage>(stage: S, records: StageRecordMap[S][]): Promise<void> => {
      const max = this.deps.traceStageMax ?? null;
      if (max !== null && stageNumber(stage) > max) return;
      await run.writeStage(stage, records);
      this.logger.debug('Trace stage written', { runId, stage, records: records.length });
    };

    await write('normalized', output.events);
    if (output.stage === 'normalized') return;
    await write('segmented', output.segments);
    if (output.stage === 'segmented') return;
    await write('compacted', output.compacted);
    if (output.stage === 'compacted') return;
    await write('hour_packed', output.hourPacks);
  }
}
