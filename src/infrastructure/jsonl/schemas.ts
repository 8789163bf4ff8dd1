import { z } from 'zod';
import type { StageRecordMap } from '../../domain/ports/TracePort.js';

// --- Raw capture log（擷取端寫出的 JSONL，snake_case） ---

export const RawDisplaySchema = z.object({
  display: z.number().int().nullish(),
  ocr_text: z.string().nullish(),
  is_active_display: z.boolean().nullish(),
  excluded: z.boolean().nullish(),
});

export const RawCaptureEventSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional(),
  ts: z.string(),
  interval_sec: z.number().nullish(),
  active_app: z.string().nullish(),
  window_title: z.string().nullish(),
  domain: z.string().nullish(),
  browser: z.object({ domain: z.string().nullish() }).passthrough().nullish(),
  /** 舊格式：單一 OCR 文字，ocr_by_display 為空時視為 display 0 */
  ocr_text: z.string().nullish(),
  ocr_by_display: z.array(RawDisplaySchema).nullish(),
  excluded: z.boolean().nullish(),
  error: z.unknown().optional(),
});

export type RawCaptureEvent = z.infer<typeof RawCaptureEventSchema>;

// --- Stage records（trace 輸出，可無損讀回） ---

const ContextKeySchema = z.object({
  app: z.string(),
  domain: z.string(),
  windowTitle: z.string(),
});

const DisplayObservationSchema = z.object({
  display: z.number().int(),
  text: z.string(),
  isActiveDisplay: z.boolean(),
});

export const NormalizedEventSchema = z.object({
  eventId: z.string(),
  ts: z.string(),
  tsMs: z.number().nullable(),
  intervalSec: z.number(),
  contextKey: ContextKeySchema,
  primaryText: z.string(),
  primarySource: z.enum(['active_display', 'fallback_all_displays', 'fallback_empty']),
  displays: z.array(DisplayObservationSchema),
  missingFields: z.array(z.string()),
});

export const SegmentSchema = z.object({
  segmentId: z.number().int().nonnegative(),
  contextKey: ContextKeySchema,
  label: z.string(),
  eventIds: z.array(z.string()).min(1),
  startTs: z.string(),
  endTs: z.string(),
  startMs: z.number(),
  endMs: z.number(),
  captures: z.number().int().positive(),
  estimatedSec: z.number().nonnegative(),
  keywords: z.array(z.string()).max(8),
  ocrSnippets: z.array(z.string()).max(3),
});

const EventResidualSchema = z.object({
  eventId: z.string(),
  ts: z.string(),
  tsMs: z.number(),
  isActiveDisplay: z.boolean(),
  chunks: z.array(z.string()),
  residualText: z.string(),
});

const CommonTextSchema = z.object({
  text: z.string(),
  count: z.number().int().min(2),
});

export const CompactedSegmentSchema = SegmentSchema.extend({
  displays: z.array(
    z.object({
      display: z.number().int(),
      residuals: z.array(EventResidualSchema),
      commonTexts: z.array(CommonTextSchema),
    }),
  ),
});

export const HourPackSchema = z.object({
  hourStartTs: z.string(),
  hourEndTs: z.string(),
  hourStartMs: z.number(),
  hourEndMs: z.number(),
  activeSecEst: z.number().nonnegative(),
  commonTexts: z.array(z.object({ text: z.string(), count: z.number().int().positive() })).max(20),
  clusters: z.array(
    z.object({
      contextKey: ContextKeySchema,
      label: z.string(),
      segmentIds: z.array(z.number().int()),
      startTs: z.string(),
      activeSec: z.number().nonnegative(),
      activeTimeline: z.array(
        z.object({
          ts: z.string(),
          segmentId: z.number().int(),
          eventId: z.string(),
          text: z.string(),
        }),
      ),
      keywords: z.array(z.string()).max(8),
      ocrSnippets: z.array(z.string()).max(3),
    }),
  ).max(3),
});

export const STAGE_SCHEMAS: { [S in keyof StageRecordMap]: z.ZodType<StageRecordMap[S]> } = {
  normalized: NormalizedEventSchema,
  segmented: SegmentSchema,
  compacted: CompactedSegmentSchema,
  hour_packed: HourPackSchema,
};

/** trace 檔名（stage 序號 + 名稱） */
export const STAGE_FILES: { [S in keyof StageRecordMap]: string } = {
  normalized: 'stage-01.normalized.jsonl',
  segmented: 'stage-02.segments.jsonl',
  compacted: 'stage-03.compacted.jsonl',
  hour_packed: 'stage-04.hour-packs.jsonl',
};
