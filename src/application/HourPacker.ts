import type { CompactedSegment } from '../domain/entities/CompactedSegment.js';
import type { Cluster, HourPack, RankedCommonText, TimelineEntry } from '../domain/entities/HourPack.js';
import { contextKeyId, type ContextKey } from '../domain/value-objects/ContextKey.js';
import { Timestamp } from '../domain/value-objects/Timestamp.js';
import { normalizeCommonText } from '../infrastructure/text/TextNormalizer.js';
import {
  SEGMENT_KEYWORD_LIMIT,
  SEGMENT_SNIPPET_LIMIT,
  addCounts,
  mostCommon,
} from '../infrastructure/text/SegmentFeatureExtractor.js';

export interface HourPackerOptions {
  /** 每小時保留的 cluster 上限 */
  maxClusters: number;
  /** 每小時保留的 common text 上限 */
  maxCommonTexts: number;
  /** common text 比較鍵的前綴長度 */
  commonTextPrefixChars: number;
}

export const DEFAULT_HOUR_PACKER_OPTIONS: HourPackerOptions = {
  maxClusters: 3,
  maxCommonTexts: 20,
  commonTextPrefixChars: 240,
};

interface CommonTally {
  text: string;
  count: number;
  order: number;
}

interface ClusterDraft {
  contextKey: ContextKey;
  label: string;
  segments: CompactedSegment[];
  startMs: number;
  startTs: string;
  activeSec: number;
}

function segmentStart(segment: CompactedSegment): Timestamp {
  return Timestamp.parse(segment.startTs) ?? Timestamp.fromEpoch(segment.startMs);
}

/**
 * Stage 4：小時層級打包
 *
 * segment 只歸屬於其起點所在的小時，不會跨小時重複。
 * common text 以 (segment, display, text) 去重後計數，避免單一 segment 反覆出現的大區塊主導排名；
 * cluster 依 context key 聚合，按 wall-clock 長度取前 maxClusters 個，
 * 其餘 cluster 只貢獻 common text 計數。
 */
export class HourPacker {
  private readonly options: HourPackerOptions;

  constructor(options: Partial<HourPackerOptions> = {}) {
    this.options = { ...DEFAULT_HOUR_PACKER_OPTIONS, ...options };
  }

  /** 為每個至少有一個 segment 起點的小時產生 HourPack，依時間排序 */
  packAll(segments: readonly CompactedSegment[]): HourPack[] {
    const buckets = new Map<number, { hourStart: Timestamp; segments: CompactedSegment[] }>();
    for (const segment of segments) {
      const hourStart = segmentStart(segment).hourStart();
      const bucket = buckets.get(hourStart.ms);
      if (bucket) {
        bucket.segments.push(segment);
      } else {
        buckets.set(hourStart.ms, { hourStart, segments: [segment] });
      }
    }

    return [...buckets.values()]
      .sort((a, b) => a.hourStart.ms - b.hourStart.ms)
      .map((b) => this.buildPack(b.hourStart, b.segments));
  }

  /**
   * 指定小時的 HourPack；沒有任何 segment 起點落在該小時時回傳空 pack
   * @param hourStartTs - 小時起點（ISO 8601），非整點時自動取整
   */
  packHour(segments: readonly CompactedSegment[], hourStartTs: string): HourPack {
    const parsed = Timestamp.parse(hourStartTs);
    if (!parsed) {
      throw new RangeError(`Invalid hour start timestamp: "${hourStartTs}"`);
    }
    const hourStart = parsed.hourStart();
    const hourEnd = hourStart.plusHours(1);
    const attributed = segments.filter((s) => {
      const start = segmentStart(s).ms;
      return start >= hourStart.ms && start < hourEnd.ms;
    });
    return this.buildPack(hourStart, attributed);
  }

  private buildPack(hourStart: Timestamp, segments: readonly CompactedSegment[]): HourPack {
    const hourEnd = hourStart.plusHours(1);
    return {
      hourStartTs: hourStart.toISOString(),
      hourEndTs: hourEnd.toISOString(),
      hourStartMs: hourStart.ms,
      hourEndMs: hourEnd.ms,
      activeSecEst: segments.reduce((sum, s) => sum + s.estimatedSec, 0),
      commonTexts: this.rankCommonTexts(segments),
      clusters: this.selectClusters(segments),
    };
  }

  private rankCommonTexts(segments: readonly CompactedSegment[]): RankedCommonText[] {
    const tallies = new Map<string, CommonTally>();
    const seen = new Set<string>();

    for (const segment of segments) {
      for (const display of segment.displays) {
        for (const common of display.commonTexts) {
          const norm = normalizeCommonText(common.text, this.options.commonTextPrefixChars);
          if (!norm) continue;
          const triple = JSON.stringify([segment.segmentId, display.display, norm]);
          if (seen.has(triple)) continue;
          seen.add(triple);

          const tally = tallies.get(norm);
          if (tally) {
            tally.count += 1;
          } else {
            tallies.set(norm, { text: common.text.trim(), count: 1, order: tallies.size });
          }
        }
      }
    }

    return [...tallies.values()]
      .sort((a, b) => b.count - a.count || b.text.length - a.text.length || a.order - b.order)
      .slice(0, this.options.maxCommonTexts)
      .map((t) => ({ text: t.text, count: t.count }));
  }

  private selectClusters(segments: readonly CompactedSegment[]): Cluster[] {
    const drafts = new Map<string, ClusterDraft>();
    for (const segment of segments) {
      const id = contextKeyId(segment.contextKey);
      const duration = Math.max(0, (segment.endMs - segment.startMs) / 1000);
      const draft = drafts.get(id);
      if (draft) {
        draft.segments.push(segment);
        draft.activeSec += duration;
        if (segment.startMs < draft.startMs) {
          draft.startMs = segment.startMs;
          draft.startTs = segment.startTs;
        }
      } else {
        drafts.set(id, {
          contextKey: { ...segment.contextKey },
          label: segment.label,
          segments: [segment],
          startMs: segment.startMs,
          startTs: segment.startTs,
          activeSec: duration,
        });
      }
    }

    return [...drafts.values()]
      .sort((a, b) => b.activeSec - a.activeSec || a.startMs - b.startMs)
      .slice(0, this.options.maxClusters)
      .map((draft) => ({
        contextKey: draft.contextKey,
        label: draft.label,
        segmentIds: draft.segments.map((s) => s.segmentId).sort((a, b) => a - b),
        startTs: draft.startTs,
        activeSec: draft.activeSec,
        activeTimeline: this.buildTimeline(draft.segments),
        ...this.mergeFeatures(draft.segments),
      }));
  }

  /** 所有 active display 都沒有文字時，cluster 仍可由這些特徵辨識 */
  private mergeFeatures(segments: readonly CompactedSegment[]): Pick<Cluster, 'keywords' | 'ocrSnippets'> {
    const keywords = new Map<string, number>();
    const snippets = new Map<string, number>();
    for (const segment of segments) {
      addCounts(keywords, segment.keywords);
      addCounts(snippets, segment.ocrSnippets);
    }
    return {
      keywords: mostCommon(keywords, SEGMENT_KEYWORD_LIMIT),
      ocrSnippets: mostCommon(snippets, SEGMENT_SNIPPET_LIMIT),
    };
  }

  /** 只取 active display 的 residual，攤平成依時間排序的一條序列 */
  private buildTimeline(segments: readonly CompactedSegment[]): TimelineEntry[] {
    const entries: Array<TimelineEntry & { tsMs: number }> = [];
    for (const segment of segments) {
      for (const display of segment.displays) {
        for (const residual of display.residuals) {
          if (!residual.isActiveDisplay) continue;
          const text = residual.residualText.trim();
          if (!text) continue;
          entries.push({
            ts: residual.ts,
            tsMs: residual.tsMs,
            segmentId: segment.segmentId,
            eventId: residual.eventId,
            text,
          });
        }
      }
    }

    return entries
      .sort((a, b) => a.tsMs - b.tsMs)
      .map(({ ts, segmentId, eventId, text }) => ({ ts, segmentId, eventId, text }));
  }
}
