import type { NormalizedEvent } from '../domain/entities/NormalizedEvent.js';
import type { Segment } from '../domain/entities/Segment.js';
import { contextKeyEquals, contextKeyLabel } from '../domain/value-objects/ContextKey.js';
import { OrderingViolationError } from '../domain/errors/DomainErrors.js';
import {
  SEGMENT_KEYWORD_LIMIT,
  SEGMENT_SNIPPET_LIMIT,
  SegmentFeatureExtractor,
  addCounts,
  mostCommon,
} from '../infrastructure/text/SegmentFeatureExtractor.js';

interface FeatureTally {
  keywords: Map<string, number>;
  snippets: Map<string, number>;
}

/**
 * Stage 2：把依時間排序的事件切成同 context key 的最大連續區段。
 *
 * key 一改變就關閉目前區段並開新區段；關閉後不再重開，
 * 所以同一 key 被其他 key 隔開時會得到兩個不同的 segmentId。
 * 輸入未排序時丟出 OrderingViolationError，不自行重排。
 * 每個成員的 primary text 各貢獻一次 keywords / snippets 計數。
 */
export class Segmenter {
  constructor(private readonly features: SegmentFeatureExtractor = new SegmentFeatureExtractor()) {}

  segment(events: readonly NormalizedEvent[]): Segment[] {
    const segments: Segment[] = [];
    const tallies: FeatureTally[] = [];
    let current: Segment | null = null;
    let prev: NormalizedEvent | null = null;

    for (const [index, event] of events.entries()) {
      const tsMs = event.tsMs;
      if (tsMs === null) {
        throw new OrderingViolationError(index, null, event.ts);
      }
      if (prev && prev.tsMs !== null && tsMs < prev.tsMs) {
        throw new OrderingViolationError(index, prev.ts, event.ts);
      }
      prev = event;

      if (current && contextKeyEquals(current.contextKey, event.contextKey)) {
        current.eventIds.push(event.eventId);
        current.endTs = event.ts;
        current.endMs = tsMs;
        current.captures += 1;
        current.estimatedSec += event.intervalSec;
        this.tally(tallies[tallies.length - 1], event);
        continue;
      }

      current = {
        segmentId: segments.length,
        contextKey: { ...event.contextKey },
        label: contextKeyLabel(event.contextKey),
        eventIds: [event.eventId],
        startTs: event.ts,
        endTs: event.ts,
        startMs: tsMs,
        endMs: tsMs,
        captures: 1,
        estimatedSec: event.intervalSec,
        keywords: [],
        ocrSnippets: [],
      };
      segments.push(current);
      const tally: FeatureTally = { keywords: new Map(), snippets: new Map() };
      tallies.push(tally);
      this.tally(tally, event);
    }

    for (const [i, segment] of segments.entries()) {
      segment.keywords = mostCommon(tallies[i].keywords, SEGMENT_KEYWORD_LIMIT);
      segment.ocrSnippets = mostCommon(tallies[i].snippets, SEGMENT_SNIPPET_LIMIT);
    }
    return segments;
  }

  private tally(tally: FeatureTally, event: NormalizedEvent): void {
    addCounts(tally.keywords, this.features.keywords(event.primaryText));
    addCounts(tally.snippets, this.features.snippets(event.primaryText));
  }
}
