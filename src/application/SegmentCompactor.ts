import type { NormalizedEvent } from '../domain/entities/NormalizedEvent.js';
import type { Segment } from '../domain/entities/Segment.js';
import type {
  CommonText,
  CompactedSegment,
  DisplayResiduals,
  EventResidual,
} from '../domain/entities/CompactedSegment.js';
import { OcrChunkingStrategy } from '../infrastructure/text/OcrChunkingStrategy.js';
import { normalizeForDedupe } from '../infrastructure/text/TextNormalizer.js';

/** residual 中 chunk 的串接符號 */
export const RESIDUAL_SEPARATOR = ' / ';

interface ChunkTally {
  text: string;
  count: number;
}

/**
 * Stage 3：段內 OCR 去重
 *
 * 每個 display 各自維護「已看過的 chunk」集合（只活在一次呼叫內），
 * 依時間順序為每個事件留下尚未出現過的 chunk 作為 residual；
 * 在 ≥2 個事件出現過的 chunk 另外記入 commonTexts。
 * active / inactive display 互不抑制。
 */
export class SegmentCompactor {
  constructor(private readonly chunker: OcrChunkingStrategy = new OcrChunkingStrategy()) {}

  /**
   * @param members - segment 的成員事件，依時間排序
   */
  compact(segment: Segment, members: readonly NormalizedEvent[]): CompactedSegment {
    const displayIds = new Set<number>();
    for (const event of members) {
      for (const obs of event.displays) displayIds.add(obs.display);
    }

    const displays: DisplayResiduals[] = [...displayIds]
      .sort((a, b) => a - b)
      .map((display) => this.compactDisplay(segment, members, display));

    return {
      ...segment,
      contextKey: { ...segment.contextKey },
      eventIds: [...segment.eventIds],
      keywords: [...segment.keywords],
      ocrSnippets: [...segment.ocrSnippets],
      displays,
    };
  }

  /**
   * 依 Segmenter 輸出順序逐段取出成員事件並壓縮。
   * segments 必須是同一批 events 的 Segmenter 結果。
   */
  compactAll(segments: readonly Segment[], events: readonly NormalizedEvent[]): CompactedSegment[] {
    let offset = 0;
    return segments.map((segment) => {
      const members = events.slice(offset, offset + segment.captures);
      offset += segment.captures;
      return this.compact(segment, members);
    });
  }

  private compactDisplay(
    segment: Segment,
    members: readonly NormalizedEvent[],
    display: number,
  ): DisplayResiduals {
    const observed: Array<{ event: NormalizedEvent; isActive: boolean; chunks: string[] }> = [];
    for (const event of members) {
      const obs = event.displays.find((d) => d.display === display);
      if (!obs) continue;
      observed.push({ event, isActive: obs.isActiveDisplay, chunks: this.chunker.split(obs.text) });
    }

    // 去重前計數：同一事件內重複的 chunk 只算一次
    const tallies = new Map<string, ChunkTally>();
    for (const { chunks } of observed) {
      const inEvent = new Set<string>();
      for (const chunk of chunks) {
        const norm = normalizeForDedupe(chunk);
        if (!norm || inEvent.has(norm)) continue;
        inEvent.add(norm);
        const tally = tallies.get(norm);
        if (tally) {
          tally.count += 1;
        } else {
          tallies.set(norm, { text: chunk, count: 1 });
        }
      }
    }

    const seen = new Set<string>();
    const residuals: EventResidual[] = observed.map(({ event, isActive, chunks }) => {
      const fresh: string[] = [];
      for (const chunk of chunks) {
        const norm = normalizeForDedupe(chunk);
        if (!norm || seen.has(norm)) continue;
        seen.add(norm);
        fresh.push(chunk);
      }
      // 全部重複時保留第一個 chunk，讓每個事件在 timeline 上仍可辨識
      if (fresh.length === 0 && chunks.length > 0) {
        fresh.push(chunks[0]);
      }
      return {
        eventId: event.eventId,
        ts: event.ts,
        tsMs: event.tsMs ?? segment.startMs,
        isActiveDisplay: isActive,
        chunks: fresh,
        residualText: fresh.join(RESIDUAL_SEPARATOR),
      };
    });

    const commonTexts: CommonText[] = [...tallies.values()]
      .filter((t) => t.count >= 2)
      .sort((a, b) => b.count - a.count)
      .map((t) => ({ text: t.text, count: t.count }));

    return { display, residuals, commonTexts };
  }
}
