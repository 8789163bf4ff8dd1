import type { HourPack } from '../domain/entities/HourPack.js';
import type { SummaryHour, SummaryInputOptions } from './dto/SummaryInput.js';

/**
 * 整理給 summarizer 的小時輸入：
 * 去掉沒有 cluster 也沒有 common text 的小時、低於 minActiveSec 的小時，
 * 依時間順序最多保留 maxHours 個。HourPacker 本身不做這些篩選。
 */
export function buildSummaryInput(hourPacks: readonly HourPack[], options: SummaryInputOptions): SummaryHour[] {
  const hours = hourPacks
    .filter((h) => h.clusters.length > 0 || h.commonTexts.length > 0)
    .filter((h) => h.activeSecEst >= options.minActiveSec)
    .sort((a, b) => a.hourStartMs - b.hourStartMs)
    .slice(0, Math.max(0, options.maxHours));

  return hours.map((h) => ({
    hourStartTs: h.hourStartTs,
    hourEndTs: h.hourEndTs,
    activeSecEst: h.activeSecEst,
    commonTexts: h.commonTexts.map((t) => ({ ...t })),
    clusters: h.clusters.map((c) => ({
      contextKey: { ...c.contextKey },
      label: c.label,
      segmentIds: [...c.segmentIds],
      activeTimeline: c.activeTimeline.map((e) => ({ ...e })),
      keywords: [...c.keywords],
      ocrSnippets: [...c.ocrSnippets],
    })),
  }));
}
