import type { SummaryHour } from '../../application/dto/SummaryInput.js';

export type OutputFormat = 'json' | 'text';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'text';
}

function formatDuration(totalSec: number): string {
  const minutes = Math.round(totalSec / 60);
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return h > 0 ? `${h}h${String(m).padStart(2, '0')}m` : `${m}m`;
}

/** 指令輸出格式化：json 原樣輸出，text 供人閱讀 */
export class OutputFormatter {
  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  formatSummaryHours(hours: SummaryHour[], format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(hours, null, 2);
    if (hours.length === 0) return 'No hours above the activity threshold.';

    return hours
      .map((h) => {
        const lines = [`## ${h.hourStartTs} (${formatDuration(h.activeSecEst)} active)`];
        for (const c of h.clusters) {
          lines.push(`- ${c.label} (segments: ${c.segmentIds.join(', ')})`);
          for (const e of c.activeTimeline) {
            lines.push(`    ${e.ts}  ${e.text}`);
          }
          const evidence = [...c.ocrSnippets, ...c.keywords];
          if (evidence.length > 0) {
            lines.push(`    evidence: ${evidence.join(' | ')}`);
          }
        }
        if (h.commonTexts.length > 0) {
          lines.push(`  common: ${h.commonTexts.map((t) => `${t.text} ×${t.count}`).join(' | ')}`);
        }
        return lines.join('\n');
      })
      .join('\n\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val}`;
      })
      .join('\n');
  }
}
