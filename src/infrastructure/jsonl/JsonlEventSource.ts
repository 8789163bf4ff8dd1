import fs from 'node:fs/promises';
import { DEFAULT_INTERVAL_SEC, type CaptureEvent, type DisplayObservation } from '../../domain/entities/CaptureEvent.js';
import type { EventSourcePort, EventSourceResult } from '../../domain/ports/EventSourcePort.js';
import { Logger } from '../../shared/Logger.js';
import { RawCaptureEventSchema, type RawCaptureEvent } from './schemas.js';

/**
 * 讀取擷取端的 JSONL 紀錄（一行一個事件）
 *
 * 空行、壞掉的 JSON 與不符 schema 的行會被略過並回報 warning；
 * excluded / error 事件沒有可用文字，也一併略過。
 * 不重新排序：順序檢查交給 Segmenter。
 */
export class JsonlEventSource implements EventSourcePort {
  private readonly logger = new Logger('JsonlEventSource');

  constructor(private readonly defaultIntervalSec: number = DEFAULT_INTERVAL_SEC) {}

  async readEvents(filePath: string): Promise<EventSourceResult> {
    const content = await fs.readFile(filePath, 'utf-8');
    return this.parse(content);
  }

  parse(content: string): EventSourceResult {
    const events: CaptureEvent[] = [];
    const warnings: string[] = [];
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      const lineNo = i + 1;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        warnings.push(`line ${lineNo}: invalid JSON`);
        continue;
      }

      const parsed = RawCaptureEventSchema.safeParse(json);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        warnings.push(`line ${lineNo}: ${issue.path.join('.') || '(root)'} ${issue.message}`);
        continue;
      }

      const raw = parsed.data;
      if (raw.excluded || raw.error) {
        warnings.push(`line ${lineNo}: skipped ${raw.excluded ? 'excluded' : 'errored'} event`);
        continue;
      }
      events.push(this.toCaptureEvent(raw, lineNo));
    }

    if (warnings.length > 0) {
      this.logger.warn('Skipped capture log lines', { count: warnings.length });
    }
    return { events, warnings };
  }

  private toCaptureEvent(raw: RawCaptureEvent, lineNo: number): CaptureEvent {
    return {
      id: raw.id ?? `line-${lineNo}`,
      ts: raw.ts,
      intervalSec: raw.interval_sec && raw.interval_sec > 0 ? raw.interval_sec : this.defaultIntervalSec,
      activeApp: raw.active_app,
      windowTitle: raw.window_title,
      domain: raw.browser?.domain ?? raw.domain ?? null,
      displays: this.toDisplays(raw),
    };
  }

  private toDisplays(raw: RawCaptureEvent): DisplayObservation[] {
    const displays: DisplayObservation[] = [];
    let activeTaken = false;

    for (const [index, d] of (raw.ocr_by_display ?? []).entries()) {
      if (d.excluded) continue;
      // 每個事件至多一個 active display，多個時以第一個為準
      const isActive = Boolean(d.is_active_display) && !activeTaken;
      if (isActive) activeTaken = true;
      displays.push({
        display: d.display ?? index,
        text: d.ocr_text ?? '',
        isActiveDisplay: isActive,
      });
    }

    if (displays.length === 0 && raw.ocr_text) {
      displays.push({ display: 0, text: raw.ocr_text, isActiveDisplay: false });
    }
    return displays;
  }
}
