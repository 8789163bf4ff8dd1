import { DEFAULT_INTERVAL_SEC, type CaptureEvent, type DisplayObservation } from '../domain/entities/CaptureEvent.js';
import type { NormalizedEvent, PrimaryTextSource } from '../domain/entities/NormalizedEvent.js';
import type { ContextKey } from '../domain/value-objects/ContextKey.js';
import { Timestamp } from '../domain/value-objects/Timestamp.js';
import { collapseLineBreaks } from '../infrastructure/text/TextNormalizer.js';

function field(value: string | null | undefined, name: string, missing: string[]): string {
  if (typeof value !== 'string') {
    missing.push(name);
    return '';
  }
  return value.trim();
}

/**
 * Stage 1：從 CaptureEvent 抽出 context key 與主要文字。
 * 不會失敗：沒有可用文字時只把 primarySource 降級。
 */
export class EventNormalizer {
  constructor(private readonly defaultIntervalSec: number = DEFAULT_INTERVAL_SEC) {}

  normalize(event: CaptureEvent): NormalizedEvent {
    const missingFields: string[] = [];
    const contextKey: ContextKey = {
      app: field(event.activeApp, 'activeApp', missingFields),
      // domain 本身可省略，不算 malformed
      domain: (event.domain ?? '').trim(),
      windowTitle: field(event.windowTitle, 'windowTitle', missingFields),
    };

    const displays: DisplayObservation[] = event.displays.map((d) => ({
      display: d.display,
      text: collapseLineBreaks(d.text),
      isActiveDisplay: d.isActiveDisplay,
    }));

    const { primaryText, primarySource } = this.pickPrimary(displays);
    const ts = Timestamp.parse(event.ts);

    return {
      eventId: event.id,
      ts: event.ts,
      tsMs: ts ? ts.ms : null,
      intervalSec: event.intervalSec > 0 ? event.intervalSec : this.defaultIntervalSec,
      contextKey,
      primaryText,
      primarySource,
      displays,
      missingFields,
    };
  }

  normalizeAll(events: readonly CaptureEvent[]): NormalizedEvent[] {
    return events.map((e) => this.normalize(e));
  }

  private pickPrimary(displays: DisplayObservation[]): { primaryText: string; primarySource: PrimaryTextSource } {
    const active = displays.find((d) => d.isActiveDisplay && d.text.trim());
    if (active) {
      return { primaryText: active.text, primarySource: 'active_display' };
    }

    const withText = displays.filter((d) => d.text.trim());
    if (withText.length > 0) {
      return {
        primaryText: withText.map((d) => d.text.trim()).join(' '),
        primarySource: 'fallback_all_displays',
      };
    }

    return { primaryText: '', primarySource: 'fallback_empty' };
  }
}
