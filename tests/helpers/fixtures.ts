import type { CaptureEvent, DisplayObservation } from '../../src/domain/entities/CaptureEvent.js';
import type { CompactedSegment, DisplayResiduals } from '../../src/domain/entities/CompactedSegment.js';
import { Timestamp } from '../../src/domain/value-objects/Timestamp.js';
import { contextKeyLabel } from '../../src/domain/value-objects/ContextKey.js';

/** 2026-02-05 的 +09:00 時間字串 */
export function at(hhmm: string): string {
  return `2026-02-05T${hhmm}:00+09:00`;
}

export function activeDisplay(text: string, display: number = 0): DisplayObservation {
  return { display, text, isActiveDisplay: true };
}

export function inactiveDisplay(text: string, display: number = 1): DisplayObservation {
  return { display, text, isActiveDisplay: false };
}

export function makeEvent(overrides: Partial<CaptureEvent> = {}): CaptureEvent {
  return {
    id: 'e1',
    ts: at('10:00'),
    intervalSec: 60,
    activeApp: 'Cursor',
    windowTitle: 'main.ts',
    domain: null,
    displays: [],
    ...overrides,
  };
}

function msOf(ts: string): number {
  const parsed = Timestamp.parse(ts);
  if (!parsed) throw new Error(`bad fixture timestamp ${ts}`);
  return parsed.ms;
}

export interface CompactedFixture {
  segmentId: number;
  app: string;
  startTs: string;
  endTs: string;
  displays?: DisplayResiduals[];
  estimatedSec?: number;
  keywords?: string[];
  ocrSnippets?: string[];
}

export function makeCompacted(f: CompactedFixture): CompactedSegment {
  const contextKey = { app: f.app, domain: '', windowTitle: '' };
  return {
    segmentId: f.segmentId,
    contextKey,
    label: contextKeyLabel(contextKey),
    eventIds: [`s${f.segmentId}-e1`],
    startTs: f.startTs,
    endTs: f.endTs,
    startMs: msOf(f.startTs),
    endMs: msOf(f.endTs),
    captures: 1,
    estimatedSec: f.estimatedSec ?? 60,
    keywords: f.keywords ?? [],
    ocrSnippets: f.ocrSnippets ?? [],
    displays: f.displays ?? [],
  };
}

export function residual(eventId: string, ts: string, text: string, isActiveDisplay: boolean = true) {
  return {
    eventId,
    ts,
    tsMs: msOf(ts),
    isActiveDisplay,
    chunks: text ? text.split(' / ') : [],
    residualText: text,
  };
}
