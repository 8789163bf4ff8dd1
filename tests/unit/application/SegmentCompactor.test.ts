import { describe, it, expect } from 'vitest';
import { EventNormalizer } from '../../../src/application/EventNormalizer.js';
import { Segmenter } from '../../../src/application/Segmenter.js';
import { SegmentCompactor } from '../../../src/application/SegmentCompactor.js';
import { OcrChunkingStrategy } from '../../../src/infrastructure/text/OcrChunkingStrategy.js';
import { normalizeForDedupe } from '../../../src/infrastructure/text/TextNormalizer.js';
import type { CaptureEvent } from '../../../src/domain/entities/CaptureEvent.js';
import { activeDisplay, at, inactiveDisplay, makeEvent } from '../../helpers/fixtures.js';

const normalizer = new EventNormalizer();
const segmenter = new Segmenter();
const compactor = new SegmentCompactor();

function compactSingle(events: CaptureEvent[]) {
  const normalized = normalizer.normalizeAll(events);
  const [segment] = segmenter.segment(normalized);
  return { segment, normalized, compacted: compactor.compact(segment, normalized) };
}

function texts(...values: string[]): CaptureEvent[] {
  return values.map((text, i) =>
    makeEvent({ id: `e${i + 1}`, ts: at(`10:0${i}`), displays: [activeDisplay(text)] }),
  );
}

describe('SegmentCompactor', () => {
  it('should keep only new chunks per event and pool recurring ones', () => {
    const { compacted } = compactSingle(texts(
      'Open file. Save file.',
      'Save file. Close file.',
      'Close file. Done.',
    ));

    expect(compacted.displays).toHaveLength(1);
    const [display] = compacted.displays;
    expect(display.display).toBe(0);
    expect(display.residuals.map((r) => r.chunks)).toEqual([
      ['Open file.', 'Save file.'],
      ['Close file.'],
      ['Done.'],
    ]);
    expect(display.residuals[0].residualText).toBe('Open file. / Save file.');
    expect(display.commonTexts).toEqual([
      { text: 'Save file.', count: 2 },
      { text: 'Close file.', count: 2 },
    ]);
  });

  it('should retain the first chunk when an event adds nothing new', () => {
    const { compacted } = compactSingle(texts(
      'Open file. Save file.',
      'Save file. Open file.',
    ));
    const residuals = compacted.displays[0].residuals;
    expect(residuals[1].chunks).toEqual(['Save file.']);
    expect(residuals[1].residualText).toBe('Save file.');
  });

  it('should compare chunks case- and punctuation-insensitively', () => {
    const { compacted } = compactSingle(texts('Save file. save FILE', 'Other thing. SAVE file!'));
    const [display] = compacted.displays;
    expect(display.residuals.map((r) => r.chunks)).toEqual([['Save file.'], ['Other thing.']]);
    expect(display.commonTexts).toEqual([{ text: 'Save file.', count: 2 }]);
  });

  it('should deduplicate each display independently', () => {
    const { compacted } = compactSingle([
      makeEvent({ id: 'e1', ts: at('10:00'), displays: [activeDisplay('Alpha. Beta.', 0), inactiveDisplay('Alpha. Beta.', 1)] }),
      makeEvent({ id: 'e2', ts: at('10:01'), displays: [activeDisplay('Alpha. Gamma.', 0), inactiveDisplay('Beta. Delta.', 1)] }),
    ]);

    expect(compacted.displays.map((d) => d.display)).toEqual([0, 1]);
    const [active, inactive] = compacted.displays;
    expect(active.residuals.map((r) => [r.isActiveDisplay, r.residualText])).toEqual([
      [true, 'Alpha. / Beta.'],
      [true, 'Gamma.'],
    ]);
    expect(inactive.residuals.map((r) => [r.isActiveDisplay, r.residualText])).toEqual([
      [false, 'Alpha. / Beta.'],
      [false, 'Delta.'],
    ]);
    expect(active.commonTexts).toEqual([{ text: 'Alpha.', count: 2 }]);
    expect(inactive.commonTexts).toEqual([{ text: 'Beta.', count: 2 }]);
  });

  it('should yield an empty residual for empty text', () => {
    const { compacted } = compactSingle(texts('Hello there. General.', ''));
    const residuals = compacted.displays[0].residuals;
    expect(residuals).toHaveLength(2);
    expect(residuals[1]).toEqual({
      eventId: 'e2',
      ts: at('10:01'),
      tsMs: Date.UTC(2026, 1, 5, 1, 1, 0),
      isActiveDisplay: true,
      chunks: [],
      residualText: '',
    });
  });

  it('should skip events that have no observation for a display', () => {
    const { compacted } = compactSingle([
      makeEvent({ id: 'e1', ts: at('10:00'), displays: [activeDisplay('One.', 0), inactiveDisplay('Side.', 1)] }),
      makeEvent({ id: 'e2', ts: at('10:01'), displays: [activeDisplay('Two.', 0)] }),
    ]);
    expect(compacted.displays[1].residuals.map((r) => r.eventId)).toEqual(['e1']);
  });

  it('should be a pure function of its input', () => {
    const { segment, normalized, compacted } = compactSingle(texts('A b. C d.', 'C d. E f.'));
    expect(compactor.compact(segment, normalized)).toEqual(compacted);
    expect(compacted.eventIds).not.toBe(segment.eventIds);
    expect(segment).not.toHaveProperty('displays');
  });

  it('should not lose any distinct chunk', () => {
    const chunker = new OcrChunkingStrategy();
    const inputs = ['Build started. Compiling 12 files.', 'Compiling 12 files. Build failed!', 'Build failed! Retry → now', 'Build started.'];
    const { compacted } = compactSingle(texts(...inputs));

    const distinct = new Set(inputs.flatMap((t) => chunker.split(t)).map(normalizeForDedupe).filter(Boolean));
    const [display] = compacted.displays;
    const kept = new Set(
      [...display.residuals.flatMap((r) => r.chunks), ...display.commonTexts.map((c) => c.text)]
        .map(normalizeForDedupe),
    );
    for (const norm of distinct) {
      expect(kept.has(norm)).toBe(true);
    }
  });

  it('should compact every segment in order', () => {
    const normalized = normalizer.normalizeAll([
      makeEvent({ id: 'e1', ts: at('10:00'), displays: [activeDisplay('Repeated. First.')] }),
      makeEvent({ id: 'e2', ts: at('10:01'), activeApp: 'Slack', displays: [activeDisplay('Repeated. Chat.')] }),
      makeEvent({ id: 'e3', ts: at('10:02'), displays: [activeDisplay('Repeated. Again.')] }),
    ]);
    const segments = segmenter.segment(normalized);
    const compacted = compactor.compactAll(segments, normalized);

    expect(compacted.map((c) => c.segmentId)).toEqual([0, 1, 2]);
    // 不同 segment 之間不共享已看過的 chunk
    expect(compacted.map((c) => c.displays[0].residuals[0].residualText)).toEqual([
      'Repeated. / First.',
      'Repeated. / Chat.',
      'Repeated. / Again.',
    ]);
  });
});
