import { describe, it, expect } from 'vitest';
import { EventNormalizer } from '../../../src/application/EventNormalizer.js';
import { DEFAULT_INTERVAL_SEC } from '../../../src/domain/entities/CaptureEvent.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { activeDisplay, at, inactiveDisplay, makeEvent } from '../../helpers/fixtures.js';

describe('EventNormalizer', () => {
  const normalizer = new EventNormalizer();

  it('should tag events without displays as fallback_empty', () => {
    const result = normalizer.normalize(makeEvent({ displays: [] }));
    expect(result.primarySource).toBe('fallback_empty');
    expect(result.primaryText).toBe('');
    expect(result.displays).toEqual([]);
  });

  it('should prefer the active display text', () => {
    const result = normalizer.normalize(makeEvent({
      displays: [inactiveDisplay('Slack', 1), activeDisplay('Editing\nmain.ts', 0)],
    }));
    expect(result.primarySource).toBe('active_display');
    expect(result.primaryText).toBe('Editing main.ts');
  });

  it('should join all display texts when the active display is empty', () => {
    const result = normalizer.normalize(makeEvent({
      displays: [activeDisplay('   ', 0), inactiveDisplay(' Mail ', 1), inactiveDisplay('Calendar', 2)],
    }));
    expect(result.primarySource).toBe('fallback_all_displays');
    expect(result.primaryText).toBe('Mail Calendar');
  });

  it('should fall back when no display is marked active', () => {
    const result = normalizer.normalize(makeEvent({ displays: [inactiveDisplay('Docs', 0)] }));
    expect(result.primarySource).toBe('fallback_all_displays');
    expect(result.primaryText).toBe('Docs');
  });

  it('should collapse line breaks on every display and keep all displays', () => {
    const result = normalizer.normalize(makeEvent({
      displays: [activeDisplay('a\nb', 0), inactiveDisplay('c \r\n d', 1)],
    }));
    expect(result.displays).toEqual([
      { display: 0, text: 'a b', isActiveDisplay: true },
      { display: 1, text: 'c d', isActiveDisplay: false },
    ]);
  });

  it('should build the context key and record missing fields', () => {
    const ok = normalizer.normalize(makeEvent({ activeApp: ' Chrome ', domain: 'github.com', windowTitle: 'PR' }));
    expect(ok.contextKey).toEqual({ app: 'Chrome', domain: 'github.com', windowTitle: 'PR' });
    expect(ok.missingFields).toEqual([]);

    const broken = normalizer.normalize(makeEvent({ activeApp: undefined, windowTitle: null }));
    expect(broken.contextKey).toEqual({ app: '', domain: '', windowTitle: '' });
    expect(broken.missingFields).toEqual(['activeApp', 'windowTitle']);
  });

  it('should parse the timestamp and default the interval', () => {
    const custom = new EventNormalizer(120);
    const result = custom.normalize(makeEvent({ ts: at('10:30'), intervalSec: 0 }));
    expect(result.tsMs).toBe(Date.UTC(2026, 1, 5, 1, 30, 0));
    expect(result.intervalSec).toBe(120);
    expect(custom.normalize(makeEvent({ ts: 'garbage' })).tsMs).toBeNull();
  });

  it('should share one default interval with the config defaults', () => {
    expect(normalizer.normalize(makeEvent({ intervalSec: -5 })).intervalSec).toBe(DEFAULT_INTERVAL_SEC);
    expect(DEFAULT_CONFIG.pipeline.defaultIntervalSec).toBe(DEFAULT_INTERVAL_SEC);
  });

  it('should not mutate the input event', () => {
    const event = makeEvent({ displays: [activeDisplay('x\ny')] });
    normalizer.normalize(event);
    expect(event.displays[0].text).toBe('x\ny');
  });
});
