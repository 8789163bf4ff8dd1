import { describe, it, expect } from 'vitest';
import {
  DistillError,
  OrderingViolationError,
  InvalidConfigError,
  MalformedEventError,
  TraceRecordError,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('OrderingViolationError is fatal', () => {
    const err = new OrderingViolationError(3, '2026-02-05T10:05:00Z', '2026-02-05T10:00:00Z');
    expect(err.classification).toBe('fatal');
    expect(err.code).toBe('ORDERING_VIOLATION');
    expect(err.index).toBe(3);
    expect(err.name).toBe('OrderingViolationError');
    expect(err.message).toBe(
      'Event #3 at 2026-02-05T10:00:00Z precedes previous event at 2026-02-05T10:05:00Z; input must be sorted by timestamp',
    );
    expect(err).toBeInstanceOf(DistillError);
    expect(err).toBeInstanceOf(Error);
  });

  it('OrderingViolationError reports unparsable timestamps', () => {
    const err = new OrderingViolationError(0, null, 'yesterday');
    expect(err.message).toBe('Event #0 has an unparsable timestamp "yesterday"');
  });

  it('InvalidConfigError is fatal', () => {
    const err = new InvalidConfigError('bad');
    expect(err.classification).toBe('fatal');
    expect(err.code).toBe('INVALID_CONFIG');
  });

  it('MalformedEventError is recoverable', () => {
    const err = new MalformedEventError('e7', ['activeApp', 'windowTitle']);
    expect(err.classification).toBe('recoverable');
    expect(err.code).toBe('MALFORMED_EVENT');
    expect(err.missingFields).toEqual(['activeApp', 'windowTitle']);
    expect(err.message).toBe('Event "e7" is missing activeApp, windowTitle; substituted empty values');
  });

  it('TraceRecordError is recoverable', () => {
    const err = new TraceRecordError('/tmp/stage-02.segments.jsonl', 4, 'Required');
    expect(err.classification).toBe('recoverable');
    expect(err.lineNumber).toBe(4);
    expect(err.message).toBe('/tmp/stage-02.segments.jsonl:4: Required');
  });
});
