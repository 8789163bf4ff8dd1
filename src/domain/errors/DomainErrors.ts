export type ErrorClassification = 'fatal' | 'recoverable';

/** 所有 distill pipeline 錯誤的基底類別 */
export abstract class DistillError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Fatal ---

export class OrderingViolationError extends DistillError {
  readonly classification = 'fatal' as const;
  readonly code = 'ORDERING_VIOLATION';

  constructor(
    public readonly index: number,
    public readonly previousTs: string | null,
    public readonly currentTs: string,
    options?: ErrorOptions,
  ) {
    super(
      previousTs === null
        ? `Event #${index} has an unparsable timestamp "${currentTs}"`
        : `Event #${index} at ${currentTs} precedes previous event at ${previousTs}; input must be sorted by timestamp`,
      options,
    );
  }
}

export class InvalidConfigError extends DistillError {
  readonly classification = 'fatal' as const;
  readonly code = 'INVALID_CONFIG';
}

// --- Recoverable ---

export class MalformedEventError extends DistillError {
  readonly classification = 'recoverable' as const;
  readonly code = 'MALFORMED_EVENT';

  constructor(
    public readonly eventId: string,
    public readonly missingFields: string[],
    options?: ErrorOptions,
  ) {
    super(`Event "${eventId}" is missing ${missingFields.join(', ')}; substituted empty values`, options);
  }
}

export class TraceRecordError extends DistillError {
  readonly classification = 'recoverable' as const;
  readonly code = 'TRACE_RECORD_INVALID';

  constructor(
    public readonly filePath: string,
    public readonly lineNumber: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${filePath}:${lineNumber}: ${message}`, options);
  }
}
