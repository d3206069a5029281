export type PipelineErrorCode =
  | 'TRANSIENT_FETCH'
  | 'EXTRACTION_FAILURE'
  | 'PERSISTENCE_CONFLICT'
  | 'PERSISTENCE_UNAVAILABLE'
  | 'SLOT_FULL'
  | 'DEADLINE_EXCEEDED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network or auth hiccup while talking to a mailbox; retried with backoff. */
export class TransientFetchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_FETCH', message, options);
  }
}

/** Content the extractor could not turn into an event; degrades to a `none` event. */
export class ExtractionFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILURE', message, options);
  }
}

/** An idempotence key collided at write time: the work was already done. */
export class PersistenceConflictError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_CONFLICT', message, options);
  }
}

/** The store cannot be reached at all. Halts the run. */
export class PersistenceUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_UNAVAILABLE', message, options);
  }
}

/** The chosen slot occurrence filled up between planning and writing. */
export class SlotFullError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SLOT_FULL', message, options);
  }
}

export class DeadlineExceededError extends PipelineError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('DEADLINE_EXCEEDED', `${label} exceeded ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}
