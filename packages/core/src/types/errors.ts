/** Fatal at startup: malformed config, ontology or authority data. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type PipelineErrorCode = 'retrieval_unavailable' | 'deadline_exceeded';

export type RetrievalUnavailableReason =
  | 'all_searches_failed'
  | 'all_searches_timed_out'
  | 'no_searches_dispatched';

export type DeadlineExceededReason =
  | 'deadline_exceeded_before_classification'
  | 'deadline_exceeded_before_search';

/** Terminal per-request failure. Carries a machine-readable code and reason. */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly reason: string;
}

export class RetrievalUnavailableError extends PipelineError {
  readonly code = 'retrieval_unavailable';
  readonly reason: RetrievalUnavailableReason;

  constructor(reason: RetrievalUnavailableReason, message: string) {
    super(message);
    this.name = 'RetrievalUnavailableError';
    this.reason = reason;
  }
}

export class DeadlineExceededError extends PipelineError {
  readonly code = 'deadline_exceeded';
  readonly reason: DeadlineExceededReason;

  constructor(reason: DeadlineExceededReason, message: string) {
    super(message);
    this.name = 'DeadlineExceededError';
    this.reason = reason;
  }
}
