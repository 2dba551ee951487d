// === Queue ===

/** A claimed unit of work. */
export interface QueueItem {
  /** Original filename, e.g. `standup.txt`. Stable key for output naming. */
  identity: string;
  /** Claim marker filename, e.g. `standup.processing`. */
  claimMarker: string;
  /** Absolute path of the claim marker. */
  path: string;
}

// === Analysis ===

export interface AnalysisRecord {
  summary: string;
  attendees: string[];
  /** Always exactly three entries. */
  action_items: string[];
}

/** Loosely-typed object produced by a parsing strategy, before coercion. */
export type CandidateObject = Record<string, unknown>;

/** Output artifact written per processed identity. */
export interface OutputArtifact extends AnalysisRecord {
  job_id: string;
}

// === Job outcomes ===

export type JobStatus = 'completed' | 'failed';

/** One metrics ledger row. */
export interface JobOutcome {
  job_id: string;
  status: JobStatus;
  duration_seconds: number;
  error?: string;
}

// === Error Type ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export type ErrorKind = 'invalid_input' | 'service_error' | 'parse_failure' | 'persistence_error';

export const ERROR_CODES = {
  INVALID_INPUT: 'DIGEST_E101',
  SERVICE_ERROR: 'DIGEST_E201',
  SERVICE_TIMEOUT: 'DIGEST_E202',
  PARSE_FAILURE: 'DIGEST_E301',
  OUTPUT_WRITE_FAILED: 'DIGEST_E401',
  LEDGER_WRITE_FAILED: 'DIGEST_E402',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ErrorContext {
  jobId?: string;
  identity?: string;
  status?: number;
}

export class DigestError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly cause?: Error;
  readonly retryable: boolean;
  readonly timestamp: string;

  constructor(opts: {
    code: ErrorCode;
    kind: ErrorKind;
    severity: ErrorSeverity;
    message: string;
    context?: ErrorContext;
    cause?: Error;
    retryable?: boolean;
  }) {
    super(opts.message);
    this.name = 'DigestError';
    this.code = opts.code;
    this.kind = opts.kind;
    this.severity = opts.severity;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
    this.retryable = opts.retryable ?? false;
    this.timestamp = new Date().toISOString();
  }
}
