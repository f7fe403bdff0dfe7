export type ScorecardErrorCode = 'INVARIANT_VIOLATION' | 'REPORT_SERIALIZATION_FAILED';

export abstract class ScorecardError extends Error {
  abstract readonly code: ScorecardErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A static table (tiers, catalog) is misconfigured. Never a user error. */
export class InvariantViolationError extends ScorecardError {
  readonly code = 'INVARIANT_VIOLATION';
}

export class ReportSerializationError extends ScorecardError {
  readonly code = 'REPORT_SERIALIZATION_FAILED';
}
