/** Base class for every error raised by the permafrost engine. */
export class PermafrostEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface SiteInputIssue {
  /** Dotted path into SiteInputV1, e.g. "snow.densityKgM3". */
  path: string;
  message: string;
}

/**
 * The site configuration was rejected before any computation started.
 * Carries one issue per offending field.
 */
export class InvalidSiteInputError extends PermafrostEngineError {
  readonly issues: SiteInputIssue[];

  constructor(issues: SiteInputIssue[]) {
    super(
      `Invalid site input: ${issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
    );
    this.issues = issues;
  }
}

export type DomainErrorCode =
  | 'asin_domain'
  | 'log_domain'
  | 'sqrt_domain'
  | 'division_by_zero'
  | 'non_finite'
  | 'season_partition'
  | 'amplitude_order';

/**
 * A formula in the pipeline would be undefined for this input combination
 * (arcsin outside [-1, 1], logarithm of a non-positive number, division by
 * zero).  Raised instead of returning NaN or Infinity.
 */
export class PermafrostDomainError extends PermafrostEngineError {
  readonly code: DomainErrorCode;
  /** Name of the quantity being computed when the violation was detected. */
  readonly quantity: string;

  constructor(code: DomainErrorCode, quantity: string, detail: string) {
    super(`Domain error while computing ${quantity} (${code}): ${detail}`);
    this.code = code;
    this.quantity = quantity;
  }
}
