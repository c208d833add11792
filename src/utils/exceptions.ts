/**
 * Error codes callers can switch on to distinguish failures.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Auction input errors
  AUCTION_NO_BIDDERS: 'AUCTION_NO_BIDDERS',
  AUCTION_INVALID_BIDDERS: 'AUCTION_INVALID_BIDDERS',

  // Auction engine errors (fatal, never retried)
  AUCTION_ROUND_LIMIT_EXCEEDED: 'AUCTION_ROUND_LIMIT_EXCEEDED',
  AUCTION_INVARIANT_VIOLATION: 'AUCTION_INVARIANT_VIOLATION',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Category of an auction failure.
 * - validation: bad caller input, rejected before processing
 * - timeout: the round cap was hit
 * - internal: an engine invariant was observed broken (always a defect)
 */
export type AuctionFailureKind = 'validation' | 'timeout' | 'internal';

export type FailureContext = Record<string, string | number>;

/**
 * A single field-level problem with one bidder.
 */
export interface FieldViolation {
  bidderId: string;
  field: string;
  message: string;
  value?: string;
  /** 1-based position in the submitted list */
  position?: number;
}

export interface AuctionExceptionJson {
  kind: AuctionFailureKind;
  errorCode: ErrorCodeType;
  message: string;
  operation: string | null;
  context: FailureContext;
  violations: FieldViolation[];
  cause?: string;
}

const STATUS_BY_KIND: Record<AuctionFailureKind, number> = {
  validation: 400,
  timeout: 500,
  internal: 500,
};

/**
 * The one failure type raised by auction processing.
 *
 * The kind is the discriminant; context is a flat string-keyed map for
 * diagnostics (bidder ids, observed amounts, round numbers).
 */
export class AuctionException extends AppException {
  readonly kind: AuctionFailureKind;
  readonly context: FailureContext = {};
  readonly violations: FieldViolation[];
  readonly originalError?: Error;
  private currentOperation: string | null = null;

  constructor(
    kind: AuctionFailureKind,
    message: string,
    options: {
      errorCode?: ErrorCodeType;
      violations?: FieldViolation[];
      originalError?: Error;
    } = {}
  ) {
    super(message, STATUS_BY_KIND[kind], options.errorCode ?? defaultCodeFor(kind));
    this.kind = kind;
    this.violations = options.violations ?? [];
    this.originalError = options.originalError;
  }

  get operation(): string | null {
    return this.currentOperation;
  }

  withOperation(operation: string): this {
    this.currentOperation = operation;
    return this;
  }

  addContext(key: string, value: string | number): this {
    this.context[key] = value;
    return this;
  }

  withContext(context: FailureContext): this {
    Object.assign(this.context, context);
    return this;
  }

  hasViolations(): boolean {
    return this.violations.length > 0;
  }

  violationsByField(): Record<string, FieldViolation[]> {
    return groupViolations(this.violations, (violation) => violation.field);
  }

  violationsByBidder(): Record<string, FieldViolation[]> {
    return groupViolations(this.violations, (violation) => violation.bidderId);
  }

  /**
   * Full diagnostic line, e.g.
   * "timeout error: bidding exceeded maximum rounds; operation: processBids"
   */
  describe(): string {
    const parts = [`${this.kind} error: ${this.message}`];
    if (this.currentOperation) {
      parts.push(`operation: ${this.currentOperation}`);
    }
    if (this.violations.length > 0) {
      parts.push(`validation errors: ${this.violations.length}`);
    }
    if (this.originalError) {
      parts.push(`caused by: ${this.originalError.message}`);
    }
    return parts.join('; ');
  }

  toJSON(): AuctionExceptionJson {
    return {
      kind: this.kind,
      errorCode: this.errorCode,
      message: this.message,
      operation: this.currentOperation,
      context: { ...this.context },
      violations: this.violations.map((violation) => ({ ...violation })),
      ...(this.originalError ? { cause: this.originalError.message } : {}),
    };
  }
}

function defaultCodeFor(kind: AuctionFailureKind): ErrorCodeType {
  switch (kind) {
    case 'validation':
      return ErrorCode.VALIDATION_ERROR;
    case 'timeout':
      return ErrorCode.AUCTION_ROUND_LIMIT_EXCEEDED;
    case 'internal':
      return ErrorCode.INTERNAL_ERROR;
  }
}

function groupViolations(
  violations: FieldViolation[],
  keyOf: (violation: FieldViolation) => string
): Record<string, FieldViolation[]> {
  const grouped: Record<string, FieldViolation[]> = {};
  for (const violation of violations) {
    const key = keyOf(violation);
    (grouped[key] ??= []).push(violation);
  }
  return grouped;
}

// Domain-specific exception factory functions for common scenarios
export const AuctionErrors = {
  noBidders: () =>
    new AuctionException('validation', 'no bidders provided', {
      errorCode: ErrorCode.AUCTION_NO_BIDDERS,
    }).addContext('bidder_count', 0),
  invalidBidders: (violations: FieldViolation[], invalidCount: number, totalCount: number) =>
    new AuctionException(
      'validation',
      `validation failed for ${invalidCount} out of ${totalCount} bidders`,
      { errorCode: ErrorCode.AUCTION_INVALID_BIDDERS, violations }
    ),
  roundLimitExceeded: (maxRounds: number) =>
    new AuctionException('timeout', 'bidding process exceeded maximum rounds', {
      errorCode: ErrorCode.AUCTION_ROUND_LIMIT_EXCEEDED,
    }).addContext('max_rounds', maxRounds),
  negativeBid: (bidderId: string, currentBidCents: number) =>
    new AuctionException('internal', 'bidder has negative current bid', {
      errorCode: ErrorCode.AUCTION_INVARIANT_VIOLATION,
    }).withContext({ bidder_id: bidderId, current_bid_cents: currentBidCents }),
  incrementRejected: (bidderId: string, currentBidCents: number, maxBidCents: number) =>
    new AuctionException('internal', 'bidder increment failed despite canIncrement() returning true', {
      errorCode: ErrorCode.AUCTION_INVARIANT_VIOLATION,
    }).withContext({
      bidder_id: bidderId,
      current_bid_cents: currentBidCents,
      max_bid_cents: maxBidCents,
    }),
  winnerNotFound: (winnerId: string) =>
    new AuctionException('internal', 'winner not found among bidders', {
      errorCode: ErrorCode.AUCTION_INVARIANT_VIOLATION,
    }).addContext('winner_id', winnerId),
  negativeWinningBid: (winnerId: string, amountCents: number) =>
    new AuctionException('internal', 'calculated minimum winning bid is negative', {
      errorCode: ErrorCode.AUCTION_INVARIANT_VIOLATION,
    }).withContext({ winner_id: winnerId, calculated_bid_cents: amountCents }),
  unexpected: (kind: AuctionFailureKind, message: string, error: unknown) =>
    new AuctionException(kind, message, {
      originalError: error instanceof Error ? error : new Error(String(error)),
    }),
};
