import type { BidderParams } from '../../domain/auction/bidder';
import { toMinorUnits } from '../../domain/auction/precision';
import { AuctionErrors, AuctionException, type FieldViolation } from '../../utils/exceptions';

/**
 * Rejects structurally invalid bidders before they reach the engine.
 */
export interface BidValidator {
  validateBidder(bidder: BidderParams): void;
  validateBidders(bidders: readonly BidderParams[]): void;
}

const AMOUNT_FIELDS = [
  ['startingBid', 'starting bid'],
  ['maxBid', 'maximum bid'],
  ['autoIncrement', 'auto-increment amount'],
] as const;

const formatValue = (amount: number): string =>
  Number.isFinite(amount) ? amount.toFixed(2) : String(amount);

/**
 * Collect every field-level problem with one bidder.
 */
export function collectBidderViolations(bidder: BidderParams): FieldViolation[] {
  const violations: FieldViolation[] = [];
  const add = (field: string, message: string, value: string) =>
    violations.push({ bidderId: bidder.id, field, message, value });

  if (bidder.id.trim() === '') {
    add('id', 'bidder ID is required', bidder.id);
  }
  if (bidder.name.trim() === '') {
    add('name', 'bidder name is required', bidder.name);
  }

  let amountsFinite = true;
  for (const [field, label] of AMOUNT_FIELDS) {
    if (!Number.isFinite(bidder[field])) {
      add(field, `${label} must be a finite number`, formatValue(bidder[field]));
      amountsFinite = false;
    }
  }
  if (!amountsFinite) {
    return violations;
  }

  if (bidder.startingBid < 0) {
    add('startingBid', 'starting bid cannot be negative', formatValue(bidder.startingBid));
  }
  if (bidder.maxBid < 0) {
    add('maxBid', 'maximum bid cannot be negative', formatValue(bidder.maxBid));
  }
  if (bidder.autoIncrement <= 0) {
    add('autoIncrement', 'auto-increment amount must be greater than zero', formatValue(bidder.autoIncrement));
  } else if (toMinorUnits(bidder.autoIncrement) <= 0) {
    add('autoIncrement', 'auto-increment amount must be at least one minor unit', String(bidder.autoIncrement));
  }
  if (bidder.startingBid > bidder.maxBid) {
    add(
      'startingBid',
      'starting bid cannot be greater than maximum bid',
      `starting: ${formatValue(bidder.startingBid)}, max: ${formatValue(bidder.maxBid)}`
    );
  }

  return violations;
}

/**
 * Standard auction input rules:
 * - id and name present (non-blank)
 * - amounts finite, starting and maximum bids non-negative
 * - auto-increment of at least one minor unit
 * - starting bid not above maximum bid
 * - ids unique across the auction, at least one bidder
 */
export class DefaultBidValidator implements BidValidator {
  /**
   * @throws AuctionException (kind 'validation') listing every violation found
   */
  validateBidder(bidder: BidderParams): void {
    const violations = collectBidderViolations(bidder);
    if (violations.length > 0) {
      throw new AuctionException('validation', `validation failed for bidder ${bidder.id}`, { violations })
        .withOperation('validateBidder')
        .withContext({ bidder_id: bidder.id, bidder_name: bidder.name });
    }
  }

  /**
   * Validate a whole auction, reporting problems across all bidders at once.
   * A duplicate id is reported and that entry is not checked further.
   *
   * @throws AuctionException (kind 'validation')
   */
  validateBidders(bidders: readonly BidderParams[]): void {
    if (bidders.length === 0) {
      throw AuctionErrors.noBidders().withOperation('validateBidders');
    }

    const allViolations: FieldViolation[] = [];
    const seenIds = new Set<string>();
    let validBidderCount = 0;

    bidders.forEach((bidder, index) => {
      const position = index + 1;

      if (seenIds.has(bidder.id)) {
        allViolations.push({
          bidderId: bidder.id,
          field: 'id',
          message: 'duplicate bidder ID',
          value: bidder.id,
          position,
        });
        return;
      }
      seenIds.add(bidder.id);

      const violations = collectBidderViolations(bidder);
      if (violations.length === 0) {
        validBidderCount++;
        return;
      }
      for (const violation of violations) {
        allViolations.push({ ...violation, position });
      }
    });

    if (allViolations.length > 0) {
      const invalidBidderCount = new Set(allViolations.map((violation) => violation.bidderId)).size;

      throw AuctionErrors.invalidBidders(allViolations, invalidBidderCount, bidders.length)
        .withOperation('validateBidders')
        .withContext({
          total_bidders: bidders.length,
          valid_bidders: validBidderCount,
          invalid_bidders: invalidBidderCount,
          total_validation_errors: allViolations.length,
        });
    }
  }
}
