/**
 * Bidder Domain Entity
 *
 * A participant in a proxy-bidding auction. Amounts come in as decimal currency
 * units and are held internally as integer minor units; the decimal views are
 * derived on read.
 * Pure computation, no I/O.
 */

import { toDecimal, toMinorUnits } from './precision';

/**
 * Bidder record as supplied by callers. Amounts are decimal currency units.
 */
export interface BidderParams {
  id: string;
  name: string;
  startingBid: number;
  maxBid: number;
  autoIncrement: number;
  /** Used only to break ties between equal bids (earlier wins) */
  entryTime: Date;
}

/**
 * Bidder record where the entry time may be assigned at construction.
 */
export type BidderInput = Omit<BidderParams, 'entryTime'> & { entryTime?: Date };

/**
 * Frozen view of a bidder, carrying both decimal and minor-unit amounts.
 */
export interface BidderSnapshot {
  readonly id: string;
  readonly name: string;
  readonly startingBid: number;
  readonly maxBid: number;
  readonly autoIncrement: number;
  readonly currentBid: number;
  readonly startingBidCents: number;
  readonly maxBidCents: number;
  readonly autoIncrementCents: number;
  readonly currentBidCents: number;
  readonly isActive: boolean;
  readonly entryTime: Date;
}

export class Bidder implements BidderParams {
  readonly id: string;
  readonly name: string;
  readonly entryTime: Date;
  readonly startingBidCents: number;
  readonly maxBidCents: number;
  readonly autoIncrementCents: number;

  private currentCents: number;
  private active = true;

  /**
   * @param now - Entry time used when the input does not carry one
   */
  constructor(input: BidderInput, now: Date = new Date()) {
    this.id = input.id;
    this.name = input.name;
    this.entryTime = input.entryTime ?? now;
    this.startingBidCents = toMinorUnits(input.startingBid);
    this.maxBidCents = toMinorUnits(input.maxBid);
    this.autoIncrementCents = toMinorUnits(input.autoIncrement);
    this.currentCents = this.startingBidCents;
  }

  get currentBidCents(): number {
    return this.currentCents;
  }

  get isActive(): boolean {
    return this.active;
  }

  get startingBid(): number {
    return toDecimal(this.startingBidCents);
  }

  get maxBid(): number {
    return toDecimal(this.maxBidCents);
  }

  get autoIncrement(): number {
    return toDecimal(this.autoIncrementCents);
  }

  get currentBid(): number {
    return toDecimal(this.currentCents);
  }

  /**
   * Whether one more full increment still fits under the maximum bid.
   */
  canIncrement(): boolean {
    return this.active && this.currentCents + this.autoIncrementCents <= this.maxBidCents;
  }

  /**
   * Raise the current bid by one increment.
   *
   * Reaching (or passing) the maximum clamps the bid to exactly maxBid and
   * deactivates the bidder, so the last step may be smaller than a full increment.
   *
   * @returns false, with no state change, when canIncrement() is false
   */
  increment(): boolean {
    if (!this.canIncrement()) {
      return false;
    }

    this.currentCents += this.autoIncrementCents;
    if (this.currentCents >= this.maxBidCents) {
      this.currentCents = this.maxBidCents;
      this.active = false;
    }
    return true;
  }

  /**
   * Decimal parameter record, suitable for building an independent copy.
   */
  toParams(): BidderParams {
    return {
      id: this.id,
      name: this.name,
      startingBid: this.startingBid,
      maxBid: this.maxBid,
      autoIncrement: this.autoIncrement,
      entryTime: this.entryTime,
    };
  }

  snapshot(): BidderSnapshot {
    return Object.freeze({
      id: this.id,
      name: this.name,
      startingBid: toDecimal(this.startingBidCents),
      maxBid: toDecimal(this.maxBidCents),
      autoIncrement: toDecimal(this.autoIncrementCents),
      currentBid: toDecimal(this.currentCents),
      startingBidCents: this.startingBidCents,
      maxBidCents: this.maxBidCents,
      autoIncrementCents: this.autoIncrementCents,
      currentBidCents: this.currentCents,
      isActive: this.active,
      entryTime: new Date(this.entryTime.getTime()),
    });
  }
}
