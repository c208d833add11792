import type { BidderParams } from '../domain/auction/bidder';
import type { AuctionResult } from '../domain/auction/auction-result';

/**
 * Options shared by bidding engine implementations
 */
export interface BiddingEngineOptions {
  /** Rounds allowed before the run fails with a timeout (default 1000) */
  maxRounds?: number;
}

/**
 * Resolves a complete, already-validated bidder set into a result.
 *
 * Implementations are synchronous and keep no state between calls.
 * Failures are thrown as AuctionException (kind 'timeout' or 'internal').
 */
export interface IBiddingEngine {
  processBids(bidders: readonly BidderParams[]): AuctionResult;
}
