import { Bidder, type BidderParams } from '../domain/auction/bidder';
import { AuctionResult } from '../domain/auction/auction-result';
import { resolveMinimumWinningBid } from '../domain/auction/pricing';
import { AuctionErrors, AuctionException, type FailureContext } from '../utils/exceptions';
import type { BiddingEngineOptions, IBiddingEngine } from './bidding-engine.interface';

export const DEFAULT_MAX_ROUNDS = 1000;

/**
 * Round-based proxy bidding engine.
 *
 * Each round, every bidder strictly below the round-start highest bid is raised
 * by one auto-increment (clamped at their maximum). Rounds repeat until nobody
 * moves. The highest current bid wins, earliest entry on ties, and the winner
 * pays the best competitor ceiling plus one of their own increments, bounded by
 * their starting and maximum bids.
 *
 * The engine works on its own copies of the bidders; caller objects are never
 * mutated. All amounts are compared in integer minor units.
 */
export class ProxyBiddingEngine implements IBiddingEngine {
  readonly maxRounds: number;

  constructor(options: BiddingEngineOptions = {}) {
    const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds <= 0) {
      throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`);
    }
    this.maxRounds = maxRounds;
  }

  /**
   * Run the auction to completion.
   *
   * @returns Empty result (no winner) for an empty list
   * @throws AuctionException - 'timeout' when maxRounds is reached, 'internal' on a broken invariant
   */
  processBids(bidders: readonly BidderParams[]): AuctionResult {
    if (bidders.length === 0) {
      return AuctionResult.empty();
    }

    // Fresh copies re-derived from the decimal parameters, entry time kept
    const working = bidders.map((bidder) => new Bidder(pickParams(bidder)));

    // Array.prototype.sort is stable: equal entry times keep input order
    working.sort((a, b) => a.entryTime.getTime() - b.entryTime.getTime());

    let rounds = 0;
    while (rounds < this.maxRounds) {
      let incremented: boolean;
      try {
        incremented = this.incrementBids(working);
      } catch (error) {
        throw tagFailure(error, 'processBids.incrementBids', {
          round: rounds,
          max_rounds: this.maxRounds,
        });
      }

      if (!incremented) {
        break;
      }
      rounds++;
    }

    if (rounds >= this.maxRounds) {
      throw AuctionErrors.roundLimitExceeded(this.maxRounds)
        .withOperation('processBids.timeoutCheck')
        .withContext({ bidder_count: bidders.length, final_round: rounds });
    }

    let winner: Bidder | null;
    try {
      winner = this.findWinner(working);
    } catch (error) {
      throw tagFailure(error, 'processBids.findWinner', { rounds_completed: rounds });
    }

    if (!winner) {
      return AuctionResult.fromCents(null, 0, bidders.length, rounds, working);
    }

    let winningBidCents: number;
    try {
      winningBidCents = this.calculateMinimumWinningBidCents(working, winner);
    } catch (error) {
      throw tagFailure(error, 'processBids.calculateMinimumWinningBid', {
        winner_id: winner.id,
        winner_current_bid_cents: winner.currentBidCents,
      });
    }

    return AuctionResult.fromCents(winner, winningBidCents, bidders.length, rounds, working);
  }

  /**
   * Raise every losing bidder that still can by one increment.
   *
   * "Losing" is measured against the highest bid at the start of the round, not
   * a running maximum: two bidders that become tied during this pass are not
   * compared again until the next one.
   *
   * @returns Whether any bidder moved
   */
  incrementBids(bidders: Bidder[]): boolean {
    if (bidders.length <= 1) {
      return false;
    }

    const highestBidCents = this.findHighestBidCents(bidders);
    let anyIncremented = false;

    for (const bidder of bidders) {
      if (bidder.currentBidCents >= highestBidCents || !bidder.canIncrement()) {
        continue;
      }

      if (!bidder.increment()) {
        throw AuctionErrors.incrementRejected(bidder.id, bidder.currentBidCents, bidder.maxBidCents)
          .withOperation('incrementBids');
      }
      anyIncremented = true;
    }

    return anyIncremented;
  }

  /**
   * Highest current bid across all bidders, in minor units.
   */
  findHighestBidCents(bidders: readonly Bidder[]): number {
    let highestCents = 0;
    bidders.forEach((bidder, index) => {
      assertNonNegativeBid(bidder, 'findHighestBidCents');
      if (index === 0 || bidder.currentBidCents > highestCents) {
        highestCents = bidder.currentBidCents;
      }
    });
    return highestCents;
  }

  /**
   * Bidder with the strictly highest current bid; on equal bids the earlier
   * entry wins. Expects the list sorted by entry time, as processBids leaves it.
   */
  findWinner(bidders: readonly Bidder[]): Bidder | null {
    let winner: Bidder | null = null;

    for (const current of bidders) {
      assertNonNegativeBid(current, 'findWinner');

      if (!winner || current.currentBidCents > winner.currentBidCents) {
        winner = current;
      } else if (
        current.currentBidCents === winner.currentBidCents &&
        current.entryTime.getTime() < winner.entryTime.getTime()
      ) {
        winner = current;
      }
    }

    return winner;
  }

  /**
   * Lowest amount the winner must pay, in minor units.
   */
  calculateMinimumWinningBidCents(bidders: readonly Bidder[], winner: Bidder): number {
    if (!bidders.includes(winner)) {
      throw AuctionErrors.winnerNotFound(winner.id).withOperation('calculateMinimumWinningBidCents');
    }

    const resolution = resolveMinimumWinningBid({
      winner: {
        bidderId: winner.id,
        startingBidCents: winner.startingBidCents,
        maxBidCents: winner.maxBidCents,
        autoIncrementCents: winner.autoIncrementCents,
      },
      competitors: bidders
        .filter((bidder) => bidder !== winner)
        .map((bidder) => ({ bidderId: bidder.id, maxBidCents: bidder.maxBidCents })),
    });

    if (resolution.amountCents < 0) {
      const error = AuctionErrors.negativeWinningBid(winner.id, resolution.amountCents).withOperation(
        'calculateMinimumWinningBidCents'
      );
      if (resolution.runnerUpId !== null && resolution.runnerUpMaxBidCents !== null) {
        error.withContext({
          second_highest_bidder: resolution.runnerUpId,
          second_highest_cents: resolution.runnerUpMaxBidCents,
        });
      }
      throw error;
    }

    return resolution.amountCents;
  }
}

function pickParams(bidder: BidderParams): BidderParams {
  return {
    id: bidder.id,
    name: bidder.name,
    startingBid: bidder.startingBid,
    maxBid: bidder.maxBid,
    autoIncrement: bidder.autoIncrement,
    entryTime: bidder.entryTime,
  };
}

function assertNonNegativeBid(bidder: Bidder, operation: string): void {
  if (bidder.currentBidCents < 0) {
    throw AuctionErrors.negativeBid(bidder.id, bidder.currentBidCents).withOperation(operation);
  }
}

/**
 * Re-tag an engine failure with the processBids step it surfaced from.
 * The inner operation is kept in context as "step".
 */
function tagFailure(error: unknown, operation: string, context: FailureContext): unknown {
  if (error instanceof AuctionException) {
    if (error.operation) {
      error.addContext('step', error.operation);
    }
    return error.withOperation(operation).withContext(context);
  }
  return error;
}
