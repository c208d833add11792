/**
 * Auction Price Resolution Domain Logic
 *
 * Pure functions for the proxy-bidding minimum winning price.
 * Pure computation, no I/O.
 */

export interface WinnerPriceSnapshot {
  bidderId: string;
  startingBidCents: number;
  maxBidCents: number;
  autoIncrementCents: number;
}

export interface CompetitorCeiling {
  bidderId: string;
  maxBidCents: number;
}

export interface MinimumBidInput {
  winner: WinnerPriceSnapshot;
  /** Every bidder other than the winner, in entry order */
  competitors: CompetitorCeiling[];
}

export interface MinimumBidResolution {
  amountCents: number;
  /** Competitor holding the highest ceiling, null when the winner bid alone */
  runnerUpId: string | null;
  runnerUpMaxBidCents: number | null;
}

/**
 * Resolve what the winner actually pays.
 *
 * Algorithm:
 * - No competitors: the winner pays their starting bid
 * - Otherwise: highest competitor maxBid + the winner's auto-increment
 * - Clamped to at most the winner's maxBid, then to at least the winner's startingBid
 *
 * Competitor ceilings are their maxBid, not the bid they actually reached.
 * On equal ceilings the first competitor in the list is reported as runner-up.
 *
 * @param input - Winner amounts and the other bidders' ceilings (all minor units)
 * @returns Amount to pay plus the runner-up used to price it
 */
export function resolveMinimumWinningBid(input: MinimumBidInput): MinimumBidResolution {
  const { winner, competitors } = input;

  let runnerUp: CompetitorCeiling | null = null;
  for (const competitor of competitors) {
    if (runnerUp === null || competitor.maxBidCents > runnerUp.maxBidCents) {
      runnerUp = competitor;
    }
  }

  if (runnerUp === null) {
    return {
      amountCents: winner.startingBidCents,
      runnerUpId: null,
      runnerUpMaxBidCents: null,
    };
  }

  let amountCents = runnerUp.maxBidCents + winner.autoIncrementCents;
  // Never more than the winner was willing to pay
  amountCents = Math.min(amountCents, winner.maxBidCents);
  // Never less than the winner opened with
  amountCents = Math.max(amountCents, winner.startingBidCents);

  return {
    amountCents,
    runnerUpId: runnerUp.bidderId,
    runnerUpMaxBidCents: runnerUp.maxBidCents,
  };
}
