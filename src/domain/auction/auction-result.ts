/**
 * Auction Result Domain Entity
 *
 * Immutable snapshot of one engine run. Bidder amounts are re-derived from
 * minor units when the snapshot is taken.
 */

import type { Bidder, BidderSnapshot } from './bidder';
import { toDecimal } from './precision';

/**
 * JSON form of a result, with dates as ISO strings.
 */
export interface AuctionResultJson {
  winner: BidderSnapshotJson | null;
  winningBid: number;
  winningBidCents: number;
  totalBidders: number;
  biddingRounds: number;
  allBidders: BidderSnapshotJson[];
}

export type BidderSnapshotJson = Omit<BidderSnapshot, 'entryTime'> & { entryTime: string };

function snapshotToJson(snapshot: BidderSnapshot): BidderSnapshotJson {
  return { ...snapshot, entryTime: snapshot.entryTime.toISOString() };
}

export class AuctionResult {
  readonly winner: BidderSnapshot | null;
  readonly winningBid: number;
  readonly winningBidCents: number;
  readonly totalBidders: number;
  readonly biddingRounds: number;
  readonly allBidders: readonly BidderSnapshot[];

  private constructor(
    winner: BidderSnapshot | null,
    winningBidCents: number,
    totalBidders: number,
    biddingRounds: number,
    allBidders: readonly BidderSnapshot[]
  ) {
    this.winner = winner;
    this.winningBidCents = winningBidCents;
    this.winningBid = toDecimal(winningBidCents);
    this.totalBidders = totalBidders;
    this.biddingRounds = biddingRounds;
    this.allBidders = Object.freeze([...allBidders]);
    Object.freeze(this);
  }

  /**
   * Build a result from the engine's final working state.
   *
   * @param winner - Winning bidder, or null when nobody bid
   * @param winningBidCents - Amount the winner pays, in minor units
   * @param totalBidders - Number of participants
   * @param biddingRounds - Increment rounds executed
   * @param bidders - Final working bidders, in the order they should be reported
   */
  static fromCents(
    winner: Bidder | null,
    winningBidCents: number,
    totalBidders: number,
    biddingRounds: number,
    bidders: readonly Bidder[]
  ): AuctionResult {
    const snapshots = bidders.map((bidder) => bidder.snapshot());
    let winnerSnapshot: BidderSnapshot | null = null;
    if (winner) {
      const winnerIndex = bidders.indexOf(winner);
      winnerSnapshot = winnerIndex >= 0 ? snapshots[winnerIndex] : winner.snapshot();
    }

    return new AuctionResult(winnerSnapshot, winningBidCents, totalBidders, biddingRounds, snapshots);
  }

  /**
   * Result for an auction nobody entered. Not an error.
   */
  static empty(): AuctionResult {
    return new AuctionResult(null, 0, 0, 0, []);
  }

  hasWinner(): boolean {
    return this.winner !== null;
  }

  toJSON(): AuctionResultJson {
    return {
      winner: this.winner ? snapshotToJson(this.winner) : null,
      winningBid: this.winningBid,
      winningBidCents: this.winningBidCents,
      totalBidders: this.totalBidders,
      biddingRounds: this.biddingRounds,
      allBidders: this.allBidders.map(snapshotToJson),
    };
  }
}
