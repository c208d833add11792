export { toMinorUnits, toDecimal, formatAmount } from './precision';

export {
  Bidder,
  type BidderParams,
  type BidderInput,
  type BidderSnapshot,
} from './bidder';

export {
  resolveMinimumWinningBid,
  type WinnerPriceSnapshot,
  type CompetitorCeiling,
  type MinimumBidInput,
  type MinimumBidResolution,
} from './pricing';

export {
  AuctionResult,
  type AuctionResultJson,
  type BidderSnapshotJson,
} from './auction-result';
