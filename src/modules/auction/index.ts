export { AuctionService, type AuctionServiceDeps } from './auction.service';
export { DefaultBidValidator, collectBidderViolations, type BidValidator } from './bid-validator';
export {
  bidderInputSchema,
  auctionRequestSchema,
  parseAuctionRequest,
  type BidderInputDto,
  type AuctionRequestDto,
} from './auction.schemas';
