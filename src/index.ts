export * from './domain';

export { ProxyBiddingEngine, DEFAULT_MAX_ROUNDS } from './engines/proxy-bidding.engine';
export type { IBiddingEngine, BiddingEngineOptions } from './engines/bidding-engine.interface';

export * from './modules/auction';

export {
  AppException,
  ValidationException,
  AuctionException,
  AuctionErrors,
  ErrorCode,
  type ErrorCodeType,
  type AuctionFailureKind,
  type FailureContext,
  type FieldViolation,
  type AuctionExceptionJson,
} from './utils/exceptions';
