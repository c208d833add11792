/**
 * Auction Service
 *
 * Orchestrates one auction run: validate the bidder set, then hand it to the
 * bidding engine. Failures from either step are tagged with the step that
 * raised them and rethrown; nothing is retried.
 */

import { Bidder, type BidderInput, type BidderParams } from '../../domain/auction/bidder';
import type { AuctionResult } from '../../domain/auction/auction-result';
import { formatAmount } from '../../domain/auction/precision';
import type { IBiddingEngine } from '../../engines/bidding-engine.interface';
import { ProxyBiddingEngine } from '../../engines/proxy-bidding.engine';
import { env } from '../../config/env.config';
import { logger } from '../../config/logger.config';
import { AuctionErrors, AuctionException, type AuctionFailureKind } from '../../utils/exceptions';
import { DefaultBidValidator, type BidValidator } from './bid-validator';

export interface AuctionServiceDeps {
  validator?: BidValidator;
  engine?: IBiddingEngine;
}

export class AuctionService {
  private readonly validator: BidValidator;
  private readonly engine: IBiddingEngine;

  constructor(deps: AuctionServiceDeps = {}) {
    this.validator = deps.validator ?? new DefaultBidValidator();
    this.engine = deps.engine ?? new ProxyBiddingEngine({ maxRounds: env.AUCTION_MAX_ROUNDS });
  }

  /**
   * Validate the bidders and resolve the auction.
   *
   * @throws AuctionException - 'validation' for rejected input, 'timeout' or 'internal' from the engine
   */
  determineWinner(bidders: readonly BidderParams[]): AuctionResult {
    try {
      this.validator.validateBidders(bidders);
    } catch (error) {
      const failure = toAuctionFailure(error, 'validation', 'unexpected validation error');
      failure.withOperation('determineWinner.validation').addContext('service', 'AuctionService');
      logger.warn('Auction input rejected', failure.toJSON());
      throw failure;
    }

    let result: AuctionResult;
    try {
      result = this.engine.processBids(bidders);
    } catch (error) {
      const failure = toAuctionFailure(error, 'internal', 'unexpected processing error');
      if (failure.operation) {
        failure.addContext('step', failure.operation);
      }
      failure.withOperation('determineWinner.processing').addContext('service', 'AuctionService');
      logger.error('Auction processing failed', failure.toJSON());
      throw failure;
    }

    logger.info('Auction resolved', {
      winnerId: result.winner?.id ?? null,
      winningBid: formatAmount(result.winningBidCents),
      biddingRounds: result.biddingRounds,
      totalBidders: result.totalBidders,
    });

    return result;
  }

  /**
   * Build bidders from plain inputs. Inputs without an entry time get
   * now + index ms, so submission order becomes entry order.
   */
  createBidders(inputs: readonly BidderInput[], now: Date = new Date()): Bidder[] {
    return inputs.map(
      (input, index) => new Bidder(input, new Date(now.getTime() + index))
    );
  }
}

function toAuctionFailure(
  error: unknown,
  fallbackKind: AuctionFailureKind,
  fallbackMessage: string
): AuctionException {
  if (error instanceof AuctionException) {
    return error;
  }
  return AuctionErrors.unexpected(fallbackKind, fallbackMessage, error);
}
