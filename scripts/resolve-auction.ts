/**
 * Resolve an auction described in a JSON file and print the result as JSON.
 * Usage: npm run build && node dist/scripts/resolve-auction.js <auction.json>
 *
 * File format: { "bidders": [{ "id", "name", "startingBid", "maxBid", "autoIncrement", "entryTime"? }] }
 * Bidders without an entryTime enter in file order.
 */
import { readFile } from 'fs/promises';
import { logger } from '../src/config/logger.config';
import { AuctionService } from '../src/modules/auction/auction.service';
import { parseAuctionRequest } from '../src/modules/auction/auction.schemas';
import { AuctionException } from '../src/utils/exceptions';

async function main() {
  const filePath = process.argv[2];
  if (!filePath) {
    logger.error('Usage: resolve-auction <auction.json>');
    process.exitCode = 1;
    return;
  }

  const service = new AuctionService();

  try {
    const contents = await readFile(filePath, 'utf-8');
    const request = parseAuctionRequest(JSON.parse(contents));
    const bidders = service.createBidders(request.bidders);
    const result = service.determineWinner(bidders);

    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    if (error instanceof AuctionException) {
      logger.error(error.describe(), error.toJSON());
    } else {
      logger.error('Auction resolution failed', { error });
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error('Unexpected failure', { error });
  process.exitCode = 1;
});
