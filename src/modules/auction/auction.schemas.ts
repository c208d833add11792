import { z } from 'zod';
import { AuctionException, type FieldViolation } from '../../utils/exceptions';

/** Zod schema for a single bidder record read from untyped input (JSON files) */
export const bidderInputSchema = z.object({
  id: z.string().trim(),
  name: z.string().trim(),
  startingBid: z.number({ invalid_type_error: 'Starting bid must be a number' }),
  maxBid: z.number({ invalid_type_error: 'Maximum bid must be a number' }),
  autoIncrement: z.number({ invalid_type_error: 'Auto-increment must be a number' }),
  /** ISO string or epoch milliseconds; omitted means list order decides ties */
  entryTime: z.union([z.string(), z.number()]).pipe(z.coerce.date()).optional(),
});

export const auctionRequestSchema = z.object({
  bidders: z.array(bidderInputSchema),
});

export type BidderInputDto = z.infer<typeof bidderInputSchema>;
export type AuctionRequestDto = z.infer<typeof auctionRequestSchema>;

/**
 * Parse an untyped auction request (e.g. a JSON file's contents).
 *
 * @throws AuctionException (kind 'validation') carrying one violation per zod issue
 */
export function parseAuctionRequest(raw: unknown): AuctionRequestDto {
  const parsed = auctionRequestSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const violations: FieldViolation[] = parsed.error.issues.map((issue) => ({
    bidderId: bidderIdAt(raw, issue.path),
    field: issue.path.map(String).join('.') || 'request',
    message: issue.message,
  }));
  const firstIssue = parsed.error.issues[0];

  throw new AuctionException('validation', firstIssue ? firstIssue.message : 'Validation failed', {
    violations,
  }).withOperation('parseAuctionRequest');
}

function bidderIdAt(raw: unknown, path: (string | number)[]): string {
  const [root, index] = path;
  if (root !== 'bidders' || typeof index !== 'number') {
    return '';
  }
  const bidders = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'bidders') : undefined;
  const entry: unknown = Array.isArray(bidders) ? bidders[index] : undefined;
  const id = typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'id') : undefined;
  return typeof id === 'string' ? id : '';
}
