import { Bidder, type BidderInput } from '../../domain/auction/bidder';

function makeBidder(overrides: Partial<BidderInput> = {}): Bidder {
  return new Bidder({
    id: 'b1',
    name: 'Test Bidder',
    startingBid: 10,
    maxBid: 20,
    autoIncrement: 5,
    ...overrides,
  });
}

describe('Bidder', () => {
  describe('construction', () => {
    it('derives minor units and starts at the starting bid', () => {
      const bidder = makeBidder({ startingBid: 10.5, maxBid: 25.75, autoIncrement: 2.25 });

      expect(bidder.startingBidCents).toBe(1050);
      expect(bidder.maxBidCents).toBe(2575);
      expect(bidder.autoIncrementCents).toBe(225);
      expect(bidder.currentBidCents).toBe(1050);
      expect(bidder.currentBid).toBe(10.5);
      expect(bidder.isActive).toBe(true);
    });

    it('uses the supplied entry time, falling back to now', () => {
      const entryTime = new Date('2026-01-05T10:00:00.000Z');
      const now = new Date('2026-02-01T00:00:00.000Z');

      expect(makeBidder({ entryTime }).entryTime).toBe(entryTime);
      expect(new Bidder({ id: 'x', name: 'X', startingBid: 1, maxBid: 2, autoIncrement: 1 }, now).entryTime).toBe(now);
    });
  });

  describe('canIncrement', () => {
    it('is true while a full increment fits under the maximum', () => {
      expect(makeBidder().canIncrement()).toBe(true);
    });

    it('is true when the increment lands exactly on the maximum', () => {
      expect(makeBidder({ startingBid: 15 }).canIncrement()).toBe(true);
    });

    it('is false when the increment would overshoot the maximum', () => {
      expect(makeBidder({ startingBid: 18 }).canIncrement()).toBe(false);
    });

    it('is false once the bidder is inactive', () => {
      const bidder = makeBidder({ startingBid: 15 });
      bidder.increment();

      expect(bidder.isActive).toBe(false);
      expect(bidder.canIncrement()).toBe(false);
    });
  });

  describe('increment', () => {
    it('adds one auto-increment', () => {
      const bidder = makeBidder();

      expect(bidder.increment()).toBe(true);
      expect(bidder.currentBidCents).toBe(1500);
      expect(bidder.isActive).toBe(true);
    });

    it('deactivates on reaching the maximum', () => {
      const bidder = makeBidder({ startingBid: 15 });

      expect(bidder.increment()).toBe(true);
      expect(bidder.currentBidCents).toBe(2000);
      expect(bidder.isActive).toBe(false);
    });

    it('leaves state untouched when it cannot increment', () => {
      const bidder = makeBidder({ startingBid: 18 });

      expect(bidder.increment()).toBe(false);
      expect(bidder.currentBidCents).toBe(1800);
      expect(bidder.isActive).toBe(true);
    });

    it('walks up to the maximum and stops', () => {
      const bidder = makeBidder({ startingBid: 10, maxBid: 25, autoIncrement: 5 });
      const seen: number[] = [];
      while (bidder.increment()) {
        seen.push(bidder.currentBidCents);
      }

      expect(seen).toEqual([1500, 2000, 2500]);
      expect(bidder.isActive).toBe(false);
      expect(bidder.increment()).toBe(false);
      expect(bidder.currentBidCents).toBe(2500);
    });

    it('keeps fractional increments exact', () => {
      const bidder = makeBidder({ startingBid: 10.01, maxBid: 20.99, autoIncrement: 0.33 });
      let steps = 0;
      while (bidder.increment()) {
        steps++;
      }

      // 1001 + 33 * 33 = 2090; one more step would need 2123 > 2099
      expect(steps).toBe(33);
      expect(bidder.currentBidCents).toBe(2090);
      expect(bidder.currentBid).toBe(20.9);
      expect(bidder.isActive).toBe(true);
    });
  });

  describe('toParams and snapshot', () => {
    it('returns decimal parameters for building a copy', () => {
      const entryTime = new Date('2026-01-05T10:00:00.000Z');
      const bidder = makeBidder({ entryTime });
      bidder.increment();

      expect(bidder.toParams()).toEqual({
        id: 'b1',
        name: 'Test Bidder',
        startingBid: 10,
        maxBid: 20,
        autoIncrement: 5,
        entryTime,
      });
    });

    it('captures current state in a frozen snapshot', () => {
      const bidder = makeBidder({ entryTime: new Date('2026-01-05T10:00:00.000Z') });
      bidder.increment();
      const snapshot = bidder.snapshot();
      bidder.increment();

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(snapshot.currentBidCents).toBe(1500);
      expect(snapshot.currentBid).toBe(15);
      expect(snapshot.isActive).toBe(true);
      expect(snapshot.entryTime.toISOString()).toBe('2026-01-05T10:00:00.000Z');
    });
  });
});
