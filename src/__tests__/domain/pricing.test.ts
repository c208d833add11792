import { resolveMinimumWinningBid, type WinnerPriceSnapshot } from '../../domain/auction/pricing';

function winner(overrides: Partial<WinnerPriceSnapshot> = {}): WinnerPriceSnapshot {
  return {
    bidderId: 'w',
    startingBidCents: 10000,
    maxBidCents: 30000,
    autoIncrementCents: 2500,
    ...overrides,
  };
}

describe('resolveMinimumWinningBid', () => {
  it('charges the starting bid when nobody else bid', () => {
    expect(resolveMinimumWinningBid({ winner: winner(), competitors: [] })).toEqual({
      amountCents: 10000,
      runnerUpId: null,
      runnerUpMaxBidCents: null,
    });
  });

  it('charges the best competitor ceiling plus one increment', () => {
    const result = resolveMinimumWinningBid({
      winner: winner(),
      competitors: [
        { bidderId: 'a', maxBidCents: 18000 },
        { bidderId: 'b', maxBidCents: 25000 },
      ],
    });

    expect(result).toEqual({ amountCents: 27500, runnerUpId: 'b', runnerUpMaxBidCents: 25000 });
  });

  it('never charges more than the winner maximum', () => {
    const result = resolveMinimumWinningBid({
      winner: winner(),
      competitors: [{ bidderId: 'a', maxBidCents: 29000 }],
    });

    expect(result.amountCents).toBe(30000);
  });

  it('never charges less than the winner starting bid', () => {
    const result = resolveMinimumWinningBid({
      winner: winner({ startingBidCents: 12000 }),
      competitors: [{ bidderId: 'a', maxBidCents: 5000 }],
    });

    // 5000 + 2500 = 7500, raised to the 12000 opening bid
    expect(result.amountCents).toBe(12000);
  });

  it('reports the first competitor among equal ceilings', () => {
    const result = resolveMinimumWinningBid({
      winner: winner(),
      competitors: [
        { bidderId: 'early', maxBidCents: 20000 },
        { bidderId: 'late', maxBidCents: 20000 },
      ],
    });

    expect(result.runnerUpId).toBe('early');
    expect(result.amountCents).toBe(22500);
  });

  it('prices against a zero ceiling like any other competitor', () => {
    const result = resolveMinimumWinningBid({
      winner: winner({ startingBidCents: 0 }),
      competitors: [{ bidderId: 'a', maxBidCents: 0 }],
    });

    expect(result).toEqual({ amountCents: 2500, runnerUpId: 'a', runnerUpMaxBidCents: 0 });
  });
});
