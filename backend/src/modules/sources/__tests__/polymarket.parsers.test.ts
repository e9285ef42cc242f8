import { describe, it, expect } from 'vitest';
import { parseMarkets, selectBtcMarkets, toMarketContext, type GammaMarket } from '../polymarket/polymarket.parsers.js';

const NOW = Date.parse('2024-11-14T00:00:00Z');

const market = (question: string, endDate: string | null, extra: Partial<GammaMarket> = {}): GammaMarket => ({
  question,
  endDate,
  slug: question.toLowerCase().replace(/\W+/g, '-'),
  outcomes: ['Yes', 'No'],
  outcomePrices: ['0.5', '0.5'],
  clobTokenIds: ['1', '2'],
  ...extra,
});

describe('selectBtcMarkets', () => {
  it('keeps open BTC markets with up-or-down questions first', () => {
    const selected = selectBtcMarkets(
      [
        market('Will ETH reach $5k?', '2024-12-01T00:00:00Z'),
        market('Bitcoin above $100k on Friday?', '2024-11-15T00:00:00Z'),
        market('BTC Up or Down yesterday', '2024-11-13T00:00:00Z'),
        market('Bitcoin Up or Down - Nov 14', '2024-11-14T20:00:00Z'),
      ],
      NOW
    );
    expect(selected.map((m) => m.question)).toEqual(['Bitcoin Up or Down - Nov 14', 'Bitcoin above $100k on Friday?']);
  });

  it('keeps markets without an end date and drops unparseable ones', () => {
    const selected = selectBtcMarkets(
      [market('Bitcoin open-ended', null), market('Bitcoin garbled', 'soon')],
      NOW
    );
    expect(selected.map((m) => m.question)).toEqual(['Bitcoin open-ended']);
  });
});

describe('toMarketContext', () => {
  it('maps outcomes by label, falling back to positional names', () => {
    const context = toMarketContext(
      market('Bitcoin Up or Down', null, {
        outcomes: ['Up'],
        outcomePrices: ['0.61', 'x'],
        clobTokenIds: ['111', '222'],
      })
    );
    expect(context.outcomes).toEqual({
      Up: { tokenId: '111', price: 0.61 },
      'Outcome 1': { tokenId: '222', price: null },
    });
    expect(context.endDate).toBeNull();
  });
});

describe('parseMarkets', () => {
  const raw = {
    question: 'Bitcoin Up or Down - Nov 14',
    endDate: '2024-11-14T20:00:00Z',
    slug: 'bitcoin-up-or-down-nov-14',
    outcomes: '["Up", "Down"]',
    outcomePrices: '["0.52", "0.48"]',
    clobTokenIds: '["111", "222"]',
  };

  it('decodes JSON-encoded outcome arrays', () => {
    expect(parseMarkets([raw], NOW)).toEqual({
      question: 'Bitcoin Up or Down - Nov 14',
      endDate: '2024-11-14T20:00:00Z',
      slug: 'bitcoin-up-or-down-nov-14',
      outcomes: {
        Up: { tokenId: '111', price: 0.52 },
        Down: { tokenId: '222', price: 0.48 },
      },
    });
  });

  it('accepts a wrapped list', () => {
    expect(parseMarkets({ data: [raw] }, NOW).slug).toBe('bitcoin-up-or-down-nov-14');
  });

  it('fails UPSTREAM when no BTC market is open', () => {
    expect(() => parseMarkets([{ question: 'Will ETH flip BTC?', endDate: '2020-01-01T00:00:00Z' }], NOW)).toThrow(
      'No active BTC market found'
    );
  });

  it('fails MALFORMED on an undecodable outcome list', () => {
    expect(() => parseMarkets([{ ...raw, outcomes: '[broken' }], NOW)).toThrow(/^Unexpected polymarket payload/);
  });
});
