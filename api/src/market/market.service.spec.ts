import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { MarketService } from './market.service';
import { IssClient } from './iss.client';
import {
  AllFetchesFailedError,
  DecodeError,
  EmptyTableError,
  InsufficientDataError,
  NoPriceAvailableError,
  SystemicFetchError,
  TransportError,
  UnsupportedRangeError,
  UnsupportedSymbolError,
} from './market.errors';
import configuration from '../config/configuration';

/* ISS-shaped quote document with one TQBR row per table */
function quoteDoc(code: string, last: number | null, prev: number) {
  return {
    securities: {
      columns: ['SECID', 'BOARDID', 'SHORTNAME', 'SECNAME', 'PREVPRICE', 'CURRENCYID'],
      data: [[code, 'TQBR', code, `${code} name`, prev, 'SUR']],
    },
    marketdata: {
      columns: ['SECID', 'BOARDID', 'LAST', 'LCLOSEPRICE', 'VOLTODAY'],
      data: [[code, 'TQBR', last, null, 1000]],
    },
  };
}

function candleDoc(rows: Array<[number | null, number, number, number, string]>) {
  return {
    candles: {
      columns: ['open', 'close', 'high', 'low', 'value', 'volume', 'begin', 'end'],
      data: rows.map(([o, c, h, l, begin]) => [o, c, h, l, 0, 10, begin, begin]),
    },
  };
}

const refused = () =>
  new TransportError('ISS request failed for X: connect ECONNREFUSED', true, {
    code: 'ECONNREFUSED',
  });

describe('MarketService', () => {
  let service: MarketService;
  const iss = {
    getRawTable: jest.fn<Promise<unknown>, [string]>(),
    getRawCandleTable: jest.fn<Promise<unknown>, [string, string, number, string?]>(),
  };

  beforeEach(async () => {
    iss.getRawTable.mockReset();
    iss.getRawCandleTable.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        MarketService,
        { provide: IssClient, useValue: iss },
        { provide: ConfigService, useValue: new ConfigService(configuration()) },
      ],
    }).compile();
    service = moduleRef.get(MarketService);
  });

  /** Fake upstream keyed by exchange code; functions are invoked per call */
  function upstream(table: Record<string, unknown | (() => never)>) {
    iss.getRawTable.mockImplementation(async (code: string) => {
      const entry = table[code];
      if (typeof entry === 'function') return entry();
      if (entry === undefined) {
        throw new TransportError(`ISS returned HTTP 404 for ${code}`, false, { status: 404 });
      }
      return entry;
    });
  }

  describe('fetchQuote', () => {
    it('cleans the symbol for the request and echoes the input back', async () => {
      upstream({ SBER: quoteDoc('SBER', 306, 300) });

      const q = await service.fetchQuote('sber.me');
      expect(iss.getRawTable).toHaveBeenCalledWith('SBER');
      expect(q).toMatchObject({
        symbol: 'sber.me',
        sourceSymbol: 'SBER.ME',
        name: 'SBER name',
        lastTradePrice: 306,
        change: 6,
        currency: 'RUB',
        exchange: 'MOEX',
      });
    });

    it('rejects symbols that do not belong to the exchange without calling it', async () => {
      await expect(service.fetchQuote('AAPL')).rejects.toBeInstanceOf(UnsupportedSymbolError);
      expect(iss.getRawTable).not.toHaveBeenCalled();
    });

    it('surfaces decode, empty table and price errors', async () => {
      upstream({
        SBER: { securities: { columns: ['SECID'], data: [['SBER']] } },
        GAZP: { ...quoteDoc('GAZP', 1, 1), marketdata: { columns: ['LAST'], data: [] } },
        LKOH: quoteDoc('LKOH', null, 0),
      });

      await expect(service.fetchQuote('SBER')).rejects.toBeInstanceOf(DecodeError);
      await expect(service.fetchQuote('GAZP')).rejects.toBeInstanceOf(EmptyTableError);
      await expect(service.fetchQuote('LKOH')).rejects.toBeInstanceOf(NoPriceAvailableError);
    });

    it('surfaces transport errors as they are', async () => {
      const err = refused();
      upstream({
        SBER: () => {
          throw err;
        },
      });
      await expect(service.fetchQuote('SBER')).rejects.toBe(err);
    });
  });

  describe('fetchMany', () => {
    it('keeps input order and drops item-local failures', async () => {
      upstream({
        SBER: quoteDoc('SBER', 306, 300),
        LKOH: quoteDoc('LKOH', 7100, 7000),
        // GAZP missing -> HTTP 404
      });

      const out = await service.fetchMany(['SBER', 'GAZP', 'LKOH']);
      expect(out.map((q) => q.symbol)).toEqual(['SBER', 'LKOH']);
    });

    it('drops symbols that are not eligible', async () => {
      upstream({ SBER: quoteDoc('SBER', 306, 300) });

      const out = await service.fetchMany(['AAPL', 'SBER']);
      expect(out.map((q) => q.symbol)).toEqual(['SBER']);
      expect(iss.getRawTable).toHaveBeenCalledTimes(1);
    });

    it('returns a quote for every occurrence of a duplicated symbol', async () => {
      upstream({ SBER: quoteDoc('SBER', 306, 300), GAZP: quoteDoc('GAZP', 165, 160) });

      const out = await service.fetchMany(['SBER', 'GAZP', 'SBER']);
      expect(out.map((q) => q.lastTradePrice)).toEqual([306, 165, 306]);
      expect(iss.getRawTable).toHaveBeenCalledTimes(3);
    });

    it('keeps each slot its own quote when suffixed and bare forms both succeed', async () => {
      upstream({ SBER: quoteDoc('SBER', 306, 300) });

      const out = await service.fetchMany(['sber.me', 'SBER']);
      expect(out.map((q) => q.symbol)).toEqual(['sber.me', 'SBER']);
      expect(out.map((q) => q.sourceSymbol)).toEqual(['SBER.ME', 'SBER.ME']);
    });

    it('fills a failed slot from a success for the same exchange code', async () => {
      iss.getRawTable
        .mockRejectedValueOnce(
          new TransportError('ISS returned HTTP 500 for SBER', false, { status: 500 }),
        )
        .mockResolvedValueOnce(quoteDoc('SBER', 306, 300));

      const out = await service.fetchMany(['sber.me', 'SBER']);
      expect(out).toHaveLength(2);
      expect(out[0]).toBe(out[1]);
      expect(out[0].symbol).toBe('SBER');
    });

    it('does not depend on completion order', async () => {
      // SBER answers last
      iss.getRawTable.mockImplementation(
        (code: string) =>
          new Promise((resolve) => {
            const delay = code === 'SBER' ? 20 : 0;
            setTimeout(() => resolve(quoteDoc(code, 150, 100)), delay);
          }),
      );

      const out = await service.fetchMany(['SBER', 'GAZP']);
      expect(out.map((q) => q.symbol)).toEqual(['SBER', 'GAZP']);
    });

    it('fails the whole batch on a systemic failure', async () => {
      const cause = refused();
      upstream({
        SBER: quoteDoc('SBER', 306, 300),
        GAZP: () => {
          throw cause;
        },
      });

      const err = await service.fetchMany(['SBER', 'GAZP']).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SystemicFetchError);
      expect(err).toMatchObject({ cause });
    });

    it('reports SystemicFetchError, not AllFetchesFailed, when everything is down', async () => {
      iss.getRawTable.mockRejectedValue(refused());

      await expect(service.fetchMany(['SBER', 'GAZP'])).rejects.toBeInstanceOf(
        SystemicFetchError,
      );
    });

    it('reports AllFetchesFailedError when every item fails locally', async () => {
      upstream({ SBER: quoteDoc('SBER', null, 0) });

      await expect(service.fetchMany(['SBER', 'GAZP', 'AAPL'])).rejects.toBeInstanceOf(
        AllFetchesFailedError,
      );
    });

    it('returns an empty list for empty input', async () => {
      await expect(service.fetchMany([])).resolves.toEqual([]);
      expect(iss.getRawTable).not.toHaveBeenCalled();
    });
  });

  describe('fetchCandles', () => {
    const now = new Date('2024-03-31T12:00:00Z');

    it('maps the range, resolves candles and derives stats', async () => {
      iss.getRawCandleTable.mockResolvedValue(
        candleDoc([
          [104, 110, 111, 103, '2024-03-29 00:00:00'],
          [100, 104, 105, 99, '2024-03-28 00:00:00'],
          [null, 1, 1, 1, '2024-03-27 00:00:00'],
        ]),
      );

      const out = await service.fetchCandles('gazp.me', '1mo', now);
      expect(iss.getRawCandleTable).toHaveBeenCalledWith('GAZP', '2024-03-01', 24);
      expect(out.symbol).toBe('gazp.me');
      expect(out.points).toHaveLength(2);
      expect(out.previousValue).toBe(100);
      expect(out.currentValue).toBe(110);
      expect(out.stats).toEqual({ change: 10, percentChange: 10, isUp: true, isDown: false });
    });

    it('throws InsufficientDataError when the source has no candles', async () => {
      iss.getRawCandleTable.mockResolvedValue(candleDoc([]));
      await expect(service.fetchCandles('SBER', '1d', now)).rejects.toBeInstanceOf(
        InsufficientDataError,
      );
    });

    it('throws DecodeError when the candles block is missing', async () => {
      iss.getRawCandleTable.mockResolvedValue({});
      await expect(service.fetchCandles('SBER', '1d', now)).rejects.toBeInstanceOf(DecodeError);
    });

    it('rejects an unknown range without calling the source', async () => {
      await expect(service.fetchCandles('SBER', '6mo', now)).rejects.toBeInstanceOf(
        UnsupportedRangeError,
      );
      expect(iss.getRawCandleTable).not.toHaveBeenCalled();
    });

    it('rejects ineligible symbols', async () => {
      await expect(service.fetchCandles('AAPL', '1y', now)).rejects.toBeInstanceOf(
        UnsupportedSymbolError,
      );
    });
  });

  it('exposes the eligibility predicate', () => {
    expect(service.isEligible('SBER')).toBe(true);
    expect(service.isEligible('TSLA')).toBe(false);
  });
});
