// api/src/market/models/quote.model.ts
export type MarketState = 'REGULAR' | 'CLOSED';

/**
 * Normalized quote for one instrument.
 * `symbol` is the string the caller asked for, not the cleaned exchange code.
 * `sourceSymbol` is the exchange-tagged code, e.g. "SBER.ME".
 */
export interface Quote {
  symbol: string;
  sourceSymbol: string;
  name: string;
  lastTradePrice: number;
  change: number;
  changePercent: number;
  open: number;
  high: number;
  low: number;
  previousClose: number;
  volume: number;
  lotSize?: number;
  currency: string;
  exchange: string;
  marketState: MarketState;
  asOf: string; // ISO 8601 UTC, time of resolution
}
