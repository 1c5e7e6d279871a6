// api/src/market/models/candle.model.ts

/**
 * One OHLCV row as returned by the exchange.
 * begin/end keep the wire format, e.g. "2024-03-01 10:00:00" (Moscow time).
 */
export interface Candle {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  begin: string;
  end: string;
}
