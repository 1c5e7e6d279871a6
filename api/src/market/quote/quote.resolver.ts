// api/src/market/quote/quote.resolver.ts
import { Logger } from '@nestjs/common';
import { ColumnTable, Row } from '../table/column-table';
import { NoPriceAvailableError } from '../market.errors';
import { MarketState, Quote } from '../models/quote.model';
import { withSuffix } from '../instrument/instrument.classifier';

const logger = new Logger('QuoteResolver');

export interface QuoteResolverOptions {
  primaryBoard: string;
  exchange: string;
  defaultCurrency: string;
  now?: () => Date;
}

/** Legacy ruble codes still reported by the exchange */
const CURRENCY_ALIASES: Record<string, string> = {
  SUR: 'RUB',
  RUR: 'RUB',
};

/**
 * Pick the primary board's row, otherwise the first row.
 * Callers guarantee the table is non-empty.
 */
export function selectBoardRow(
  table: ColumnTable,
  board: string,
  tableName: string,
  symbol: string,
): Row {
  const hit = table.findRowWhere('BOARDID', board);
  if (hit) return hit;
  logger.warn(`${symbol}: no ${board} row in ${tableName}, using first of ${table.rowCount}`);
  return table.row(0);
}

/**
 * Build a Quote from the reference ("securities") and live ("marketdata") tables.
 *
 * Price falls through LAST -> LCLOSEPRICE -> PREVPRICE, skipping absent or zero values.
 * OHLC fields missing from the live row collapse to the resolved price.
 */
export function resolveQuote(
  symbol: string,
  securities: ColumnTable,
  marketdata: ColumnTable,
  options: QuoteResolverOptions,
): Quote {
  const secRow = selectBoardRow(securities, options.primaryBoard, 'securities', symbol);
  const mdRow = selectBoardRow(marketdata, options.primaryBoard, 'marketdata', symbol);

  const last = firstNonZero(
    marketdata.double(mdRow, 'LAST'),
    marketdata.double(mdRow, 'LCLOSEPRICE'),
    securities.double(secRow, 'PREVPRICE'),
  );
  if (last === undefined) {
    throw new NoPriceAvailableError(symbol);
  }

  const previousClose = securities.double(secRow, 'PREVPRICE') ?? 0;
  const change = previousClose !== 0 ? last - previousClose : 0;

  const reportedPct = marketdata.double(mdRow, 'LASTTOPREVPRICE');
  const changePercent =
    reportedPct ?? (previousClose !== 0 ? (change / previousClose) * 100 : 0);

  const quote: Quote = {
    symbol,
    sourceSymbol: withSuffix(symbol),
    name: displayName(securities, secRow, symbol),
    lastTradePrice: last,
    change,
    changePercent,
    open: firstNonZero(marketdata.double(mdRow, 'OPEN'), last) ?? last,
    high: firstNonZero(marketdata.double(mdRow, 'HIGH'), last) ?? last,
    low: firstNonZero(marketdata.double(mdRow, 'LOW'), last) ?? last,
    previousClose,
    volume: marketdata.long(mdRow, 'VOLTODAY') ?? 0,
    currency: currencyOf(securities, secRow, options.defaultCurrency),
    exchange: options.exchange,
    marketState: marketStateOf(marketdata, mdRow),
    asOf: (options.now?.() ?? new Date()).toISOString(),
  };

  const lotSize = securities.long(secRow, 'LOTSIZE');
  if (lotSize !== undefined) quote.lotSize = lotSize;

  logger.debug(
    `${symbol}=${last} prev=${previousClose} change=${change} (${changePercent}%) vol=${quote.volume}`,
  );
  return quote;
}

function firstNonZero(...values: Array<number | undefined>): number | undefined {
  return values.find((v) => v !== undefined && v !== 0);
}

function displayName(table: ColumnTable, row: Row, fallback: string): string {
  const long = table.string(row, 'SECNAME')?.trim();
  if (long) return long;
  const short = table.string(row, 'SHORTNAME')?.trim();
  if (short) return short;
  return fallback;
}

function currencyOf(table: ColumnTable, row: Row, fallback: string): string {
  const raw = table.string(row, 'CURRENCYID')?.trim().toUpperCase();
  if (!raw) return fallback;
  return CURRENCY_ALIASES[raw] ?? raw;
}

function marketStateOf(table: ColumnTable, row: Row): MarketState {
  const status = table.string(row, 'TRADINGSTATUS');
  if (status === undefined) return 'REGULAR';
  return status === 'T' ? 'REGULAR' : 'CLOSED';
}
