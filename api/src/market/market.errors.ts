/**
 * Error taxonomy for the market data pipeline.
 *
 * Item-local errors describe one symbol and are dropped by batch fetches.
 * Systemic errors mean the upstream source itself is down and abort a batch.
 */
export class MarketDataError extends Error {
  readonly symbol?: string;

  constructor(message: string, options?: { symbol?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.symbol = options?.symbol;
  }
}

/** Table block missing or malformed */
export class DecodeError extends MarketDataError {}

/** Structurally valid table with no rows where one was required */
export class EmptyTableError extends MarketDataError {
  constructor(
    readonly table: string,
    options?: { symbol?: string },
  ) {
    super(`Table "${table}" has no rows`, options);
  }
}

export class OutOfRangeError extends MarketDataError {
  constructor(
    readonly index: number,
    readonly size: number,
  ) {
    super(
      size === 0
        ? `Row ${index} is out of range: the table has no rows`
        : `Row ${index} is out of range (0..${size - 1})`,
    );
  }
}

/** LAST, LCLOSEPRICE and PREVPRICE all absent or zero */
export class NoPriceAvailableError extends MarketDataError {
  constructor(symbol: string) {
    super(`No price available for ${symbol}`, { symbol });
  }
}

export class InsufficientDataError extends MarketDataError {}

export class UnsupportedRangeError extends MarketDataError {
  constructor(readonly range: string) {
    super(`Unknown chart range "${range}"`);
  }
}

export class UnsupportedSymbolError extends MarketDataError {
  constructor(symbol: string) {
    super(`Symbol ${symbol} is not traded on this exchange`, { symbol });
  }
}

/**
 * Failed call to the upstream.
 * `systemic` is set when the host could not be reached at all.
 */
export class TransportError extends MarketDataError {
  readonly status?: number;
  readonly code?: string;

  constructor(
    message: string,
    readonly systemic: boolean,
    options?: { symbol?: string; status?: number; code?: string; cause?: unknown },
  ) {
    super(message, options);
    this.status = options?.status;
    this.code = options?.code;
  }
}

export class SystemicFetchError extends MarketDataError {
  constructor(cause: unknown) {
    super(
      `Market data source unavailable: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class AllFetchesFailedError extends MarketDataError {
  constructor(readonly requested: number) {
    super(`All ${requested} quote fetches failed`);
  }
}

export function isSystemicFailure(error: unknown): boolean {
  return error instanceof TransportError && error.systemic;
}
