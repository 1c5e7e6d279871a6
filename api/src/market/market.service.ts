import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IssClient } from './iss.client';
import {
  AllFetchesFailedError,
  SystemicFetchError,
  UnsupportedRangeError,
  UnsupportedSymbolError,
  isSystemicFailure,
} from './market.errors';
import { decodeTable } from './table/column-table';
import { QuoteResolverOptions, resolveQuote } from './quote/quote.resolver';
import { resolveCandles } from './candles/candle.resolver';
import { canonicalize, isEligible } from './instrument/instrument.classifier';
import {
  buildChartSeries,
  deriveChartStats,
  isChartRange,
  lookbackWindow,
  mapRange,
} from './chart/chart-range';
import { Quote } from './models/quote.model';
import { ChartSeries, ChartStats } from './models/chart.model';

export type ChartResult = ChartSeries & { stats: ChartStats };

@Injectable()
export class MarketService {
  private readonly logger = new Logger(MarketService.name);
  private readonly resolverOptions: QuoteResolverOptions;

  constructor(
    private readonly iss: IssClient,
    private readonly config: ConfigService,
  ) {
    this.resolverOptions = {
      primaryBoard: this.config.get<string>('iss.primaryBoard') ?? 'TQBR',
      exchange: this.config.get<string>('iss.exchange') ?? 'MOEX',
      defaultCurrency: this.config.get<string>('iss.defaultCurrency') ?? 'RUB',
    };
  }

  /* ----------------------------- Public API ----------------------------- */

  isEligible(symbol: string): boolean {
    return isEligible(symbol);
  }

  /**
   * Resolve one quote. Every failure reaches the caller as a typed error.
   */
  async fetchQuote(symbol: string): Promise<Quote> {
    if (!isEligible(symbol)) {
      throw new UnsupportedSymbolError(symbol);
    }
    const code = canonicalize(symbol);
    this.logger.debug(`[quote] ${symbol} -> ${code}`);

    const doc = await this.iss.getRawTable(code);
    const securities = decodeTable(doc, 'securities', { required: true, symbol });
    const marketdata = decodeTable(doc, 'marketdata', { required: true, symbol });
    return resolveQuote(symbol, securities, marketdata, this.resolverOptions);
  }

  /**
   * Resolve quotes for many symbols concurrently.
   *
   * - Item-local failures drop that symbol from the result.
   * - A systemic failure in any task fails the whole batch.
   * - Output follows input order (duplicates included); it may be shorter than the input.
   * - A slot whose own fetch failed borrows a success for the same exchange code.
   */
  async fetchMany(symbols: readonly string[]): Promise<Quote[]> {
    if (symbols.length === 0) return [];

    const settled = await Promise.allSettled(symbols.map((s) => this.fetchForBatch(s)));

    const systemic = settled.find(
      (r): r is PromiseRejectedResult => r.status === 'rejected',
    );
    if (systemic) {
      this.logger.error(`[batch] upstream unavailable, failing ${symbols.length} symbols`);
      throw new SystemicFetchError(systemic.reason);
    }

    const results = settled.map((r) => (r.status === 'fulfilled' ? r.value : undefined));
    const byCode = new Map<string, Quote>();
    results.forEach((q, i) => {
      const key = canonicalize(symbols[i]);
      if (q && !byCode.has(key)) byCode.set(key, q);
    });

    if (byCode.size === 0) {
      throw new AllFetchesFailedError(symbols.length);
    }

    const ordered: Quote[] = [];
    results.forEach((q, i) => {
      const hit = q ?? byCode.get(canonicalize(symbols[i]));
      if (hit) ordered.push(hit);
    });
    this.logger.debug(`[batch] ${ordered.length}/${symbols.length} quotes resolved`);
    return ordered;
  }

  /**
   * Candle series for a symbol over an abstract range, plus change stats.
   * `range` is checked here too, for callers that skip the query DTO.
   */
  async fetchCandles(
    symbol: string,
    range: string,
    now: Date = new Date(),
  ): Promise<ChartResult> {
    if (!isEligible(symbol)) {
      throw new UnsupportedSymbolError(symbol);
    }
    if (!isChartRange(range)) {
      throw new UnsupportedRangeError(range);
    }
    const code = canonicalize(symbol);
    const { interval } = mapRange(range);
    const { from } = lookbackWindow(range, now);

    const doc = await this.iss.getRawCandleTable(code, from, interval);
    const candles = resolveCandles(decodeTable(doc, 'candles', { symbol }));
    const series = buildChartSeries(symbol, range, candles);

    this.logger.debug(
      `[candles] ${symbol} ${range} from=${from} interval=${interval} -> ${series.points.length} points`,
    );
    return { ...series, stats: deriveChartStats(series) };
  }

  /* ------------------------------- Helpers ------------------------------ */

  /** Resolves undefined on item-local failure; rejects only on systemic failure */
  private async fetchForBatch(symbol: string): Promise<Quote | undefined> {
    try {
      return await this.fetchQuote(symbol);
    } catch (e: unknown) {
      if (isSystemicFailure(e)) throw e;
      const message = e instanceof Error ? e.message : String(e);
      this.logger.warn(`[batch] dropping ${symbol}: ${message}`);
      return undefined;
    }
  }
}
