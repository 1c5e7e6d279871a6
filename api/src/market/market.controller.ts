import {
  Controller,
  Get,
  Query,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { MarketService, ChartResult } from './market.service';
import {
  CandlesQueryDto,
  EligibilityQueryDto,
  QuoteQueryDto,
  QuotesQueryDto,
} from './dto/quote-query.dto';
import {
  AllFetchesFailedError,
  DecodeError,
  EmptyTableError,
  InsufficientDataError,
  MarketDataError,
  NoPriceAvailableError,
  SystemicFetchError,
  TransportError,
  UnsupportedRangeError,
  UnsupportedSymbolError,
} from './market.errors';
import { Quote } from './models/quote.model';

/**
 * Market Controller
 * Quotes and chart candles for exchange-listed shares
 */
@Controller('market')
export class MarketController {
  private readonly logger = new Logger(MarketController.name);

  constructor(private readonly market: MarketService) {}

  /**
   * Get a quote for one symbol
   * @returns Quote with last price, change and day range
   */
  @Get('quote')
  async getQuote(@Query() q: QuoteQueryDto): Promise<Quote> {
    try {
      return await this.market.fetchQuote(q.symbol);
    } catch (error) {
      throw this.toHttpException(error, `Failed to fetch quote for ${q.symbol}`, {
        symbol: q.symbol,
      });
    }
  }

  /**
   * Get quotes for a comma-separated list of symbols
   * @returns Quotes in request order; symbols that failed individually are omitted
   */
  @Get('quotes')
  async getQuotes(@Query() q: QuotesQueryDto): Promise<Quote[]> {
    try {
      return await this.market.fetchMany(q.symbols);
    } catch (error) {
      throw this.toHttpException(error, 'Failed to fetch quotes', { symbols: q.symbols });
    }
  }

  /**
   * Get chart candles for a symbol over a range
   * @returns Time-ordered points with change statistics
   */
  @Get('candles')
  async getCandles(@Query() q: CandlesQueryDto): Promise<ChartResult> {
    try {
      return await this.market.fetchCandles(q.symbol, q.range);
    } catch (error) {
      throw this.toHttpException(error, `Failed to fetch candles for ${q.symbol}`, {
        symbol: q.symbol,
        range: q.range,
      });
    }
  }

  @Get('eligible')
  getEligibility(@Query() q: EligibilityQueryDto): { symbol: string; eligible: boolean } {
    return { symbol: q.symbol, eligible: this.market.isEligible(q.symbol) };
  }

  /* ------------------------------- Helpers ------------------------------ */

  private toHttpException(
    error: unknown,
    message: string,
    context: Record<string, unknown>,
  ): HttpException {
    if (error instanceof HttpException) return error;

    const status = statusFor(error);
    if (status >= 500) {
      this.logger.error(`${message}: ${error instanceof Error ? error.message : String(error)}`);
    } else {
      this.logger.warn(`${message}: ${error instanceof Error ? error.message : String(error)}`);
    }

    return new HttpException(
      {
        message,
        ...context,
        error: error instanceof MarketDataError ? error.message : 'Market data unavailable',
      },
      status,
    );
  }
}

function statusFor(error: unknown): HttpStatus {
  if (error instanceof UnsupportedRangeError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (
    error instanceof UnsupportedSymbolError ||
    error instanceof NoPriceAvailableError ||
    error instanceof InsufficientDataError
  ) {
    return HttpStatus.NOT_FOUND;
  }
  if (
    error instanceof SystemicFetchError ||
    (error instanceof TransportError && error.systemic)
  ) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  if (
    error instanceof DecodeError ||
    error instanceof EmptyTableError ||
    error instanceof AllFetchesFailedError ||
    error instanceof TransportError
  ) {
    return HttpStatus.BAD_GATEWAY;
  }
  return HttpStatus.SERVICE_UNAVAILABLE;
}
