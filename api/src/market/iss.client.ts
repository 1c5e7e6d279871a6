import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { TransportError } from './market.errors';
import type { CandleInterval } from './chart/chart-range';

/** Connection-level failures: the host as a whole is unreachable */
const SYSTEMIC_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
]);

/**
 * Thin transport over the exchange's ISS endpoints.
 * Returns the parsed JSON document untouched; decoding happens in the core.
 * Uses the module's shared HttpService (one keep-alive pool per process).
 */
@Injectable()
export class IssClient {
  private readonly logger = new Logger(IssClient.name);
  private readonly board: string;

  constructor(
    private readonly http: HttpService,
    private readonly config: ConfigService,
  ) {
    this.board = this.config.get<string>('iss.primaryBoard') ?? 'TQBR';
  }

  /* "securities" and "marketdata" tables for one share */
  async getRawTable(code: string): Promise<unknown> {
    const path = `engines/stock/markets/shares/securities/${encodeURIComponent(code)}.json`;
    return this.get(code, path, {
      'iss.meta': 'off',
      'iss.only': 'securities,marketdata',
    });
  }

  /* "candles" table for one share on the primary board */
  async getRawCandleTable(
    code: string,
    from: string,
    interval: CandleInterval,
    till?: string,
  ): Promise<unknown> {
    const params: Record<string, string | number> = {
      from,
      interval,
      'iss.meta': 'off',
    };
    if (till) params.till = till;

    const path =
      `engines/stock/markets/shares/boards/${encodeURIComponent(this.board)}` +
      `/securities/${encodeURIComponent(code)}/candles.json`;
    return this.get(code, path, params);
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async get(
    code: string,
    path: string,
    params: Record<string, string | number>,
  ): Promise<unknown> {
    this.logger.debug(`GET ${path} ${JSON.stringify(params)}`);
    try {
      const res = await firstValueFrom(this.http.get<unknown>(path, { params }));
      return res.data;
    } catch (e: unknown) {
      throw this.toTransportError(code, path, e);
    }
  }

  private toTransportError(code: string, path: string, e: unknown): TransportError {
    if (isAxiosError(e)) {
      const status = e.response?.status;
      const errCode = e.code;
      const systemic =
        status === undefined && errCode !== undefined && SYSTEMIC_CODES.has(errCode);
      this.logger.error(
        `[HTTP GET failed] ${path} status=${status ?? '-'} code=${errCode ?? '-'}: ${e.message}`,
      );
      return new TransportError(
        status !== undefined
          ? `ISS returned HTTP ${status} for ${code}`
          : `ISS request failed for ${code}: ${e.message}`,
        systemic,
        { symbol: code, status, code: errCode, cause: e },
      );
    }
    const message = e instanceof Error ? e.message : String(e);
    this.logger.error(`[HTTP GET failed] ${path}: ${message}`);
    return new TransportError(`ISS request failed for ${code}: ${message}`, false, {
      symbol: code,
      cause: e,
    });
  }
}
