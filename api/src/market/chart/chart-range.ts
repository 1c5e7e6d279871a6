// api/src/market/chart/chart-range.ts
import { InsufficientDataError } from '../market.errors';
import { Candle } from '../models/candle.model';
import { ChartPoint, ChartSeries, ChartStats } from '../models/chart.model';
import { parseIssTimestamp, subtractDays, toIssDate } from '../utils/time.utils';

export const CHART_RANGES = ['1d', '2w', '1mo', '3mo', '1y', '5y', 'max'] as const;
export type ChartRange = (typeof CHART_RANGES)[number];

/**
 * ISS candle interval codes:
 * 1 = 1 min, 10 = 10 min, 60 = 1 hour, 24 = 1 day, 7 = 1 week, 31 = 1 month
 */
export type CandleInterval = 1 | 10 | 60 | 24 | 7 | 31;

export interface RangeWindow {
  lookbackDays: number;
  interval: CandleInterval;
}

/* Finer candles for short ranges, coarser for long ones, to bound payload size */
const RANGE_TABLE: Record<ChartRange, RangeWindow> = {
  '1d': { lookbackDays: 1, interval: 10 },
  '2w': { lookbackDays: 14, interval: 60 },
  '1mo': { lookbackDays: 30, interval: 24 },
  '3mo': { lookbackDays: 90, interval: 24 },
  '1y': { lookbackDays: 365, interval: 7 },
  '5y': { lookbackDays: 5 * 365, interval: 31 },
  max: { lookbackDays: 20 * 365, interval: 31 },
};

export function isChartRange(v: unknown): v is ChartRange {
  return typeof v === 'string' && CHART_RANGES.some((r) => r === v);
}

export function mapRange(range: ChartRange): RangeWindow {
  return RANGE_TABLE[range];
}

/** "from" date (yyyy-MM-dd, exchange calendar) for a range ending now */
export function lookbackWindow(range: ChartRange, now: Date = new Date()): { from: string } {
  return { from: toIssDate(subtractDays(now, RANGE_TABLE[range].lookbackDays)) };
}

/**
 * Convert candles into chart points and wrap them as a series.
 * Candles whose begin timestamp does not parse are skipped.
 */
export function buildChartSeries(
  symbol: string,
  range: ChartRange,
  candles: readonly Candle[],
): ChartSeries {
  const points: ChartPoint[] = [];
  for (const c of candles) {
    const time = parseIssTimestamp(c.begin);
    if (time === undefined) continue;
    points.push({ time, open: c.open, high: c.high, low: c.low, close: c.close, volume: c.volume });
  }
  points.sort((a, b) => a.time - b.time);

  if (points.length === 0) {
    throw new InsufficientDataError(`No candle data for ${symbol} (${range})`, { symbol });
  }

  return {
    symbol,
    range,
    interval: RANGE_TABLE[range].interval,
    points,
    previousValue: points[0].open,
    currentValue: points[points.length - 1].close,
  };
}

/**
 * change = last close - first open; percentChange relative to first open.
 */
export function deriveChartStats(series: Pick<ChartSeries, 'points'>): ChartStats {
  const { points } = series;
  if (points.length === 0) {
    throw new InsufficientDataError('Cannot derive chart stats from an empty series');
  }
  const first = points[0].open;
  const change = points[points.length - 1].close - first;
  const percentChange = first !== 0 ? (change / first) * 100 : 0;
  return {
    change,
    percentChange,
    isUp: change > 0,
    isDown: change < 0,
  };
}
