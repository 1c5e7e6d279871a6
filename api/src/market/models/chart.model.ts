// api/src/market/models/chart.model.ts
import type { ChartRange, CandleInterval } from '../chart/chart-range';

export interface ChartPoint {
  time: number; // epoch seconds, UTC
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Time-ordered chart points for one (symbol, range) request.
 * Change figures are derived on demand from previousValue/currentValue.
 */
export interface ChartSeries {
  symbol: string;
  range: ChartRange;
  interval: CandleInterval;
  points: ChartPoint[];
  previousValue: number;
  currentValue: number;
}

export interface ChartStats {
  change: number;
  percentChange: number;
  isUp: boolean;
  isDown: boolean;
}
