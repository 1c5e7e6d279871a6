// api/src/market/candles/candle.resolver.ts
import { Logger } from '@nestjs/common';
import { ColumnTable } from '../table/column-table';
import { Candle } from '../models/candle.model';

const logger = new Logger('CandleResolver');

/**
 * Turn a decoded "candles" table into time-ordered OHLCV rows.
 * Rows missing any of open/high/low/close are dropped whole.
 * An empty result means "no data" and is not an error.
 */
export function resolveCandles(table: ColumnTable): Candle[] {
  const oi = table.columnIndex('open');
  const hi = table.columnIndex('high');
  const li = table.columnIndex('low');
  const ci = table.columnIndex('close');
  const vi = table.columnIndex('volume');
  const bi = table.columnIndex('begin');
  const ei = table.columnIndex('end');

  const out: Candle[] = [];
  for (const r of table.rows) {
    const open = table.asDouble(r, oi);
    const high = table.asDouble(r, hi);
    const low = table.asDouble(r, li);
    const close = table.asDouble(r, ci);
    if (open === undefined || high === undefined || low === undefined || close === undefined) {
      continue;
    }
    out.push({
      open,
      high,
      low,
      close,
      volume: table.asLong(r, vi) ?? 0,
      begin: table.asString(r, bi) ?? '',
      end: table.asString(r, ei) ?? '',
    });
  }

  // stable: equal begins keep source order
  out.sort((a, b) => (a.begin < b.begin ? -1 : a.begin > b.begin ? 1 : 0));

  const dropped = table.rowCount - out.length;
  logger.debug(`parsed ${out.length} candles${dropped ? `, dropped ${dropped}` : ''}`);
  return out;
}
