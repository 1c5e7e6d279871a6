import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsString,
  Length,
  Matches,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { CHART_RANGES, ChartRange } from '../chart/chart-range';

/* Exchange code with an optional .ME / .MOEX tag, any case */
const SYMBOL_PATTERN = /^[A-Z0-9]{1,12}(\.(ME|MOEX))?$/i;
const SYMBOL_MESSAGE =
  'Symbol must be 1-12 letters or digits, optionally followed by .ME or .MOEX';

function trimmed({ value }: { value: unknown }): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

/**
 * DTO for a single quote lookup
 * The symbol is passed through as typed so the response can echo it back
 */
export class QuoteQueryDto {
  @IsString()
  @Transform(trimmed)
  @Matches(SYMBOL_PATTERN, { message: SYMBOL_MESSAGE })
  symbol!: string;
}

/**
 * DTO for the eligibility check
 * Any symbol shape is accepted; foreign symbols answer eligible: false
 */
export class EligibilityQueryDto {
  @IsString()
  @Transform(trimmed)
  @Length(1, 32)
  symbol!: string;
}

/**
 * DTO for a batch quote lookup: ?symbols=SBER,GAZP,lkoh.me
 */
export class QuotesQueryDto {
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      : value,
  )
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(50)
  @IsString({ each: true })
  @Matches(SYMBOL_PATTERN, { each: true, message: SYMBOL_MESSAGE })
  symbols!: string[];
}

/**
 * DTO for chart candles
 */
export class CandlesQueryDto {
  @IsString()
  @Transform(trimmed)
  @Matches(SYMBOL_PATTERN, { message: SYMBOL_MESSAGE })
  symbol!: string;

  @IsIn(CHART_RANGES, {
    message: `Range must be one of: ${CHART_RANGES.join(', ')}`,
  })
  range!: ChartRange;
}
