// api/src/market/instrument/instrument.classifier.ts
import tickers from './tickers.json';

/** Suffixes that tag a symbol as belonging to this exchange */
export const EXCHANGE_SUFFIXES = ['.MOEX', '.ME'] as const;

const LISTED: ReadonlySet<string> = new Set(tickers.map((t) => t.toUpperCase()));

function matchedSuffix(symbol: string): string | undefined {
  const upper = symbol.trim().toUpperCase();
  return EXCHANGE_SUFFIXES.find((s) => upper.endsWith(s) && upper.length > s.length);
}

/**
 * Exchange code used as the aggregation key: suffix stripped, upper-cased.
 * "sber.me" -> "SBER"
 */
export function canonicalize(symbol: string): string {
  const trimmed = symbol.trim();
  const suffix = matchedSuffix(trimmed);
  const base = suffix ? trimmed.slice(0, trimmed.length - suffix.length) : trimmed;
  return base.toUpperCase();
}

/**
 * Bare allow-listed tickers and anything carrying an exchange suffix are eligible.
 */
export function isEligible(symbol: string): boolean {
  if (!symbol.trim()) return false;
  return LISTED.has(canonicalize(symbol)) || matchedSuffix(symbol) !== undefined;
}

/** Canonical code re-tagged for the exchange: "sber" -> "SBER.ME" */
export function withSuffix(symbol: string): string {
  return `${canonicalize(symbol)}.ME`;
}
