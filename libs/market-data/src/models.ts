export const INSTRUMENT_SYMBOLS = ['BTC', 'ETH', 'XRP'] as const;

export type InstrumentSymbol = (typeof INSTRUMENT_SYMBOLS)[number];

/**
 * A single reported figure. `text` holds values that arrive as free text
 * (operator input such as `500M`, or a non-numeric upstream field).
 */
export type Metric =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'unavailable' };

export interface InstrumentQuote {
  symbol: InstrumentSymbol;
  price: Metric;
  change24hPct: Metric;
}

export interface MarketSnapshot {
  quotes: Record<InstrumentSymbol, InstrumentQuote>;
  btcDominancePct: Metric;
}

export interface DerivativeMetrics {
  symbol: InstrumentSymbol;
  currentPrice: Metric;
  change24h: Metric;
  volume24h: Metric;
  openInterest: Metric;
  longLiquidations24h: Metric;
  shortLiquidations24h: Metric;
  totalLiquidations24h: Metric;
}

export type DerivativeMetricsMap = Record<InstrumentSymbol, DerivativeMetrics>;

export interface SentimentReading {
  value: Metric;
  classification: Metric;
  observedAt?: Date;
}

export type DerivativesResult =
  | { status: 'ok'; metrics: DerivativeMetricsMap }
  | { status: 'not_configured' }
  | { status: 'upstream_error'; message: string };
