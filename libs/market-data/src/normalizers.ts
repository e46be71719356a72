import {
  DerivativeMetrics,
  DerivativeMetricsMap,
  INSTRUMENT_SYMBOLS,
  InstrumentQuote,
  InstrumentSymbol,
  MarketSnapshot,
  Metric,
} from './models';

export const UNAVAILABLE: Metric = { kind: 'unavailable' };

export const numberMetric = (value: number): Metric => ({ kind: 'number', value });

/** Free text from an operator. `n/a` and blanks collapse to unavailable. */
export const textMetric = (raw: string): Metric => {
  const value = raw.trim();
  if (!value || value.toLowerCase() === 'n/a') return UNAVAILABLE;
  return { kind: 'text', value };
};

/** Upstream JSON value: numbers and numeric strings become numbers. */
export const toMetric = (raw: unknown): Metric => {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? numberMetric(raw) : UNAVAILABLE;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    const parsed = trimmed ? Number(trimmed) : Number.NaN;
    return Number.isFinite(parsed) ? numberMetric(parsed) : textMetric(trimmed);
  }
  return UNAVAILABLE;
};

/** Whole numbers within `[min, max]`; fractions and partial numbers are unavailable. */
export const toIntegerMetric = (
  raw: unknown,
  min = Number.MIN_SAFE_INTEGER,
  max = Number.MAX_SAFE_INTEGER,
): Metric => {
  const text = typeof raw === 'string' ? raw.trim() : '';
  const parsed = typeof raw === 'number' ? raw : text ? Number(text) : Number.NaN;
  return Number.isInteger(parsed) && parsed >= min && parsed <= max ? numberMetric(parsed) : UNAVAILABLE;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const unavailableQuote = (symbol: InstrumentSymbol): InstrumentQuote => ({
  symbol,
  price: UNAVAILABLE,
  change24hPct: UNAVAILABLE,
});

export const unavailableSnapshot = (): MarketSnapshot => ({
  quotes: {
    BTC: unavailableQuote('BTC'),
    ETH: unavailableQuote('ETH'),
    XRP: unavailableQuote('XRP'),
  },
  btcDominancePct: UNAVAILABLE,
});

export const emptyDerivativeMetrics = (symbol: InstrumentSymbol): DerivativeMetrics => ({
  symbol,
  currentPrice: UNAVAILABLE,
  change24h: UNAVAILABLE,
  volume24h: UNAVAILABLE,
  openInterest: UNAVAILABLE,
  longLiquidations24h: UNAVAILABLE,
  shortLiquidations24h: UNAVAILABLE,
  totalLiquidations24h: UNAVAILABLE,
});

export const emptyDerivativeMetricsMap = (): DerivativeMetricsMap => ({
  BTC: emptyDerivativeMetrics('BTC'),
  ETH: emptyDerivativeMetrics('ETH'),
  XRP: emptyDerivativeMetrics('XRP'),
});

/** Copies price and 24h change from the snapshot into every instrument. */
export const withSnapshotQuotes = (
  metrics: DerivativeMetricsMap,
  snapshot: MarketSnapshot,
): DerivativeMetricsMap => {
  const result = emptyDerivativeMetricsMap();
  for (const symbol of INSTRUMENT_SYMBOLS) {
    const quote = snapshot.quotes[symbol];
    result[symbol] = {
      ...metrics[symbol],
      currentPrice: quote.price,
      change24h: quote.change24hPct,
    };
  }
  return result;
};

export const isInstrumentSymbol = (value: string): value is InstrumentSymbol =>
  INSTRUMENT_SYMBOLS.some((symbol) => symbol === value);
