import { DerivativeMetricsSource } from '../interfaces';
import { DerivativeMetrics, DerivativeMetricsMap, DerivativesResult, MarketSnapshot } from '../models';
import {
  emptyDerivativeMetrics,
  emptyDerivativeMetricsMap,
  isInstrumentSymbol,
  textMetric,
  withSnapshotQuotes,
} from '../normalizers';

type ManualField = keyof Pick<
  DerivativeMetrics,
  'volume24h' | 'totalLiquidations24h' | 'longLiquidations24h' | 'shortLiquidations24h' | 'openInterest'
>;

const FIELD_KEYS: Partial<Record<string, ManualField>> = {
  TV: 'volume24h',
  TL: 'totalLiquidations24h',
  LL: 'longLiquidations24h',
  SL: 'shortLiquidations24h',
  OI: 'openInterest',
};

export const MANUAL_INPUT_EXAMPLE =
  'BTC: TV=500M, TL=10M, LL=6M, SL=4M, OI=100K; ETH: TV=200M, TL=5M, LL=3M, SL=2M, OI=50K; XRP: TV=100M, TL=2M, LL=1.5M, SL=0.5M, OI=20K';

/**
 * Parses `SYM: KEY=VALUE, ...; SYM: ...`. Malformed clauses and fields,
 * unknown symbols and unknown keys are skipped. Anything not given stays
 * unavailable, and `n/a` as the whole input means no manual data at all.
 */
export const parseManualDerivatives = (input: string): DerivativeMetricsMap => {
  const metrics = emptyDerivativeMetricsMap();
  if (input.trim().toLowerCase() === 'n/a') {
    return metrics;
  }

  for (const clause of input.split(';')) {
    const colon = clause.indexOf(':');
    if (colon < 0) continue;

    const symbol = clause.slice(0, colon).trim().toUpperCase();
    if (!isInstrumentSymbol(symbol)) continue;

    const entry = emptyDerivativeMetrics(symbol);
    for (const part of clause.slice(colon + 1).split(',')) {
      const eq = part.indexOf('=');
      if (eq < 0) continue;
      const field = FIELD_KEYS[part.slice(0, eq).trim().toUpperCase()];
      if (!field) continue;
      entry[field] = textMetric(part.slice(eq + 1));
    }
    metrics[symbol] = entry;
  }

  return metrics;
};

export class ManualDerivativesSource implements DerivativeMetricsSource {
  readonly kind = 'manual';

  constructor(private readonly input: string) {}

  async collect(snapshot: MarketSnapshot): Promise<DerivativesResult> {
    return { status: 'ok', metrics: withSnapshotQuotes(parseManualDerivatives(this.input), snapshot) };
  }
}
