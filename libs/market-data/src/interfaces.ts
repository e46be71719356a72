import { DerivativesResult, MarketSnapshot } from './models';

/**
 * Anything that can produce per-instrument derivative metrics for a report
 * cycle. Price and change always come from the snapshot passed in.
 */
export interface DerivativeMetricsSource {
  readonly kind: 'automated' | 'manual';
  collect(snapshot: MarketSnapshot): Promise<DerivativesResult>;
}
