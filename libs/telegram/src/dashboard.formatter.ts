import {
  DerivativeMetrics,
  DerivativeMetricsMap,
  INSTRUMENT_SYMBOLS,
  MarketSnapshot,
  Metric,
  SentimentReading,
} from '@libs/market-data';
import { DateTime } from 'luxon';
import { escapeHtml, SEGMENT_SEPARATOR } from './formatting.utils';

export const NOT_AVAILABLE = 'N/A';
export const NO_DATA_MESSAGE = 'No data available to build the dashboard.';

export interface ReportDocument {
  segments: string[];
}

export interface DashboardReportInput {
  derivatives: DerivativeMetricsMap | null;
  sentiment: SentimentReading | null;
  market: MarketSnapshot | null;
  generatedAt?: Date;
  timeZone?: string;
  timeZoneLabel?: string;
}

export const formatMetric = (metric: Metric): string => {
  switch (metric.kind) {
    case 'number':
      return metric.value.toFixed(2);
    case 'text':
      return escapeHtml(metric.value);
    case 'unavailable':
      return NOT_AVAILABLE;
  }
};

const formatGeneratedAt = (generatedAt: Date, timeZone: string): string => {
  const local = DateTime.fromJSDate(generatedAt, { zone: timeZone });
  const safe = local.isValid ? local : DateTime.fromJSDate(generatedAt, { zone: 'UTC' });
  return safe.toFormat('yyyy-MM-dd HH:mm');
};

const formatInstrument = (metrics: DerivativeMetrics): string => {
  const lines = [`<b>${metrics.symbol}</b>`];
  const { currentPrice, change24h } = metrics;
  if (currentPrice.kind === 'number' && change24h.kind === 'number') {
    lines.push(`Price: ${currentPrice.value.toFixed(2)} (${change24h.value.toFixed(2)}%)`);
  }
  lines.push(
    `Volume 24h: ${formatMetric(metrics.volume24h)}`,
    `Liquidations 24h (total): ${formatMetric(metrics.totalLiquidations24h)}`,
    `Long liquidations 24h: ${formatMetric(metrics.longLiquidations24h)}`,
    `Short liquidations 24h: ${formatMetric(metrics.shortLiquidations24h)}`,
    `Open interest (OI): ${formatMetric(metrics.openInterest)}`,
  );
  return lines.join('\n');
};

// "unavailable" and a text value are kept apart on purpose; both still render.
const formatDominance = (dominance: Metric): string =>
  dominance.kind === 'unavailable'
    ? 'BTC dominance unavailable.'
    : `BTC dominance: ${formatMetric(dominance)}%`;

// The index is an integer and is printed as such.
const formatSentimentValue = (value: Metric): string =>
  value.kind === 'number' ? String(value.value) : formatMetric(value);

const formatSentiment = (sentiment: SentimentReading | null): string =>
  sentiment
    ? `Fear &amp; Greed index: ${formatSentimentValue(sentiment.value)} ${formatMetric(sentiment.classification)}`
    : 'Fear &amp; Greed index unavailable.';

/**
 * Builds the dashboard post. Segments never contain blank lines, so the
 * rendered document can be split back at `\n\n` safely.
 */
export const formatDashboardReport = (input: DashboardReportInput): ReportDocument => {
  const { derivatives, sentiment, market } = input;
  if (!derivatives && !sentiment && !market) {
    return { segments: [NO_DATA_MESSAGE] };
  }

  const generatedAt = input.generatedAt ?? new Date();
  const timeZone = input.timeZone ?? 'Europe/Moscow';
  const label = input.timeZoneLabel ?? 'MSK';

  const segments = [
    `📊 <b>Market Dashboard</b> — ${formatGeneratedAt(generatedAt, timeZone)} ${escapeHtml(label)}`,
  ];

  if (derivatives) {
    segments.push(...INSTRUMENT_SYMBOLS.map((symbol) => formatInstrument(derivatives[symbol])));
  } else {
    segments.push('Derivatives data unavailable.');
  }

  if (market) {
    segments.push(formatDominance(market.btcDominancePct));
  }

  segments.push(formatSentiment(sentiment));

  return { segments };
};

export const renderReport = (document: ReportDocument): string =>
  document.segments.join(SEGMENT_SEPARATOR);
