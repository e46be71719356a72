import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { DerivativeMetricsSource } from '../interfaces';
import {
  DerivativeMetrics,
  DerivativesResult,
  INSTRUMENT_SYMBOLS,
  InstrumentSymbol,
  MarketSnapshot,
} from '../models';
import { emptyDerivativeMetricsMap, isRecord, toMetric, withSnapshotQuotes } from '../normalizers';
import { createHttpClient, describeHttpError } from '../utils/http.util';
import { getHttpTimeoutMs, getProviderBaseUrl } from './providers.config';

type Fetched<T> = { ok: true; data: T } | { ok: false; message: string };

@Injectable()
export class CoinglassDerivativesProvider implements DerivativeMetricsSource {
  readonly kind = 'automated';
  readonly provider = 'coinglass';
  private readonly logger = new Logger(CoinglassDerivativesProvider.name);
  private readonly apiKey: string;
  private readonly http: AxiosInstance;

  constructor(configService: ConfigService) {
    this.apiKey = (configService.get<string>('COINGLASS_API_KEY') ?? '').trim();
    this.http = createHttpClient(
      getProviderBaseUrl(configService, 'coinglass'),
      getHttpTimeoutMs(configService),
      { accept: 'application/json', coinglassSecret: this.apiKey },
    );
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Open interest, volume and 24h liquidations per instrument. Liquidations
   * are optional per instrument; the overview endpoint failing for every
   * instrument is reported as an upstream error.
   */
  async collect(snapshot: MarketSnapshot): Promise<DerivativesResult> {
    if (!this.isConfigured()) {
      this.logger.error('COINGLASS_API_KEY is not set, automated derivatives data is disabled.');
      return { status: 'not_configured' };
    }

    const metrics = emptyDerivativeMetricsMap();
    const overviewErrors: string[] = [];

    for (const symbol of INSTRUMENT_SYMBOLS) {
      const entry = metrics[symbol];

      const overview = await this.fetchOverview(symbol);
      if (overview.ok) {
        entry.volume24h = toMetric(overview.data.totalVolume);
        entry.openInterest = toMetric(overview.data.openInterest);
      } else {
        overviewErrors.push(`${symbol}: ${overview.message}`);
      }

      const liquidations = await this.fetchLiquidations(symbol);
      if (liquidations.ok) {
        this.applyLiquidations(entry, liquidations.data);
      }
    }

    if (overviewErrors.length === INSTRUMENT_SYMBOLS.length) {
      const message = overviewErrors.join('; ');
      this.logger.error(JSON.stringify({ event: 'derivatives_unavailable', provider: this.provider, message }));
      return { status: 'upstream_error', message };
    }

    return { status: 'ok', metrics: withSnapshotQuotes(metrics, snapshot) };
  }

  private async fetchOverview(symbol: InstrumentSymbol): Promise<Fetched<Record<string, unknown>>> {
    const result = await this.request('/futures/openInterest', { symbol });
    if (!result.ok) {
      this.warn('derivatives_overview_failed', symbol, result.message);
      return result;
    }
    if (!isRecord(result.data)) {
      this.warn('derivatives_overview_failed', symbol, 'no overview data');
      return { ok: false, message: 'no overview data' };
    }
    return { ok: true, data: result.data };
  }

  private async fetchLiquidations(symbol: InstrumentSymbol): Promise<Fetched<Record<string, unknown>>> {
    const result = await this.request('/liquidation/history', { symbol, interval: 'h24' });
    if (!result.ok) {
      this.warn('derivatives_liquidations_failed', symbol, result.message);
      return result;
    }
    // most recent entry first
    const latest = Array.isArray(result.data) ? result.data[0] : undefined;
    if (!isRecord(latest)) {
      this.warn('derivatives_liquidations_empty', symbol, 'no 24h liquidation data');
      return { ok: false, message: 'no 24h liquidation data' };
    }
    return { ok: true, data: latest };
  }

  private async request(path: string, params: Record<string, string>): Promise<Fetched<unknown>> {
    try {
      const response = await this.http.get<unknown>(path, { params });
      const body = response.data;
      if (!isRecord(body) || !body.success) {
        return { ok: false, message: 'request was not successful' };
      }
      return { ok: true, data: body.data };
    } catch (error) {
      return { ok: false, message: describeHttpError(error) };
    }
  }

  private applyLiquidations(entry: DerivativeMetrics, data: Record<string, unknown>): void {
    entry.longLiquidations24h = toMetric(data.longLiquidation);
    entry.shortLiquidations24h = toMetric(data.shortLiquidation);
    entry.totalLiquidations24h = toMetric(data.totalLiquidation);
  }

  private warn(event: string, symbol: InstrumentSymbol, message: string): void {
    this.logger.warn(JSON.stringify({ event, provider: this.provider, symbol, message }));
  }
}
