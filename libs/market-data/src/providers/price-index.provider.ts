import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { INSTRUMENT_SYMBOLS, InstrumentQuote, InstrumentSymbol, MarketSnapshot } from '../models';
import { isRecord, toMetric, unavailableSnapshot } from '../normalizers';
import { createHttpClient, describeHttpError } from '../utils/http.util';
import { getHttpTimeoutMs, getProviderBaseUrl } from './providers.config';

const COINGECKO_IDS: Record<InstrumentSymbol, string> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  XRP: 'ripple',
};

@Injectable()
export class PriceIndexProvider {
  readonly provider = 'coingecko';
  private readonly logger = new Logger(PriceIndexProvider.name);
  private readonly http: AxiosInstance;

  constructor(configService: ConfigService) {
    this.http = createHttpClient(
      getProviderBaseUrl(configService, 'coingecko'),
      getHttpTimeoutMs(configService),
    );
  }

  /**
   * Spot prices, 24h change and BTC dominance. Never throws: on any failure
   * every field of the returned snapshot is unavailable.
   */
  async fetchSnapshot(): Promise<MarketSnapshot> {
    try {
      const prices = await this.http.get<unknown>('/simple/price', {
        params: {
          ids: INSTRUMENT_SYMBOLS.map((symbol) => COINGECKO_IDS[symbol]).join(','),
          vs_currencies: 'usd',
          include_24hr_change: 'true',
        },
      });
      const global = await this.http.get<unknown>('/global');
      return this.toSnapshot(prices.data, global.data);
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: 'price_index_fetch_failed',
          provider: this.provider,
          message: describeHttpError(error),
        }),
      );
      return unavailableSnapshot();
    }
  }

  private toSnapshot(prices: unknown, global: unknown): MarketSnapshot {
    if (!isRecord(prices) || !isRecord(global)) {
      throw new Error('Malformed price index payload');
    }

    const quote = (symbol: InstrumentSymbol): InstrumentQuote => {
      const entry = prices[COINGECKO_IDS[symbol]];
      const fields = isRecord(entry) ? entry : {};
      return {
        symbol,
        price: toMetric(fields.usd),
        change24hPct: toMetric(fields.usd_24h_change),
      };
    };

    const data = isRecord(global.data) ? global.data : {};
    const marketCap = isRecord(data.market_cap_percentage) ? data.market_cap_percentage : {};

    return {
      quotes: { BTC: quote('BTC'), ETH: quote('ETH'), XRP: quote('XRP') },
      btcDominancePct: toMetric(marketCap.btc),
    };
  }
}
