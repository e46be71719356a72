import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { SentimentReading } from '../models';
import { isRecord, textMetric, toIntegerMetric, UNAVAILABLE } from '../normalizers';
import { createHttpClient, describeHttpError } from '../utils/http.util';
import { getHttpTimeoutMs, getProviderBaseUrl } from './providers.config';

@Injectable()
export class SentimentProvider {
  readonly provider = 'fear_greed';
  private readonly logger = new Logger(SentimentProvider.name);
  private readonly http: AxiosInstance;

  constructor(configService: ConfigService) {
    this.http = createHttpClient(
      getProviderBaseUrl(configService, 'fear_greed'),
      getHttpTimeoutMs(configService),
    );
  }

  /** Latest Fear & Greed reading, or null when the index cannot be read at all. */
  async fetchLatest(): Promise<SentimentReading | null> {
    try {
      const response = await this.http.get<unknown>('/fng/', { params: { limit: 1 } });
      const entries = isRecord(response.data) ? response.data.data : undefined;
      const latest = Array.isArray(entries) ? entries[0] : undefined;
      if (!isRecord(latest)) {
        this.logger.warn(JSON.stringify({ event: 'sentiment_empty', provider: this.provider }));
        return null;
      }

      const seconds = Number(latest.timestamp);
      return {
        value: toIntegerMetric(latest.value, 0, 100),
        classification:
          typeof latest.value_classification === 'string'
            ? textMetric(latest.value_classification)
            : UNAVAILABLE,
        observedAt: Number.isFinite(seconds) && seconds > 0 ? new Date(seconds * 1000) : undefined,
      };
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: 'sentiment_fetch_failed',
          provider: this.provider,
          message: describeHttpError(error),
        }),
      );
      return null;
    }
  }
}
