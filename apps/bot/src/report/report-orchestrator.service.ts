import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CoinglassDerivativesProvider,
  DerivativeMetricsSource,
  ManualDerivativesSource,
  PriceIndexProvider,
  SentimentProvider,
} from '@libs/market-data';
import { formatDashboardReport, TelegramService } from '@libs/telegram';
import { ReportDeliveryService } from './report-delivery.service';
import { API_ERROR_WARNING, CONFIG_MISSING_WARNING } from './report.messages';

export type ReportTarget = { kind: 'channel' } | { kind: 'chat'; chatId: string };

export type ReportOutcome =
  | { status: 'published'; chatId: string }
  | { status: 'not_configured' }
  | { status: 'upstream_error'; message: string }
  | { status: 'delivery_failed'; chatId: string };

/**
 * One report cycle: price index, sentiment, derivatives (automated or
 * manual), formatting and delivery, strictly in that order. Cycles are not
 * serialised against each other.
 */
@Injectable()
export class ReportOrchestratorService {
  private readonly logger = new Logger(ReportOrchestratorService.name);
  private readonly timeZone: string;
  private readonly timeZoneLabel: string;

  constructor(
    private readonly priceIndexProvider: PriceIndexProvider,
    private readonly sentimentProvider: SentimentProvider,
    private readonly derivativesProvider: CoinglassDerivativesProvider,
    private readonly deliveryService: ReportDeliveryService,
    private readonly telegramService: TelegramService,
    configService: ConfigService,
  ) {
    this.timeZone = configService.get<string>('REPORT_TIMEZONE', 'Europe/Moscow');
    this.timeZoneLabel = configService.get<string>('REPORT_TIMEZONE_LABEL', 'MSK');
  }

  runAutomated(target: ReportTarget): Promise<ReportOutcome> {
    return this.run(this.derivativesProvider, target);
  }

  runManual(input: string, target: ReportTarget): Promise<ReportOutcome> {
    return this.run(new ManualDerivativesSource(input), target);
  }

  private async run(source: DerivativeMetricsSource, target: ReportTarget): Promise<ReportOutcome> {
    const chatId = target.kind === 'channel' ? this.telegramService.getChannelId() : target.chatId;
    this.logger.log(`Building dashboard (${source.kind}) for ${chatId}.`);

    const market = await this.priceIndexProvider.fetchSnapshot();
    const sentiment = await this.sentimentProvider.fetchLatest();
    const derivatives = await source.collect(market);

    if (derivatives.status === 'not_configured') {
      this.logger.warn('Derivatives source is not configured, dashboard cancelled.');
      await this.telegramService.notifyAdmin(CONFIG_MISSING_WARNING);
      return { status: 'not_configured' };
    }

    if (derivatives.status === 'upstream_error') {
      this.logger.error(JSON.stringify({ event: 'report_cancelled', message: derivatives.message }));
      await this.telegramService.notifyAdmin(API_ERROR_WARNING);
      return { status: 'upstream_error', message: derivatives.message };
    }

    const document = formatDashboardReport({
      derivatives: derivatives.metrics,
      sentiment,
      market,
      timeZone: this.timeZone,
      timeZoneLabel: this.timeZoneLabel,
    });

    const delivered = await this.deliveryService.deliver(document, chatId);
    return delivered ? { status: 'published', chatId } : { status: 'delivery_failed', chatId };
  }
}
