import { afterEach, describe, expect, it, vi } from 'vitest';
import { CoinglassDerivativesProvider, PriceIndexProvider, SentimentProvider } from '@libs/market-data';
import { TelegramService } from '@libs/telegram';
import { DashboardScheduler } from '../apps/bot/src/cron/dashboard.scheduler';
import { ReportDeliveryService } from '../apps/bot/src/report/report-delivery.service';
import { ReportOrchestratorService, ReportOutcome } from '../apps/bot/src/report/report-orchestrator.service';
import { buildConfigService } from './helpers/config';

const setup = (overrides: Record<string, unknown> = {}) => {
  const configService = buildConfigService(overrides);
  const telegramService = new TelegramService(configService);
  const orchestrator = new ReportOrchestratorService(
    new PriceIndexProvider(configService),
    new SentimentProvider(configService),
    new CoinglassDerivativesProvider(configService),
    new ReportDeliveryService(telegramService, configService),
    telegramService,
    configService,
  );
  const runAutomated = vi.spyOn(orchestrator, 'runAutomated');
  return { scheduler: new DashboardScheduler(orchestrator, configService), runAutomated };
};

describe('dashboard scheduler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('publishes to the channel on each tick', async () => {
    const { scheduler, runAutomated } = setup();
    runAutomated.mockResolvedValue({ status: 'published', chatId: '@test_channel' });

    await scheduler.tick();

    expect(runAutomated).toHaveBeenCalledWith({ kind: 'channel' });
  });

  it('skips a tick while the previous run is still going', async () => {
    const { scheduler, runAutomated } = setup();
    let finish: (outcome: ReportOutcome) => void = () => undefined;
    runAutomated.mockImplementation(
      () =>
        new Promise<ReportOutcome>((resolve) => {
          finish = resolve;
        }),
    );

    const first = scheduler.tick();
    await scheduler.tick();
    finish({ status: 'published', chatId: '@test_channel' });
    await first;

    expect(runAutomated).toHaveBeenCalledTimes(1);
  });

  it('keeps running after a failed tick', async () => {
    const { scheduler, runAutomated } = setup();
    runAutomated.mockRejectedValueOnce(new Error('boom'));
    runAutomated.mockResolvedValueOnce({ status: 'not_configured' });

    await expect(scheduler.tick()).resolves.toBeUndefined();
    await scheduler.tick();

    expect(runAutomated).toHaveBeenCalledTimes(2);
  });

  it('does not schedule anything when autopost is disabled', () => {
    const { scheduler } = setup({ DASHBOARD_AUTOPOST_ENABLED: false });

    scheduler.onModuleInit();

    expect(scheduler.isScheduled()).toBe(false);
  });

  it('schedules the daily job when enabled', () => {
    const { scheduler } = setup({ DASHBOARD_AUTOPOST_ENABLED: true, DASHBOARD_AUTOPOST_CRON: '0 8 * * *' });

    scheduler.onModuleInit();
    expect(scheduler.isScheduled()).toBe(true);

    scheduler.onModuleDestroy();
    expect(scheduler.isScheduled()).toBe(false);
  });
});
