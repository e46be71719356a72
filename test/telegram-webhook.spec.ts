import { afterEach, describe, expect, it, vi } from 'vitest';
import { BadRequestException, UnauthorizedException } from '@nestjs/common';
import { CoinglassDerivativesProvider, PriceIndexProvider, SentimentProvider } from '@libs/market-data';
import { TelegramService } from '@libs/telegram';
import { ReportDeliveryService } from '../apps/bot/src/report/report-delivery.service';
import { ReportOrchestratorService } from '../apps/bot/src/report/report-orchestrator.service';
import { TelegramBotController } from '../apps/bot/src/telegram/telegram-bot.controller';
import { TelegramBotService } from '../apps/bot/src/telegram/telegram-bot.service';
import { buildConfigService } from './helpers/config';

const setup = () => {
  const configService = buildConfigService({ TELEGRAM_WEBHOOK_SECRET: 'test-secret' });
  const telegramService = new TelegramService(configService);
  const orchestrator = new ReportOrchestratorService(
    new PriceIndexProvider(configService),
    new SentimentProvider(configService),
    new CoinglassDerivativesProvider(configService),
    new ReportDeliveryService(telegramService, configService),
    telegramService,
    configService,
  );
  const botService = new TelegramBotService(configService, orchestrator);
  const handleUpdate = vi.spyOn(botService, 'handleUpdate').mockResolvedValue(undefined);
  return { controller: new TelegramBotController(configService, botService), handleUpdate };
};

describe('telegram webhook controller', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects requests without the shared secret', async () => {
    const { controller, handleUpdate } = setup();

    await expect(controller.handleWebhook({ update_id: 1 }, 'wrong')).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
    await expect(controller.handleWebhook({ update_id: 1 })).rejects.toBeInstanceOf(UnauthorizedException);
    expect(handleUpdate).not.toHaveBeenCalled();
  });

  it('rejects bodies that are not updates', async () => {
    const { controller } = setup();

    await expect(controller.handleWebhook({ hello: 'world' }, 'test-secret')).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('forwards updates to the bot', async () => {
    const { controller, handleUpdate } = setup();

    await expect(controller.handleWebhook({ update_id: 42 }, 'test-secret')).resolves.toEqual({ ok: true });
    expect(handleUpdate).toHaveBeenCalledWith({ update_id: 42 });
  });
});
