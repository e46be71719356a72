import { BadRequestException, Body, Controller, Headers, Post, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isTelegramUpdate, TelegramBotService } from './telegram-bot.service';

@Controller('telegram')
export class TelegramBotController {
  constructor(
    private readonly configService: ConfigService,
    private readonly telegramBotService: TelegramBotService,
  ) {}

  @Post('webhook')
  async handleWebhook(
    @Body() body: unknown,
    @Headers('x-telegram-bot-api-secret-token') apiSecret?: string,
  ): Promise<{ ok: true }> {
    const secret = this.configService.get<string>('TELEGRAM_WEBHOOK_SECRET', '');
    if (!secret || !apiSecret || apiSecret !== secret) {
      throw new UnauthorizedException();
    }
    if (!isTelegramUpdate(body)) {
      throw new BadRequestException('Not a Telegram update');
    }

    await this.telegramBotService.handleUpdate(body);
    return { ok: true };
  }
}
