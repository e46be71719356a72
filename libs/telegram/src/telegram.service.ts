import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';

@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot: Telegraf;
  private readonly channelId: string;
  private readonly adminId: string;
  private readonly disableWebPreview: boolean;

  constructor(configService: ConfigService) {
    const token = configService.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) throw new Error('TELEGRAM_BOT_TOKEN is required');

    this.channelId = String(configService.get<string>('TELEGRAM_CHANNEL_ID', '')).trim();
    this.adminId = String(configService.get<number>('TELEGRAM_ADMIN_ID', 0));
    this.disableWebPreview = configService.get<boolean>('TELEGRAM_DISABLE_WEB_PAGE_PREVIEW', false);
    this.bot = new Telegraf(token);
  }

  getChannelId(): string {
    return this.channelId;
  }

  /** Every message the bot sends is HTML: reports and notices escape their values. */
  async sendMessage(chatId: string | number, message: string): Promise<number> {
    const response = await this.bot.telegram.sendMessage(chatId, message, {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: this.disableWebPreview },
    });
    return response.message_id;
  }

  /** Best-effort message to the administrative operator; never throws. */
  async notifyAdmin(message: string): Promise<boolean> {
    if (!this.adminId || this.adminId === '0') {
      this.logger.warn('TELEGRAM_ADMIN_ID is not configured, admin notification dropped.');
      return false;
    }
    try {
      await this.sendMessage(this.adminId, message);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(JSON.stringify({ event: 'admin_notify_failed', message: reason }));
      return false;
    }
  }
}
