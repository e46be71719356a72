import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import type { Update } from 'telegraf/types';
import { ReportOrchestratorService, ReportTarget } from '../report/report-orchestrator.service';
import {
  describeOutcome,
  MANUAL_INPUT_EXPIRED,
  MANUAL_INPUT_RECEIVED,
  manualInputPrompt,
  PERMISSION_DENIED,
  REPORT_STARTED,
  TEST_STARTED,
} from './bot.messages';
import { ManualInputTarget, PendingInput, PendingInputStore } from './pending-input.store';

export type Reply = (text: string) => Promise<unknown>;

export const isTelegramUpdate = (value: unknown): value is Update =>
  typeof value === 'object' &&
  value !== null &&
  'update_id' in value &&
  typeof value.update_id === 'number';

@Injectable()
export class TelegramBotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramBotService.name);
  private readonly bot: Telegraf;
  private readonly adminId: number;
  private readonly aboutText: string;
  private readonly pendingInputs: PendingInputStore;
  private polling = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly reportOrchestrator: ReportOrchestratorService,
  ) {
    const token = this.configService.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) {
      throw new Error('TELEGRAM_BOT_TOKEN is required');
    }

    this.adminId = Number(this.configService.get<number>('TELEGRAM_ADMIN_ID', 0));
    this.aboutText = this.configService.get<string>(
      'BOT_ABOUT_TEXT',
      'This is the market dashboard bot of the channel. Please contact the channel administrator with any questions.',
    );
    const ttlMinutes = Number(this.configService.get<number>('MANUAL_INPUT_TTL_MINUTES', 30));
    this.pendingInputs = new PendingInputStore(ttlMinutes * 60_000);

    this.bot = new Telegraf(token);
    this.registerHandlers();
  }

  onModuleInit(): void {
    const usePolling = this.configService.get<boolean>('TELEGRAM_USE_POLLING', true);
    if (!usePolling) return;

    this.polling = true;
    this.bot
      .launch({ dropPendingUpdates: true }, () => this.logger.log('Telegram bot polling started.'))
      .catch((error: unknown) => {
        this.polling = false;
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(JSON.stringify({ event: 'telegram_polling_failed', message }));
      });
  }

  onModuleDestroy(): void {
    if (this.polling) {
      this.bot.stop();
      this.polling = false;
    }
  }

  async handleUpdate(update: Update): Promise<void> {
    await this.bot.handleUpdate(update);
  }

  isAdmin(userId: number | undefined): boolean {
    return userId !== undefined && this.adminId > 0 && userId === this.adminId;
  }

  async handleAbout(reply: Reply): Promise<void> {
    await reply(this.aboutText);
  }

  async handleReportCommand(userId: number | undefined, reply: Reply): Promise<void> {
    if (!this.isAdmin(userId)) {
      await reply(PERMISSION_DENIED);
      return;
    }
    await reply(REPORT_STARTED);
    const outcome = await this.reportOrchestrator.runAutomated({ kind: 'channel' });
    await reply(describeOutcome(outcome, 'channel'));
  }

  async handleTestCommand(userId: number | undefined, chatId: number, reply: Reply): Promise<void> {
    if (!this.isAdmin(userId)) {
      await reply(PERMISSION_DENIED);
      return;
    }
    await reply(TEST_STARTED);
    const outcome = await this.reportOrchestrator.runAutomated({ kind: 'chat', chatId: String(chatId) });
    await reply(describeOutcome(outcome, 'operator'));
  }

  async handleManualRequest(
    userId: number | undefined,
    chatId: number,
    target: ManualInputTarget,
    reply: Reply,
  ): Promise<void> {
    if (userId === undefined || !this.isAdmin(userId)) {
      await reply(PERMISSION_DENIED);
      return;
    }
    await reply(manualInputPrompt(target));
    this.pendingInputs.open(userId, target, chatId);
    this.logger.log(`Manual Coinglass input requested (${target}).`);
  }

  /**
   * Plain text: manual input from the admin when a session is open, the
   * about text for everyone else.
   */
  async handleText(userId: number | undefined, text: string, reply: Reply): Promise<void> {
    if (userId === undefined || !this.isAdmin(userId)) {
      await reply(this.aboutText);
      return;
    }
    if (text.startsWith('/')) return;

    const consumed = this.pendingInputs.consume(userId);
    if (consumed.status === 'none') return;
    if (consumed.status === 'expired') {
      await reply(MANUAL_INPUT_EXPIRED);
      return;
    }

    await this.processManualInput(consumed.session, text, reply);
  }

  hasPendingInput(userId: number): boolean {
    return this.pendingInputs.has(userId);
  }

  private async processManualInput(session: PendingInput, text: string, reply: Reply): Promise<void> {
    await reply(MANUAL_INPUT_RECEIVED);
    const target: ReportTarget =
      session.target === 'channel' ? { kind: 'channel' } : { kind: 'chat', chatId: String(session.chatId) };
    const outcome = await this.reportOrchestrator.runManual(text, target);
    await reply(describeOutcome(outcome, session.target));
  }

  private registerHandlers(): void {
    this.bot.start((ctx) => this.handleAbout((text) => ctx.reply(text)));
    this.bot.help((ctx) => this.handleAbout((text) => ctx.reply(text)));

    this.bot.command('report', (ctx) => this.handleReportCommand(ctx.from?.id, (text) => ctx.reply(text)));

    this.bot.command('test', (ctx) =>
      this.handleTestCommand(ctx.from?.id, ctx.message.chat.id, (text) => ctx.reply(text)),
    );

    this.bot.command('report_admin', (ctx) =>
      this.handleManualRequest(ctx.from?.id, ctx.message.chat.id, 'channel', (text) => ctx.reply(text)),
    );

    this.bot.command('report_admin_test', (ctx) =>
      this.handleManualRequest(ctx.from?.id, ctx.message.chat.id, 'operator', (text) => ctx.reply(text)),
    );

    this.bot.on('text', (ctx) => this.handleText(ctx.from?.id, ctx.message.text, (text) => ctx.reply(text)));

    this.bot.on('message', async (ctx) => {
      if (this.isAdmin(ctx.from?.id)) return;
      await this.handleAbout((text) => ctx.reply(text));
    });

    this.bot.catch((error, ctx) => {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        JSON.stringify({ event: 'telegram_handler_failed', updateType: ctx.updateType, message }),
      );
    });
  }
}
