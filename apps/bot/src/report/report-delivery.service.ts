import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  chunkSegments,
  ReportDocument,
  TELEGRAM_REPORT_MAX_LENGTH,
  TelegramService,
} from '@libs/telegram';
import { deliveryFailedNotice } from './report.messages';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

@Injectable()
export class ReportDeliveryService {
  private readonly logger = new Logger(ReportDeliveryService.name);
  private readonly maxLength: number;
  private readonly pauseMs: number;

  constructor(
    private readonly telegramService: TelegramService,
    configService: ConfigService,
  ) {
    this.maxLength = Number(configService.get<number>('REPORT_CHUNK_MAX_LENGTH', TELEGRAM_REPORT_MAX_LENGTH));
    this.pauseMs = Number(configService.get<number>('REPORT_CHUNK_PAUSE_MS', 1000));
  }

  /**
   * Sends the document chunk by chunk. The first failed chunk aborts the
   * rest and is reported to the admin; an empty document is a failure.
   */
  async deliver(document: ReportDocument, chatId: string): Promise<boolean> {
    const chunks = chunkSegments(document.segments, this.maxLength);
    if (chunks.length === 0) {
      this.logger.warn(JSON.stringify({ event: 'report_empty', chatId }));
      return false;
    }

    for (const [index, chunk] of chunks.entries()) {
      try {
        await this.telegramService.sendMessage(chatId, chunk);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(
          JSON.stringify({
            event: 'report_chunk_failed',
            chatId,
            chunk: index + 1,
            chunks: chunks.length,
            message,
          }),
        );
        await this.telegramService.notifyAdmin(deliveryFailedNotice(chatId));
        return false;
      }

      if (index < chunks.length - 1 && this.pauseMs > 0) {
        await delay(this.pauseMs);
      }
    }

    this.logger.log(`Dashboard delivered to ${chatId} in ${chunks.length} message(s).`);
    return true;
  }
}
