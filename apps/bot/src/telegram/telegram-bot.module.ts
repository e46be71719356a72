import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { ReportModule } from '../report/report.module';
import { TelegramBotController } from './telegram-bot.controller';
import { TelegramBotService } from './telegram-bot.service';

@Module({
  imports: [CoreModule, ReportModule],
  controllers: [TelegramBotController],
  providers: [TelegramBotService],
})
export class TelegramBotModule {}
