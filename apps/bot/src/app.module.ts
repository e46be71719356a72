import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { DashboardSchedulerModule } from './cron/dashboard-scheduler.module';
import { HealthController } from './health.controller';
import { TelegramBotModule } from './telegram/telegram-bot.module';

@Module({
  imports: [CoreModule, TelegramBotModule, DashboardSchedulerModule],
  controllers: [HealthController],
})
export class AppModule {}
