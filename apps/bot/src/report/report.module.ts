import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { TelegramModule } from '@libs/telegram';
import { ReportDeliveryService } from './report-delivery.service';
import { ReportOrchestratorService } from './report-orchestrator.service';

@Module({
  imports: [CoreModule, MarketDataModule, TelegramModule],
  providers: [ReportDeliveryService, ReportOrchestratorService],
  exports: [ReportOrchestratorService],
})
export class ReportModule {}
