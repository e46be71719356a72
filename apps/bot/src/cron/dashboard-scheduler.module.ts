import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { ReportModule } from '../report/report.module';
import { DashboardScheduler } from './dashboard.scheduler';

@Module({
  imports: [CoreModule, ReportModule],
  providers: [DashboardScheduler],
})
export class DashboardSchedulerModule {}
