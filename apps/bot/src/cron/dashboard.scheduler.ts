import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CronJob } from 'cron';
import { ReportOrchestratorService } from '../report/report-orchestrator.service';

@Injectable()
export class DashboardScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DashboardScheduler.name);
  private job: CronJob | null = null;
  private running = false;

  constructor(
    private readonly reportOrchestrator: ReportOrchestratorService,
    private readonly config: ConfigService,
  ) {}

  onModuleInit(): void {
    const enabled = this.config.get<boolean>('DASHBOARD_AUTOPOST_ENABLED', false);
    if (!enabled) {
      this.logger.log('Dashboard autopost disabled (DASHBOARD_AUTOPOST_ENABLED=false).');
      return;
    }

    const schedule = this.config.get<string>('DASHBOARD_AUTOPOST_CRON') || '0 8 * * *';
    const timezone = this.config.get<string>('REPORT_TIMEZONE') || 'Europe/Moscow';

    this.job = new CronJob(schedule, () => this.tick(), null, false, timezone);
    this.job.start();
    this.logger.log(`Scheduled dashboard autopost (${schedule}) tz=${timezone}`);
  }

  onModuleDestroy(): void {
    this.job?.stop();
    this.job = null;
  }

  isScheduled(): boolean {
    return this.job !== null;
  }

  async tick(): Promise<void> {
    if (this.running) {
      this.logger.warn('Previous dashboard run still in progress, skipping.');
      return;
    }
    this.running = true;
    try {
      const outcome = await this.reportOrchestrator.runAutomated({ kind: 'channel' });
      this.logger.log(JSON.stringify({ event: 'dashboard_autopost', status: outcome.status }));
    } catch (err) {
      this.logger.error('Dashboard autopost failed', err instanceof Error ? err.stack : String(err));
    } finally {
      this.running = false;
    }
  }
}
