import cron, { ScheduledTask } from 'node-cron';
import { logger } from '../utils/logger';
import type { EventService } from '../services/event.service';
import type { ResultService } from '../services/result.service';

export interface TallyRefreshReport {
  refreshed: string[];
  failed: string[];
}

export class JobScheduler {
  private jobs: Map<string, ScheduledTask> = new Map();
  private running: Set<string> = new Set();

  constructor(
    private readonly events: EventService,
    private readonly results: ResultService
  ) {}

  /**
   * Schedule the periodic jobs. An empty pattern leaves the tally refresh off.
   */
  public initialize(tallyRefreshCron: string): void {
    if (!tallyRefreshCron) {
      logger.info('Tally refresh job disabled');
      return;
    }

    this.scheduleJob('tally-refresh', tallyRefreshCron, async () => {
      await this.runTallyRefresh();
    });
  }

  public stop(): void {
    for (const [name, job] of this.jobs) {
      job.stop();
      logger.info(`Stopped job: ${name}`);
    }
    this.jobs.clear();
  }

  public get scheduledJobs(): string[] {
    return [...this.jobs.keys()];
  }

  /**
   * Re-tally every event still open for voting. One event failing does not
   * stop the others.
   */
  public async runTallyRefresh(): Promise<TallyRefreshReport> {
    const report: TallyRefreshReport = { refreshed: [], failed: [] };

    for (const eventId of this.events.listOpenEventIds()) {
      try {
        await this.results.tally(eventId);
        report.refreshed.push(eventId);
      } catch (error) {
        report.failed.push(eventId);
        logger.error(`Tally refresh failed for event ${eventId}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return report;
  }

  private scheduleJob(name: string, cronPattern: string, task: () => Promise<void>): void {
    if (!cron.validate(cronPattern)) {
      throw new Error(`Invalid cron pattern for job ${name}: ${cronPattern}`);
    }

    const job = cron.schedule(cronPattern, async () => {
      // Skip a tick while the previous run is still going
      if (this.running.has(name)) {
        logger.warn(`Job still running, skipping tick: ${name}`);
        return;
      }

      const startTime = Date.now();
      this.running.add(name);
      try {
        logger.info(`Starting job: ${name}`);
        await task();
        logger.info(`Job completed: ${name} (${Date.now() - startTime}ms)`);
      } catch (error) {
        logger.error(`Job failed: ${name} (${Date.now() - startTime}ms)`, error);
      } finally {
        this.running.delete(name);
      }
    });

    this.jobs.set(name, job);
    logger.info(`Scheduled job: ${name} with pattern: ${cronPattern}`);
  }
}
