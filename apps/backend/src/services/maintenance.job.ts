import { errorMessage } from '../utils/errors';
import defaultLogger, { Logger } from '../utils/logger';
import { AuditTrailService } from './audit-trail.service';
import { ListingLifecycleService } from './lifecycle/listing-lifecycle.service';

export interface MaintenanceRun {
  reclaimedAssets: number;
  replayedAuditRecords: number;
}

/** Intervals in ms; 0 leaves that task unscheduled. */
export interface MaintenanceSchedule {
  assetSweepMs: number;
  auditRetryMs: number;
}

export type MaintenanceTask = 'asset sweep' | 'audit retry';

/**
 * Periodic housekeeping: reclaims image files of listings past their undo
 * window and replays audit records that failed to persist. Each task runs on
 * its own timer.
 */
export class MaintenanceJob {
  private readonly timers = new Map<MaintenanceTask, NodeJS.Timeout>();
  private readonly running = new Set<MaintenanceTask>();

  constructor(
    private readonly lifecycle: ListingLifecycleService,
    private readonly auditTrail: AuditTrailService,
    private readonly schedule: MaintenanceSchedule,
    private readonly logger: Logger = defaultLogger
  ) {}

  start(): boolean {
    if (this.timers.size > 0) {
      return false;
    }

    this.scheduleTask('asset sweep', this.schedule.assetSweepMs, async () => {
      await this.lifecycle.reclaimAssets();
    });
    this.scheduleTask('audit retry', this.schedule.auditRetryMs, async () => {
      await this.auditTrail.retryPending();
    });

    return this.timers.size > 0;
  }

  stop(): void {
    if (this.timers.size === 0) {
      return;
    }

    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
    this.logger.info('Maintenance job stopped');
  }

  get isScheduled(): boolean {
    return this.timers.size > 0;
  }

  scheduledTasks(): MaintenanceTask[] {
    return [...this.timers.keys()];
  }

  async runOnce(): Promise<MaintenanceRun> {
    const reclaimedAssets = await this.lifecycle.reclaimAssets();
    const replayedAuditRecords = await this.auditTrail.retryPending();
    return { reclaimedAssets, replayedAuditRecords };
  }

  private scheduleTask(task: MaintenanceTask, intervalMs: number, run: () => Promise<void>): void {
    if (intervalMs <= 0) {
      return;
    }

    const timer = setInterval(() => {
      void this.tick(task, run);
    }, intervalMs);
    timer.unref();
    this.timers.set(task, timer);

    this.logger.info(`Maintenance ${task} scheduled every ${intervalMs}ms`);
  }

  private async tick(task: MaintenanceTask, run: () => Promise<void>): Promise<void> {
    // Skip a tick while the previous run of the same task is still going
    if (this.running.has(task)) {
      return;
    }

    this.running.add(task);
    try {
      await run();
    } catch (error) {
      this.logger.error(`Maintenance ${task} failed: ${errorMessage(error)}`);
    } finally {
      this.running.delete(task);
    }
  }
}
