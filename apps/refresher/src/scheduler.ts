import cron, { type ScheduledTask } from 'node-cron';
import { componentLogger, errorMessage } from '@ghl-oauth/token-manager';

const log = componentLogger('refresher');

export interface JobDefinition {
  name: string;
  schedule: string;
  run: () => Promise<unknown>;
}

/**
 * One cron job. A run that is still going when the next tick fires makes
 * that tick a no-op.
 */
export class ScheduledJob {
  private task: ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private readonly job: JobDefinition,
    private readonly timezone?: string,
  ) {}

  get name() {
    return this.job.name;
  }

  start(): void {
    if (this.task) {
      log.warn({ job: this.job.name }, 'job already scheduled');
      return;
    }
    this.task = cron.schedule(this.job.schedule, () => void this.tick(), this.timezone ? { timezone: this.timezone } : undefined);
    log.info({ job: this.job.name, schedule: this.job.schedule }, 'job scheduled');
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  /** Returns false when the tick was skipped because a run was in flight. */
  async tick(): Promise<boolean> {
    if (this.isRunning) {
      log.warn({ job: this.job.name }, 'previous run still in progress, skipping');
      return false;
    }
    this.isRunning = true;
    const started = Date.now();
    try {
      await this.job.run();
      log.debug({ job: this.job.name, ms: Date.now() - started }, 'job finished');
    } catch (e) {
      log.error({ job: this.job.name, err: errorMessage(e) }, 'job failed');
    } finally {
      this.isRunning = false;
    }
    return true;
  }
}
