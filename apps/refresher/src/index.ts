// Scheduled trigger process: calls the API's bulk-refresh and token-health
// endpoints on cron cadences.
import 'dotenv/config';
import { componentLogger } from '@ghl-oauth/token-manager';
import { loadRefresherConfig } from './config.js';
import { ScheduledJob } from './scheduler.js';
import { triggerBulkRefresh, triggerHealthCheck, weeklyMaintenance } from './triggers.js';

const log = componentLogger('refresher');

const cfg = loadRefresherConfig();

const jobs = [
  new ScheduledJob({ name: 'bulk-refresh', schedule: cfg.refreshCron, run: () => triggerBulkRefresh(cfg) }, cfg.timezone),
  new ScheduledJob({ name: 'token-health', schedule: cfg.healthCron, run: () => triggerHealthCheck(cfg) }, cfg.timezone),
  new ScheduledJob({ name: 'weekly-maintenance', schedule: cfg.weeklyCron, run: () => weeklyMaintenance(cfg) }, cfg.timezone),
];

for (const job of jobs) job.start();
log.info({ api: cfg.apiUrl, jobs: jobs.map((j) => j.name) }, 'refresher started');

function shutdown(signal: string) {
  log.info({ signal }, 'refresher stopping');
  for (const job of jobs) job.stop();
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
