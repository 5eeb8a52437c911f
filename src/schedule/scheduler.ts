/**
 * Scheduler: node-cron jobs for recurring profile and trends runs.
 * Started by `gridscout server` when schedule.jobs is non-empty.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type Database from 'better-sqlite3';
import type { Config, ScheduleJob } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runProfile, runTrends, type CollaboratorFactory } from '../engine/runner.js';

let tasks: ScheduledTask[] = [];

export function describeJob(job: ScheduleJob): string {
  return job.kind === 'profile' ? `profile:${job.handle}` : `trends:${job.category}`;
}

/**
 * Execute one scheduled job. Failures are logged, never thrown, so one bad
 * job does not take the scheduler down.
 */
export async function runScheduledJob(
  db: Database.Database,
  config: Config,
  job: ScheduleJob,
  collaborators?: CollaboratorFactory,
): Promise<boolean> {
  const name = describeJob(job);
  logger.info({ job: name }, 'Scheduled run starting');
  try {
    const run =
      job.kind === 'profile'
        ? await runProfile(db, config, { handle: job.handle, posts: job.posts, writeFile: true, collaborators })
        : await runTrends(db, config, {
            category: job.category,
            maxReels: job.max_reels,
            maxHours: job.max_hours,
            writeFile: true,
            collaborators,
          });
    logger.info({ job: name, runId: run.runId, records: run.report.result.records.length }, 'Scheduled run complete');
    return true;
  } catch (err) {
    logger.error({ job: name, error: errorMessage(err) }, 'Scheduled run failed');
    return false;
  }
}

export function startScheduler(db: Database.Database, config: Config): number {
  for (const job of config.schedule.jobs) {
    if (!cron.validate(job.cron)) {
      logger.warn({ job: describeJob(job), cron: job.cron }, 'Invalid cron expression, job skipped');
      continue;
    }
    tasks.push(
      cron.schedule(job.cron, () => {
        void runScheduledJob(db, config, job);
      }),
    );
  }

  if (tasks.length > 0) {
    logger.info({ jobs: tasks.length }, 'Scheduler started');
  }
  return tasks.length;
}

export function stopScheduler(): void {
  for (const task of tasks) {
    task.stop();
  }
  tasks = [];
  logger.info('Scheduler stopped');
}
