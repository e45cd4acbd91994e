/**
 * Scheduler — node-cron job that repeats the check on a schedule.
 * Started by `tubewatch watch`.
 */

import cron from 'node-cron';
import { logger } from '../shared/logger.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import type { RunReport } from '../engine/run.js';

export type ScheduledCheck = (signal: AbortSignal) => Promise<RunReport>;

export interface Watcher {
  stop(): Promise<void>;
}

/**
 * Runs never overlap: a tick that fires while a check is still in flight is
 * skipped. `stop` aborts the in-flight check and waits for it to drain.
 */
export function startWatch(cronExpr: string, check: ScheduledCheck): Watcher {
  if (!cron.validate(cronExpr)) {
    throw new ConfigError(`Invalid cron expression: ${cronExpr}`, { cron: cronExpr });
  }

  let inFlight: Promise<void> | null = null;
  let controller: AbortController | null = null;

  const tick = (): void => {
    if (inFlight) {
      logger.warn({ cron: cronExpr }, 'Previous check still running, skipping tick');
      return;
    }
    controller = new AbortController();
    inFlight = check(controller.signal)
      .then((report) => {
        if (report.fatal) {
          logger.error({ kind: report.fatal.kind }, 'Scheduled check hit a credential failure');
        }
      })
      .catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Scheduled check failed');
      })
      .finally(() => {
        inFlight = null;
        controller = null;
      });
  };

  const task = cron.schedule(cronExpr, tick);
  logger.info({ cron: cronExpr }, 'Scheduler started');

  return {
    async stop() {
      task.stop();
      controller?.abort();
      if (inFlight) await inFlight;
      logger.info('Scheduler stopped');
    },
  };
}
