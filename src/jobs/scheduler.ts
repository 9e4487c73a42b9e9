import * as cron from 'node-cron';
import { logger } from '../utils/logger';
import { ConfigurationError, toError } from '../services/base/errors';
import {
  ScheduleConfig,
  calculateNextRun,
  getScheduleDescription,
  toCronExpression,
  validateScheduleConfig
} from '../utils/schedule';

export interface SchedulerHandle {
  stop(): void;
}

/**
 * Register a recurring job. Runs never overlap; a failed run is logged and the
 * schedule keeps going.
 */
export function startScheduler(config: ScheduleConfig, job: () => Promise<unknown>): SchedulerHandle {
  const validation = validateScheduleConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid schedule: ${validation.error}`, 'schedule');
  }

  const expression = toCronExpression(config);
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn('Previous scheduled run still in progress - skipping');
      return;
    }
    running = true;
    try {
      await job();
    } catch (error) {
      logger.error(`Scheduled run failed: ${toError(error).message}`);
    } finally {
      running = false;
      logger.info(`Next scheduled run at ${calculateNextRun(config).toISOString()}`);
    }
  };

  const task = cron.schedule(expression, () => {
    tick().catch(error => logger.error('Scheduler tick failed:', error));
  });

  logger.info(`Scheduler started: ${getScheduleDescription(config)} (${expression})`, {
    nextRun: calculateNextRun(config).toISOString()
  });

  return {
    stop: () => {
      task.stop();
      logger.info('Scheduler stopped');
    }
  };
}
