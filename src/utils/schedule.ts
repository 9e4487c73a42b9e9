import dayjs from 'dayjs';

export type ScheduleFrequency = 'daily' | 'weekly' | 'monthly';

export interface ScheduleConfig {
  frequency: ScheduleFrequency;
  time: string; // HH:MM format
  dayOfWeek?: number; // 0-6 (Sunday-Saturday)
  dayOfMonth?: number; // 1-28
}

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function parseTime(time: string): [number, number] {
  const [hours, minutes] = time.split(':').map(Number);
  return [hours, minutes];
}

/**
 * Calculate the next run time based on schedule configuration
 */
export function calculateNextRun(config: ScheduleConfig, from: Date = new Date()): Date {
  const [hours, minutes] = parseTime(config.time);
  const now = dayjs(from);
  let nextRun = now.hour(hours).minute(minutes).second(0).millisecond(0);

  switch (config.frequency) {
    case 'daily':
      // If the time has already passed today, move to tomorrow
      if (nextRun.isBefore(now)) {
        nextRun = nextRun.add(1, 'day');
      }
      break;

    case 'weekly': {
      if (config.dayOfWeek === undefined) {
        throw new Error('Day of week is required for weekly schedules');
      }

      // Find the next occurrence of the specified day
      let daysToAdd = config.dayOfWeek - nextRun.day();
      if (daysToAdd < 0 || (daysToAdd === 0 && nextRun.isBefore(now))) {
        daysToAdd += 7;
      }

      nextRun = nextRun.add(daysToAdd, 'day');
      break;
    }

    case 'monthly': {
      if (config.dayOfMonth === undefined) {
        throw new Error('Day of month is required for monthly schedules');
      }

      nextRun = nextRun.date(config.dayOfMonth);

      // If the date has already passed this month, move to next month
      if (nextRun.isBefore(now)) {
        nextRun = nextRun.add(1, 'month');
      }
      break;
    }

    default:
      throw new Error(`Unknown frequency: ${String(config.frequency)}`);
  }

  return nextRun.toDate();
}

/**
 * Translate the schedule into a node-cron expression
 */
export function toCronExpression(config: ScheduleConfig): string {
  const [hours, minutes] = parseTime(config.time);

  switch (config.frequency) {
    case 'daily':
      return `${minutes} ${hours} * * *`;
    case 'weekly':
      return `${minutes} ${hours} * * ${config.dayOfWeek ?? 0}`;
    case 'monthly':
      return `${minutes} ${hours} ${config.dayOfMonth ?? 1} * *`;
    default:
      throw new Error(`Unknown frequency: ${String(config.frequency)}`);
  }
}

/**
 * Get a human-readable description of the schedule
 */
export function getScheduleDescription(config: ScheduleConfig): string {
  const time = config.time;

  switch (config.frequency) {
    case 'daily':
      return `Daily at ${time}`;

    case 'weekly': {
      const dayName = config.dayOfWeek !== undefined ? DAY_NAMES[config.dayOfWeek] : 'Unknown';
      return `Every ${dayName} at ${time}`;
    }

    case 'monthly':
      return `Monthly on day ${config.dayOfMonth} at ${time}`;

    default:
      return 'Unknown schedule';
  }
}

/**
 * Validate schedule configuration
 */
export function validateScheduleConfig(config: ScheduleConfig): { valid: boolean; error?: string } {
  // Validate time format
  const timeRegex = /^([0-1]?[0-9]|2[0-3]):[0-5][0-9]$/;
  if (!timeRegex.test(config.time)) {
    return { valid: false, error: 'Invalid time format. Use HH:MM' };
  }

  switch (config.frequency) {
    case 'daily':
      // No additional validation needed
      break;

    case 'weekly':
      if (config.dayOfWeek === undefined || !Number.isInteger(config.dayOfWeek) || config.dayOfWeek < 0 || config.dayOfWeek > 6) {
        return { valid: false, error: 'Day of week must be between 0 (Sunday) and 6 (Saturday)' };
      }
      break;

    case 'monthly':
      // Limited to days that exist in every month
      if (config.dayOfMonth === undefined || !Number.isInteger(config.dayOfMonth) || config.dayOfMonth < 1 || config.dayOfMonth > 28) {
        return { valid: false, error: 'Day of month must be between 1 and 28' };
      }
      break;

    default:
      return { valid: false, error: 'Invalid frequency. Use daily, weekly, or monthly' };
  }

  return { valid: true };
}
