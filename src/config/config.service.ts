import {
  ApplicationConfiguration,
  ConfigValidationResult,
  ServiceAvailability,
  ADConfig,
  MailConfig,
  ServiceType
} from './types';
import { AccountKind, PolicyConfig } from '../lifecycle/types';
import { DEFAULT_POLICIES } from '../lifecycle/classifier';
import { ConfigurationError } from '../services/base/errors';
import { ScheduleConfig, ScheduleFrequency, validateScheduleConfig } from '../utils/schedule';
import { logger } from '../utils/logger';

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
const NODE_ENVS = ['development', 'production', 'test'] as const;
const FREQUENCIES: readonly ScheduleFrequency[] = ['daily', 'weekly', 'monthly'];

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find(candidate => candidate === value) ?? fallback;
}

function flag(value: string | undefined): boolean {
  return value?.toLowerCase() === 'true';
}

function integer(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer (got '${value}')`, name);
  }
  return parsed;
}

function list(value: string | undefined): string[] {
  return (value || '')
    .split(/[,;]/)
    .map(entry => entry.trim())
    .filter(Boolean);
}

/**
 * Parse a day threshold. Anything but a positive integer is rejected.
 */
export function parseDayThreshold(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const days = Number(value.trim());
  if (!Number.isInteger(days) || days <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got '${value}')`, name);
  }
  return days;
}

export function validatePolicy(kind: AccountKind, policy: PolicyConfig): void {
  for (const field of ['disableDays', 'removeDays'] as const) {
    const days = policy[field];
    if (!Number.isInteger(days) || days <= 0) {
      throw new ConfigurationError(`${kind} ${field} must be a positive integer (got ${days})`, field);
    }
  }
}

/**
 * Centralized Configuration Management Service
 * Handles environment variable parsing, validation and service availability detection
 */
export class ConfigurationService {
  private static instance: ConfigurationService | null = null;
  private config: ApplicationConfiguration | null = null;
  private validationResult: ConfigValidationResult | null = null;

  static getInstance(): ConfigurationService {
    if (!this.instance) {
      this.instance = new ConfigurationService();
    }
    return this.instance;
  }

  /**
   * Initialize and validate configuration.
   * Throws ConfigurationError for invalid day thresholds.
   */
  initialize(env: Env = process.env): ConfigValidationResult {
    logger.info('Initializing configuration service...');

    this.config = this.loadConfiguration(env);
    this.validationResult = this.validateConfiguration(this.config);

    if (this.validationResult.errors.length > 0) {
      logger.error('Configuration validation errors:', { errors: this.validationResult.errors });
    }

    if (this.validationResult.warnings.length > 0) {
      logger.warn('Configuration validation warnings:', { warnings: this.validationResult.warnings });
    }

    logger.info('Service availability:', this.validationResult.availability);
    return this.validationResult;
  }

  /**
   * Get full application configuration
   */
  getConfig(): ApplicationConfiguration {
    if (!this.config) {
      throw new ConfigurationError('Configuration not initialized. Call initialize() first.');
    }
    return this.config;
  }

  /**
   * Get configuration for a specific section
   */
  getServiceConfig<T extends keyof ApplicationConfiguration>(section: T): ApplicationConfiguration[T] {
    return this.getConfig()[section];
  }

  /**
   * Check if a service is available and properly configured
   */
  isServiceAvailable(service: ServiceType): boolean {
    if (!this.validationResult) {
      throw new ConfigurationError('Configuration not initialized. Call initialize() first.');
    }
    return this.validationResult.availability[service];
  }

  hasErrors(): boolean {
    return (this.validationResult?.errors?.length ?? 0) > 0;
  }

  getErrors(): string[] {
    return this.validationResult?.errors || [];
  }

  /**
   * Load configuration from environment variables
   */
  private loadConfiguration(env: Env): ApplicationConfiguration {
    const ad = this.loadADConfig(env);
    const baseDN = ad?.baseDN ?? '';

    return {
      app: {
        nodeEnv: pick(env.NODE_ENV, NODE_ENVS, 'development'),
        applyActions: flag(env.APPLY_ACTIONS),
        logging: {
          level: pick(env.LOG_LEVEL, LOG_LEVELS, 'info')
        }
      },
      ad,
      searchBases: {
        computer: env.COMPUTER_SEARCH_BASE || baseDN,
        user: env.USER_SEARCH_BASE || baseDN
      },
      policies: {
        computer: {
          disableDays: parseDayThreshold('COMPUTER_DISABLE_DAYS', env.COMPUTER_DISABLE_DAYS, DEFAULT_POLICIES.computer.disableDays),
          removeDays: parseDayThreshold('COMPUTER_REMOVE_DAYS', env.COMPUTER_REMOVE_DAYS, DEFAULT_POLICIES.computer.removeDays)
        },
        user: {
          disableDays: parseDayThreshold('USER_DISABLE_DAYS', env.USER_DISABLE_DAYS, DEFAULT_POLICIES.user.disableDays),
          removeDays: parseDayThreshold('USER_REMOVE_DAYS', env.USER_REMOVE_DAYS, DEFAULT_POLICIES.user.removeDays)
        }
      },
      mail: this.loadMailConfig(env),
      archive: {
        path: env.ARCHIVE_PATH || undefined,
        removeUsersAfterArchive: flag(env.REMOVE_USERS_AFTER_ARCHIVE)
      },
      schedule: this.loadScheduleConfig(env)
    };
  }

  /**
   * Load Active Directory configuration
   */
  private loadADConfig(env: Env): ADConfig | undefined {
    const server = env.AD_SERVER;
    const baseDN = env.AD_BASE_DN;
    const username = env.AD_USERNAME;
    const password = env.AD_PASSWORD;

    if (!server || !baseDN || !username || !password) {
      return undefined;
    }

    return {
      server,
      baseDN,
      username,
      password,
      useLDAPS: flag(env.AD_USE_LDAPS),
      timeout: integer('LDAP_TIMEOUT', env.LDAP_TIMEOUT, 30000),
      connectTimeout: integer('LDAP_CONNECT_TIMEOUT', env.LDAP_CONNECT_TIMEOUT, 10000),
      maxConnections: integer('LDAP_MAX_CONNECTIONS', env.LDAP_MAX_CONNECTIONS, 5)
    };
  }

  private loadMailConfig(env: Env): MailConfig {
    return {
      host: env.SMTP_HOST || undefined,
      port: integer('SMTP_PORT', env.SMTP_PORT, 25),
      secure: flag(env.SMTP_SECURE),
      username: env.SMTP_USER || undefined,
      password: env.SMTP_PASSWORD || undefined,
      sender: env.REPORT_SENDER || undefined,
      recipients: list(env.REPORT_RECIPIENTS),
      subject: env.REPORT_SUBJECT || 'AD account lifecycle report'
    };
  }

  private loadScheduleConfig(env: Env): ScheduleConfig {
    return {
      frequency: pick(env.SCHEDULE_FREQUENCY, FREQUENCIES, 'weekly'),
      time: env.SCHEDULE_TIME || '06:00',
      dayOfWeek: integer('SCHEDULE_DAY_OF_WEEK', env.SCHEDULE_DAY_OF_WEEK, 1),
      dayOfMonth: integer('SCHEDULE_DAY_OF_MONTH', env.SCHEDULE_DAY_OF_MONTH, 1)
    };
  }

  /**
   * Validate the loaded configuration
   */
  private validateConfiguration(config: ApplicationConfiguration): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const availability: ServiceAvailability = {
      ad: !!config.ad,
      mail: !!config.mail.host && !!config.mail.sender && config.mail.recipients.length > 0,
      archive: !!config.archive.path
    };

    if (!availability.ad) {
      errors.push('Active Directory configuration not found - set AD_SERVER, AD_BASE_DN, AD_USERNAME and AD_PASSWORD');
    }

    if (config.mail.recipients.length > 0 && !config.mail.sender) {
      errors.push('REPORT_SENDER is required when REPORT_RECIPIENTS is set');
    }

    if (config.mail.recipients.length > 0 && !config.mail.host) {
      errors.push('SMTP_HOST is required when REPORT_RECIPIENTS is set');
    }

    if (!availability.mail) {
      warnings.push('Mail delivery not configured - reports will only be logged');
    }

    if (!availability.archive) {
      warnings.push('ARCHIVE_PATH not set - user removals will be aborted');
    }

    if (config.archive.removeUsersAfterArchive && !availability.archive) {
      errors.push('REMOVE_USERS_AFTER_ARCHIVE requires ARCHIVE_PATH');
    }

    const schedule = validateScheduleConfig(config.schedule);
    if (!schedule.valid) {
      errors.push(`Schedule: ${schedule.error}`);
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
      availability
    };
  }

  /**
   * Get a human-readable configuration summary
   */
  getConfigSummary(): string {
    if (!this.config || !this.validationResult) {
      return 'Configuration not initialized';
    }

    const { availability } = this.validationResult;
    const enabledServices = Object.entries(availability)
      .filter(([_, enabled]) => enabled)
      .map(([service]) => service)
      .join(', ');

    const { computer, user } = this.config.policies;
    return `Configuration loaded. Available services: ${enabledServices || 'none'}. ` +
      `Computers ${computer.disableDays}/${computer.removeDays} days, users ${user.disableDays}/${user.removeDays} days`;
  }
}

// Export singleton instance
export const configService = ConfigurationService.getInstance();
