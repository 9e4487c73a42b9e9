/**
 * Configuration Types and Interfaces
 * Centralized type definitions for all application configuration
 */

import type { AccountKind, PolicyConfig } from '../lifecycle/types';
import type { ScheduleConfig } from '../utils/schedule';

export interface ADConfig {
  server: string;
  baseDN: string;
  username: string;
  password: string;
  useLDAPS: boolean;
  timeout: number;
  connectTimeout: number;
  maxConnections: number;
}

export interface SearchBaseConfig {
  computer: string;
  user: string;
}

export interface MailConfig {
  host?: string;
  port: number;
  secure: boolean;
  username?: string;
  password?: string;
  sender?: string;
  recipients: string[];
  subject: string;
}

export interface ArchiveConfig {
  path?: string;
  removeUsersAfterArchive: boolean;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  applyActions: boolean;
  logging: {
    level: 'error' | 'warn' | 'info' | 'debug';
  };
}

export interface ApplicationConfiguration {
  app: AppConfig;
  ad?: ADConfig;  // Optional - may not be configured
  searchBases: SearchBaseConfig;
  policies: Record<AccountKind, PolicyConfig>;
  mail: MailConfig;
  archive: ArchiveConfig;
  schedule: ScheduleConfig;
}

export interface ServiceAvailability {
  ad: boolean;
  mail: boolean;
  archive: boolean;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  availability: ServiceAvailability;
}

export type ServiceType = keyof ServiceAvailability;
