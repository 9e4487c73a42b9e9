#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { logger } from './utils/logger';
import { configService } from './config/config.service';
import { createLDAPClient } from './config/ldap';
import { ConfigurationError, ConnectionError } from './services/base/errors';
import { accountLifecycleJob } from './jobs/account-lifecycle.job';
import { startScheduler } from './jobs/scheduler';
import { createLifecycleService, parseCommandLine } from './cli';

async function main(): Promise<number> {
  const command = parseCommandLine(process.argv.slice(2));

  const validation = configService.initialize();
  if (!validation.isValid) {
    throw new ConfigurationError(`Invalid configuration: ${validation.errors.join('; ')}`);
  }

  const config = configService.getConfig();
  logger.level = config.app.logging.level;
  if (!config.ad) {
    throw new ConfigurationError('Active Directory is not configured');
  }
  logger.info(configService.getConfigSummary());

  const ldap = createLDAPClient(config.ad);
  if (!(await ldap.testConnection())) {
    throw new ConnectionError(`Cannot bind to ${config.ad.server}`);
  }
  const service = createLifecycleService(config, ldap);

  if (command.command === 'run') {
    try {
      const result = await accountLifecycleJob(service, {
        kinds: command.kinds,
        apply: command.apply,
        sendReport: command.sendReport,
        names: command.names,
        searchBases: command.searchBase
          ? { computer: command.searchBase, user: command.searchBase }
          : undefined
      });
      return result.success ? 0 : 1;
    } finally {
      await ldap.close();
    }
  }

  const scheduler = startScheduler(config.schedule, () => accountLifecycleJob(service, {
    kinds: ['computer', 'user'],
    apply: config.app.applyActions,
    sendReport: true
  }));

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    scheduler.stop();
    ldap.close()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Error closing LDAP connections:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return 0;
}

main()
  .then(code => {
    // The scheduler keeps the process alive on its own
    if (code !== 0) {
      process.exitCode = code;
    }
  })
  .catch(error => {
    logger.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
