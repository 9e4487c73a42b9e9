import { logger } from '../utils/logger';
import { AccountKind } from '../lifecycle/types';
import { LifecycleService } from '../services/lifecycle.service';
import { LifecycleRunSummary } from '../types/shared-types';
import { toError } from '../services/base/errors';

export interface AccountLifecycleJobData {
  kinds: AccountKind[];
  apply: boolean;
  sendReport: boolean;
  /** Only look up these accounts; requires a single kind */
  names?: string[];
  searchBases?: Partial<Record<AccountKind, string>>;
}

export interface AccountLifecycleJobResult {
  success: boolean;
  duration: number;
  summaries: LifecycleRunSummary[];
  failures: Array<{ kind: AccountKind; message: string }>;
}

/**
 * Run the lifecycle for every requested kind. A kind that fails is logged and
 * the remaining kinds still run.
 */
export const accountLifecycleJob = async (
  service: LifecycleService,
  data: AccountLifecycleJobData
): Promise<AccountLifecycleJobResult> => {
  const startTime = Date.now();
  const summaries: LifecycleRunSummary[] = [];
  const failures: AccountLifecycleJobResult['failures'] = [];

  logger.info('Starting account lifecycle job', { kinds: data.kinds, apply: data.apply });

  for (const kind of data.kinds) {
    try {
      summaries.push(await service.run({
        kind,
        apply: data.apply,
        sendReport: data.sendReport,
        names: data.names,
        searchBase: data.searchBases?.[kind]
      }));
    } catch (error) {
      const message = toError(error).message;
      logger.error(`Account lifecycle job failed for ${kind}: ${message}`);
      failures.push({ kind, message });
    }
  }

  const duration = Date.now() - startTime;
  logger.info('Account lifecycle job completed', { duration, failures: failures.length });

  return { success: failures.length === 0, duration, summaries, failures };
};
