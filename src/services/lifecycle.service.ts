import { logger } from '../utils/logger';
import { classifyAll, sortClassificationResults } from '../lifecycle/classifier';
import { encodeDisabledDescription } from '../lifecycle/description-codec';
import { AccountKind, AccountSnapshot, ClassificationResult, PolicyConfig } from '../lifecycle/types';
import { validatePolicy } from '../config/config.service';
import {
  AccountOutcome,
  LifecycleRunOptions,
  LifecycleRunSummary,
  LookupFailure
} from '../types/shared-types';
import { AccountNotFoundError, toError } from './base/errors';
import { ArchiveStore, DirectoryReader, DirectoryWriter, ReportMailer } from './base/types';
import {
  buildReportSubject,
  emptyActionCounts,
  renderLifecycleReport,
  renderOuSummaryReport,
  summarizeByOrganizationalUnit
} from './report.service';

export interface LifecycleCollaborators {
  reader: DirectoryReader;
  writer: DirectoryWriter;
  archive?: ArchiveStore;
  mailer?: ReportMailer;
}

export interface LifecycleServiceOptions {
  policies: Record<AccountKind, PolicyConfig>;
  removeUsersAfterArchive: boolean;
  reportSubject: string;
  clock?: () => Date;
}

type RemovalGate =
  | { state: 'unchecked' }
  | { state: 'ready'; store: ArchiveStore }
  | { state: 'aborted'; reason: string };

type CheckedGate = Exclude<RemovalGate, { state: 'unchecked' }>;

/**
 * Runs fetch, classify, apply and report for one account kind.
 */
export class LifecycleService {
  private logger = logger.child({ service: 'LifecycleService' });
  private clock: () => Date;

  constructor(private collaborators: LifecycleCollaborators, private options: LifecycleServiceOptions) {
    validatePolicy('computer', options.policies.computer);
    validatePolicy('user', options.policies.user);
    this.clock = options.clock ?? (() => new Date());
  }

  async run(runOptions: LifecycleRunOptions, now: Date = this.clock()): Promise<LifecycleRunSummary> {
    const { kind, apply } = runOptions;
    const policy = this.options.policies[kind];

    this.logger.info(`Starting ${kind} lifecycle run`, {
      apply,
      names: runOptions.names?.length ?? 0,
      searchBase: runOptions.searchBase
    });

    const { snapshots, lookupFailures } = await this.loadSnapshots(runOptions);
    const results = sortClassificationResults(classifyAll(snapshots, policy, now));

    const counts = emptyActionCounts();
    for (const result of results) {
      counts[result.action]++;
    }

    let gate: RemovalGate = { state: 'unchecked' };
    const outcomes: AccountOutcome[] = [];

    for (const result of results) {
      if (result.action !== 'Disable' && result.action !== 'Remove') {
        outcomes.push({ result, status: 'none' });
        continue;
      }

      if (!apply) {
        outcomes.push({ result, status: 'planned' });
        continue;
      }

      if (result.action === 'Disable') {
        outcomes.push(await this.disable(result, now));
      } else if (result.kind === 'computer') {
        outcomes.push(await this.remove(result));
      } else {
        if (gate.state === 'unchecked') {
          gate = await this.openRemovalGate();
        }
        if (gate.state === 'aborted') {
          outcomes.push({ result, status: 'aborted', message: gate.reason });
          continue;
        }
        const outcome = await this.archiveAndRemove(result, gate.store);
        outcomes.push(outcome);
        if (outcome.status === 'failed' && !outcome.archivePath) {
          gate = { state: 'aborted', reason: `Archive failed for ${result.name}: ${outcome.message ?? 'unknown error'}` };
        }
      }
    }

    const summary: LifecycleRunSummary = {
      kind,
      policy,
      startedAt: now,
      finishedAt: this.clock(),
      applied: apply,
      outcomes,
      counts,
      lookupFailures,
      skipped: snapshots.length - results.length,
      removalAborted: gate.state === 'aborted',
      removalAbortReason: gate.state === 'aborted' ? gate.reason : undefined,
      reportSent: false
    };

    if (summary.removalAborted) {
      this.logger.error(`User removals aborted: ${summary.removalAbortReason}`);
    }

    if (runOptions.sendReport) {
      summary.reportSent = await this.sendReports(summary, results, !runOptions.names?.length);
    }

    this.logger.info(`Completed ${kind} lifecycle run`, {
      evaluated: results.length,
      skipped: summary.skipped,
      lookupFailures: lookupFailures.length,
      failed: outcomes.filter(outcome => outcome.status === 'failed').length,
      counts
    });

    return summary;
  }

  private async loadSnapshots(
    runOptions: LifecycleRunOptions
  ): Promise<{ snapshots: AccountSnapshot[]; lookupFailures: LookupFailure[] }> {
    const { kind, names, searchBase } = runOptions;

    if (!names || names.length === 0) {
      return { snapshots: await this.collaborators.reader.listAccounts(kind, searchBase), lookupFailures: [] };
    }

    const snapshots: AccountSnapshot[] = [];
    const lookupFailures: LookupFailure[] = [];

    for (const name of names) {
      try {
        snapshots.push(await this.collaborators.reader.fetchAccount(kind, name));
      } catch (error) {
        const cause = toError(error);
        if (error instanceof AccountNotFoundError) {
          this.logger.warn(`Skipping ${kind} '${name}': not found`);
        } else {
          this.logger.warn(`Skipping ${kind} '${name}': ${cause.message}`);
        }
        lookupFailures.push({ name, message: cause.message });
      }
    }

    return { snapshots, lookupFailures };
  }

  private async disable(result: ClassificationResult, now: Date): Promise<AccountOutcome> {
    try {
      await this.collaborators.writer.setDisabled(result, encodeDisabledDescription(result.description, now));
      this.logger.info(`Disabled ${result.kind} ${result.name}`);
      return { result, status: 'applied' };
    } catch (error) {
      return this.failure(result, 'disable', error);
    }
  }

  private async remove(result: ClassificationResult): Promise<AccountOutcome> {
    try {
      await this.collaborators.writer.deleteAccount(result);
      this.logger.info(`Removed ${result.kind} ${result.name}`);
      return { result, status: 'applied' };
    } catch (error) {
      return this.failure(result, 'delete', error);
    }
  }

  private async openRemovalGate(): Promise<CheckedGate> {
    const store = this.collaborators.archive;
    if (!store) {
      return { state: 'aborted', reason: 'No archive destination configured' };
    }
    try {
      await store.ensureReachable();
      return { state: 'ready', store };
    } catch (error) {
      return { state: 'aborted', reason: toError(error).message };
    }
  }

  /**
   * Archive a user and, when enabled, delete it. A failed outcome without an
   * archivePath means the archive itself did not complete.
   */
  private async archiveAndRemove(result: ClassificationResult, store: ArchiveStore): Promise<AccountOutcome> {
    let archivePath: string;
    try {
      const state = await this.collaborators.reader.readObject(result);
      archivePath = await store.archive(result, state);
    } catch (error) {
      return this.failure(result, 'archive', error);
    }

    if (!this.options.removeUsersAfterArchive) {
      return { result, status: 'archived', archivePath };
    }

    try {
      await this.collaborators.writer.deleteAccount(result);
      this.logger.info(`Removed ${result.kind} ${result.name}`, { archivePath });
      return { result, status: 'applied', archivePath };
    } catch (error) {
      return { ...this.failure(result, 'delete', error), archivePath };
    }
  }

  private failure(result: ClassificationResult, operation: string, error: unknown): AccountOutcome {
    const cause = toError(error);
    this.logger.error(`Failed to ${operation} ${result.kind} ${result.name}: ${cause.message}`, {
      account: result.name,
      distinguishedName: result.distinguishedName,
      action: result.action
    });
    return { result, status: 'failed', message: cause.message };
  }

  private async sendReports(
    summary: LifecycleRunSummary,
    results: ClassificationResult[],
    includeOuSummary: boolean
  ): Promise<boolean> {
    const mailer = this.collaborators.mailer;
    if (!mailer) {
      this.logger.warn('No mailer configured - report not sent');
      return false;
    }

    const subject = buildReportSubject(this.options.reportSubject, summary.kind, summary.startedAt);
    try {
      await mailer.sendReport({ subject, html: renderLifecycleReport(summary) });
      if (includeOuSummary && results.length > 0) {
        await mailer.sendReport({
          subject: `${subject} (by OU)`,
          html: renderOuSummaryReport(summary.kind, summarizeByOrganizationalUnit(results), summary.finishedAt)
        });
      }
      return true;
    } catch (error) {
      this.logger.error(`Report delivery failed: ${toError(error).message}`, { subject });
      return false;
    }
  }
}
