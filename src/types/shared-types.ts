/**
 * Types shared between the lifecycle pipeline, reporting and the command line
 */

import type { AccountKind, ClassificationResult, LifecycleAction, PolicyConfig } from '../lifecycle/types';

/**
 * What happened to an account during a run
 * - none: the action needs no directory change
 * - planned: the action would change the directory but the run did not apply it
 * - applied: the directory change succeeded
 * - archived: a user was archived and left in place
 * - failed: the directory or archive change failed
 * - aborted: a removal was skipped because the archive step could not run
 */
export type OutcomeStatus = 'none' | 'planned' | 'applied' | 'archived' | 'failed' | 'aborted';

export interface AccountOutcome {
  result: ClassificationResult;
  status: OutcomeStatus;
  message?: string;
  archivePath?: string;
}

export interface LifecycleRunOptions {
  kind: AccountKind;
  /** Look up these accounts instead of listing the search base */
  names?: string[];
  searchBase?: string;
  apply: boolean;
  sendReport: boolean;
}

export interface LookupFailure {
  name: string;
  message: string;
}

export interface LifecycleRunSummary {
  kind: AccountKind;
  policy: PolicyConfig;
  startedAt: Date;
  finishedAt: Date;
  applied: boolean;
  outcomes: AccountOutcome[];
  counts: Record<LifecycleAction, number>;
  lookupFailures: LookupFailure[];
  skipped: number;
  removalAborted: boolean;
  removalAbortReason?: string;
  reportSent: boolean;
}
