import dayjs from 'dayjs';
import { decodeInactiveDate } from './description-codec';
import {
  AccountKind,
  AccountSnapshot,
  ClassificationResult,
  LifecycleAction,
  PolicyConfig,
  PolicyThresholds
} from './types';

export const DEFAULT_POLICIES: Record<AccountKind, PolicyConfig> = {
  computer: { disableDays: 30, removeDays: 30 },
  user: { disableDays: 90, removeDays: 180 }
};

const SERVER_OS_PATTERN = /server/i;
const SERVICE_ACCOUNT_PATTERN = /^svc/i;
const KEEP_PATTERN = /keep/i;

export function defaultPolicyFor(kind: AccountKind): PolicyConfig {
  return { ...DEFAULT_POLICIES[kind] };
}

export function resolvePolicyThresholds(policy: PolicyConfig, now: Date): PolicyThresholds {
  const reference = dayjs(now);
  return {
    disableDate: reference.subtract(policy.disableDays, 'day').toDate(),
    removeDate: reference.subtract(policy.removeDays, 'day').toDate(),
    noDescRemoveDate: reference.subtract(policy.disableDays + policy.removeDays, 'day').toDate()
  };
}

/**
 * Servers and computers that never reported an operating system are left alone.
 */
export function isClassifiable(snapshot: AccountSnapshot): boolean {
  if (snapshot.kind !== 'computer') {
    return true;
  }
  const os = snapshot.operatingSystem?.trim();
  return !!os && !SERVER_OS_PATTERN.test(os);
}

// A missing logon counts as older than any threshold
function isBefore(date: Date | null, threshold: Date): boolean {
  return date === null || date.getTime() < threshold.getTime();
}

function primaryAction(snapshot: AccountSnapshot, thresholds: PolicyThresholds): LifecycleAction {
  if (!isBefore(snapshot.lastLogonDate, thresholds.disableDate)) {
    return 'None';
  }

  if (snapshot.enabled) {
    return 'Disable';
  }

  const decoded = decodeInactiveDate(snapshot.description);
  if (decoded.ok) {
    return isBefore(decoded.date, thresholds.removeDate) ? 'Remove' : 'Wait';
  }

  return isBefore(snapshot.lastLogonDate, thresholds.noDescRemoveDate) ? 'Remove' : 'Wait';
}

function applyOverrides(
  action: LifecycleAction,
  snapshot: AccountSnapshot,
  thresholds: PolicyThresholds
): LifecycleAction {
  let result = action;

  if (snapshot.kind === 'user') {
    if (SERVICE_ACCOUNT_PATTERN.test(snapshot.name)) {
      result = 'Svc';
    }
    if (snapshot.whenCreated.getTime() > thresholds.disableDate.getTime()) {
      result = 'New';
    }
  }

  if (KEEP_PATTERN.test(snapshot.description)) {
    result = 'Keep';
  }

  return result;
}

/**
 * Assign one lifecycle action to an account.
 *
 * Returns null for computers that are servers or have no operating system recorded.
 */
export function classify(
  snapshot: AccountSnapshot,
  policy: PolicyConfig,
  now: Date
): ClassificationResult | null {
  if (!isClassifiable(snapshot)) {
    return null;
  }

  const thresholds = resolvePolicyThresholds(policy, now);
  const action = applyOverrides(primaryAction(snapshot, thresholds), snapshot, thresholds);

  return { ...snapshot, action };
}

export function classifyAll(
  snapshots: readonly AccountSnapshot[],
  policy: PolicyConfig,
  now: Date
): ClassificationResult[] {
  const results: ClassificationResult[] = [];
  for (const snapshot of snapshots) {
    const result = classify(snapshot, policy, now);
    if (result) {
      results.push(result);
    }
  }
  return results;
}

type Sortable = { action: LifecycleAction; name: string };

export function compareByActionAndName(a: Sortable, b: Sortable): number {
  if (a.action !== b.action) {
    return a.action < b.action ? -1 : 1;
  }
  return a.name.localeCompare(b.name, undefined, { sensitivity: 'base' });
}

/**
 * Order results by action, then by account name. Returns a new array.
 */
export function sortClassificationResults<T extends Sortable>(results: readonly T[]): T[] {
  return [...results].sort(compareByActionAndName);
}
