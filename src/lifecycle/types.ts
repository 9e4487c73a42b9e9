/**
 * Account lifecycle types
 */

export type AccountKind = 'computer' | 'user';

export const LIFECYCLE_ACTIONS = ['None', 'Disable', 'Wait', 'Remove', 'Keep', 'Svc', 'New'] as const;

export type LifecycleAction = typeof LIFECYCLE_ACTIONS[number];

interface AccountSnapshotBase {
  name: string;
  enabled: boolean;
  /** null when the directory never recorded a logon */
  lastLogonDate: Date | null;
  description: string;
  distinguishedName?: string;
}

export interface ComputerSnapshot extends AccountSnapshotBase {
  kind: 'computer';
  operatingSystem: string | null;
}

export interface UserSnapshot extends AccountSnapshotBase {
  kind: 'user';
  whenCreated: Date;
}

export type AccountSnapshot = ComputerSnapshot | UserSnapshot;

export type ClassificationResult = AccountSnapshot & {
  action: LifecycleAction;
};

export interface PolicyConfig {
  disableDays: number;
  removeDays: number;
}

export interface PolicyThresholds {
  disableDate: Date;
  removeDate: Date;
  noDescRemoveDate: Date;
}

export type DecodeResult =
  | { ok: true; date: Date }
  | { ok: false };

/**
 * Directory identity needed to act on an account.
 */
export interface AccountRef {
  kind: AccountKind;
  name: string;
  distinguishedName?: string;
}
