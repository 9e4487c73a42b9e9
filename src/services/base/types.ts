import type { AccountKind, AccountRef, AccountSnapshot } from '../../lifecycle/types';

/**
 * Full attribute set of a directory object, as archived before removal
 */
export type DirectoryObjectState = Record<string, string | string[]>;

export interface DirectoryReader {
  /** Throws AccountNotFoundError when the name does not resolve */
  fetchAccount(kind: AccountKind, name: string): Promise<AccountSnapshot>;
  listAccounts(kind: AccountKind, searchBase?: string): Promise<AccountSnapshot[]>;
  readObject(account: AccountRef): Promise<DirectoryObjectState>;
}

export interface DirectoryWriter {
  /** Clears deletion protection, disables the account and replaces its description */
  setDisabled(account: AccountRef, newDescription: string): Promise<void>;
  deleteAccount(account: AccountRef): Promise<void>;
}

export interface ArchiveStore {
  readonly destination: string;
  /** Throws ArchiveUnavailableError when nothing can be written */
  ensureReachable(): Promise<void>;
  /** Returns the location of the written archive */
  archive(account: AccountRef, state: DirectoryObjectState): Promise<string>;
}

export interface ReportMessage {
  subject: string;
  html: string;
}

export interface ReportMailer {
  sendReport(message: ReportMessage): Promise<void>;
}
