import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import dayjs from 'dayjs';
import { logger } from '../utils/logger';
import { AccountRef } from '../lifecycle/types';
import { ArchiveUnavailableError, DirectoryWriteError, toError } from './base/errors';
import { ArchiveStore, DirectoryObjectState } from './base/types';

export interface ArchiveRecord {
  archivedAt: string;
  kind: AccountRef['kind'];
  name: string;
  distinguishedName?: string;
  state: DirectoryObjectState;
}

/**
 * Writes the full state of removed accounts as JSON files under a directory
 * (typically a file share).
 */
export class FileArchiveStore implements ArchiveStore {
  private logger = logger.child({ service: 'ArchiveStore' });

  constructor(readonly destination: string, private clock: () => Date = () => new Date()) {}

  async ensureReachable(): Promise<void> {
    try {
      const stats = await fs.stat(this.destination);
      if (!stats.isDirectory()) {
        throw new Error(`${this.destination} is not a directory`);
      }
      await fs.access(this.destination, constants.W_OK);
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Archive destination unavailable: ${cause.message}`);
      throw new ArchiveUnavailableError(this.destination, cause);
    }
  }

  async archive(account: AccountRef, state: DirectoryObjectState): Promise<string> {
    const archivedAt = this.clock();
    const safeName = account.name.replace(/[^A-Za-z0-9._-]/g, '_');
    const file = path.join(
      this.destination,
      `${account.kind}-${safeName}-${dayjs(archivedAt).format('YYYYMMDD-HHmmss')}.json`
    );

    const record: ArchiveRecord = {
      archivedAt: archivedAt.toISOString(),
      kind: account.kind,
      name: account.name,
      distinguishedName: account.distinguishedName,
      state
    };

    try {
      // 'wx' refuses to overwrite an earlier archive of the same account
      await fs.writeFile(file, JSON.stringify(record, null, 2), { encoding: 'utf8', flag: 'wx' });
    } catch (error) {
      const cause = toError(error);
      throw new DirectoryWriteError(
        `Failed to archive ${account.kind} ${account.name} to ${file}: ${cause.message}`,
        account.name,
        'archive',
        cause
      );
    }

    this.logger.info(`Archived ${account.kind} ${account.name}`, { file });
    return file;
  }
}
