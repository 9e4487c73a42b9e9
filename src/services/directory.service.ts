import {
  DACL_SECURITY_INFORMATION,
  LDAPOperations,
  LDAPSearchOptions,
  LDAPSearchResult,
  SecurityDescriptorFlagsControl
} from '../config/ldap';
import { logger } from '../utils/logger';
import {
  createAttributeGetter,
  getBinaryAttribute,
  isAccountDisabled,
  ldapTimestampToDate,
  parseUserAccountControl,
  windowsFileTimeToDate,
  LDAPAttributes,
  UAC_FLAGS
} from '../utils/ldap-utils';
import { hasDeletionProtection, removeDeletionProtection } from '../utils/security-descriptor';
import { buildAccountLookupFilter, getAccountQuery } from '../queries/ldap';
import { AccountKind, AccountRef, AccountSnapshot } from '../lifecycle/types';
import { AccountNotFoundError, DataSourceError, DirectoryWriteError, QueryError, toError } from './base/errors';
import { DirectoryObjectState, DirectoryReader, DirectoryWriter } from './base/types';

// Octet string, SID and security descriptor syntax attributes found on account objects
export const BINARY_OBJECT_ATTRIBUTES = [
  'objectGUID',
  'objectSid',
  'sIDHistory',
  'nTSecurityDescriptor',
  'msDS-AllowedToActOnBehalfOfOtherIdentity',
  'logonHours',
  'userParameters',
  'userCertificate',
  'userSMIMECertificate',
  'cACertificate',
  'thumbnailPhoto',
  'jpegPhoto',
  'mS-DS-ConsistencyGuid',
  'msDS-GenerationId',
  'msExchMailboxGuid',
  'msExchArchiveGUID',
  'msExchDisabledArchiveGUID',
  'msExchMasterAccountSid',
  'msExchMailboxSecurityDescriptor',
  'msExchSafeSendersHash',
  'msExchBlockedSendersHash',
  'msExchSafeRecipientsHash',
  'msRTCSIP-UserRoutingGroupId',
  'mSMQDigests',
  'mSMQSignCertificates',
  'terminalServer'
];

export interface DirectoryServiceOptions {
  searchBases?: Partial<Record<AccountKind, string>>;
}

/**
 * Converts a search entry into an account snapshot
 */
export function toAccountSnapshot(kind: AccountKind, entry: LDAPSearchResult): AccountSnapshot {
  const getAttr = createAttributeGetter(entry.attributes);
  const common = {
    enabled: !isAccountDisabled(getAttr('userAccountControl')),
    lastLogonDate: windowsFileTimeToDate(getAttr('lastLogonTimestamp')),
    description: getAttr('description'),
    distinguishedName: getAttr('distinguishedName') || entry.dn
  };

  if (kind === 'computer') {
    return {
      kind,
      name: getAttr('name'),
      operatingSystem: getAttr('operatingSystem') || null,
      ...common
    };
  }

  return {
    kind,
    name: getAttr('sAMAccountName'),
    // An unknown creation date never counts as a new account
    whenCreated: ldapTimestampToDate(getAttr('whenCreated')) ?? new Date(0),
    ...common
  };
}

function toObjectState(attributes: LDAPAttributes): DirectoryObjectState {
  const state: DirectoryObjectState = {};
  for (const [key, value] of Object.entries(attributes)) {
    const values: Array<string | Buffer> = Array.isArray(value) ? value : [value];
    // Requested names the server did not return (such as '*') come back empty
    if (values.length === 0) {
      continue;
    }
    const text = values.map(item => (Buffer.isBuffer(item) ? item.toString('base64') : item));
    state[key] = text.length === 1 ? text[0] : text;
  }
  return state;
}

export class DirectoryService implements DirectoryReader, DirectoryWriter {
  private logger = logger.child({ service: 'DirectoryService' });
  private searchBases: Partial<Record<AccountKind, string>>;

  constructor(private ldap: LDAPOperations, options: DirectoryServiceOptions = {}) {
    this.searchBases = options.searchBases || {};
  }

  async fetchAccount(kind: AccountKind, name: string): Promise<AccountSnapshot> {
    const definition = getAccountQuery(kind);
    const results = await this.search(`lookup of ${kind} '${name}'`, {
      base: this.searchBases[kind],
      filter: buildAccountLookupFilter(kind, name),
      attributes: definition.query.attributes,
      sizeLimit: 2
    });

    if (results.length === 0) {
      throw new AccountNotFoundError(kind, name);
    }
    if (results.length > 1) {
      this.logger.warn(`More than one ${kind} matched '${name}', using ${results[0].dn}`);
    }

    return toAccountSnapshot(kind, results[0]);
  }

  async listAccounts(kind: AccountKind, searchBase?: string): Promise<AccountSnapshot[]> {
    const definition = getAccountQuery(kind);
    const base = searchBase || this.searchBases[kind];

    const results = await this.search(`${definition.name} search`, {
      base,
      scope: definition.query.scope,
      filter: definition.query.filter,
      attributes: definition.query.attributes,
      sizeLimit: definition.query.sizeLimit,
      paged: true
    });

    this.logger.info(`Loaded ${results.length} ${kind} accounts`, { base: base || 'default' });
    return results.map(entry => toAccountSnapshot(kind, entry));
  }

  async readObject(account: AccountRef): Promise<DirectoryObjectState> {
    const dn = await this.resolveDN(account);
    const [entry] = await this.search(`read of ${dn}`, {
      base: dn,
      scope: 'base',
      filter: '(objectClass=*)',
      attributes: ['*'],
      binaryAttributes: BINARY_OBJECT_ATTRIBUTES
    });

    if (!entry) {
      throw new AccountNotFoundError(account.kind, account.name);
    }
    return { dn: entry.dn, ...toObjectState(entry.attributes) };
  }

  async setDisabled(account: AccountRef, newDescription: string): Promise<void> {
    try {
      const dn = await this.resolveDN(account);
      // Read and write only the DACL; the rest of the descriptor stays as it is
      const daclOnly = new SecurityDescriptorFlagsControl(DACL_SECURITY_INFORMATION);
      const [entry] = await this.ldap.search({
        base: dn,
        scope: 'base',
        filter: '(objectClass=*)',
        attributes: ['userAccountControl', 'nTSecurityDescriptor'],
        binaryAttributes: ['nTSecurityDescriptor'],
        controls: [daclOnly]
      });
      if (!entry) {
        throw new AccountNotFoundError(account.kind, account.name);
      }

      // Deletion protection would block the later removal
      const descriptor = getBinaryAttribute(entry.attributes, 'nTSecurityDescriptor');
      if (descriptor && hasDeletionProtection(descriptor)) {
        const cleared = removeDeletionProtection(descriptor);
        await this.ldap.modify(dn, [
          { operation: 'replace', type: 'nTSecurityDescriptor', values: [cleared.descriptor] }
        ], [daclOnly]);
        this.logger.info(`Cleared deletion protection on ${dn}`);
      }

      const getAttr = createAttributeGetter(entry.attributes);
      const uac = parseUserAccountControl(getAttr('userAccountControl')) | UAC_FLAGS.ACCOUNT_DISABLED;
      await this.ldap.modify(dn, [
        { operation: 'replace', type: 'userAccountControl', values: [String(uac)] },
        { operation: 'replace', type: 'description', values: [newDescription] }
      ]);

      this.logger.info(`Disabled ${account.kind} ${account.name}`, { dn });
    } catch (error) {
      throw this.writeError(account, 'disable', error);
    }
  }

  async deleteAccount(account: AccountRef): Promise<void> {
    try {
      const dn = await this.resolveDN(account);
      await this.ldap.del(dn);
      this.logger.info(`Deleted ${account.kind} ${account.name}`, { dn });
    } catch (error) {
      throw this.writeError(account, 'delete', error);
    }
  }

  private async resolveDN(account: AccountRef): Promise<string> {
    if (account.distinguishedName) {
      return account.distinguishedName;
    }
    const snapshot = await this.fetchAccount(account.kind, account.name);
    return snapshot.distinguishedName || '';
  }

  private async search(description: string, options: LDAPSearchOptions): Promise<LDAPSearchResult[]> {
    try {
      return await this.ldap.search(options);
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`LDAP ${description} failed: ${cause.message}`);
      throw new QueryError(`LDAP ${description} failed: ${cause.message}`, cause);
    }
  }

  private writeError(
    account: AccountRef,
    operation: DirectoryWriteError['operation'],
    error: unknown
  ): DirectoryWriteError {
    if (error instanceof DirectoryWriteError) {
      return error;
    }
    const cause = toError(error);
    const reason = cause instanceof DataSourceError ? cause.message : `directory rejected the change: ${cause.message}`;
    return new DirectoryWriteError(
      `Failed to ${operation} ${account.kind} ${account.name}: ${reason}`,
      account.name,
      operation,
      cause
    );
  }
}
