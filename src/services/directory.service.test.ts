import { DirectoryService, toAccountSnapshot } from './directory.service';
import { LDAPOperations, LDAPSearchOptions, SecurityDescriptorFlagsControl } from '../config/ldap';
import { AccountNotFoundError, DirectoryWriteError, QueryError } from './base/errors';
import { ACCESS_MASK, ACE_TYPES, EVERYONE_SID } from '../utils/security-descriptor';
import { buildAce, buildSecurityDescriptor } from '../test/security-descriptor.fixtures';
import { dateToWindowsFileTime } from '../utils/ldap-utils';

const COMPUTER_DN = 'CN=WS-0101,OU=Laptops,DC=example,DC=local';
const USER_DN = 'CN=Jane Doe,OU=Staff,DC=example,DC=local';

function createLdapMock(): jest.Mocked<LDAPOperations> {
  return {
    search: jest.fn(),
    modify: jest.fn().mockResolvedValue(undefined),
    del: jest.fn().mockResolvedValue(undefined),
    testConnection: jest.fn().mockResolvedValue(true),
    close: jest.fn().mockResolvedValue(undefined)
  };
}

describe('toAccountSnapshot', () => {
  it('maps a computer entry', () => {
    const snapshot = toAccountSnapshot('computer', {
      dn: COMPUTER_DN,
      attributes: {
        name: 'WS-0101',
        operatingSystem: 'Windows 10 Enterprise',
        userAccountControl: '4098',
        lastLogonTimestamp: dateToWindowsFileTime(new Date('2024-03-01T08:00:00Z')),
        description: 'Finance laptop'
      }
    });

    expect(snapshot).toEqual({
      kind: 'computer',
      name: 'WS-0101',
      operatingSystem: 'Windows 10 Enterprise',
      enabled: false,
      lastLogonDate: new Date('2024-03-01T08:00:00Z'),
      description: 'Finance laptop',
      distinguishedName: COMPUTER_DN
    });
  });

  it('maps a user entry with missing optional attributes', () => {
    const snapshot = toAccountSnapshot('user', {
      dn: USER_DN,
      attributes: {
        sAMAccountName: 'jdoe',
        userAccountControl: '512',
        lastLogonTimestamp: '0',
        whenCreated: '20190102030405.0Z',
        distinguishedName: USER_DN
      }
    });

    expect(snapshot).toEqual({
      kind: 'user',
      name: 'jdoe',
      enabled: true,
      lastLogonDate: null,
      description: '',
      whenCreated: new Date('2019-01-02T03:04:05Z'),
      distinguishedName: USER_DN
    });
  });

  it('uses the epoch for an unknown creation date', () => {
    const snapshot = toAccountSnapshot('user', { dn: USER_DN, attributes: { sAMAccountName: 'jdoe' } });
    expect(snapshot.kind === 'user' && snapshot.whenCreated.getTime()).toBe(0);
  });

  it('records a missing operating system as null', () => {
    const snapshot = toAccountSnapshot('computer', { dn: COMPUTER_DN, attributes: { name: 'WS-0101' } });
    expect(snapshot.kind === 'computer' && snapshot.operatingSystem).toBeNull();
  });
});

describe('DirectoryService', () => {
  let ldap: jest.Mocked<LDAPOperations>;
  let service: DirectoryService;

  beforeEach(() => {
    ldap = createLdapMock();
    service = new DirectoryService(ldap, {
      searchBases: { computer: 'OU=Workstations,DC=example,DC=local', user: 'OU=Staff,DC=example,DC=local' }
    });
  });

  describe('fetchAccount', () => {
    it('looks the account up by name under the configured base', async () => {
      ldap.search.mockResolvedValue([{ dn: COMPUTER_DN, attributes: { name: 'WS-0101', operatingSystem: 'Windows 11' } }]);

      const snapshot = await service.fetchAccount('computer', 'WS-0101');

      expect(snapshot.name).toBe('WS-0101');
      const options: LDAPSearchOptions = ldap.search.mock.calls[0][0];
      expect(options.base).toBe('OU=Workstations,DC=example,DC=local');
      expect(options.filter).toBe('(&(objectCategory=computer)(name=WS-0101))');
      expect(options.sizeLimit).toBe(2);
    });

    it('escapes the name in the filter', async () => {
      ldap.search.mockResolvedValue([{ dn: USER_DN, attributes: { sAMAccountName: 'j*doe' } }]);

      await service.fetchAccount('user', 'j*doe');

      expect(ldap.search.mock.calls[0][0].filter).toBe(
        '(&(&(objectClass=user)(objectCategory=person))(sAMAccountName=j\\2adoe))'
      );
    });

    it('throws AccountNotFoundError when nothing matches', async () => {
      ldap.search.mockResolvedValue([]);

      await expect(service.fetchAccount('user', 'ghost')).rejects.toThrow(AccountNotFoundError);
      await expect(service.fetchAccount('user', 'ghost')).rejects.toThrow(
        "user account 'ghost' was not found in the directory"
      );
    });

    it('wraps search failures in QueryError', async () => {
      ldap.search.mockRejectedValue(new Error('connection reset'));

      await expect(service.fetchAccount('user', 'jdoe')).rejects.toThrow(QueryError);
    });
  });

  describe('listAccounts', () => {
    it('runs a paged search with the query definition', async () => {
      ldap.search.mockResolvedValue([
        { dn: USER_DN, attributes: { sAMAccountName: 'jdoe' } },
        { dn: 'CN=Bob,OU=Staff,DC=example,DC=local', attributes: { sAMAccountName: 'bob' } }
      ]);

      const snapshots = await service.listAccounts('user');

      expect(snapshots.map(snapshot => snapshot.name)).toEqual(['jdoe', 'bob']);
      expect(ldap.search).toHaveBeenCalledWith(expect.objectContaining({
        base: 'OU=Staff,DC=example,DC=local',
        scope: 'sub',
        filter: '(&(objectClass=user)(objectCategory=person))',
        paged: true
      }));
    });

    it('prefers an explicit search base', async () => {
      ldap.search.mockResolvedValue([]);

      await service.listAccounts('computer', 'OU=Kiosks,DC=example,DC=local');

      expect(ldap.search.mock.calls[0][0].base).toBe('OU=Kiosks,DC=example,DC=local');
    });
  });

  describe('readObject', () => {
    it('returns every attribute with binary values as base64', async () => {
      ldap.search.mockResolvedValue([{
        dn: USER_DN,
        attributes: {
          sAMAccountName: 'jdoe',
          memberOf: ['CN=Staff,DC=example,DC=local', 'CN=VPN,DC=example,DC=local'],
          objectGUID: Buffer.from([1, 2, 3])
        }
      }]);

      const state = await service.readObject({ kind: 'user', name: 'jdoe', distinguishedName: USER_DN });

      expect(state).toEqual({
        dn: USER_DN,
        sAMAccountName: 'jdoe',
        memberOf: ['CN=Staff,DC=example,DC=local', 'CN=VPN,DC=example,DC=local'],
        objectGUID: 'AQID'
      });
      expect(ldap.search).toHaveBeenCalledWith(expect.objectContaining({ base: USER_DN, scope: 'base', attributes: ['*'] }));
    });

    it('keeps binary account attributes as base64', async () => {
      ldap.search.mockResolvedValue([{
        dn: USER_DN,
        attributes: {
          sAMAccountName: 'jdoe',
          logonHours: Buffer.from([0x00, 0xff, 0x80, 0xfe, 0x01, 0xc3]),
          'mS-DS-ConsistencyGuid': Buffer.from([0xde, 0xad, 0xbe, 0xef])
        }
      }]);

      const state = await service.readObject({ kind: 'user', name: 'jdoe', distinguishedName: USER_DN });

      expect(state.logonHours).toBe('AP+A/gHD');
      expect(state['mS-DS-ConsistencyGuid']).toBe('3q2+7w==');
      const { binaryAttributes } = ldap.search.mock.calls[0][0];
      expect(binaryAttributes).toEqual(expect.arrayContaining([
        'logonHours', 'userCertificate', 'mS-DS-ConsistencyGuid', 'msExchMailboxGuid', 'userParameters'
      ]));
    });

    it('drops requested attribute names that came back empty', async () => {
      ldap.search.mockResolvedValue([{ dn: USER_DN, attributes: { sAMAccountName: 'jdoe', '*': [] } }]);

      const state = await service.readObject({ kind: 'user', name: 'jdoe', distinguishedName: USER_DN });

      expect(state).toEqual({ dn: USER_DN, sAMAccountName: 'jdoe' });
    });

    it('resolves the distinguished name when it is not known', async () => {
      ldap.search
        .mockResolvedValueOnce([{ dn: USER_DN, attributes: { sAMAccountName: 'jdoe', distinguishedName: USER_DN } }])
        .mockResolvedValueOnce([{ dn: USER_DN, attributes: { sAMAccountName: 'jdoe' } }]);

      await service.readObject({ kind: 'user', name: 'jdoe' });

      expect(ldap.search).toHaveBeenCalledTimes(2);
      expect(ldap.search.mock.calls[1][0].base).toBe(USER_DN);
    });
  });

  describe('setDisabled', () => {
    const account = { kind: 'computer' as const, name: 'WS-0101', distinguishedName: COMPUTER_DN };

    it('sets the disabled flag and replaces the description', async () => {
      ldap.search.mockResolvedValue([{ dn: COMPUTER_DN, attributes: { userAccountControl: '4096' } }]);

      await service.setDisabled(account, 'INACTIVE 06/15/2024 Finance laptop');

      expect(ldap.modify).toHaveBeenCalledTimes(1);
      expect(ldap.modify).toHaveBeenCalledWith(COMPUTER_DN, [
        { operation: 'replace', type: 'userAccountControl', values: ['4098'] },
        { operation: 'replace', type: 'description', values: ['INACTIVE 06/15/2024 Finance laptop'] }
      ]);
    });

    it('clears deletion protection before disabling', async () => {
      const allowRead = buildAce(ACE_TYPES.ACCESS_ALLOWED, 0x20094, EVERYONE_SID);
      const protectedDescriptor = buildSecurityDescriptor(null, [
        buildAce(ACE_TYPES.ACCESS_DENIED, ACCESS_MASK.DELETE | ACCESS_MASK.DELETE_TREE, EVERYONE_SID),
        allowRead
      ]);
      ldap.search.mockResolvedValue([{
        dn: COMPUTER_DN,
        attributes: { userAccountControl: '4096', nTSecurityDescriptor: protectedDescriptor }
      }]);

      await service.setDisabled(account, 'INACTIVE 06/15/2024');

      expect(ldap.modify).toHaveBeenCalledTimes(2);
      const [dn, [change]] = ldap.modify.mock.calls[0];
      expect(dn).toBe(COMPUTER_DN);
      expect(change.type).toBe('nTSecurityDescriptor');
      const [written] = change.values;
      expect(Buffer.isBuffer(written) && written.equals(buildSecurityDescriptor(null, [allowRead]))).toBe(true);
      expect(ldap.modify.mock.calls[1][1][0]).toEqual({ operation: 'replace', type: 'userAccountControl', values: ['4098'] });
    });

    it('limits descriptor reads and writes to the DACL', async () => {
      const protectedDescriptor = buildSecurityDescriptor(null, [
        buildAce(ACE_TYPES.ACCESS_DENIED, ACCESS_MASK.DELETE | ACCESS_MASK.DELETE_TREE, EVERYONE_SID)
      ]);
      ldap.search.mockResolvedValue([{
        dn: COMPUTER_DN,
        attributes: { userAccountControl: '4096', nTSecurityDescriptor: protectedDescriptor }
      }]);

      await service.setDisabled(account, 'INACTIVE 06/15/2024');

      const [searchControl] = ldap.search.mock.calls[0][0].controls ?? [];
      expect(searchControl).toBeInstanceOf(SecurityDescriptorFlagsControl);
      const [modifyControl] = ldap.modify.mock.calls[0][2] ?? [];
      expect(modifyControl).toBeInstanceOf(SecurityDescriptorFlagsControl);
      expect(modifyControl).toMatchObject({ type: '1.2.840.113556.1.4.801', flags: 4 });
      // The account flags go through without the control
      expect(ldap.modify.mock.calls[1]).toHaveLength(2);
    });

    it('leaves an unprotected descriptor alone', async () => {
      ldap.search.mockResolvedValue([{
        dn: COMPUTER_DN,
        attributes: {
          userAccountControl: '4096',
          nTSecurityDescriptor: buildSecurityDescriptor(null, [buildAce(ACE_TYPES.ACCESS_ALLOWED, 0x20094, EVERYONE_SID)])
        }
      }]);

      await service.setDisabled(account, 'INACTIVE 06/15/2024');

      expect(ldap.modify).toHaveBeenCalledTimes(1);
    });

    it('reports a rejected change as DirectoryWriteError', async () => {
      ldap.search.mockResolvedValue([{ dn: COMPUTER_DN, attributes: { userAccountControl: '4096' } }]);
      ldap.modify.mockRejectedValue(new Error('Insufficient access'));

      const error = await service.setDisabled(account, 'INACTIVE 06/15/2024').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DirectoryWriteError);
      expect(error).toMatchObject({
        accountName: 'WS-0101',
        operation: 'disable',
        message: 'Failed to disable computer WS-0101: directory rejected the change: Insufficient access'
      });
    });
  });

  describe('deleteAccount', () => {
    it('deletes by distinguished name', async () => {
      await service.deleteAccount({ kind: 'computer', name: 'WS-0101', distinguishedName: COMPUTER_DN });
      expect(ldap.del).toHaveBeenCalledWith(COMPUTER_DN);
    });

    it('reports a lookup failure as DirectoryWriteError', async () => {
      ldap.search.mockResolvedValue([]);

      await expect(service.deleteAccount({ kind: 'user', name: 'ghost' })).rejects.toMatchObject({
        operation: 'delete',
        message: "Failed to delete user ghost: user account 'ghost' was not found in the directory"
      });
      expect(ldap.del).not.toHaveBeenCalled();
    });
  });
});
