import {
  createAttributeGetter,
  dateToWindowsFileTime,
  escapeFilterValue,
  getBinaryAttribute,
  isAccountDisabled,
  ldapTimestampToDate,
  parseOrganizationalUnit,
  parseUserAccountControl,
  windowsFileTimeToDate,
  UAC_FLAGS
} from './ldap-utils';

describe('LDAP Utilities', () => {
  describe('createAttributeGetter', () => {
    it('should get attributes case-insensitively', () => {
      const attributes = {
        'sAMAccountName': 'jdoe',
        'description': 'Finance',
        'OPERATINGSYSTEM': 'Windows 11 Pro'
      };

      const getAttr = createAttributeGetter(attributes);

      expect(getAttr('sAMAccountName')).toBe('jdoe');
      expect(getAttr('samaccountname')).toBe('jdoe');
      expect(getAttr('Description')).toBe('Finance');
      expect(getAttr('operatingSystem')).toBe('Windows 11 Pro');
      expect(getAttr('nonexistent')).toBe('');
    });

    it('should return the first value of multi-valued and binary attributes', () => {
      const getAttr = createAttributeGetter({
        description: ['first', 'second'],
        empty: [],
        raw: Buffer.from('bytes')
      });

      expect(getAttr('description')).toBe('first');
      expect(getAttr('empty')).toBe('');
      expect(getAttr('raw')).toBe('bytes');
    });
  });

  describe('getBinaryAttribute', () => {
    it('should return the buffer regardless of key casing', () => {
      const descriptor = Buffer.from([1, 0, 4, 0x80]);
      expect(getBinaryAttribute({ ntSecurityDescriptor: descriptor }, 'nTSecurityDescriptor')).toBe(descriptor);
      expect(getBinaryAttribute({ ntSecurityDescriptor: [descriptor] }, 'nTSecurityDescriptor')).toBe(descriptor);
    });

    it('should return null for missing or textual values', () => {
      expect(getBinaryAttribute({}, 'nTSecurityDescriptor')).toBeNull();
      expect(getBinaryAttribute({ nTSecurityDescriptor: 'text' }, 'nTSecurityDescriptor')).toBeNull();
      expect(getBinaryAttribute({ nTSecurityDescriptor: [] }, 'nTSecurityDescriptor')).toBeNull();
    });
  });

  describe('Windows FileTime Conversions', () => {
    it('should convert Date to Windows FileTime', () => {
      const date = new Date('2024-01-01T00:00:00.000Z');
      // Windows FileTime for 2024-01-01 00:00:00 UTC
      expect(dateToWindowsFileTime(date)).toBe('133485408000000000');
    });

    it('should convert Windows FileTime to Date', () => {
      expect(windowsFileTimeToDate('133485408000000000')).toEqual(new Date('2024-01-01T00:00:00.000Z'));
      expect(windowsFileTimeToDate(133485408000000000)).toEqual(new Date('2024-01-01T00:00:00.000Z'));
    });

    it('should treat never-set values as null', () => {
      expect(windowsFileTimeToDate('0')).toBeNull();
      expect(windowsFileTimeToDate('')).toBeNull();
      expect(windowsFileTimeToDate(0)).toBeNull();
      expect(windowsFileTimeToDate('not-a-number')).toBeNull();
    });
  });

  describe('ldapTimestampToDate', () => {
    it('should parse generalized time as UTC', () => {
      expect(ldapTimestampToDate('20230715083000.0Z')).toEqual(new Date('2023-07-15T08:30:00.000Z'));
    });

    it('should return null for malformed values', () => {
      expect(ldapTimestampToDate('')).toBeNull();
      expect(ldapTimestampToDate('2023-07-15')).toBeNull();
    });
  });

  describe('userAccountControl', () => {
    it('should parse numeric strings', () => {
      expect(parseUserAccountControl('514')).toBe(514);
      expect(parseUserAccountControl('')).toBe(0);
      expect(parseUserAccountControl(4096)).toBe(4096);
    });

    it('should detect the disabled flag', () => {
      expect(isAccountDisabled(0x0200 | UAC_FLAGS.ACCOUNT_DISABLED)).toBe(true);
      expect(isAccountDisabled('4098')).toBe(true);
      expect(isAccountDisabled('4096')).toBe(false);
      expect(isAccountDisabled('')).toBe(false);
    });
  });

  describe('escapeFilterValue', () => {
    it('should escape filter metacharacters', () => {
      expect(escapeFilterValue('a*b(c)d\\e')).toBe('a\\2ab\\28c\\29d\\5ce');
      expect(escapeFilterValue('nul\0')).toBe('nul\\00');
      expect(escapeFilterValue('WS-0101')).toBe('WS-0101');
    });
  });

  describe('parseOrganizationalUnit', () => {
    it('should return the closest OU', () => {
      expect(parseOrganizationalUnit('CN=WS-1,OU=Laptops,OU=Finance,DC=example,DC=local')).toBe('Laptops');
      expect(parseOrganizationalUnit('cn=jdoe,ou=Staff,dc=example,dc=local')).toBe('Staff');
    });

    it('should return an empty string without an OU', () => {
      expect(parseOrganizationalUnit('CN=jdoe,CN=Users,DC=example,DC=local')).toBe('');
      expect(parseOrganizationalUnit(undefined)).toBe('');
    });
  });
});
