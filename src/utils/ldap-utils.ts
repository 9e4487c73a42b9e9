/**
 * LDAP Utility Functions
 * Common utilities for reading and writing account objects
 */

export type LDAPAttributeValue = string | string[] | Buffer | Buffer[];

export type LDAPAttributes = Record<string, LDAPAttributeValue>;

// LDAP Filter Constants
export const LDAP_FILTERS = {
  USER: '(&(objectClass=user)(objectCategory=person))',
  COMPUTERS: '(objectCategory=computer)'
} as const;

// LDAP Attribute Constants
export const LDAP_ATTRIBUTES = {
  USER: ['sAMAccountName', 'description', 'userAccountControl', 'lastLogonTimestamp', 'whenCreated', 'distinguishedName'],
  COMPUTER: ['name', 'operatingSystem', 'description', 'userAccountControl', 'lastLogonTimestamp', 'distinguishedName']
} as const;

// User Account Control flags
export const UAC_FLAGS = {
  ACCOUNT_DISABLED: 0x0002
} as const;

export interface LDAPAttributeGetter {
  (name: string): string;
}

function toText(value: LDAPAttributeValue | undefined): string {
  if (value === undefined) {
    return '';
  }
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) {
    return '';
  }
  return Buffer.isBuffer(first) ? first.toString('utf8') : first;
}

/**
 * Create a case-insensitive attribute getter for LDAP results.
 * Multi-valued attributes yield their first value; missing attributes yield ''.
 */
export function createAttributeGetter(attributes: LDAPAttributes): LDAPAttributeGetter {
  // Create a lowercase key map for case-insensitive lookups
  const lowerCaseMap: Record<string, string> = {};
  Object.keys(attributes).forEach(key => {
    lowerCaseMap[key.toLowerCase()] = key;
  });

  return (name: string): string => {
    // Try exact match first
    if (attributes[name] !== undefined) {
      return toText(attributes[name]);
    }

    // Try case-insensitive match
    const actualKey = lowerCaseMap[name.toLowerCase()];
    if (actualKey !== undefined) {
      return toText(attributes[actualKey]);
    }

    return '';
  };
}

/**
 * Find a binary attribute regardless of key casing
 */
export function getBinaryAttribute(attributes: LDAPAttributes, name: string): Buffer | null {
  const key = Object.keys(attributes).find(candidate => candidate.toLowerCase() === name.toLowerCase());
  if (key === undefined) {
    return null;
  }
  const value = attributes[key];
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) {
    return null;
  }
  return Buffer.isBuffer(first) ? first : null;
}

// Difference between 1601-01-01 and 1970-01-01 in 100-nanosecond intervals
const EPOCH_DIFFERENCE = 116444736000000000n;

/**
 * Convert JavaScript Date to Windows FileTime format
 * Windows FileTime = 100-nanosecond intervals since January 1, 1601 UTC
 */
export function dateToWindowsFileTime(date: Date): string {
  const jsTime = BigInt(date.getTime()) * 10000n; // Convert ms to 100-nanosecond intervals
  return (jsTime + EPOCH_DIFFERENCE).toString();
}

/**
 * Convert Windows FileTime to JavaScript Date
 */
export function windowsFileTimeToDate(fileTime: string | number): Date | null {
  if (!fileTime || fileTime === '0' || !/^\d+$/.test(String(fileTime))) return null;

  const jsTime = (BigInt(fileTime) - EPOCH_DIFFERENCE) / 10000n; // Convert from 100-nanosecond to milliseconds
  return new Date(Number(jsTime));
}

/**
 * Parse LDAP generalized time (e.g. 20240101120000.0Z) to Date
 */
export function ldapTimestampToDate(timestamp: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})/.exec(timestamp || '');
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match.map(Number);
  // Active Directory always returns generalized time in UTC
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

export function parseUserAccountControl(userAccountControl: string | number): number {
  const uac = typeof userAccountControl === 'string' ? parseInt(userAccountControl, 10) : userAccountControl;
  return Number.isNaN(uac) ? 0 : uac;
}

/**
 * Check if account is disabled
 */
export function isAccountDisabled(userAccountControl: string | number): boolean {
  return !!(parseUserAccountControl(userAccountControl) & UAC_FLAGS.ACCOUNT_DISABLED);
}

/**
 * Escape a value for use inside an LDAP filter (RFC 4515)
 */
export function escapeFilterValue(value: string): string {
  return value
    .replace(/\\/g, '\\5c')
    .replace(/\*/g, '\\2a')
    .replace(/\(/g, '\\28')
    .replace(/\)/g, '\\29')
    .replace(/\0/g, '\\00');
}

/**
 * Parse organizational unit from distinguished name
 */
export function parseOrganizationalUnit(distinguishedName: string | undefined): string {
  if (!distinguishedName) return '';

  const ouMatch = distinguishedName.match(/OU=([^,]+)/i);
  return ouMatch ? ouMatch[1] : '';
}
