/**
 * LDAP Query Registry
 * Query definitions used to load account snapshots
 */

import type { AccountKind } from '../../lifecycle/types';
import { escapeFilterValue } from '../../utils/ldap-utils';
import { LDAPQueryDefinition } from './types';
import { computerAccountsQuery } from './computers';
import { userAccountsQuery } from './users';

export const accountQueries: Record<AccountKind, LDAPQueryDefinition> = {
  computer: computerAccountsQuery,
  user: userAccountsQuery
};

// Attribute that holds the account name for each kind
export const NAMING_ATTRIBUTES: Record<AccountKind, string> = {
  computer: 'name',
  user: 'sAMAccountName'
};

export function getAccountQuery(kind: AccountKind): LDAPQueryDefinition {
  return accountQueries[kind];
}

/**
 * Filter matching a single account of the given kind by name
 */
export function buildAccountLookupFilter(kind: AccountKind, name: string): string {
  const query = getAccountQuery(kind);
  return `(&${query.query.filter}(${NAMING_ATTRIBUTES[kind]}=${escapeFilterValue(name)}))`;
}

export * from './types';
