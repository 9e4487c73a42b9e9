import { LDAP_ATTRIBUTES, LDAP_FILTERS } from '../../../utils/ldap-utils';
import { LDAPQueryDefinition } from '../types';

export const userAccountsQuery: LDAPQueryDefinition = {
  name: 'User Accounts',

  query: {
    scope: 'sub',
    filter: LDAP_FILTERS.USER,
    attributes: [...LDAP_ATTRIBUTES.USER]
  }
};
