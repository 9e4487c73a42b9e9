import { LDAP_ATTRIBUTES, LDAP_FILTERS } from '../../../utils/ldap-utils';
import { LDAPQueryDefinition } from '../types';

export const computerAccountsQuery: LDAPQueryDefinition = {
  name: 'Computer Accounts',

  query: {
    scope: 'sub',
    filter: LDAP_FILTERS.COMPUTERS,
    attributes: [...LDAP_ATTRIBUTES.COMPUTER]
  }
};
