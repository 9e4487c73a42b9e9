/**
 * LDAP Query Types and Interfaces
 */

export interface LDAPQueryDefinition {
  name: string;

  // LDAP query configuration
  query: {
    scope: 'base' | 'one' | 'sub';
    filter: string;
    attributes: string[];
    sizeLimit?: number;
  };
}
