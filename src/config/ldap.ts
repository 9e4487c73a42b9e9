import { Attribute, Change, Client, Control } from 'ldapts';
import { logger } from '../utils/logger';
import { LDAPAttributes } from '../utils/ldap-utils';
import { ADConfig } from './types';

export interface LDAPConfig {
  url: string;
  baseDN: string;
  username: string;
  password: string;
  timeout?: number;
  connectTimeout?: number;
  maxConnections?: number;
}

export interface LDAPSearchOptions {
  filter: string;
  base?: string;
  scope?: 'base' | 'one' | 'sub';
  attributes?: string[];
  binaryAttributes?: string[];
  sizeLimit?: number;
  timeLimit?: number;
  paged?: boolean;
  controls?: Control[];
}

export interface LDAPSearchResult {
  dn: string;
  attributes: LDAPAttributes;
}

export interface LDAPModification {
  operation: 'add' | 'delete' | 'replace';
  type: string;
  values: string[] | Buffer[];
}

/**
 * The directory operations the rest of the application relies on
 */
export interface LDAPOperations {
  search(options: LDAPSearchOptions): Promise<LDAPSearchResult[]>;
  modify(dn: string, modifications: LDAPModification[], controls?: Control[]): Promise<void>;
  del(dn: string): Promise<void>;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}

type BerWriter = Parameters<Control['write']>[0];

export const DACL_SECURITY_INFORMATION = 0x4;

/**
 * LDAP_SERVER_SD_FLAGS_OID: limits which parts of nTSecurityDescriptor a
 * search returns and a modify writes.
 */
export class SecurityDescriptorFlagsControl extends Control {
  static readonly OID = '1.2.840.113556.1.4.801';

  constructor(public readonly flags: number) {
    super(SecurityDescriptorFlagsControl.OID, { critical: true });
  }

  protected override writeControl(writer: BerWriter): void {
    // controlValue: OCTET STRING wrapping SEQUENCE { flags INTEGER }
    writer.startSequence(0x04);
    writer.startSequence();
    writer.writeInt(this.flags);
    writer.endSequence();
    writer.endSequence();
  }
}

const INVALID_CREDENTIALS = 49;
const NETWORK_ERRORS = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH'];

function errorCode(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'number' || typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class LDAPClient implements LDAPOperations {
  private config: Required<LDAPConfig>;
  private connectionPool: Client[] = [];

  constructor(config: LDAPConfig) {
    this.config = {
      ...config,
      timeout: config.timeout ?? 30000,
      connectTimeout: config.connectTimeout ?? 10000,
      maxConnections: config.maxConnections ?? 5
    };
  }

  get baseDN(): string {
    return this.config.baseDN;
  }

  private newClient(): Client {
    return new Client({
      url: this.config.url,
      tlsOptions: {
        rejectUnauthorized: process.env.NODE_ENV === 'production',
        minVersion: 'TLSv1.2',
      },
      timeout: this.config.timeout,
      connectTimeout: this.config.connectTimeout,
    });
  }

  private async createClient(): Promise<Client> {
    const client = this.newClient();

    try {
      await client.bind(this.config.username, this.config.password);
      logger.debug('LDAP client connected and bound successfully');
      return client;
    } catch (error) {
      logger.error('LDAP connection/bind failed:', { error: errorMessage(error) });
      await this.unbindQuietly(client);
      throw error;
    }
  }

  private async unbindQuietly(client: Client): Promise<void> {
    try {
      await client.unbind();
    } catch (error) {
      logger.debug('LDAP unbind failed:', { error: errorMessage(error) });
    }
  }

  private async getClient(): Promise<Client> {
    // Try to get a client from the pool
    let client = this.connectionPool.pop();
    while (client) {
      try {
        // Test if the client is still connected by doing a simple search
        await client.search(this.config.baseDN, {
          filter: '(objectClass=*)',
          scope: 'base',
          attributes: ['objectClass'],
          sizeLimit: 1,
          timeLimit: 5
        });
        return client;
      } catch (error) {
        logger.debug('Pooled LDAP client is not connected, removing from pool:', { error: errorMessage(error) });
        await this.unbindQuietly(client);

        if (errorCode(error) === INVALID_CREDENTIALS) {
          logger.warn('Credential error detected, clearing entire connection pool');
          await this.close();
          break;
        }
      }
      client = this.connectionPool.pop();
    }
    // No valid client in pool, create a new one
    return this.createClient();
  }

  private releaseClient(client: Client): void {
    if (this.connectionPool.length < this.config.maxConnections) {
      this.connectionPool.push(client);
    } else {
      void this.unbindQuietly(client);
    }
  }

  private async withClient<T>(operation: (client: Client) => Promise<T>): Promise<T> {
    const client = await this.getClient();
    try {
      const result = await operation(client);
      this.releaseClient(client);
      return result;
    } catch (error) {
      // A failed operation may leave the connection in an unknown state
      await this.unbindQuietly(client);
      throw error;
    }
  }

  async testConnection(): Promise<boolean> {
    logger.info(`LDAP health check: Testing connection to ${this.config.url}`);
    const testClient = this.newClient();

    try {
      await testClient.bind(this.config.username, this.config.password);
      logger.info('LDAP health check: Successfully connected with service account');
      return true;
    } catch (error) {
      const code = errorCode(error);
      if (typeof code === 'string' && NETWORK_ERRORS.includes(code)) {
        logger.error(`LDAP server not reachable: ${code} - ${errorMessage(error)}`);
      } else {
        logger.error(`LDAP health check failed: ${errorMessage(error)}, code: ${code}`);
      }
      return false;
    } finally {
      await this.unbindQuietly(testClient);
    }
  }

  async search(options: LDAPSearchOptions): Promise<LDAPSearchResult[]> {
    return this.withClient(async client => {
      const { searchEntries } = await client.search(options.base || this.config.baseDN, {
        scope: options.scope || 'sub',
        filter: options.filter,
        attributes: options.attributes || [],
        explicitBufferAttributes: options.binaryAttributes || [],
        sizeLimit: options.sizeLimit || 0,
        timeLimit: options.timeLimit || 30,
        paged: options.paged ? { pageSize: 500 } : false
      }, options.controls);

      logger.debug(`LDAP search completed successfully, ${searchEntries.length} results`);
      return searchEntries.map(({ dn, ...attributes }) => ({ dn, attributes }));
    });
  }

  async modify(dn: string, modifications: LDAPModification[], controls?: Control[]): Promise<void> {
    const changes = modifications.map(modification => new Change({
      operation: modification.operation,
      modification: new Attribute({
        type: modification.type,
        values: modification.values
      })
    }));

    await this.withClient(client => client.modify(dn, changes, controls));
    logger.debug(`LDAP modify completed for ${dn}`, { attributes: modifications.map(m => m.type) });
  }

  async del(dn: string): Promise<void> {
    await this.withClient(client => client.del(dn));
    logger.debug(`LDAP delete completed for ${dn}`);
  }

  async close(): Promise<void> {
    const pool = this.connectionPool;
    this.connectionPool = [];
    await Promise.all(pool.map(client => this.unbindQuietly(client)));
    logger.info('All LDAP connections closed');
  }
}

export function buildLDAPUrl(config: Pick<ADConfig, 'server' | 'useLDAPS'>): string {
  if (config.server.startsWith('ldap://') || config.server.startsWith('ldaps://')) {
    return config.server;
  }
  const port = config.useLDAPS ? 636 : 389;
  const protocol = config.useLDAPS ? 'ldaps' : 'ldap';
  return `${protocol}://${config.server}:${port}`;
}

export const createLDAPClient = (config: ADConfig): LDAPClient => {
  return new LDAPClient({
    url: buildLDAPUrl(config),
    baseDN: config.baseDN,
    username: config.username,
    password: config.password,
    timeout: config.timeout,
    connectTimeout: config.connectTimeout,
    maxConnections: config.maxConnections
  });
};
