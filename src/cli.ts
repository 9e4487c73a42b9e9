import { parseArgs } from 'util';
import { AccountKind } from './lifecycle/types';
import { ApplicationConfiguration } from './config/types';
import { LDAPOperations } from './config/ldap';
import { ConfigurationError } from './services/base/errors';
import { DirectoryService } from './services/directory.service';
import { FileArchiveStore } from './services/archive.service';
import { MailService } from './services/mail.service';
import { LifecycleService } from './services/lifecycle.service';

export type CliCommand =
  | {
      command: 'run';
      kinds: AccountKind[];
      apply: boolean;
      names: string[];
      searchBase?: string;
      sendReport: boolean;
    }
  | { command: 'schedule' };

export const USAGE = [
  'Usage:',
  '  run [--kind computer|user|all] [--apply] [--name NAME ...] [--search-base DN] [--no-mail]',
  '  schedule'
].join('\n');

const KIND_OPTIONS = new Map<string, AccountKind[]>([
  ['computer', ['computer']],
  ['user', ['user']],
  ['all', ['computer', 'user']]
]);

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCommandLine(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      kind: { type: 'string', default: 'all' },
      apply: { type: 'boolean', default: false },
      name: { type: 'string', multiple: true },
      'search-base': { type: 'string' },
      'no-mail': { type: 'boolean', default: false }
    }
  });

  const [command = 'run', ...rest] = positionals;
  if (rest.length > 0) {
    throw new ConfigurationError(`Unexpected arguments: ${rest.join(' ')}\n${USAGE}`);
  }

  if (command === 'schedule') {
    return { command: 'schedule' };
  }
  if (command !== 'run') {
    throw new ConfigurationError(`Unknown command '${command}'\n${USAGE}`);
  }

  const kindOption = values.kind ?? 'all';
  const kinds = KIND_OPTIONS.get(kindOption);
  if (!kinds) {
    throw new ConfigurationError(`--kind must be computer, user or all (got '${kindOption}')`, 'kind');
  }

  const names = (values.name ?? []).map(name => name.trim()).filter(Boolean);
  if (names.length > 0 && kinds.length > 1) {
    throw new ConfigurationError('--name requires --kind computer or --kind user', 'name');
  }

  return {
    command: 'run',
    kinds,
    apply: values.apply ?? false,
    names,
    searchBase: values['search-base'],
    sendReport: !values['no-mail']
  };
}

/**
 * Wire the lifecycle pipeline to the directory, archive and mail services
 */
export function createLifecycleService(config: ApplicationConfiguration, ldap: LDAPOperations): LifecycleService {
  const directory = new DirectoryService(ldap, { searchBases: config.searchBases });

  return new LifecycleService(
    {
      reader: directory,
      writer: directory,
      archive: config.archive.path ? new FileArchiveStore(config.archive.path) : undefined,
      mailer: config.mail.host && config.mail.sender && config.mail.recipients.length > 0
        ? new MailService(config.mail)
        : undefined
    },
    {
      policies: config.policies,
      removeUsersAfterArchive: config.archive.removeUsersAfterArchive,
      reportSubject: config.mail.subject
    }
  );
}
