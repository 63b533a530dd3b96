/**
 * Management commands
 *
 *   manage init-roles
 *   manage create-user --email <email> --password <password> --first-name <name>
 *                      --last-name <name> [--role viewer|member|editor|admin] [--superuser]
 *   manage list-users
 */

import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { DatabaseManager } from '../db/index.js';
import { getFullName } from '../models/ClubUser.js';
import { createServices, type Services } from '../services/index.js';
import { ValidationError } from '../utils/errors.js';
import { closeLogging, createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('manage');

const USAGE = `Usage: manage <command> [options]

Commands:
  init-roles     Create the default roles (viewer, member, editor, admin)
  create-user    --email --password --first-name --last-name [--role] [--superuser]
  list-users     Print every user with role and status`;

type Output = (line: string) => void;

async function initRoles(services: Services, print: Output): Promise<void> {
  const created = await services.roles.ensureDefaultRoles();
  if (created.length === 0) {
    print('Default roles already exist.');
    return;
  }
  for (const role of created) {
    print(`Created role: ${role.name}`);
  }
}

async function createUser(services: Services, args: string[], print: Output): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      email: { type: 'string' },
      password: { type: 'string' },
      'first-name': { type: 'string' },
      'last-name': { type: 'string' },
      role: { type: 'string' },
      superuser: { type: 'boolean', default: false },
    },
  });

  await services.roles.ensureDefaultRoles();
  const user = await services.members.createInitialUser({
    email: values.email ?? '',
    password: values.password ?? '',
    firstName: values['first-name'] ?? '',
    lastName: values['last-name'] ?? '',
    role: values.role,
    isSuperuser: values.superuser,
  });
  print(`Created user ${user.email} (${user.role?.name ?? 'no role'})`);
}

function listUsers(services: Services, print: Output): void {
  const users = services.repos.users.list();
  if (users.length === 0) {
    print('No users.');
    return;
  }
  for (const user of users) {
    const flags = [user.isActive ? 'active' : 'inactive', ...(user.isSuperuser ? ['superuser'] : [])];
    print(`${user.id}\t${user.email}\t${getFullName(user)}\t${user.role?.name ?? '-'}\t${flags.join(',')}`);
  }
}

/**
 * Run one command against the given services. Returns the process exit code.
 */
export async function runCommand(
  services: Services,
  argv: string[],
  print: Output = line => console.log(line),
): Promise<number> {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case 'init-roles':
        await initRoles(services, print);
        return 0;
      case 'create-user':
        await createUser(services, rest, print);
        return 0;
      case 'list-users':
        listUsers(services, print);
        return 0;
      default:
        print(USAGE);
        return command === undefined || command === 'help' ? 0 : 1;
    }
  } catch (error) {
    if (error instanceof ValidationError) {
      for (const [field, messages] of Object.entries(error.fieldErrors)) {
        print(`${field}: ${messages.join(' ')}`);
      }
      return 1;
    }
    if (error instanceof TypeError && 'code' in error) {
      print(error.message);
      print(USAGE);
      return 1;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const database = DatabaseManager.getInstance();
  let exitCode = 1;
  try {
    database.connect();
    exitCode = await runCommand(createServices(database), process.argv.slice(2));
  } catch (error) {
    logger.error('Command failed', error);
  } finally {
    database.close();
    await closeLogging();
  }
  process.exit(exitCode);
}

const __filename = fileURLToPath(import.meta.url);

if (process.argv[1] === __filename) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
