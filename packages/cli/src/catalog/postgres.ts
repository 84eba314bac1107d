/**
 * PostgreSQL 15 as a single-replica StatefulSet
 */

import * as fs from 'fs';
import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { ServiceError } from '../errors';
import { clusterHost, requirePod, timestamp } from './helpers';

const SELECTOR = 'app=postgres';
const USER = 'postgres';

const pod = (ctx: ServiceContext) => requirePod(ctx, SELECTOR, 'PostgreSQL');

async function sql(ctx: ServiceContext, query: string, database = 'postgres'): Promise<void> {
  const name = await pod(ctx);
  ctx.out.info('Executing SQL query...');
  await ctx.kube.exec(name, ctx.namespace, ['psql', '-U', USER, '-d', database, '-c', query], { tty: true });
}

export const postgres = defineService({
  id: 'postgres',
  name: 'PostgreSQL',
  description: 'PostgreSQL 15 database',
  aliases: ['postgresql', 'pg'],
  manifest: 'postgres.yaml',
  selector: SELECTOR,
  presence: { kind: 'statefulset', name: 'postgres' },
  workloads: [{ kind: 'statefulset', name: 'postgres', selector: SELECTOR, timeoutSeconds: 120, replicas: 1 }],
  statusSections: [
    { title: 'StatefulSet Status', get: ['statefulset', 'postgres'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'postgres'] },
    { title: 'Persistent Volume', get: ['pvc', 'postgres-pvc'], fallback: '  No PVC found' },
  ],
  healthCheck: {
    image: 'postgres:15',
    env: { PGPASSWORD: 'postgres' },
    command: (namespace) => [
      'timeout', '5', 'psql', '-h', clusterHost('postgres', namespace), '-U', USER, '-c', 'SELECT 1;',
    ],
  },
  accessPorts: [{ key: 'postgres', service: 'postgres', portName: 'postgres' }],
  describeAccess: ({ ip, ports, namespace }) => [
    `  Host: ${ip}:${ports.postgres}`,
    `  Internal: ${clusterHost('postgres', namespace)}:5432`,
    '',
    '  Connection String:',
    `    postgresql://postgres:postgres@${ip}:${ports.postgres}/postgres`,
    '',
    '  Default Credentials:',
    '    Username: postgres',
    '    Password: postgres',
    '    Database: postgres',
  ],
  actions: [
    defineAction({
      name: 'psql',
      aliases: ['cli'],
      description: 'Open the PostgreSQL CLI',
      arguments: [{ name: 'args', variadic: true }],
      passThrough: true,
      run: async (ctx, args) => {
        const name = await pod(ctx);
        ctx.out.info('Connecting to PostgreSQL CLI...');
        await ctx.kube.exec(name, ctx.namespace, ['psql', '-U', USER, ...args], { tty: true });
      },
    }),
    defineAction({
      name: 'sql',
      aliases: ['query', 'exec'],
      description: 'Execute a SQL query',
      arguments: [{ name: 'query', required: true }, { name: 'database' }],
      run: (ctx, [query, database]) => sql(ctx, query, database),
    }),
    defineAction({
      name: 'list-db',
      aliases: ['databases'],
      description: 'List all databases',
      run: async (ctx) => {
        ctx.out.info('Listing databases...');
        await sql(ctx, '\\l');
      },
    }),
    defineAction({
      name: 'list-tables',
      aliases: ['tables'],
      description: 'List tables in a database',
      arguments: [{ name: 'database' }],
      run: async (ctx, [database = 'postgres']) => {
        ctx.out.info(`Listing tables in database: ${database}`);
        await sql(ctx, '\\dt', database);
      },
    }),
    defineAction({
      name: 'create-db',
      aliases: ['createdb'],
      description: 'Create a database',
      arguments: [{ name: 'name', required: true }, { name: 'owner' }],
      run: async (ctx, [database, owner = USER]) => {
        ctx.out.info(`Creating database: ${database}`);
        await sql(ctx, `CREATE DATABASE ${database} OWNER ${owner};`);
        ctx.out.success(`Database '${database}' created`);
      },
    }),
    defineAction({
      name: 'create-user',
      aliases: ['createuser'],
      description: 'Create a user',
      arguments: [{ name: 'username', required: true }, { name: 'password', required: true }],
      run: async (ctx, [username, password]) => {
        ctx.out.info(`Creating user: ${username}`);
        await sql(ctx, `CREATE USER ${username} WITH PASSWORD '${password.replace(/'/g, "''")}';`);
        ctx.out.success(`User '${username}' created`);
      },
    }),
    defineAction({
      name: 'grant',
      description: 'Grant all privileges on a database to a user',
      arguments: [{ name: 'database', required: true }, { name: 'username', required: true }],
      run: async (ctx, [database, username]) => {
        ctx.out.info(`Granting privileges on ${database} to ${username}`);
        await sql(ctx, `GRANT ALL PRIVILEGES ON DATABASE ${database} TO ${username};`);
        ctx.out.success('Privileges granted');
      },
    }),
    defineAction({
      name: 'backup',
      description: 'Dump a database to a local file',
      arguments: [{ name: 'database' }, { name: 'file' }],
      run: async (ctx, [database = 'postgres', file = `backup-${timestamp()}.sql`]) => {
        const name = await pod(ctx);
        ctx.out.info(`Backing up database: ${database} to ${file}`);
        await ctx.kube.exec(name, ctx.namespace, ['pg_dump', '-U', USER, database], { stdoutPath: file });
        ctx.out.success(`Backup saved to: ${file}`);
      },
    }),
    defineAction({
      name: 'restore',
      description: 'Restore a database from a local dump',
      arguments: [{ name: 'file', required: true }, { name: 'database' }],
      run: async (ctx, [file, database = 'postgres']) => {
        if (!fs.existsSync(file)) {
          throw new ServiceError('postgres', `Backup file not found: ${file}`);
        }
        const name = await pod(ctx);
        ctx.out.info(`Restoring database: ${database} from ${file}`);
        await ctx.kube.exec(name, ctx.namespace, ['psql', '-U', USER, database], { stdinPath: file });
        ctx.out.success('Database restored');
      },
    }),
    defineAction({
      name: 'version',
      description: 'Show the PostgreSQL version',
      run: async (ctx) => {
        const name = await pod(ctx);
        await ctx.kube.exec(name, ctx.namespace, ['psql', '-U', USER, '-c', 'SELECT version();']);
      },
    }),
  ],
  examples: [
    'minidev postgres deploy',
    'minidev postgres psql',
    'minidev postgres sql "SELECT * FROM users;" mydb',
    'minidev postgres create-db myapp postgres',
    'minidev postgres create-user appuser changeme',
    'minidev postgres grant myapp appuser',
    'minidev postgres backup mydb backup.sql',
  ],
});
