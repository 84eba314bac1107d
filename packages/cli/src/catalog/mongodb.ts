/**
 * MongoDB 8 as a single-replica StatefulSet
 */

import * as fs from 'fs';
import * as path from 'path';
import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { ServiceError } from '../errors';
import { clusterHost, requirePod, timestamp } from './helpers';

const SELECTOR = 'app=mongodb';
const AUTH = ['--username', 'admin', '--password', 'mongodb', '--authenticationDatabase', 'admin'];
const SHELL_AUTH = ['-u', 'admin', '-p', 'mongodb', '--authenticationDatabase', 'admin'];

const pod = (ctx: ServiceContext) => requirePod(ctx, SELECTOR, 'MongoDB');

/**
 * Quote a value as a single-quoted JavaScript string for mongosh --eval
 */
export function jsString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

async function evaluate(ctx: ServiceContext, command: string, database = 'admin'): Promise<void> {
  const name = await pod(ctx);
  ctx.out.info('Executing MongoDB command...');
  await ctx.kube.exec(name, ctx.namespace, ['mongosh', ...SHELL_AUTH, database, '--eval', command], { tty: true });
}

function requireFile(file: string, message: string): void {
  if (!fs.existsSync(file)) {
    throw new ServiceError('mongodb', `${message}: ${file}`);
  }
}

export const mongodb = defineService({
  id: 'mongodb',
  name: 'MongoDB',
  description: 'MongoDB 8 document database',
  aliases: ['mongo'],
  manifest: 'mongodb.yaml',
  selector: SELECTOR,
  presence: { kind: 'statefulset', name: 'mongodb' },
  workloads: [{ kind: 'statefulset', name: 'mongodb', selector: SELECTOR, timeoutSeconds: 120, replicas: 1 }],
  statusSections: [
    { title: 'StatefulSet Status', get: ['statefulset', 'mongodb'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'mongodb'] },
    { title: 'Persistent Volume', get: ['pvc', 'mongodb-pvc'], fallback: '  No PVC found' },
  ],
  healthCheck: {
    image: 'mongo:8.0',
    command: (namespace) => [
      'timeout', '5', 'mongosh', '--host', clusterHost('mongodb', namespace), ...AUTH,
      '--eval', "db.adminCommand('ping')",
    ],
  },
  accessPorts: [{ key: 'mongodb', service: 'mongodb', portName: 'mongodb' }],
  describeAccess: ({ ip, ports, namespace }) => [
    `  Host: ${ip}:${ports.mongodb}`,
    `  Internal: ${clusterHost('mongodb', namespace)}:27017`,
    '',
    '  Connection String:',
    `    mongodb://admin:mongodb@${ip}:${ports.mongodb}/admin`,
    '',
    '  Default Credentials:',
    '    Username: admin',
    '    Password: mongodb',
    '    Database: admin',
  ],
  actions: [
    defineAction({
      name: 'mongosh',
      aliases: ['shell', 'cli'],
      description: 'Open the MongoDB shell',
      arguments: [{ name: 'args', variadic: true }],
      passThrough: true,
      run: async (ctx, args) => {
        const name = await pod(ctx);
        ctx.out.info('Connecting to MongoDB Shell...');
        await ctx.kube.exec(name, ctx.namespace, ['mongosh', ...SHELL_AUTH, ...args], { tty: true });
      },
    }),
    defineAction({
      name: 'eval',
      aliases: ['exec', 'command'],
      description: 'Execute a MongoDB command',
      arguments: [{ name: 'command', required: true }, { name: 'database' }],
      run: (ctx, [command, database]) => evaluate(ctx, command, database),
    }),
    defineAction({
      name: 'list-db',
      aliases: ['databases'],
      description: 'List all databases',
      run: async (ctx) => {
        ctx.out.info('Listing databases...');
        await evaluate(ctx, "db.adminCommand('listDatabases')");
      },
    }),
    defineAction({
      name: 'list-collections',
      aliases: ['collections'],
      description: 'List collections in a database',
      arguments: [{ name: 'database' }],
      run: async (ctx, [database = 'admin']) => {
        ctx.out.info(`Listing collections in database: ${database}`);
        await evaluate(ctx, 'db.getCollectionNames()', database);
      },
    }),
    defineAction({
      name: 'create-db',
      aliases: ['createdb'],
      description: 'Initialize a database',
      arguments: [{ name: 'name', required: true }],
      run: async (ctx, [database]) => {
        ctx.out.info(`Creating database: ${database} (will be created on first write)`);
        await evaluate(ctx, "db.createCollection('_init')", database);
        ctx.out.success(`Database '${database}' initialized`);
      },
    }),
    defineAction({
      name: 'create-user',
      aliases: ['createuser'],
      description: 'Create a user',
      arguments: [
        { name: 'username', required: true },
        { name: 'password', required: true },
        { name: 'database' },
        { name: 'role' },
      ],
      run: async (ctx, [username, password, database = 'admin', role = 'readWrite']) => {
        ctx.out.info(`Creating user: ${username} in database: ${database} with role: ${role}`);
        await evaluate(
          ctx,
          `db.createUser({user: ${jsString(username)}, pwd: ${jsString(password)}, roles: [{role: ${jsString(role)}, db: ${jsString(database)}}]})`,
          database
        );
        ctx.out.success(`User '${username}' created`);
      },
    }),
    defineAction({
      name: 'grant',
      description: 'Grant a role on a database to a user',
      arguments: [{ name: 'username', required: true }, { name: 'database', required: true }, { name: 'role' }],
      run: async (ctx, [username, database, role = 'readWrite']) => {
        ctx.out.info(`Granting role '${role}' on '${database}' to '${username}'`);
        await evaluate(
          ctx,
          `db.grantRolesToUser(${jsString(username)}, [{role: ${jsString(role)}, db: ${jsString(database)}}])`
        );
        ctx.out.success('Role granted');
      },
    }),
    defineAction({
      name: 'backup',
      description: 'Dump a database to a gzipped archive',
      arguments: [{ name: 'database' }, { name: 'directory' }],
      run: async (ctx, [database = 'admin', directory = `./mongodb-backup-${timestamp()}`]) => {
        const name = await pod(ctx);
        const file = path.join(directory, `${database}.archive.gz`);
        ctx.out.info(`Backing up database: ${database} to ${directory}`);
        fs.mkdirSync(directory, { recursive: true });
        await ctx.kube.exec(
          name,
          ctx.namespace,
          ['mongodump', ...AUTH, '--db', database, '--archive', '--gzip'],
          { stdoutPath: file }
        );
        ctx.out.success(`Backup saved to: ${file}`);
      },
    }),
    defineAction({
      name: 'restore',
      description: 'Restore a database from a gzipped archive',
      arguments: [{ name: 'file', required: true }, { name: 'database', required: true }],
      run: async (ctx, [file, database]) => {
        requireFile(file, 'Backup file not found');
        const name = await pod(ctx);
        ctx.out.info(`Restoring database: ${database} from ${file}`);
        await ctx.kube.exec(
          name,
          ctx.namespace,
          ['mongorestore', ...AUTH, '--db', database, '--archive', '--gzip'],
          { stdinPath: file }
        );
        ctx.out.success('Database restored');
      },
    }),
    defineAction({
      name: 'import',
      description: 'Import a JSON array into a collection',
      arguments: [
        { name: 'file', required: true },
        { name: 'database', required: true },
        { name: 'collection', required: true },
      ],
      run: async (ctx, [file, database, collection]) => {
        requireFile(file, 'File not found');
        const name = await pod(ctx);
        ctx.out.info(`Importing ${file} to ${database}.${collection}`);
        await ctx.kube.copyTo(file, ctx.namespace, name, '/tmp/import.json');
        await ctx.kube.exec(name, ctx.namespace, [
          'mongoimport', ...AUTH,
          '--db', database,
          '--collection', collection,
          '--file', '/tmp/import.json',
          '--jsonArray',
        ]);
        ctx.out.success('Data imported');
      },
    }),
    defineAction({
      name: 'export',
      description: 'Export a collection to a JSON file',
      arguments: [{ name: 'database', required: true }, { name: 'collection', required: true }, { name: 'file' }],
      run: async (ctx, [database, collection, file = `${collection}-${timestamp()}.json`]) => {
        const name = await pod(ctx);
        ctx.out.info(`Exporting ${database}.${collection} to ${file}`);
        await ctx.kube.exec(
          name,
          ctx.namespace,
          ['mongoexport', ...AUTH, '--db', database, '--collection', collection, '--jsonArray'],
          { stdoutPath: file }
        );
        ctx.out.success(`Data exported to: ${file}`);
      },
    }),
    defineAction({
      name: 'version',
      description: 'Show the MongoDB version and host',
      run: async (ctx) => {
        const name = await pod(ctx);
        await ctx.kube.exec(name, ctx.namespace, [
          'mongosh', ...SHELL_AUTH, '--eval', 'db.version(); db.serverStatus().host',
        ]);
      },
    }),
    defineAction({
      name: 'stats',
      aliases: ['statistics'],
      description: 'Show server statistics',
      run: async (ctx) => {
        ctx.out.info('MongoDB Server Statistics...');
        await evaluate(ctx, 'db.serverStatus()');
      },
    }),
  ],
  examples: [
    'minidev mongodb deploy',
    'minidev mongodb mongosh',
    'minidev mongodb eval "db.users.find()" mydb',
    'minidev mongodb create-db myapp',
    'minidev mongodb import users.json myapp users',
  ],
});
