/**
 * Apache Airflow: webserver, scheduler and an embedded PostgreSQL that is
 * skipped when a standalone `postgres` service already runs in the namespace
 */

import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { clusterHost, openServiceAction, requirePod } from './helpers';

const WEBSERVER = 'app=airflow,component=webserver';
const SCHEDULER = 'app=airflow,component=scheduler';
const EMBEDDED_POSTGRES = 'app=airflow-postgres';

async function hasStandalonePostgres(ctx: ServiceContext): Promise<boolean> {
  return (
    (await ctx.kube.resourceExists('statefulset', 'postgres', ctx.namespace)) ||
    (await ctx.kube.resourceExists('service', 'postgres', ctx.namespace))
  );
}

async function airflowCli(ctx: ServiceContext, args: string[]): Promise<void> {
  const pod = await requirePod(ctx, WEBSERVER, 'Airflow webserver');
  ctx.out.info(`Executing: airflow ${args.join(' ')}`);
  await ctx.kube.exec(pod, ctx.namespace, ['airflow', ...args], { tty: true });
}

export const airflow = defineService({
  id: 'airflow',
  name: 'Apache Airflow',
  description: 'Workflow scheduler with webserver and embedded PostgreSQL',
  manifest: 'airflow.yaml',
  selector: WEBSERVER,
  presence: { kind: 'deployment', name: 'airflow-webserver' },
  workloads: [
    {
      kind: 'deployment',
      name: 'airflow-postgres',
      label: 'PostgreSQL',
      selector: EMBEDDED_POSTGRES,
      timeoutSeconds: 120,
      waitMessage: 'Waiting for embedded PostgreSQL to be ready...',
      restartable: false,
      skip: async (ctx) => {
        if (await hasStandalonePostgres(ctx)) {
          ctx.out.info(`Using standalone PostgreSQL service (${clusterHost('postgres', ctx.namespace)})`);
          return true;
        }
        return false;
      },
    },
    {
      kind: 'deployment',
      name: 'airflow-webserver',
      label: 'Airflow Webserver',
      selector: WEBSERVER,
      timeoutSeconds: 300,
      waitMessage: 'Waiting for Airflow Webserver to be ready (this may take a few minutes)...',
    },
    {
      kind: 'deployment',
      name: 'airflow-scheduler',
      label: 'Airflow Scheduler',
      selector: SCHEDULER,
      timeoutSeconds: 180,
      waitMessage: 'Waiting for Airflow Scheduler to be ready...',
    },
  ],
  statusSections: [
    { title: 'PostgreSQL', get: ['deployment', 'airflow-postgres'], fallbackPods: 'app=postgres' },
    { title: 'Airflow Webserver', get: ['deployment', 'airflow-webserver'], pods: WEBSERVER },
    { title: 'Airflow Scheduler', get: ['deployment', 'airflow-scheduler'], pods: SCHEDULER },
    { title: 'Services', get: ['service', '-l', 'app=airflow'] },
  ],
  healthCheck: {
    image: 'curlimages/curl:latest',
    command: (namespace) => [
      'timeout', '5', 'curl', '-f', '-s', `http://${clusterHost('airflow-webserver', namespace)}:8080/health`,
    ],
  },
  accessPorts: [{ key: 'http', service: 'airflow-webserver', portName: 'http' }],
  describeAccess: ({ ip, ports }) => [
    `  Airflow UI: http://${ip}:${ports.http}`,
    '  Default credentials: admin/admin',
  ],
  logTargets: {
    defaultTarget: 'webserver',
    targets: [
      { name: 'webserver', aliases: ['web'], selector: WEBSERVER },
      { name: 'scheduler', aliases: ['sched'], selector: SCHEDULER },
      { name: 'postgres', aliases: ['db'], selector: EMBEDDED_POSTGRES, fallbackSelector: 'app=postgres' },
    ],
  },
  actions: [
    defineAction({
      name: 'cli',
      aliases: ['cmd'],
      description: 'Execute an Airflow CLI command',
      arguments: [{ name: 'command', variadic: true, required: true }],
      passThrough: true,
      run: airflowCli,
    }),
    defineAction({
      name: 'create-user',
      aliases: ['adduser'],
      description: 'Create an Airflow user',
      arguments: [{ name: 'username' }, { name: 'password' }, { name: 'role' }],
      run: async (ctx, [username = 'user', password = 'user', role = 'User']) => {
        ctx.out.info(`Creating Airflow user: ${username}`);
        await airflowCli(ctx, [
          'users', 'create',
          '--username', username,
          '--password', password,
          '--firstname', 'User',
          '--lastname', 'Name',
          '--role', role,
          '--email', `${username}@example.com`,
        ]);
      },
    }),
    openServiceAction('ui', ['web'], 'airflow-webserver', 'Airflow UI'),
  ],
  examples: [
    'minidev airflow deploy',
    'minidev airflow logs webserver 100',
    'minidev airflow cli dags list',
    'minidev airflow create-user john changeme Admin',
  ],
});
