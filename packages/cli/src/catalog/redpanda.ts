/**
 * Redpanda, a Kafka-compatible streaming platform
 */

import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { ServiceError } from '../errors';

const SELECTOR = 'app=redpanda';
const BROKER_POD = 'redpanda-0';
const EXTERNAL = 'redpanda-external';

async function rpk(ctx: ServiceContext, args: string[]): Promise<void> {
  if (!(await ctx.kube.podExists(BROKER_POD, ctx.namespace))) {
    throw new ServiceError('redpanda', 'Redpanda pod not found');
  }
  ctx.out.info(`Executing: rpk ${args.join(' ')}`);
  await ctx.kube.exec(BROKER_POD, ctx.namespace, ['rpk', ...args], { tty: true });
}

export const redpanda = defineService({
  id: 'redpanda',
  name: 'Redpanda',
  description: 'Kafka-compatible streaming platform',
  aliases: ['kafka'],
  manifest: 'redpanda.yaml',
  selector: SELECTOR,
  presence: { kind: 'statefulset', name: 'redpanda' },
  workloads: [
    {
      kind: 'statefulset',
      name: 'redpanda',
      selector: SELECTOR,
      timeoutSeconds: 180,
      replicas: 1,
      waitMessage: 'Waiting for Redpanda to be ready...',
    },
  ],
  statusSections: [
    { title: 'StatefulSet Status', get: ['statefulset', 'redpanda'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Services', get: ['service', '-l', SELECTOR] },
  ],
  accessPorts: [
    { key: 'kafka', service: EXTERNAL, portName: 'kafka' },
    { key: 'admin', service: EXTERNAL, portName: 'admin' },
    { key: 'proxy', service: EXTERNAL, portName: 'http-proxy' },
    { key: 'schema', service: EXTERNAL, portName: 'schema-registry' },
  ],
  describeAccess: ({ ip, ports }) => [
    `  Kafka API:         ${ip}:${ports.kafka}`,
    `  Admin API:         http://${ip}:${ports.admin}`,
    `  HTTP Proxy:        http://${ip}:${ports.proxy}`,
    `  Schema Registry:   http://${ip}:${ports.schema}`,
  ],
  actions: [
    defineAction({
      name: 'rpk',
      description: 'Execute an rpk command',
      arguments: [{ name: 'command', variadic: true, required: true }],
      passThrough: true,
      run: rpk,
    }),
    defineAction({
      name: 'topic',
      description: 'Manage topics',
      subactions: [
        defineAction({
          name: 'create',
          description: 'Create a topic',
          arguments: [{ name: 'name' }, { name: 'partitions' }, { name: 'replicas' }],
          run: async (ctx, [topic = 'test-topic', partitions = '3', replicas = '1']) => {
            ctx.out.info(`Creating topic: ${topic} (partitions: ${partitions}, replicas: ${replicas})`);
            await rpk(ctx, ['topic', 'create', topic, '--partitions', partitions, '--replicas', replicas]);
          },
        }),
        defineAction({
          name: 'list',
          description: 'List all topics',
          run: async (ctx) => {
            ctx.out.info('Listing topics...');
            await rpk(ctx, ['topic', 'list']);
          },
        }),
      ],
    }),
    defineAction({
      name: 'produce',
      description: 'Produce messages to a topic',
      arguments: [{ name: 'topic' }],
      run: async (ctx, [topic = 'test-topic']) => {
        ctx.out.info(`Producing to topic: ${topic}`);
        ctx.out.line('Type messages (Ctrl+D to finish):');
        await rpk(ctx, ['topic', 'produce', topic]);
      },
    }),
    defineAction({
      name: 'consume',
      description: 'Consume messages from a topic',
      arguments: [{ name: 'topic' }],
      run: async (ctx, [topic = 'test-topic']) => {
        ctx.out.info(`Consuming from topic: ${topic}`);
        await rpk(ctx, ['topic', 'consume', topic]);
      },
    }),
  ],
  examples: [
    'minidev redpanda topic create my-topic 3 1',
    'minidev redpanda produce my-topic',
    'minidev redpanda consume my-topic',
    'minidev redpanda rpk cluster info',
  ],
});
