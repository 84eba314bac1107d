/**
 * Elasticsearch single-node cluster, security disabled
 */

import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { errorMessage } from '../errors';
import { isoSeconds, parseDocument, printResponse, serviceUrl } from './helpers';

const SELECTOR = 'app=elasticsearch';

const baseUrl = (ctx: ServiceContext) => serviceUrl(ctx, 'elasticsearch', 'http');

async function get(ctx: ServiceContext, path: string): Promise<void> {
  const url = `${await baseUrl(ctx)}${path}`;
  printResponse(ctx, await ctx.http.request({ method: 'GET', url }));
}

async function clusterHealth(ctx: ServiceContext): Promise<void> {
  ctx.out.info('Cluster Health:');
  await get(ctx, '/_cluster/health?pretty');
}

/**
 * `*` matches everything, anything else is a match query on `message`
 */
export function searchQuery(query: string): Record<string, unknown> {
  return query === '*' ? { query: { match_all: {} } } : { query: { match: { message: query } } };
}

export const elasticsearch = defineService({
  id: 'elasticsearch',
  name: 'Elasticsearch',
  description: 'Elasticsearch search and analytics engine',
  aliases: ['es'],
  manifest: 'elasticsearch.yaml',
  selector: SELECTOR,
  presence: { kind: 'statefulset', name: 'elasticsearch' },
  workloads: [{ kind: 'statefulset', name: 'elasticsearch', selector: SELECTOR, timeoutSeconds: 180, replicas: 1 }],
  statusSections: [
    { title: 'StatefulSet Status', get: ['statefulset', 'elasticsearch'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'elasticsearch'] },
    { title: 'Persistent Volume Claims', get: ['pvc', '-l', SELECTOR] },
  ],
  accessPorts: [{ key: 'http', service: 'elasticsearch', portName: 'http' }],
  describeAccess: ({ ip, ports }) => [
    `  REST API:    http://${ip}:${ports.http}`,
    `  Health:      http://${ip}:${ports.http}/_cluster/health`,
    `  Cluster:     http://${ip}:${ports.http}/_cluster/state`,
    '',
    '  Security is disabled for development - no authentication required',
  ],
  hooks: {
    afterRemove: async (ctx) => {
      ctx.out.info('Removing persistent volume claims...');
      await ctx.kube.deleteByLabel('pvc', SELECTOR, ctx.namespace);
    },
    afterStatus: async (ctx) => {
      ctx.out.line();
      try {
        await clusterHealth(ctx);
      } catch (error) {
        ctx.out.error(`Failed to connect to Elasticsearch: ${errorMessage(error)}`);
      }
    },
  },
  actions: [
    defineAction({
      name: 'health',
      description: 'Show cluster health',
      run: clusterHealth,
    }),
    defineAction({
      name: 'stats',
      description: 'Show cluster statistics',
      run: async (ctx) => {
        ctx.out.header('Cluster Statistics');
        await get(ctx, '/_cluster/stats?pretty');
      },
    }),
    defineAction({
      name: 'nodes',
      description: 'Show node information',
      run: async (ctx) => {
        ctx.out.header('Node Information');
        await get(ctx, '/_nodes?pretty');
      },
    }),
    defineAction({
      name: 'index',
      description: 'Manage indices',
      subactions: [
        defineAction({
          name: 'create',
          description: 'Create an index with one shard and no replicas',
          arguments: [{ name: 'name' }],
          run: async (ctx, [index = 'test-index']) => {
            const url = `${await baseUrl(ctx)}/${index}`;
            ctx.out.info(`Creating index: ${index}`);
            printResponse(
              ctx,
              await ctx.http.request({
                method: 'PUT',
                url,
                body: { settings: { number_of_shards: 1, number_of_replicas: 0 } },
              })
            );
          },
        }),
        defineAction({
          name: 'list',
          description: 'List all indices',
          run: async (ctx) => {
            ctx.out.info('Listing indices...');
            await get(ctx, '/_cat/indices?v');
          },
        }),
        defineAction({
          name: 'delete',
          description: 'Delete an index',
          arguments: [{ name: 'name', required: true }],
          run: async (ctx, [index]) => {
            const url = `${await baseUrl(ctx)}/${index}`;
            ctx.out.info(`Deleting index: ${index}`);
            printResponse(ctx, await ctx.http.request({ method: 'DELETE', url }));
          },
        }),
        defineAction({
          name: 'doc',
          description: 'Index a JSON document',
          arguments: [{ name: 'index' }, { name: 'json' }],
          run: async (ctx, [index = 'test-index', json]) => {
            const url = `${await baseUrl(ctx)}/${index}/_doc`;
            const body = json
              ? parseDocument('elasticsearch', json)
              : { message: 'test document', timestamp: isoSeconds(), value: 123 };
            ctx.out.info(`Indexing document to: ${index}`);
            printResponse(ctx, await ctx.http.request({ method: 'POST', url, body }));
          },
        }),
      ],
    }),
    defineAction({
      name: 'search',
      description: 'Search an index',
      arguments: [{ name: 'index' }, { name: 'query' }],
      run: async (ctx, [index = 'test-index', query = '*']) => {
        const url = `${await baseUrl(ctx)}/${index}/_search`;
        ctx.out.info(`Searching index: ${index} for: ${query}`);
        printResponse(ctx, await ctx.http.request({ method: 'POST', url, body: searchQuery(query) }));
      },
    }),
    defineAction({
      name: 'ui',
      aliases: ['web'],
      description: 'Open cluster health in the browser',
      run: async (ctx) => {
        const url = `${await baseUrl(ctx)}/_cluster/health?pretty`;
        ctx.out.info('Opening Elasticsearch cluster health...');
        if (!(await ctx.openUrl(url))) {
          ctx.out.line(`URL: ${url}`);
        }
      },
    }),
  ],
  examples: [
    'minidev elasticsearch deploy',
    'minidev elasticsearch index create my-index',
    `minidev elasticsearch index doc my-index '{"message":"hello world"}'`,
    'minidev elasticsearch search my-index hello',
    'minidev elasticsearch health',
  ],
});
