/**
 * ZincSearch, a lightweight full-text search engine
 */

import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { isoSeconds, openServiceAction, parseDocument, printResponse, serviceUrl } from './helpers';

const SELECTOR = 'app=zincsearch';
const AUTH = { username: 'admin', password: 'admin' };

const apiUrl = async (ctx: ServiceContext, path: string) =>
  `${await serviceUrl(ctx, 'zincsearch', 'http')}/api${path}`;

export const zincsearch = defineService({
  id: 'zincsearch',
  name: 'ZincSearch',
  description: 'Lightweight full-text search engine',
  aliases: ['zinc'],
  manifest: 'zincsearch.yaml',
  selector: SELECTOR,
  presence: { kind: 'deployment', name: 'zincsearch' },
  workloads: [{ kind: 'deployment', name: 'zincsearch', selector: SELECTOR, timeoutSeconds: 120 }],
  statusSections: [
    { title: 'Deployment Status', get: ['deployment', 'zincsearch'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'zincsearch'] },
  ],
  accessPorts: [{ key: 'http', service: 'zincsearch', portName: 'http' }],
  describeAccess: ({ ip, ports }) => [
    `  Web UI:      http://${ip}:${ports.http}`,
    `  API Docs:    http://${ip}:${ports.http}/ui/`,
    '  Default credentials: admin/admin',
  ],
  actions: [
    defineAction({
      name: 'index',
      description: 'Manage indices',
      subactions: [
        defineAction({
          name: 'create',
          description: 'Create an index',
          arguments: [{ name: 'name' }],
          run: async (ctx, [index = 'test-index']) => {
            const url = await apiUrl(ctx, '/index');
            ctx.out.info(`Creating index: ${index}`);
            printResponse(
              ctx,
              await ctx.http.request({ method: 'PUT', url, auth: AUTH, body: { name: index, storage_type: 'disk' } })
            );
          },
        }),
        defineAction({
          name: 'list',
          description: 'List all indices',
          run: async (ctx) => {
            const url = await apiUrl(ctx, '/index');
            ctx.out.info('Listing indices...');
            printResponse(ctx, await ctx.http.request({ method: 'GET', url, auth: AUTH }));
          },
        }),
        defineAction({
          name: 'doc',
          description: 'Index a JSON document',
          arguments: [{ name: 'index' }, { name: 'json' }],
          run: async (ctx, [index = 'test-index', json]) => {
            const url = await apiUrl(ctx, `/${index}/_doc`);
            const body = json ? parseDocument('zincsearch', json) : { message: 'test document', timestamp: isoSeconds() };
            ctx.out.info(`Indexing document to: ${index}`);
            printResponse(ctx, await ctx.http.request({ method: 'POST', url, auth: AUTH, body }));
          },
        }),
      ],
    }),
    defineAction({
      name: 'search',
      description: 'Search an index',
      arguments: [{ name: 'index' }, { name: 'query' }],
      run: async (ctx, [index = 'test-index', query = '*']) => {
        const url = await apiUrl(ctx, `/${index}/_search`);
        ctx.out.info(`Searching index: ${index} for: ${query}`);
        printResponse(
          ctx,
          await ctx.http.request({
            method: 'POST',
            url,
            auth: AUTH,
            body: { search_type: 'match', query: { term: query }, from: 0, max_results: 20 },
          })
        );
      },
    }),
    openServiceAction('ui', ['web'], 'zincsearch', 'ZincSearch UI'),
  ],
  examples: [
    'minidev zincsearch index create my-index',
    `minidev zincsearch index doc my-index '{"message":"hello"}'`,
    'minidev zincsearch search my-index hello',
  ],
});
