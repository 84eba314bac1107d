/**
 * Dex OpenID Connect provider with static test users
 */

import { defineAction, defineService } from '@minidev/core';
import { printResponse, serviceUrl } from './helpers';

const SELECTOR = 'app=dex';

export const dex = defineService({
  id: 'dex',
  name: 'Dex',
  description: 'OpenID Connect identity provider',
  aliases: ['oidc'],
  manifest: 'dex.yaml',
  selector: SELECTOR,
  presence: { kind: 'deployment', name: 'dex' },
  workloads: [{ kind: 'deployment', name: 'dex', selector: SELECTOR, timeoutSeconds: 60 }],
  statusSections: [
    { title: 'Deployment Status', get: ['deployment', 'dex'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'dex'] },
  ],
  accessPorts: [{ key: 'http', service: 'dex', portName: 'http' }],
  describeAccess: ({ ip, ports }) => [
    `  OIDC Issuer:  http://${ip}:${ports.http}/dex`,
    `  Config:       http://${ip}:${ports.http}/dex/.well-known/openid-configuration`,
    '',
    '  Test users:',
    '    admin@example.com / password',
    '    user@example.com / password',
  ],
  actions: [
    defineAction({
      name: 'test',
      description: 'Fetch the OIDC discovery document',
      run: async (ctx) => {
        const url = `${await serviceUrl(ctx, 'dex', 'http')}/dex/.well-known/openid-configuration`;
        ctx.out.info('Testing OIDC configuration...');
        printResponse(ctx, await ctx.http.request({ method: 'GET', url }));
      },
    }),
  ],
  notes: [
    'Default test users: admin@example.com, user@example.com',
    'Default password: password',
    'OIDC client ID: example-app',
  ],
});
