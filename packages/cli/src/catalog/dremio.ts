/**
 * Dremio data lakehouse engine
 */

import { defineService } from '@minidev/core';
import { openServiceAction } from './helpers';

const SELECTOR = 'app=dremio';

export const dremio = defineService({
  id: 'dremio',
  name: 'Dremio',
  description: 'Dremio SQL lakehouse engine',
  manifest: 'dremio.yaml',
  selector: SELECTOR,
  presence: { kind: 'deployment', name: 'dremio' },
  workloads: [
    {
      kind: 'deployment',
      name: 'dremio',
      selector: SELECTOR,
      timeoutSeconds: 600,
      waitMessage: 'Waiting for Dremio to be ready (this may take 3-5 minutes)...',
    },
  ],
  statusSections: [
    { title: 'Deployment Status', get: ['deployment', 'dremio'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'dremio'] },
  ],
  accessPorts: [
    { key: 'web', service: 'dremio', portName: 'web' },
    { key: 'jdbc', service: 'dremio', portName: 'jdbc' },
  ],
  describeAccess: ({ ip, ports }) => [
    `  Web UI:  http://${ip}:${ports.web}`,
    `  JDBC:    jdbc:dremio:direct=${ip}:${ports.jdbc}`,
    '',
    '  First-time setup: Create admin account on Web UI',
  ],
  actions: [openServiceAction('ui', ['web'], 'dremio', 'Dremio UI')],
  notes: ['First deployment takes 3-5 minutes to start', 'Initial setup requires creating admin account via Web UI'],
});
