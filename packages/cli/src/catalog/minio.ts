/**
 * MinIO object storage
 */

import { defineService } from '@minidev/core';
import { clusterHost, openServiceAction } from './helpers';

const SELECTOR = 'app=minio';

export const minio = defineService({
  id: 'minio',
  name: 'MinIO',
  description: 'S3-compatible object storage',
  aliases: ['s3'],
  manifest: 'minio.yaml',
  selector: SELECTOR,
  presence: { kind: 'deployment', name: 'minio' },
  workloads: [{ kind: 'deployment', name: 'minio', selector: SELECTOR, timeoutSeconds: 120 }],
  statusSections: [
    { title: 'Deployment Status', get: ['deployment', 'minio'] },
    { title: 'Pods', pods: SELECTOR },
    { title: 'Service', get: ['service', 'minio'] },
  ],
  healthCheck: {
    image: 'minio/mc',
    command: (namespace) => [
      'timeout', '5', 'mc', 'alias', 'set', 'healthcheck',
      `http://${clusterHost('minio', namespace)}:9000`, 'minioadmin', 'minioadmin',
    ],
  },
  accessPorts: [
    { key: 'api', service: 'minio', portName: 'api' },
    { key: 'console', service: 'minio', portName: 'console' },
  ],
  describeAccess: ({ ip, ports }) => [
    `  API:     http://${ip}:${ports.api}`,
    `  Console: http://${ip}:${ports.console}`,
    '  Default credentials: minioadmin/minioadmin',
  ],
  actions: [openServiceAction('console', ['ui'], 'minio', 'MinIO console')],
});
