/**
 * Service catalog
 */

import { ServiceRegistry, type ServiceDefinition } from '@minidev/core';
import { airflow } from './airflow';
import { dex } from './dex';
import { dremio } from './dremio';
import { elasticsearch } from './elasticsearch';
import { minio } from './minio';
import { mongodb } from './mongodb';
import { postfix } from './postfix';
import { postgres } from './postgres';
import { redpanda } from './redpanda';
import { spark } from './spark';
import { zincsearch } from './zincsearch';

export const catalog: ServiceDefinition[] = [
  postgres,
  mongodb,
  minio,
  dremio,
  spark,
  airflow,
  redpanda,
  zincsearch,
  elasticsearch,
  dex,
  postfix,
];

export function createServiceRegistry(definitions: ServiceDefinition[] = catalog): ServiceRegistry {
  const registry = new ServiceRegistry();
  for (const definition of definitions) {
    registry.register(definition);
  }
  return registry;
}
