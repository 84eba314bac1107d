/**
 * Service registry tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ServiceRegistry, defineService, defineAction } from '../index';
import type { ServiceDefinition } from '../index';

function makeService(id: string, aliases: string[] = []): ServiceDefinition {
  return defineService({
    id,
    name: id.toUpperCase(),
    description: `${id} service`,
    aliases,
    manifest: `${id}.yaml`,
    selector: `app=${id}`,
    presence: { kind: 'deployment', name: id },
    workloads: [
      { kind: 'deployment', name: id, selector: `app=${id}`, timeoutSeconds: 120 },
    ],
  });
}

describe('defineService', () => {
  it('should fill optional collections with empty defaults', () => {
    const service = makeService('cache');

    expect(service.statusSections).toEqual([]);
    expect(service.accessPorts).toEqual([]);
    expect(service.actions).toEqual([]);
    expect(service.notes).toEqual([]);
    expect(service.examples).toEqual([]);
    expect(service.hooks).toEqual({});
  });

  it('should keep provided actions', () => {
    const action = defineAction({ name: 'ping', description: 'Ping the service' });
    const service = defineService({
      ...makeService('cache'),
      actions: [action],
    });

    expect(service.actions).toHaveLength(1);
    expect(service.actions[0].name).toBe('ping');
  });
});

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry;

  beforeEach(() => {
    registry = new ServiceRegistry();
  });

  it('should look up services by id and alias', () => {
    registry.register(makeService('postgres', ['pg']));

    expect(registry.get('postgres')?.id).toBe('postgres');
    expect(registry.get('pg')?.id).toBe('postgres');
    expect(registry.has('pg')).toBe(true);
    expect(registry.get('mysql')).toBeUndefined();
  });

  it('should preserve registration order', () => {
    registry.register(makeService('minio'));
    registry.register(makeService('spark'));
    registry.register(makeService('airflow'));

    expect(registry.ids()).toEqual(['minio', 'spark', 'airflow']);
    expect(registry.getAll().map((s) => s.id)).toEqual(['minio', 'spark', 'airflow']);
  });

  it('should reject duplicate ids', () => {
    registry.register(makeService('minio'));

    expect(() => registry.register(makeService('minio'))).toThrow(
      'Service already registered: minio'
    );
  });

  it('should reject aliases that collide with existing names', () => {
    registry.register(makeService('postgres', ['pg']));

    expect(() => registry.register(makeService('pgbouncer', ['pg']))).toThrow(
      'Service alias already registered: pg'
    );
    expect(() => registry.register(makeService('other', ['postgres']))).toThrow(
      'Service alias already registered: postgres'
    );
  });

  it('should list available services when a lookup fails', () => {
    registry.register(makeService('minio'));
    registry.register(makeService('dex'));

    expect(() => registry.require('kafka')).toThrow(
      'Unknown service: kafka. Available services: minio, dex'
    );
  });
});
