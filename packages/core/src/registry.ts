import type { ServiceDefinition } from './types';

/**
 * Registry for the managed service catalog
 */
export class ServiceRegistry {
  private services: Map<string, ServiceDefinition> = new Map();
  private aliases: Map<string, string> = new Map();

  /**
   * Register a service and its aliases
   */
  register(service: ServiceDefinition): void {
    if (this.services.has(service.id) || this.aliases.has(service.id)) {
      throw new Error(`Service already registered: ${service.id}`);
    }
    for (const alias of service.aliases) {
      if (this.services.has(alias) || this.aliases.has(alias)) {
        throw new Error(`Service alias already registered: ${alias}`);
      }
    }

    this.services.set(service.id, service);
    for (const alias of service.aliases) {
      this.aliases.set(alias, service.id);
    }
  }

  /**
   * Get a service by ID or alias
   */
  get(idOrAlias: string): ServiceDefinition | undefined {
    const id = this.aliases.get(idOrAlias) ?? idOrAlias;
    return this.services.get(id);
  }

  /**
   * Get a service by ID or alias, failing with the list of known services
   */
  require(idOrAlias: string): ServiceDefinition {
    const service = this.get(idOrAlias);
    if (!service) {
      throw new Error(
        `Unknown service: ${idOrAlias}. Available services: ${this.ids().join(', ')}`
      );
    }
    return service;
  }

  has(idOrAlias: string): boolean {
    return this.get(idOrAlias) !== undefined;
  }

  /**
   * Get all registered services in registration order
   */
  getAll(): ServiceDefinition[] {
    return Array.from(this.services.values());
  }

  ids(): string[] {
    return Array.from(this.services.keys());
  }
}
