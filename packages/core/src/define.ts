import type { DefineServiceInput, ServiceAction, ServiceDefinition } from './types';

/**
 * Define a managed service
 */
export function defineService(input: DefineServiceInput): ServiceDefinition {
  return {
    id: input.id,
    name: input.name,
    description: input.description,
    aliases: input.aliases ?? [],
    manifest: input.manifest,
    selector: input.selector,
    presence: input.presence,
    workloads: input.workloads,
    statusSections: input.statusSections ?? [],
    accessPorts: input.accessPorts ?? [],
    describeAccess: input.describeAccess,
    healthCheck: input.healthCheck,
    logTargets: input.logTargets,
    renderManifest: input.renderManifest,
    hooks: input.hooks ?? {},
    actions: input.actions ?? [],
    notes: input.notes ?? [],
    examples: input.examples ?? [],
  };
}

/**
 * Define a service-specific subcommand
 */
export function defineAction(input: ServiceAction): ServiceAction {
  return {
    name: input.name,
    aliases: input.aliases,
    description: input.description,
    arguments: input.arguments,
    passThrough: input.passThrough,
    subactions: input.subactions,
    run: input.run,
  };
}
