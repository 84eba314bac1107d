/**
 * Assembles the minidev program
 */

import { Command } from 'commander';
import type { ServiceRegistry } from '@minidev/core';
import { createServiceRegistry } from './catalog';
import {
  createCleanupCommand,
  createClusterCommand,
  createCommandRuntime,
  createListCommand,
  createPortForwardCommand,
  createProjectCommand,
  createServiceCommand,
  createVolumeCommand,
  debugLogCommand,
  doctorCommand,
  type RuntimeFactory,
} from './commands';

export const VERSION = '0.1.0';

export function createProgram(
  registry: ServiceRegistry = createServiceRegistry(),
  runtimeFactory: RuntimeFactory = createCommandRuntime
): Command {
  const program = new Command();

  program
    .name('minidev')
    .description('Deploy and manage development services on a local Minikube cluster')
    .version(VERSION)
    .option('--namespace <namespace>', 'Kubernetes namespace (overrides NAMESPACE)')
    .enablePositionalOptions();

  // Services
  for (const service of registry.getAll()) {
    program.addCommand(createServiceCommand(service, runtimeFactory));
  }

  // Environments
  program.addCommand(createProjectCommand(registry, runtimeFactory));
  program.addCommand(createClusterCommand(runtimeFactory));

  // Utilities
  program.addCommand(doctorCommand);
  program.addCommand(createCleanupCommand(runtimeFactory));
  program.addCommand(createPortForwardCommand(runtimeFactory));
  program.addCommand(createVolumeCommand(runtimeFactory));
  program.addCommand(createListCommand(registry));
  program.addCommand(debugLogCommand);

  return program;
}
