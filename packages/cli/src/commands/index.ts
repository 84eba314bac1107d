/**
 * minidev CLI Commands
 *
 * - service.ts  - one command per catalog service
 * - project.ts  - a project's enabled services as a group
 * - cluster.ts  - the minikube cluster itself
 * - the rest    - utilities (doctor, cleanup, port-forward, volume, list, debug-log)
 */

export { createServiceCommand, createActionCommand } from './service';
export { createProjectCommand } from './project';
export { createClusterCommand } from './cluster';
export { doctorCommand } from './doctor';
export { debugLogCommand } from './debug-log';
export { createCleanupCommand } from './cleanup';
export { createPortForwardCommand } from './port-forward';
export { createVolumeCommand } from './volume';
export { createListCommand } from './list';
export { createCommandRuntime, withErrorHandling } from './shared';
export type { RuntimeFactory, CommandRuntime, GlobalOptions } from './shared';
