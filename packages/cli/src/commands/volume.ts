/**
 * minidev volume
 *
 * Host-path PersistentVolumes inside the minikube node.
 */

import { Command } from 'commander';
import type { Runtime } from '../services/context';
import {
  DEFAULT_STORAGE_CLASS,
  DEFAULT_VOLUME_SIZE,
  generatePersistentVolume,
  type VolumeOptions,
} from '../generators/k8s/volume';
import { createCommandRuntime, withErrorHandling, type RuntimeFactory } from './shared';

/**
 * Create the PersistentVolume unless one with the same name exists
 */
export async function createVolume(runtime: Runtime, options: VolumeOptions): Promise<boolean> {
  const { kube, out } = runtime;
  if (await kube.resourceExists('pv', options.name)) {
    out.info(`PersistentVolume '${options.name}' already exists`);
    return true;
  }

  out.info(`Creating PersistentVolume '${options.name}' (${options.size ?? DEFAULT_VOLUME_SIZE})...`);
  const manifest = generatePersistentVolume(options);
  await kube.applyContent(manifest.content, runtime.ctx.namespace, manifest.filename);
  out.success(`PersistentVolume '${options.name}' created`);
  return true;
}

export function createVolumeCommand(runtimeFactory: RuntimeFactory = createCommandRuntime): Command {
  const command = new Command('volume').description('Manage host-path PersistentVolumes');

  const create = new Command('create')
    .description('Create a PersistentVolume backed by /data/<name> on the node')
    .argument('<name>', 'Volume name')
    .argument('[size]', 'Capacity', DEFAULT_VOLUME_SIZE)
    .argument('[storageClass]', 'Storage class', DEFAULT_STORAGE_CLASS);
  create.action((name: string, size: string, storageClass: string) =>
    withErrorHandling('volume create', () =>
      createVolume(runtimeFactory(create).runtime, { name, size, storageClass })
    )
  );

  command.addCommand(create);
  return command;
}
