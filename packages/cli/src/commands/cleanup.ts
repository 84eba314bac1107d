/**
 * minidev cleanup
 */

import { Command } from 'commander';
import { createCommandRuntime, withErrorHandling, type RuntimeFactory } from './shared';

export function createCleanupCommand(runtimeFactory: RuntimeFactory = createCommandRuntime): Command {
  const command = new Command('cleanup').description('Delete Failed and Unknown pods in the namespace');
  command.action(() =>
    withErrorHandling('cleanup', async () => {
      const { runtime } = runtimeFactory(command);
      await runtime.kube.cleanupFailedPods(runtime.ctx.namespace);
    })
  );
  return command;
}
