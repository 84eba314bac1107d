/**
 * minidev port-forward
 */

import { Command } from 'commander';
import { ServiceError } from '../errors';
import { createCommandRuntime, withErrorHandling, type RuntimeFactory } from './shared';

function assertPort(service: string, port: string): void {
  const value = Number(port);
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ServiceError(service, `Invalid port: ${port}`);
  }
}

export function createPortForwardCommand(runtimeFactory: RuntimeFactory = createCommandRuntime): Command {
  const command = new Command('port-forward')
    .description('Forward a local port to a service in the namespace')
    .argument('<service>', 'Kubernetes service name')
    .argument('<localPort>', 'Local port')
    .argument('<remotePort>', 'Service port');
  command.action((service: string, localPort: string, remotePort: string) =>
    withErrorHandling('port-forward', async () => {
      assertPort(service, localPort);
      assertPort(service, remotePort);
      const { runtime } = runtimeFactory(command);
      await runtime.kube.portForward(service, localPort, remotePort, runtime.ctx.namespace);
    })
  );
  return command;
}
