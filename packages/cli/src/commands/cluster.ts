/**
 * minidev cluster
 *
 * Create, inspect, stop and delete the minikube cluster.
 */

import { Command } from 'commander';
import { ClusterService } from '../services/cluster.service';
import { createCommandRuntime, withErrorHandling, type RuntimeFactory } from './shared';

export function createClusterCommand(runtimeFactory: RuntimeFactory = createCommandRuntime): Command {
  const command = new Command('cluster').description('Manage the minikube cluster');

  const cluster = (sub: Command) => new ClusterService(runtimeFactory(sub).runtime);

  const start = new Command('start').description(
    'Start the cluster with the configured resources and addons'
  );
  start.action(() => withErrorHandling('cluster start', () => cluster(start).start()));

  const status = new Command('status').description('Show cluster status and resource usage');
  status.action(() => withErrorHandling('cluster status', () => cluster(status).status()));

  const stop = new Command('stop').description('Stop the cluster, preserving its state');
  stop.action(() => withErrorHandling('cluster stop', () => cluster(stop).stop()));

  const remove = new Command('delete').description('Delete the cluster and all its data');
  remove.action(() => withErrorHandling('cluster delete', () => cluster(remove).delete()));

  const ip = new Command('ip').description('Print the cluster IP');
  ip.action(() => withErrorHandling('cluster ip', () => cluster(ip).ip()));

  const dashboard = new Command('dashboard').description('Open the Kubernetes dashboard');
  dashboard.action(() => withErrorHandling('cluster dashboard', () => cluster(dashboard).dashboard()));

  command
    .addCommand(start)
    .addCommand(status, { isDefault: true })
    .addCommand(stop)
    .addCommand(remove)
    .addCommand(ip)
    .addCommand(dashboard);

  return command;
}
