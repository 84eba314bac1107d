/**
 * Cluster Service
 *
 * Creates, inspects and stops the minikube cluster itself.
 */

import * as os from 'os';
import ora from 'ora';
import type { Runtime } from './context';
import { isAddonEnabled } from './minikube.service';

// =============================================================================
// Types
// =============================================================================

export const CLUSTER_ADDONS = ['metrics-server', 'storage-provisioner', 'default-storageclass'];

export const LOW_MEMORY_GB = 16;

export interface HostResources {
  cpus: number;
  memoryGb: number;
}

export interface ClusterServiceOptions {
  host?: () => HostResources;
  apiAttempts?: number;
  apiIntervalMs?: number;
  systemPodsTimeoutSeconds?: number;
}

export function hostResources(): HostResources {
  return {
    cpus: os.cpus().length,
    memoryGb: Math.floor(os.totalmem() / 1024 ** 3),
  };
}

/**
 * Count pods per namespace from `kubectl get pods --all-namespaces --no-headers`,
 * busiest namespace first
 */
export function countPodsByNamespace(output: string): Array<{ namespace: string; count: number }> {
  const counts = new Map<string, number>();
  for (const line of output.split('\n')) {
    const namespace = line.trim().split(/\s+/)[0];
    if (namespace) {
      counts.set(namespace, (counts.get(namespace) ?? 0) + 1);
    }
  }
  return Array.from(counts, ([namespace, count]) => ({ namespace, count })).sort(
    (a, b) => b.count - a.count || a.namespace.localeCompare(b.namespace)
  );
}

export class ClusterService {
  private readonly host: () => HostResources;
  private readonly apiAttempts: number;
  private readonly apiIntervalMs: number;
  private readonly systemPodsTimeoutSeconds: number;

  constructor(
    private readonly runtime: Runtime,
    options: ClusterServiceOptions = {}
  ) {
    this.host = options.host ?? hostResources;
    this.apiAttempts = options.apiAttempts ?? 30;
    this.apiIntervalMs = options.apiIntervalMs ?? 2000;
    this.systemPodsTimeoutSeconds = options.systemPodsTimeoutSeconds ?? 120;
  }

  private get out() {
    return this.runtime.out;
  }

  private get profile(): string {
    return this.runtime.minikube.profile;
  }

  // ===========================================================================
  // start
  // ===========================================================================

  async start(): Promise<boolean> {
    this.out.header('Minikube Cluster Startup');

    if (!(await this.checkPrerequisites())) {
      return false;
    }

    if (await this.checkExistingCluster()) {
      await this.startCluster();
      await this.enableAddons();
      if (!(await this.waitForCluster())) {
        return false;
      }
    }

    await this.showClusterInfo();
    this.showNextSteps();
    this.out.header('Startup Complete!');
    return true;
  }

  async checkPrerequisites(): Promise<boolean> {
    const { minikube, kube } = this.runtime;
    this.out.header('Checking Prerequisites');

    const version = await minikube.version();
    if (!version) {
      this.out.error('minikube is not installed');
      this.out.line('Install from: https://minikube.sigs.k8s.io/docs/start/');
      return false;
    }
    this.out.success(`minikube found: ${version}`);

    const kubectlVersion = await kube.clientVersion();
    if (!kubectlVersion) {
      this.out.warning('kubectl is not installed');
      this.out.line('Install from: https://kubernetes.io/docs/tasks/tools/');
      this.out.line("You can use 'minikube kubectl' as alternative");
    } else {
      this.out.success(`kubectl found: ${kubectlVersion}`);
    }

    const host = this.host();
    this.out.success(`System resources: ${host.cpus} cores, ${host.memoryGb}GB RAM`);
    if (host.memoryGb < LOW_MEMORY_GB) {
      this.out.warning('Low memory detected. Consider reducing MINIKUBE_MEMORY');
    }
    return true;
  }

  /**
   * Resolves true when a cluster should be started, false to reuse the
   * running one
   */
  async checkExistingCluster(): Promise<boolean> {
    const { minikube, ctx } = this.runtime;
    this.out.header('Checking Existing Cluster');

    if (!(await minikube.isRunning())) {
      return true;
    }

    this.out.warning(`Cluster '${this.profile}' is already running`);
    this.out.line();
    await minikube.profiles();
    this.out.line();

    if (await ctx.prompt.confirm('Do you want to delete and recreate?', false)) {
      this.out.info('Deleting existing cluster...');
      await minikube.delete();
      return true;
    }

    this.out.info('Using existing cluster');
    return false;
  }

  async startCluster(): Promise<void> {
    const { minikube } = this.runtime;
    const settings = minikube.settings;
    this.out.header('Starting Minikube Cluster');

    this.out.line('Configuration:');
    this.out.line(`  Profile:     ${this.profile}`);
    this.out.line(`  CPUs:        ${settings.cpus} cores`);
    this.out.line(`  Memory:      ${settings.memory} MB (${Math.floor(settings.memory / 1024)}GB)`);
    this.out.line(`  Disk:        ${settings.diskSize}`);
    this.out.line(`  Driver:      ${settings.driver ?? 'auto'}`);
    this.out.line(`  Runtime:     ${settings.runtime}`);
    this.out.line(`  K8s Version: ${settings.kubernetesVersion}`);
    this.out.line();

    this.out.info('Starting cluster... (this may take 1-2 minutes)');
    await minikube.start({ full: true });
    this.out.success('Cluster started successfully');
  }

  async enableAddons(): Promise<void> {
    const { minikube } = this.runtime;
    this.out.header('Enabling Addons');

    const addons = await minikube.addonsList();
    for (const addon of CLUSTER_ADDONS) {
      if (isAddonEnabled(addons, addon)) {
        this.out.success(`${addon} already enabled`);
      } else {
        this.out.info(`Enabling ${addon}...`);
        await minikube.enableAddon(addon);
      }
    }
  }

  async waitForCluster(): Promise<boolean> {
    const { kube, ctx } = this.runtime;
    this.out.header('Waiting for Cluster to be Ready');

    const spinner = ora('Waiting for API server...').start();
    let ready = false;
    for (let attempt = 1; attempt <= this.apiAttempts; attempt++) {
      if (await kube.apiReachable()) {
        ready = true;
        break;
      }
      if (attempt < this.apiAttempts) {
        await ctx.sleep(this.apiIntervalMs);
      }
    }

    if (!ready) {
      spinner.fail('Timeout waiting for API server');
      return false;
    }
    spinner.succeed('API server is ready');

    this.out.info('Waiting for system pods...');
    if (!(await kube.waitForAllPods('kube-system', this.systemPodsTimeoutSeconds))) {
      this.out.error('System pods did not become ready');
      return false;
    }
    this.out.success('Cluster is ready');
    return true;
  }

  async showClusterInfo(): Promise<void> {
    const { minikube, kube } = this.runtime;
    this.out.header('Cluster Information');

    await minikube.profiles();
    this.out.line();

    this.out.line('Nodes:');
    await kube.show(['get', 'nodes', '-o', 'wide']);
    this.out.line();

    this.out.line('System Pods:');
    await kube.show(['get', 'pods', '-n', 'kube-system']);
    this.out.line();

    await this.printEnabledAddons();

    this.out.success(`Cluster IP: ${(await minikube.ip()) ?? 'N/A'}`);
    this.out.success('Dashboard:  minidev cluster dashboard');
    this.out.success(`SSH:        minikube ssh -p ${this.profile}`);
  }

  showNextSteps(): void {
    this.out.header('Next Steps');

    this.out.line("Cluster is ready! Here's what you can do:");
    this.out.line();
    this.out.line('1. Check resource usage:');
    this.out.line('   kubectl top nodes');
    this.out.line('   kubectl top pods --all-namespaces');
    this.out.line();
    this.out.line('2. Deploy services:');
    this.out.line('   minidev --namespace demo minio deploy');
    this.out.line('   minidev --namespace demo spark deploy');
    this.out.line();
    this.out.line('3. Access Kubernetes dashboard:');
    this.out.line('   minidev cluster dashboard');
    this.out.line();
    this.out.line('4. Stop cluster (preserves state):');
    this.out.line('   minidev cluster stop');
    this.out.line();
    this.out.line('5. Delete cluster:');
    this.out.line('   minidev cluster delete');
  }

  private async printEnabledAddons(): Promise<void> {
    const addons = await this.runtime.minikube.addonsList();
    this.out.line('Enabled Addons:');
    for (const line of addons.split('\n').filter((entry) => entry.includes('enabled'))) {
      this.out.line(line);
    }
    this.out.line();
  }

  // ===========================================================================
  // status / stop / delete
  // ===========================================================================

  async status(): Promise<boolean> {
    const { minikube, kube } = this.runtime;
    this.out.header('Minikube Cluster Status');

    if (!(await minikube.statusOk())) {
      this.out.error(`Cluster '${this.profile}' not found`);
      this.out.line();
      this.out.line('To start: minidev cluster start');
      return false;
    }

    this.out.line('Profiles:');
    await minikube.profiles();
    this.out.line();

    this.out.line('Cluster Status:');
    await minikube.status();
    this.out.line();

    if (!(await kube.apiReachable())) {
      this.out.error('Cluster is not accessible');
      this.out.line(`Try: minikube start -p ${this.profile}`);
      return false;
    }

    this.out.line('Nodes:');
    await kube.show(['get', 'nodes', '-o', 'wide']);
    this.out.line();

    const apiServices = await kube.query(['get', 'apiservices']);
    if (apiServices?.includes('metrics.k8s.io')) {
      await this.printResourceUsage();
    }

    this.out.line('Pods by Namespace:');
    const pods = await kube.query(['get', 'pods', '--all-namespaces', '--no-headers']);
    for (const { namespace, count } of countPodsByNamespace(pods ?? '')) {
      this.out.line(`${String(count).padStart(7)} ${namespace}`);
    }
    this.out.line();

    this.out.line('Services:');
    await kube.show(['get', 'svc', '--all-namespaces']);
    this.out.line();

    this.out.line(`Cluster IP: ${(await minikube.ip()) ?? 'N/A'}`);
    this.out.line();

    this.out.line('Disk Usage (inside cluster):');
    this.out.line((await minikube.ssh('df -h /'))?.trimEnd() ?? 'N/A');
    this.out.line();

    await this.printEnabledAddons();

    this.out.header('Quick Commands');
    this.out.line('Dashboard:   minidev cluster dashboard');
    this.out.line(`SSH:         minikube ssh -p ${this.profile}`);
    this.out.line(`Logs:        minikube logs -p ${this.profile}`);
    this.out.line('Stop:        minidev cluster stop');
    this.out.line('Delete:      minidev cluster delete');
    return true;
  }

  private async printResourceUsage(): Promise<void> {
    const { kube } = this.runtime;
    this.out.line('Resource Usage:');
    this.out.line();

    this.out.line('Nodes:');
    if (!(await kube.show(['top', 'nodes']))) {
      this.out.error('Metrics not ready yet (wait 30 seconds)');
    }
    this.out.line();

    for (const [title, sortBy] of [
      ['Top Pods by CPU:', 'cpu'],
      ['Top Pods by Memory:', 'memory'],
    ]) {
      this.out.line(title);
      const top = await kube.query(['top', 'pods', '--all-namespaces', `--sort-by=${sortBy}`]);
      const lines = top?.trimEnd().split('\n').slice(0, 10) ?? [];
      if (lines.length === 0 || lines[0] === '') {
        this.out.line('No pods running');
      }
      for (const line of lines.filter((entry) => entry !== '')) {
        this.out.line(line);
      }
      this.out.line();
    }
  }

  async stop(): Promise<boolean> {
    const { minikube } = this.runtime;
    this.out.header('Stopping Minikube Cluster');

    if (!(await minikube.statusOk())) {
      this.out.warning(`Cluster '${this.profile}' is not running`);
      return true;
    }

    this.out.line(`Stopping cluster: ${this.profile}`);
    this.out.line();
    await minikube.stop();
    this.out.success('Cluster stopped successfully');
    this.out.line();
    this.out.line('To start again: minidev cluster start');
    this.out.line('To delete:      minidev cluster delete');
    return true;
  }

  async delete(): Promise<boolean> {
    const { minikube, ctx } = this.runtime;
    this.out.warning(`This will delete the '${this.profile}' cluster and all data!`);
    if (!(await ctx.prompt.confirm('Are you sure?', false))) {
      this.out.info('Cancelled');
      return true;
    }
    await minikube.delete();
    this.out.success(`Cluster '${this.profile}' deleted`);
    return true;
  }

  async ip(): Promise<boolean> {
    const ip = await this.runtime.minikube.ip();
    if (!ip) {
      this.out.error('Could not determine minikube IP (is minikube running?)');
      return false;
    }
    this.out.line(ip);
    return true;
  }

  async dashboard(): Promise<void> {
    await this.runtime.minikube.dashboard();
  }
}
