/**
 * Minikube Service
 *
 * Wraps the minikube binary. Every call is scoped to the configured profile.
 */

import type { ClusterClient, Output } from '@minidev/core';
import type { MinikubeSettings } from '../config/settings';
import { CommandFailedError } from '../errors';
import type { CommandRunner, RunResult } from './process.service';

export interface StartOptions {
  /** Also pass container runtime and Kubernetes version */
  full?: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `minikube addons list` output shows the addon as enabled
 */
export function isAddonEnabled(addonsList: string, addon: string): boolean {
  const pattern = new RegExp(`${escapeRegExp(addon)}.*enabled`);
  return addonsList.split('\n').some((line) => pattern.test(line));
}

export class Minikube implements ClusterClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly out: Output,
    readonly settings: MinikubeSettings
  ) {}

  get profile(): string {
    return this.settings.profile;
  }

  private args(args: string[]): string[] {
    return [...args, '-p', this.settings.profile];
  }

  private minikube(args: string[]): Promise<RunResult> {
    return this.runner.run('minikube', this.args(args));
  }

  private async interactive(args: string[]): Promise<number> {
    return this.runner.interactive('minikube', this.args(args));
  }

  private async interactiveOrThrow(args: string[]): Promise<void> {
    const code = await this.interactive(args);
    if (code !== 0) {
      throw new CommandFailedError('minikube', this.args(args), code, '');
    }
  }

  // ===========================================================================
  // Cluster state
  // ===========================================================================

  async isRunning(): Promise<boolean> {
    const result = await this.minikube(['status', '--format={{.Host}}']);
    return result.stdout.includes('Running');
  }

  /**
   * `minikube status` succeeds only for a cluster that is up
   */
  async statusOk(): Promise<boolean> {
    const result = await this.minikube(['status']);
    return result.code === 0;
  }

  async version(): Promise<string | null> {
    const result = await this.runner.run('minikube', ['version', '--short']);
    return result.code === 0 ? result.stdout.trim() : null;
  }

  async ip(): Promise<string | null> {
    const result = await this.minikube(['ip']);
    const ip = result.stdout.trim();
    return result.code === 0 && ip ? ip : null;
  }

  startArgs(options: StartOptions = {}): string[] {
    const { cpus, memory, diskSize, driver, runtime, kubernetesVersion } = this.settings;
    const args = ['start', `--cpus=${cpus}`, `--memory=${memory}`, `--disk-size=${diskSize}`];
    if (driver) {
      args.push(`--driver=${driver}`);
    }
    if (options.full) {
      args.push(`--container-runtime=${runtime}`, `--kubernetes-version=${kubernetesVersion}`);
    }
    return this.args(args);
  }

  async start(options: StartOptions = {}): Promise<void> {
    const args = this.startArgs(options);
    const code = await this.runner.interactive('minikube', args);
    if (code !== 0) {
      throw new CommandFailedError('minikube', args, code, '');
    }
  }

  /**
   * Start minikube with the configured resources unless it is already running
   */
  async ensureRunning(): Promise<void> {
    if (await this.isRunning()) {
      this.out.info('Minikube is already running');
      return;
    }

    this.out.warning('Minikube is not running. Starting minikube...');
    this.out.info('Minikube configuration:');
    this.out.line(`  CPUs: ${this.settings.cpus}`);
    this.out.line(`  Memory: ${this.settings.memory}MB`);
    this.out.line(`  Disk: ${this.settings.diskSize}`);
    this.out.info(`Starting: minikube ${this.startArgs().join(' ')}`);

    await this.start();
    this.out.success('Minikube started successfully');
  }

  async stop(): Promise<void> {
    await this.interactiveOrThrow(['stop']);
  }

  async delete(): Promise<void> {
    await this.interactiveOrThrow(['delete']);
  }

  status(): Promise<number> {
    return this.interactive(['status']);
  }

  async profiles(): Promise<void> {
    await this.runner.interactive('minikube', ['profile', 'list']);
  }

  async dashboard(): Promise<void> {
    await this.interactiveOrThrow(['dashboard']);
  }

  async ssh(command: string): Promise<string | null> {
    const result = await this.minikube(['ssh', command]);
    return result.code === 0 ? result.stdout : null;
  }

  // ===========================================================================
  // Addons
  // ===========================================================================

  async addonsList(): Promise<string> {
    const result = await this.minikube(['addons', 'list']);
    return result.stdout;
  }

  async enableAddon(addon: string): Promise<void> {
    await this.interactiveOrThrow(['addons', 'enable', addon]);
  }

  // ===========================================================================
  // Services and mounts
  // ===========================================================================

  async openService(service: string, namespace: string): Promise<void> {
    await this.interactiveOrThrow(['service', service, '-n', namespace, '--url=false']);
  }

  async serviceUrl(service: string, namespace: string): Promise<string | null> {
    const result = await this.minikube(['service', service, '-n', namespace, '--url']);
    return result.code === 0 ? result.stdout.trim() : null;
  }

  mount(hostPath: string): number | undefined {
    return this.runner.background(
      'minikube',
      this.args(['mount', `${hostPath}:${hostPath}`, '--9p-version=9p2000.L', '--uid=1000', '--gid=1000'])
    );
  }

  async activeMounts(): Promise<string[]> {
    const result = await this.runner.run('ps', ['aux']);
    return result.stdout
      .split('\n')
      .filter((line) => line.includes('minikube mount') && !line.includes('grep'));
  }
}
