/**
 * Kubectl Service
 *
 * Thin wrapper over the kubectl binary: namespaces, manifests, readiness
 * polling, pod lookup, logs and exec.
 */

import * as fs from 'fs';
import * as path from 'path';
import type {
  ExecOptions,
  KubeClient,
  LogOptions,
  Output,
  RunPodOptions,
  WorkloadKind,
} from '@minidev/core';
import { CommandFailedError, ServiceError } from '../errors';
import type { CommandRunner, RunOptions, RunResult } from './process.service';

export interface KubectlOptions {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  /** Interval between StatefulSet readiness checks */
  pollIntervalMs?: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class Kubectl implements KubeClient {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly runner: CommandRunner,
    private readonly out: Output,
    options: KubectlOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
  }

  private kubectl(args: string[], options?: RunOptions): Promise<RunResult> {
    return this.runner.run('kubectl', args, options);
  }

  private async kubectlOrThrow(args: string[], options?: RunOptions): Promise<RunResult> {
    const result = await this.kubectl(args, options);
    if (result.code !== 0) {
      throw new CommandFailedError('kubectl', args, result.code, result.stderr);
    }
    return result;
  }

  private async interactiveOrThrow(args: string[], options?: ExecOptions): Promise<void> {
    const code = await this.runner.interactive('kubectl', args, {
      stdinPath: options?.stdinPath,
      stdoutPath: options?.stdoutPath,
    });
    if (code !== 0) {
      throw new CommandFailedError('kubectl', args, code, '');
    }
  }

  // ===========================================================================
  // Namespaces and resources
  // ===========================================================================

  async namespaceExists(namespace: string): Promise<boolean> {
    const result = await this.kubectl(['get', 'namespace', namespace]);
    return result.code === 0;
  }

  async ensureNamespace(namespace: string): Promise<void> {
    if (await this.namespaceExists(namespace)) {
      this.out.info(`Namespace '${namespace}' already exists`);
      return;
    }
    this.out.info(`Creating namespace '${namespace}'...`);
    await this.kubectlOrThrow(['create', 'namespace', namespace]);
    this.out.success(`Namespace '${namespace}' created`);
  }

  async resourceExists(kind: string, name: string, namespace?: string): Promise<boolean> {
    const args = ['get', kind, name];
    if (namespace) {
      args.push('-n', namespace);
    }
    const result = await this.kubectl(args);
    return result.code === 0;
  }

  async get(args: string[], namespace?: string): Promise<string | null> {
    const fullArgs = ['get', ...args];
    if (namespace) {
      fullArgs.push('-n', namespace);
    }
    const result = await this.kubectl(fullArgs);
    return result.code === 0 ? result.stdout : null;
  }

  async jsonPath(kind: string, name: string, jsonPath: string, namespace: string): Promise<string | null> {
    const result = await this.kubectl(['get', kind, name, '-n', namespace, `-o=jsonpath=${jsonPath}`]);
    const value = result.stdout.trim();
    return result.code === 0 && value ? value : null;
  }

  // ===========================================================================
  // Manifests
  // ===========================================================================

  async applyManifest(file: string, namespace: string): Promise<void> {
    if (!fs.existsSync(file)) {
      throw new ServiceError(path.basename(file, '.yaml'), `Manifest file not found: ${file}`);
    }
    this.out.info(`Applying manifest: ${file}`);
    await this.kubectlOrThrow(['apply', '-f', file, '-n', namespace]);
    this.out.success('Manifest applied successfully');
  }

  /**
   * Apply rendered manifest content through stdin
   */
  async applyContent(content: string, namespace: string, source: string): Promise<void> {
    this.out.info(`Applying manifest: ${source}`);
    await this.kubectlOrThrow(['apply', '-f', '-', '-n', namespace], { input: content });
    this.out.success('Manifest applied successfully');
  }

  async deleteManifest(file: string, namespace: string): Promise<void> {
    if (!fs.existsSync(file)) {
      this.out.warning(`Manifest file not found: ${file}`);
      return;
    }
    this.out.info(`Deleting resources from manifest: ${file}`);
    const result = await this.kubectl(['delete', '-f', file, '-n', namespace, '--ignore-not-found=true']);
    if (result.code !== 0) {
      this.out.warning('Some resources may not have been deleted');
    }
    this.out.success('Resources deleted');
  }

  // ===========================================================================
  // Readiness
  // ===========================================================================

  async waitForDeployment(name: string, namespace: string, timeoutSeconds: number): Promise<boolean> {
    this.out.info(`Waiting for deployment '${name}' to be ready (timeout: ${timeoutSeconds}s)...`);
    const result = await this.kubectl([
      'wait',
      '--for=condition=available',
      `--timeout=${timeoutSeconds}s`,
      `deployment/${name}`,
      '-n',
      namespace,
    ]);
    if (result.code === 0) {
      this.out.success(`Deployment '${name}' is ready`);
      return true;
    }
    this.out.error(`Deployment '${name}' failed to become ready within ${timeoutSeconds}s`);
    return false;
  }

  async waitForStatefulSet(
    name: string,
    namespace: string,
    replicas: number,
    timeoutSeconds: number
  ): Promise<boolean> {
    this.out.info(`Waiting for statefulset '${name}' to be ready (timeout: ${timeoutSeconds}s)...`);
    const deadline = this.now() + timeoutSeconds * 1000;

    for (;;) {
      const ready = await this.jsonPath('statefulset', name, '{.status.readyReplicas}', namespace);
      if (ready === String(replicas)) {
        this.out.success(`StatefulSet '${name}' is ready`);
        return true;
      }
      if (this.now() >= deadline) {
        this.out.error(`StatefulSet '${name}' failed to become ready within ${timeoutSeconds}s`);
        return false;
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  async waitForPhase(
    kind: string,
    name: string,
    namespace: string,
    phase: string,
    attempts: number,
    intervalMs: number
  ): Promise<boolean> {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const current = await this.jsonPath(kind, name, '{.status.phase}', namespace);
      if (current === phase) {
        return true;
      }
      if (attempt < attempts) {
        await this.sleep(intervalMs);
      }
    }
    return false;
  }

  // ===========================================================================
  // Pods
  // ===========================================================================

  podStatus(selector: string, namespace: string): Promise<string | null> {
    return this.get(['pods', '-l', selector, '-o', 'wide'], namespace);
  }

  async firstPod(selector: string, namespace: string): Promise<string | null> {
    const result = await this.kubectl([
      'get', 'pods', '-l', selector, '-n', namespace, '-o', 'jsonpath={.items[0].metadata.name}',
    ]);
    const name = result.stdout.trim();
    return result.code === 0 && name ? name : null;
  }

  async latestPod(selector: string, namespace: string): Promise<string | null> {
    const result = await this.kubectl([
      'get', 'pods', '-l', selector, '-n', namespace,
      '--sort-by=.metadata.creationTimestamp',
      '-o', 'jsonpath={.items[-1:].metadata.name}',
    ]);
    const name = result.stdout.trim();
    return result.code === 0 && name ? name : null;
  }

  podExists(name: string, namespace: string): Promise<boolean> {
    return this.resourceExists('pod', name, namespace);
  }

  nodePort(service: string, namespace: string, portName: string): Promise<string | null> {
    return this.jsonPath('service', service, `{.spec.ports[?(@.name=='${portName}')].nodePort}`, namespace);
  }

  async exec(pod: string, namespace: string, command: string[], options: ExecOptions = {}): Promise<void> {
    const flags = options.tty ? ['-it'] : options.stdinPath ? ['-i'] : [];
    await this.interactiveOrThrow(['exec', ...flags, pod, '-n', namespace, '--', ...command], options);
  }

  async copyTo(localPath: string, namespace: string, pod: string, remotePath: string): Promise<void> {
    await this.kubectlOrThrow(['cp', localPath, `${namespace}/${pod}:${remotePath}`]);
  }

  async logs(pod: string, namespace: string, options: LogOptions): Promise<void> {
    const args = ['logs', pod, '-n', namespace, `--tail=${options.lines}`];
    if (options.follow) {
      args.push('-f');
    }
    await this.interactiveOrThrow(args);
  }

  async showLogs(selector: string, namespace: string, options: LogOptions): Promise<void> {
    const pod = await this.firstPod(selector, namespace);
    if (!pod) {
      throw new ServiceError(selector, `No pods found with label: ${selector}`);
    }
    this.out.info(`Showing logs for pod: ${pod}`);
    await this.logs(pod, namespace, options);
  }

  async rolloutRestart(kind: WorkloadKind, name: string, namespace: string): Promise<void> {
    await this.kubectlOrThrow(['rollout', 'restart', `${kind}/${name}`, '-n', namespace]);
  }

  async deleteByLabel(kind: string, selector: string, namespace: string): Promise<boolean> {
    const result = await this.kubectl(['delete', kind, '-l', selector, '-n', namespace, '--ignore-not-found=true']);
    return result.code === 0;
  }

  /**
   * Run a throwaway pod and report whether its command succeeded
   */
  async runPod(
    name: string,
    namespace: string,
    image: string,
    command: string[],
    options: RunPodOptions = {}
  ): Promise<boolean> {
    const envFlags = Object.entries(options.env ?? {}).map(([key, value]) => `--env=${key}=${value}`);
    const result = await this.kubectl([
      'run', name, '--rm', '-i', '--restart=Never', '--quiet',
      `--image=${image}`,
      ...envFlags,
      '-n', namespace,
      '--command', '--', ...command,
    ]);
    return result.code === 0;
  }

  async runInteractive(args: string[]): Promise<void> {
    await this.interactiveOrThrow(['run', ...args]);
  }

  async cleanupFailedPods(namespace: string): Promise<void> {
    this.out.info(`Cleaning up failed pods in namespace '${namespace}'...`);
    for (const phase of ['Failed', 'Unknown']) {
      await this.kubectl(['delete', 'pods', '-n', namespace, `--field-selector=status.phase=${phase}`]);
    }
    this.out.success('Cleanup completed');
  }

  // ===========================================================================
  // Cluster-wide queries
  // ===========================================================================

  /**
   * Run an arbitrary kubectl command, returning stdout or null on failure
   */
  async query(args: string[]): Promise<string | null> {
    const result = await this.kubectl(args);
    return result.code === 0 ? result.stdout : null;
  }

  /**
   * Run a kubectl command with its output going straight to the terminal
   */
  async show(args: string[]): Promise<boolean> {
    const code = await this.runner.interactive('kubectl', args);
    return code === 0;
  }

  async clientVersion(): Promise<string | null> {
    const output = await this.query(['version', '--client']);
    const firstLine = output?.split('\n')[0].trim();
    return firstLine || null;
  }

  async apiReachable(): Promise<boolean> {
    return (await this.query(['get', 'nodes'])) !== null;
  }

  waitForAllPods(namespace: string, timeoutSeconds: number): Promise<boolean> {
    return this.show([
      'wait', '--for=condition=Ready', 'pods', '--all', '-n', namespace, `--timeout=${timeoutSeconds}s`,
    ]);
  }

  async portForward(service: string, localPort: string, remotePort: string, namespace: string): Promise<void> {
    this.out.info(`Port forwarding: localhost:${localPort} -> ${service}:${remotePort}`);
    await this.interactiveOrThrow(['port-forward', `service/${service}`, `${localPort}:${remotePort}`, '-n', namespace]);
  }
}
