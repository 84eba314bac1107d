/**
 * Service Lifecycle
 *
 * The deploy/remove/restart/status/logs/health flow shared by every catalog
 * service. Definitions only describe names, selectors and timeouts; this
 * module drives kubectl with them.
 *
 * Methods resolve false for failures they have already reported to the
 * console. Unexpected failures (kubectl refusing a manifest) throw.
 */

import type { AccessContext, ServiceDefinition, StatusSection, Workload } from '@minidev/core';
import { errorMessage, ServiceError } from '../errors';
import type { Runtime } from './context';
import { readManifest, resolveManifestPath, type ManifestLocations } from './manifest.service';

export const DEFAULT_LOG_LINES = 50;

export interface LogRequest {
  target?: string;
  lines: number;
  follow: boolean;
}

/**
 * Interpret positional log arguments: `[component] [lines] [follow]` for
 * services with several log targets, `[lines] [follow]` otherwise
 */
export function parseLogArgs(definition: ServiceDefinition, args: string[], follow = false): LogRequest {
  const rest = [...args];
  const target = definition.logTargets ? rest.shift() : undefined;
  const rawLines = rest.shift();
  const lines = rawLines === undefined ? DEFAULT_LOG_LINES : Number(rawLines);
  if (!Number.isInteger(lines) || lines <= 0) {
    throw new ServiceError(definition.id, `Invalid line count: ${rawLines}`);
  }
  return { target, lines, follow: follow || rest.shift() === 'true' };
}

export class ServiceLifecycle {
  constructor(
    private readonly runtime: Runtime,
    private readonly locations: ManifestLocations
  ) {}

  private get ctx() {
    return this.runtime.ctx;
  }

  private get out() {
    return this.runtime.out;
  }

  manifestPath(definition: ServiceDefinition): string {
    return resolveManifestPath(definition.manifest, this.locations);
  }

  supportsRestart(definition: ServiceDefinition): boolean {
    return definition.workloads.some((workload) => workload.restartable !== false);
  }

  // ===========================================================================
  // deploy / remove / restart
  // ===========================================================================

  async deploy(definition: ServiceDefinition): Promise<boolean> {
    const { kube, minikube } = this.runtime;
    const namespace = this.ctx.namespace;

    this.out.header(`Deploying ${definition.name}`);

    await minikube.ensureRunning();
    await kube.ensureNamespace(namespace);

    const manifest = this.manifestPath(definition);
    if (definition.renderManifest) {
      const content = definition.renderManifest(readManifest(manifest), this.ctx);
      await kube.applyContent(content, namespace, manifest);
    } else {
      await kube.applyManifest(manifest, namespace);
    }

    await definition.hooks.afterApply?.(this.ctx);

    for (const workload of definition.workloads) {
      if (workload.skip && (await workload.skip(this.ctx))) {
        continue;
      }
      if (workload.waitMessage) {
        this.out.info(workload.waitMessage);
      }
      if (!(await this.waitFor(workload))) {
        this.out.error(`${workload.label ?? definition.name} deployment failed`);
        await this.showFailureLogs(workload);
        return false;
      }
    }

    this.out.success(`${definition.name} deployed successfully`);
    await this.status(definition);
    return true;
  }

  async remove(definition: ServiceDefinition): Promise<boolean> {
    this.out.header(`Removing ${definition.name}`);
    await this.runtime.kube.deleteManifest(this.manifestPath(definition), this.ctx.namespace);
    await definition.hooks.afterRemove?.(this.ctx);
    this.out.success(`${definition.name} removed`);
    return true;
  }

  /**
   * Restart dependents first, then wait in deploy order
   */
  async restart(definition: ServiceDefinition): Promise<boolean> {
    this.out.header(`Restarting ${definition.name}`);

    const workloads = definition.workloads.filter((workload) => workload.restartable !== false);
    if (workloads.length === 0) {
      this.out.warning(`${definition.name} has no workloads to restart`);
      return false;
    }

    for (const workload of [...workloads].reverse()) {
      try {
        this.out.info(`Restarting ${workload.kind} ${workload.name}...`);
        await this.runtime.kube.rolloutRestart(workload.kind, workload.name, this.ctx.namespace);
      } catch (error) {
        this.out.error(`Failed to restart ${definition.name}: ${errorMessage(error)}`);
        return false;
      }
    }

    for (const workload of workloads) {
      if (!(await this.waitFor(workload))) {
        return false;
      }
    }

    this.out.success(`${definition.name} restarted successfully`);
    return true;
  }

  private waitFor(workload: Workload): Promise<boolean> {
    const { kube } = this.runtime;
    const namespace = this.ctx.namespace;
    if (workload.kind === 'statefulset') {
      return kube.waitForStatefulSet(workload.name, namespace, workload.replicas ?? 1, workload.timeoutSeconds);
    }
    return kube.waitForDeployment(workload.name, namespace, workload.timeoutSeconds);
  }

  private async showFailureLogs(workload: Workload): Promise<void> {
    try {
      await this.runtime.kube.showLogs(workload.selector, this.ctx.namespace, {
        lines: DEFAULT_LOG_LINES,
        follow: false,
      });
    } catch (error) {
      this.out.error(errorMessage(error));
    }
  }

  // ===========================================================================
  // status / health
  // ===========================================================================

  async isDeployed(definition: ServiceDefinition): Promise<boolean> {
    const { kind, name } = definition.presence;
    return this.runtime.kube.resourceExists(kind, name, this.ctx.namespace);
  }

  async status(definition: ServiceDefinition): Promise<boolean> {
    this.out.header(`${definition.name} Status`);

    if (!(await this.isDeployed(definition))) {
      this.out.warning(`${definition.name} is not deployed`);
      return false;
    }

    if (definition.hooks.status) {
      await definition.hooks.status(this.ctx);
      return true;
    }

    for (const section of definition.statusSections) {
      await this.printSection(section);
    }

    if (definition.healthCheck) {
      this.out.line();
      this.out.info('Health Check:');
      const healthy = await this.probe(definition);
      this.out.line(healthy ? '  ✓ Healthy' : '  ✖ Unhealthy');
    }

    await this.printAccess(definition);
    await definition.hooks.afterStatus?.(this.ctx);
    return true;
  }

  private async printSection(section: StatusSection): Promise<void> {
    const { kube } = this.runtime;
    const namespace = this.ctx.namespace;

    this.out.line();
    this.out.info(`${section.title}:`);

    if (section.get) {
      const result = await kube.get(section.get, section.clusterScoped ? undefined : namespace);
      if (result !== null) {
        this.out.line(result.trimEnd());
      } else if (section.fallbackPods) {
        this.printOptional(await kube.podStatus(section.fallbackPods, namespace), section.fallback);
      } else if (section.fallback) {
        this.out.line(section.fallback);
      }
    }

    if (section.pods) {
      this.printOptional(await kube.podStatus(section.pods, namespace), section.get ? undefined : section.fallback);
    }
  }

  private printOptional(value: string | null, fallback?: string): void {
    if (value !== null && value.trim()) {
      this.out.line(value.trimEnd());
    } else if (fallback) {
      this.out.line(fallback);
    }
  }

  private probe(definition: ServiceDefinition): Promise<boolean> {
    const probe = definition.healthCheck;
    if (!probe) {
      return Promise.resolve(false);
    }
    const namespace = this.ctx.namespace;
    return this.runtime.kube.runPod(`${definition.id}-health-check`, namespace, probe.image, probe.command(namespace), {
      env: probe.env,
    });
  }

  async health(definition: ServiceDefinition): Promise<boolean> {
    if (!definition.healthCheck) {
      this.out.warning(`${definition.name} has no health check`);
      return false;
    }
    const healthy = await this.probe(definition);
    this.out.line(healthy ? '✓ Healthy' : '✖ Unhealthy');
    return healthy;
  }

  async resolveAccess(definition: ServiceDefinition): Promise<AccessContext> {
    const ports: Record<string, string | null> = {};
    for (const port of definition.accessPorts) {
      ports[port.key] = await this.runtime.kube.nodePort(port.service, this.ctx.namespace, port.portName);
    }
    return { ip: await this.ctx.cluster.ip(), ports, namespace: this.ctx.namespace };
  }

  private async printAccess(definition: ServiceDefinition): Promise<void> {
    if (!definition.describeAccess) {
      return;
    }
    const access = await this.resolveAccess(definition);

    this.out.line();
    this.out.info('Access Information:');
    const complete = access.ip !== null && Object.values(access.ports).every((port) => port !== null);
    if (!complete) {
      this.out.line('  Unavailable (minikube IP or NodePort not found)');
      return;
    }
    for (const line of definition.describeAccess(access)) {
      this.out.line(line);
    }
  }

  // ===========================================================================
  // logs
  // ===========================================================================

  async logs(definition: ServiceDefinition, args: string[], follow: boolean): Promise<boolean> {
    if (definition.hooks.logs) {
      return (await definition.hooks.logs(this.ctx, args, follow)) !== false;
    }

    const request = parseLogArgs(definition, args, follow);
    let selector = definition.selector;
    let title = `${definition.name} Logs`;

    if (definition.logTargets) {
      const wanted = request.target ?? definition.logTargets.defaultTarget;
      const target = definition.logTargets.targets.find(
        (candidate) => candidate.name === wanted || candidate.aliases?.includes(wanted)
      );
      if (!target) {
        const names = definition.logTargets.targets.map((candidate) => `'${candidate.name}'`).join(', ');
        this.out.error(`Unknown component: ${wanted} (use ${names})`);
        return false;
      }
      selector = target.selector;
      if (target.fallbackSelector && !(await this.runtime.kube.firstPod(selector, this.ctx.namespace))) {
        selector = target.fallbackSelector;
      }
      title = `${definition.name} ${target.name} Logs`;
    }

    this.out.header(title);
    try {
      await this.runtime.kube.showLogs(selector, this.ctx.namespace, {
        lines: request.lines,
        follow: request.follow,
      });
    } catch (error) {
      this.out.error(errorMessage(error));
      return false;
    }
    return true;
  }
}
