/**
 * Project Service
 *
 * A project is a directory holding a .env that names a namespace and the
 * catalog services to run in it. This module loads that file and drives the
 * enabled services as a group.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ServiceDefinition, ServiceRegistry } from '@minidev/core';
import { loadEnvFile, loadSettings, type Environment, type Settings } from '../config/settings';
import { ConfigError } from '../errors';
import { generateProjectFiles, type GeneratedFile } from '../generators/project';
import type { Runtime } from './context';
import type { ServiceLifecycle } from './lifecycle.service';
import { findMissingTools } from './tools.service';

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_ENABLED_SERVICES = ['minio', 'spark', 'airflow'];

export const PROJECT_ENV_FILE = '.env';

export interface Project {
  dir: string;
  name: string;
  description?: string;
  namespace: string;
  enabledServices: string[];
  /** Process environment overlaid with the project file */
  env: Environment;
  settings: Settings;
}

export interface GenerateOptions {
  name: string;
  description?: string;
  targetDir: string;
  enabledServices?: string[];
  /** Overwrite an existing .env */
  force?: boolean;
}

export const MINIKUBE_COMMANDS = ['start', 'stop', 'delete', 'status', 'ip', 'dashboard'] as const;

// =============================================================================
// Loading
// =============================================================================

/**
 * Split a comma-separated service list, dropping blanks
 */
export function splitServiceList(raw: string | undefined): string[] {
  const names = (raw ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return names.length > 0 ? names : [...DEFAULT_ENABLED_SERVICES];
}

/**
 * Resolve enabled service names against the catalog
 */
export function parseEnabledServices(names: string[], registry: ServiceRegistry): ServiceDefinition[] {
  const missing = names.filter((name) => !registry.has(name));
  if (missing.length > 0) {
    throw new ConfigError(
      `Unknown services: ${missing.join(', ')}. Available services: ${registry.ids().join(', ')}`
    );
  }
  return names.map((name) => registry.require(name));
}

export function loadProject(dir: string, processEnv: Environment = process.env): Project {
  const projectDir = path.resolve(dir);
  const envFile = path.join(projectDir, PROJECT_ENV_FILE);
  if (!fs.existsSync(envFile)) {
    throw new ConfigError(
      `Project .env file not found at ${envFile}. Run 'minidev project generate <name>' to create one`
    );
  }

  const env: Environment = { ...processEnv, ...loadEnvFile(envFile) };
  const name = env.PROJECT_NAME?.trim();
  if (!name) {
    throw new ConfigError(`PROJECT_NAME is not set in ${envFile}`);
  }

  const namespace = env.NAMESPACE?.trim() || name;
  const settings = loadSettings({ ...env, NAMESPACE: namespace }, projectDir);

  return {
    dir: projectDir,
    name,
    description: env.PROJECT_DESCRIPTION || undefined,
    namespace,
    enabledServices: splitServiceList(env.ENABLED_SERVICES),
    env,
    settings,
  };
}

// =============================================================================
// Generation
// =============================================================================

export function generateProject(options: GenerateOptions): GeneratedFile[] {
  const envFile = path.join(options.targetDir, PROJECT_ENV_FILE);
  if (fs.existsSync(envFile) && !options.force) {
    throw new ConfigError(`${envFile} already exists (use --force to overwrite)`);
  }

  const files = generateProjectFiles(
    {
      name: options.name,
      description: options.description,
      enabledServices: options.enabledServices ?? DEFAULT_ENABLED_SERVICES,
    },
    options.targetDir
  );

  fs.mkdirSync(options.targetDir, { recursive: true });
  for (const file of files) {
    fs.writeFileSync(file.path, file.content, { mode: file.mode });
    if (file.mode !== undefined) {
      fs.chmodSync(file.path, file.mode);
    }
  }
  return files;
}

// =============================================================================
// Service group operations
// =============================================================================

export class ProjectService {
  private readonly services: ServiceDefinition[];

  constructor(
    private readonly project: Project,
    private readonly runtime: Runtime,
    private readonly lifecycle: ServiceLifecycle,
    private readonly registry: ServiceRegistry
  ) {
    this.services = parseEnabledServices(project.enabledServices, registry);
  }

  private get out() {
    return this.runtime.out;
  }

  private get serviceList(): string {
    return this.project.enabledServices.join(',');
  }

  /**
   * Fails when minikube or kubectl is not installed
   */
  async validateEnvironment(): Promise<boolean> {
    const missing = await findMissingTools(this.runtime.runner);
    if (missing.length === 0) {
      return true;
    }

    this.out.error(`Missing required tools: ${missing.map((check) => check.name).join(' ')}`);
    this.out.line('Please install the missing tools and try again.');
    this.out.line();
    this.out.line('Installation instructions:');
    for (const check of missing) {
      this.out.line(`  - ${check.name}: ${check.fix}`);
    }
    return false;
  }

  /**
   * Deploy every enabled service in order, stopping at the first failure
   */
  async start(): Promise<boolean> {
    this.out.info(`Starting services: ${this.serviceList}`);

    await this.runtime.minikube.ensureRunning();
    await this.runtime.kube.ensureNamespace(this.project.namespace);

    for (const service of this.services) {
      this.out.info(`Deploying ${service.id}...`);
      if (!(await this.lifecycle.deploy(service))) {
        this.out.error(`Failed to deploy ${service.id}`);
        return false;
      }
    }

    this.out.success('All services started successfully');
    return true;
  }

  /**
   * Remove enabled services in reverse order
   */
  async stop(): Promise<boolean> {
    this.out.info(`Stopping services: ${this.serviceList}`);

    for (const service of [...this.services].reverse()) {
      this.out.info(`Removing ${service.id}...`);
      await this.lifecycle.remove(service);
    }

    this.out.success('All services stopped');
    return true;
  }

  async restart(): Promise<boolean> {
    this.out.info(`Restarting services: ${this.serviceList}`);

    let ok = true;
    for (const service of this.services) {
      if (!this.lifecycle.supportsRestart(service)) {
        this.out.warning(`${service.id} has no workloads to restart, skipping`);
        continue;
      }
      this.out.info(`Restarting ${service.id}...`);
      ok = (await this.lifecycle.restart(service)) && ok;
    }

    if (!ok) {
      this.out.error('Some services failed to restart');
      return false;
    }
    this.out.success('All services restarted');
    return true;
  }

  async status(): Promise<boolean> {
    const { minikube } = this.runtime;
    this.out.header(`${this.project.name} Environment Status`);

    this.out.line();
    this.out.info('Minikube Status:');
    await minikube.status();

    this.out.line();
    this.out.info(`Minikube IP: ${(await minikube.ip()) ?? 'unavailable'}`);

    this.out.info(`Service status for: ${this.serviceList}`);
    for (const service of this.services) {
      this.out.line();
      this.out.info(`=== ${service.id} Status ===`);
      await this.lifecycle.status(service);
    }

    this.printConfiguration();
    return true;
  }

  printConfiguration(): void {
    this.out.line();
    this.out.info('Project Configuration:');
    this.out.line(`  Project: ${this.project.name}`);
    this.out.line(`  Namespace: ${this.project.namespace}`);
    this.out.line(`  Directory: ${this.project.dir}`);
    this.out.line(`  Description: ${this.project.description ?? 'No description'}`);
    this.out.line(`  Enabled Services: ${this.serviceList}`);
  }

  /**
   * Logs for one service (any catalog service), or for every enabled one
   */
  async logs(service: string | undefined, args: string[], follow: boolean): Promise<boolean> {
    if (service) {
      return this.lifecycle.logs(this.registry.require(service), args, follow);
    }

    let ok = true;
    for (const definition of this.services) {
      this.out.line();
      this.out.info(`=== ${definition.id} Logs ===`);
      ok = (await this.lifecycle.logs(definition, [], false)) && ok;
    }
    return ok;
  }

  async minikube(command: string): Promise<boolean> {
    const { minikube, ctx } = this.runtime;

    switch (command) {
      case 'start':
        await minikube.ensureRunning();
        return true;
      case 'stop':
        this.out.info('Stopping Minikube...');
        await minikube.stop();
        return true;
      case 'delete':
        this.out.warning('This will delete the Minikube cluster and all data!');
        if (await ctx.prompt.confirm('Are you sure?', false)) {
          await minikube.delete();
        }
        return true;
      case 'status':
        return (await minikube.status()) === 0;
      case 'ip': {
        const ip = await minikube.ip();
        if (!ip) {
          this.out.error('Could not determine minikube IP (is minikube running?)');
          return false;
        }
        this.out.line(ip);
        return true;
      }
      case 'dashboard':
        await minikube.dashboard();
        return true;
      default:
        this.out.error(`Unknown minikube command: ${command}`);
        this.out.line(`Available: ${MINIKUBE_COMMANDS.join(', ')}`);
        return false;
    }
  }
}
