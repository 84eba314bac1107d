import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { ServiceRegistry, defineService, type ServiceDefinition } from '@minidev/core';
import { ConfigError } from '../errors';
import { generateEnvContent } from '../generators/project/env';
import { generateSetupScript } from '../generators/project';
import { ServiceLifecycle } from '../services/lifecycle.service';
import {
  DEFAULT_ENABLED_SERVICES,
  ProjectService,
  generateProject,
  loadProject,
  parseEnabledServices,
  splitServiceList,
  type Project,
} from '../services/project.service';
import { createTestRuntime, testSettings, type TestRuntime } from './fakes';

function service(id: string, restartable = true): ServiceDefinition {
  return defineService({
    id,
    name: id.toUpperCase(),
    description: `${id} service`,
    manifest: `${id}.yaml`,
    selector: `app=${id}`,
    presence: { kind: 'deployment', name: id },
    workloads: [{ kind: 'deployment', name: id, selector: `app=${id}`, timeoutSeconds: 60, restartable }],
  });
}

class RecordingLifecycle extends ServiceLifecycle {
  readonly events: string[] = [];
  readonly failing = new Set<string>();

  constructor(runtime: TestRuntime) {
    super(runtime, { defaultDir: '/unused' });
  }

  override async deploy(definition: ServiceDefinition): Promise<boolean> {
    this.events.push(`deploy ${definition.id}`);
    return !this.failing.has(definition.id);
  }

  override async remove(definition: ServiceDefinition): Promise<boolean> {
    this.events.push(`remove ${definition.id}`);
    return true;
  }

  override async restart(definition: ServiceDefinition): Promise<boolean> {
    this.events.push(`restart ${definition.id}`);
    return !this.failing.has(definition.id);
  }

  override async status(definition: ServiceDefinition): Promise<boolean> {
    this.events.push(`status ${definition.id}`);
    return true;
  }

  override async logs(definition: ServiceDefinition, args: string[], follow: boolean): Promise<boolean> {
    this.events.push(`logs ${definition.id} [${args.join(' ')}] ${follow}`);
    return true;
  }
}

function testRegistry(): ServiceRegistry {
  const registry = new ServiceRegistry();
  registry.register(service('alpha'));
  registry.register(service('beta', false));
  registry.register(service('gamma'));
  return registry;
}

// ============================================================================
// Loading
// ============================================================================

describe('splitServiceList', () => {
  it('should trim names and drop blanks', () => {
    expect(splitServiceList(' minio, ,spark ')).toEqual(['minio', 'spark']);
  });

  it('should fall back to the default services', () => {
    expect(splitServiceList(undefined)).toEqual(['minio', 'spark', 'airflow']);
    expect(splitServiceList(' , ')).toEqual(DEFAULT_ENABLED_SERVICES);
  });
});

describe('parseEnabledServices', () => {
  it('should resolve names in the order given', () => {
    const ids = parseEnabledServices(['gamma', 'alpha'], testRegistry()).map((definition) => definition.id);

    expect(ids).toEqual(['gamma', 'alpha']);
  });

  it('should list every unknown service', () => {
    expect(() => parseEnabledServices(['alpha', 'redis', 'kafka'], testRegistry())).toThrow(
      'Unknown services: redis, kafka. Available services: alpha, beta, gamma'
    );
  });
});

describe('project files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(tmpdir(), 'minidev-project-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a project .env', () => {
    fs.writeFileSync(
      path.join(tempDir, '.env'),
      'PROJECT_NAME="analytics"\nENABLED_SERVICES="postgres, minio"\nPROJECT_MANIFESTS_DIR="manifests"\n'
    );

    const project = loadProject(tempDir, {});

    expect(project.name).toBe('analytics');
    expect(project.namespace).toBe('analytics');
    expect(project.description).toBeUndefined();
    expect(project.enabledServices).toEqual(['postgres', 'minio']);
    expect(project.settings.namespace).toBe('analytics');
    expect(project.settings.projectManifestsDir).toBe(path.join(tempDir, 'manifests'));
  });

  it('should let the project file override the process environment', () => {
    fs.writeFileSync(path.join(tempDir, '.env'), 'PROJECT_NAME=analytics\nNAMESPACE=analytics-dev\n');

    const project = loadProject(tempDir, { NAMESPACE: 'default', MINIKUBE_CPUS: '2' });

    expect(project.namespace).toBe('analytics-dev');
    expect(project.settings.minikube.cpus).toBe(2);
  });

  it('should require a .env file', () => {
    expect(() => loadProject(tempDir, {})).toThrow(
      `Project .env file not found at ${path.join(tempDir, '.env')}. Run 'minidev project generate <name>' to create one`
    );
  });

  it('should require PROJECT_NAME', () => {
    fs.writeFileSync(path.join(tempDir, '.env'), 'NAMESPACE=analytics\n');

    expect(() => loadProject(tempDir, {})).toThrow(ConfigError);
    expect(() => loadProject(tempDir, {})).toThrow(`PROJECT_NAME is not set in ${path.join(tempDir, '.env')}`);
  });

  it('should generate files that load back as the same project', () => {
    const targetDir = path.join(tempDir, 'analytics');

    const files = generateProject({ name: 'analytics', targetDir, enabledServices: ['postgres', 'minio'] });

    expect(files.map((file) => path.basename(file.path))).toEqual(['.env', 'setup-env.sh']);
    expect(fs.statSync(path.join(targetDir, 'setup-env.sh')).mode & 0o777).toBe(0o755);

    const project = loadProject(targetDir, {});
    expect(project.name).toBe('analytics');
    expect(project.description).toBe('analytics Environment');
    expect(project.namespace).toBe('analytics');
    expect(project.enabledServices).toEqual(['postgres', 'minio']);
    expect(project.settings.minikube.driver).toBe('docker');
    expect(project.settings.minikube.diskSize).toBe('20g');
  });

  it('should refuse to overwrite an existing project without force', () => {
    generateProject({ name: 'analytics', targetDir: tempDir });

    expect(() => generateProject({ name: 'other', targetDir: tempDir })).toThrow(
      `${path.join(tempDir, '.env')} already exists (use --force to overwrite)`
    );

    generateProject({ name: 'other', targetDir: tempDir, force: true });
    expect(loadProject(tempDir, {}).name).toBe('other');
  });
});

describe('project generators', () => {
  it('should render env sections with comments and notes', () => {
    const content = generateEnvContent(
      [
        {
          header: 'Project Configuration',
          variables: [{ name: 'PROJECT_NAME', value: 'analytics', comment: 'Shown in status' }],
          notes: ['See the README'],
        },
      ],
      'analytics'
    );

    const rule = `# ${'='.repeat(77)}`;
    expect(content).toBe(
      [
        rule,
        '# analytics Environment Configuration',
        rule,
        '',
        '# Project Configuration',
        '# Shown in status',
        'PROJECT_NAME="analytics"',
        '# See the README',
        '',
      ].join('\n')
    );
  });

  it('should delegate the setup script to the project command', () => {
    const lines = generateSetupScript('analytics').split('\n');

    expect(lines[0]).toBe('#!/usr/bin/env bash');
    expect(lines[1]).toBe('# analytics environment setup');
    expect(lines.slice(6)).toEqual([
      'case "${1:-status}" in',
      '  start|deploy|stop|remove|restart|status|logs|minikube|service|help|--help|-h)',
      '    exec minidev project --dir "$SCRIPT_DIR" "${@:-status}" ;;',
      '  *)',
      '    exec minidev project --dir "$SCRIPT_DIR" service "$@" ;;',
      'esac',
      '',
    ]);
  });
});

// ============================================================================
// Service group operations
// ============================================================================

describe('ProjectService', () => {
  let runtime: TestRuntime;
  let lifecycle: RecordingLifecycle;
  let project: Project;

  function createService(enabledServices = ['alpha', 'beta', 'gamma']): ProjectService {
    project = { ...project, enabledServices };
    return new ProjectService(project, runtime, lifecycle, testRegistry());
  }

  beforeEach(() => {
    runtime = createTestRuntime({ settings: testSettings({ namespace: 'analytics' }) });
    runtime.fake.on('minikube status', { stdout: 'Running' });
    lifecycle = new RecordingLifecycle(runtime);
    project = {
      dir: '/work/analytics',
      name: 'analytics',
      namespace: 'analytics',
      enabledServices: [],
      env: {},
      settings: runtime.settings,
    };
  });

  it('should reject unknown enabled services up front', () => {
    expect(() => createService(['alpha', 'redis'])).toThrow('Unknown services: redis');
  });

  it('should deploy enabled services in order', async () => {
    const ok = await createService(['alpha', 'gamma']).start();

    expect(ok).toBe(true);
    expect(lifecycle.events).toEqual(['deploy alpha', 'deploy gamma']);
    expect(runtime.output.lines).toEqual([
      'ℹ Starting services: alpha,gamma',
      'ℹ Minikube is already running',
      "ℹ Namespace 'analytics' already exists",
      'ℹ Deploying alpha...',
      'ℹ Deploying gamma...',
      '✓ All services started successfully',
    ]);
  });

  it('should pass the environment check when both tools answer', async () => {
    runtime.fake.on('minikube version', { stdout: 'v1.32.0' });
    runtime.fake.on('kubectl version', { stdout: 'Client Version: v1.28.0' });

    expect(await createService(['alpha']).validateEnvironment()).toBe(true);
    expect(runtime.output.lines).toEqual([]);
  });

  it('should list missing tools with install instructions', async () => {
    runtime.fake.on('kubectl version', { code: 127 });

    expect(await createService(['alpha']).validateEnvironment()).toBe(false);
    expect(runtime.output.lines).toEqual([
      '✖ Missing required tools: kubectl',
      'Please install the missing tools and try again.',
      '',
      'Installation instructions:',
      '  - kubectl: Install from https://kubernetes.io/docs/tasks/tools/',
    ]);
  });

  it('should stop at the first failed deploy', async () => {
    lifecycle.failing.add('beta');

    expect(await createService().start()).toBe(false);
    expect(lifecycle.events).toEqual(['deploy alpha', 'deploy beta']);
    expect(runtime.output.lines.at(-1)).toBe('✖ Failed to deploy beta');
  });

  it('should remove services in reverse order', async () => {
    expect(await createService().stop()).toBe(true);
    expect(lifecycle.events).toEqual(['remove gamma', 'remove beta', 'remove alpha']);
  });

  it('should skip services without restartable workloads', async () => {
    expect(await createService().restart()).toBe(true);
    expect(lifecycle.events).toEqual(['restart alpha', 'restart gamma']);
    expect(runtime.output.lines).toContain('⚠ beta has no workloads to restart, skipping');
  });

  it('should keep restarting after a failure and report it', async () => {
    lifecycle.failing.add('alpha');

    expect(await createService().restart()).toBe(false);
    expect(lifecycle.events).toEqual(['restart alpha', 'restart gamma']);
    expect(runtime.output.lines.at(-1)).toBe('✖ Some services failed to restart');
  });

  it('should print status for each service and the configuration', async () => {
    runtime.fake.on('minikube ip', { stdout: '192.168.49.2' });

    await createService(['alpha']).status();

    expect(lifecycle.events).toEqual(['status alpha']);
    expect(runtime.output.lines).toEqual([
      '# analytics Environment Status',
      '',
      'ℹ Minikube Status:',
      '',
      'ℹ Minikube IP: 192.168.49.2',
      'ℹ Service status for: alpha',
      '',
      'ℹ === alpha Status ===',
      '',
      'ℹ Project Configuration:',
      '  Project: analytics',
      '  Namespace: analytics',
      '  Directory: /work/analytics',
      '  Description: No description',
      '  Enabled Services: alpha',
    ]);
  });

  it('should show logs for every enabled service', async () => {
    await createService(['alpha', 'gamma']).logs(undefined, [], false);

    expect(lifecycle.events).toEqual(['logs alpha [] false', 'logs gamma [] false']);
    expect(runtime.output.lines).toEqual(['', 'ℹ === alpha Logs ===', '', 'ℹ === gamma Logs ===']);
  });

  it('should pass log arguments to a single service, enabled or not', async () => {
    await createService(['alpha']).logs('beta', ['100'], true);

    expect(lifecycle.events).toEqual(['logs beta [100] true']);
  });

  describe('minikube', () => {
    it('should ask before deleting the cluster', async () => {
      const projectService = createService();

      expect(await projectService.minikube('delete')).toBe(true);
      expect(runtime.prompter.questions).toEqual(['Are you sure?']);
      expect(runtime.fake.find('minikube delete')).toBeUndefined();
    });

    it('should print the cluster IP', async () => {
      runtime.fake.on('minikube ip', { stdout: '192.168.49.2\n' });

      expect(await createService().minikube('ip')).toBe(true);
      expect(runtime.output.lines).toEqual(['192.168.49.2']);
    });

    it('should fail when the IP is unavailable', async () => {
      runtime.fake.on('minikube ip', { code: 1 });

      expect(await createService().minikube('ip')).toBe(false);
      expect(runtime.output.lines).toEqual(['✖ Could not determine minikube IP (is minikube running?)']);
    });

    it('should reject unknown commands', async () => {
      expect(await createService().minikube('reboot')).toBe(false);
      expect(runtime.output.lines).toEqual([
        '✖ Unknown minikube command: reboot',
        'Available: start, stop, delete, status, ip, dashboard',
      ]);
    });
  });
});
