import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigError } from '../errors';
import { loadEnvFile, loadSettings } from '../config/settings';

describe('loadSettings', () => {
  it('should apply defaults for an empty environment', () => {
    const settings = loadSettings({}, '/work');

    expect(settings).toEqual({
      namespace: 'default',
      minikube: {
        cpus: 4,
        memory: 8192,
        diskSize: '40g',
        driver: undefined,
        runtime: 'containerd',
        kubernetesVersion: 'v1.28.0',
        profile: 'minikube',
      },
      projectManifestsDir: undefined,
      projectRoot: '/work',
      sparkProjectPath: '/work',
      manifestsDir: undefined,
    });
  });

  it('should read minikube settings from the environment', () => {
    const settings = loadSettings(
      {
        NAMESPACE: 'analytics',
        MINIKUBE_CPUS: '8',
        MINIKUBE_MEMORY: '16384',
        MINIKUBE_DRIVER: 'docker',
        MINIKUBE_PROFILE: 'data',
      },
      '/work'
    );

    expect(settings.namespace).toBe('analytics');
    expect(settings.minikube.cpus).toBe(8);
    expect(settings.minikube.memory).toBe(16384);
    expect(settings.minikube.driver).toBe('docker');
    expect(settings.minikube.profile).toBe('data');
  });

  it('should treat empty values as unset', () => {
    const settings = loadSettings({ NAMESPACE: '', MINIKUBE_DRIVER: '' }, '/work');

    expect(settings.namespace).toBe('default');
    expect(settings.minikube.driver).toBeUndefined();
  });

  it('should resolve project manifests against the project root', () => {
    const settings = loadSettings(
      { PROJECT_ROOT: '/srv/analytics', PROJECT_MANIFESTS_DIR: 'k8s', SPARK_PROJECT_PATH: 'jobs' },
      '/work'
    );

    expect(settings.projectRoot).toBe('/srv/analytics');
    expect(settings.projectManifestsDir).toBe('/srv/analytics/k8s');
    expect(settings.sparkProjectPath).toBe('/work/jobs');
  });

  it('should keep an absolute manifests override', () => {
    expect(loadSettings({ MINIDEV_MANIFESTS_DIR: '/opt/manifests' }, '/work').manifestsDir).toBe('/opt/manifests');
  });

  it('should reject a non-numeric CPU count', () => {
    expect(() => loadSettings({ MINIKUBE_CPUS: 'many' }, '/work')).toThrow(ConfigError);
    expect(() => loadSettings({ MINIKUBE_CPUS: 'many' }, '/work')).toThrow(/^Invalid value for MINIKUBE_CPUS: /);
  });

  it('should reject a zero memory size', () => {
    expect(() => loadSettings({ MINIKUBE_MEMORY: '0' }, '/work')).toThrow(/^Invalid value for MINIKUBE_MEMORY: /);
  });
});

describe('loadEnvFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(tmpdir(), 'minidev-env-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should parse quoted values and skip comments', () => {
    const file = path.join(tempDir, '.env');
    fs.writeFileSync(file, '# Project\nPROJECT_NAME="analytics"\nNAMESPACE=analytics-dev\n');

    expect(loadEnvFile(file)).toEqual({ PROJECT_NAME: 'analytics', NAMESPACE: 'analytics-dev' });
  });

  it('should throw for a missing file', () => {
    const file = path.join(tempDir, '.env');

    expect(() => loadEnvFile(file)).toThrow(`Environment file not found: ${file}`);
  });
});
