import { describe, it, expect } from 'vitest';
import { ClusterService, countPodsByNamespace } from '../services/cluster.service';
import { createTestRuntime } from './fakes';

const bigHost = () => ({ cpus: 8, memoryGb: 32 });

describe('countPodsByNamespace', () => {
  it('should count pods and put the busiest namespace first', () => {
    const output = [
      'kube-system   coredns-5dd5756b68-x2x7l   1/1   Running   0   5m',
      'dev           minio-7c9f8d5b4-kq2lp      1/1   Running   0   2m',
      'kube-system   etcd-minikube              1/1   Running   0   5m',
      'apps          web-0                      1/1   Running   0   1m',
      '',
    ].join('\n');

    expect(countPodsByNamespace(output)).toEqual([
      { namespace: 'kube-system', count: 2 },
      { namespace: 'apps', count: 1 },
      { namespace: 'dev', count: 1 },
    ]);
  });

  it('should return nothing for empty output', () => {
    expect(countPodsByNamespace('')).toEqual([]);
  });
});

describe('ClusterService', () => {
  describe('checkPrerequisites', () => {
    it('should stop when minikube is missing', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('minikube version', { code: 127 });

      expect(await new ClusterService(runtime, { host: bigHost }).checkPrerequisites()).toBe(false);
      expect(runtime.output.lines).toEqual([
        '# Checking Prerequisites',
        '✖ minikube is not installed',
        'Install from: https://minikube.sigs.k8s.io/docs/start/',
      ]);
    });

    it('should warn about low host memory', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('minikube version', { stdout: 'v1.32.0\n' });
      runtime.fake.on('kubectl version', { stdout: 'Client Version: v1.28.0\n' });

      const service = new ClusterService(runtime, { host: () => ({ cpus: 8, memoryGb: 8 }) });

      expect(await service.checkPrerequisites()).toBe(true);
      expect(runtime.output.lines).toEqual([
        '# Checking Prerequisites',
        '✓ minikube found: v1.32.0',
        '✓ kubectl found: Client Version: v1.28.0',
        '✓ System resources: 8 cores, 8GB RAM',
        '⚠ Low memory detected. Consider reducing MINIKUBE_MEMORY',
      ]);
    });

    it('should only warn when kubectl is missing', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('minikube version', { stdout: 'v1.32.0' });
      runtime.fake.on('kubectl version', { code: 127 });

      expect(await new ClusterService(runtime, { host: bigHost }).checkPrerequisites()).toBe(true);
      expect(runtime.output.lines).toContain('⚠ kubectl is not installed');
    });
  });

  describe('checkExistingCluster', () => {
    it('should start a cluster when none is running', async () => {
      const runtime = createTestRuntime();

      expect(await new ClusterService(runtime).checkExistingCluster()).toBe(true);
      expect(runtime.prompter.questions).toEqual([]);
    });

    it('should reuse a running cluster when recreation is declined', async () => {
      const runtime = createTestRuntime({ confirm: false });
      runtime.fake.on('minikube status', { stdout: 'Running' });

      expect(await new ClusterService(runtime).checkExistingCluster()).toBe(false);
      expect(runtime.prompter.questions).toEqual(['Do you want to delete and recreate?']);
      expect(runtime.fake.find('minikube delete')).toBeUndefined();
      expect(runtime.output.lines.at(-1)).toBe('ℹ Using existing cluster');
    });

    it('should delete a running cluster when recreation is confirmed', async () => {
      const runtime = createTestRuntime({ confirm: true });
      runtime.fake.on('minikube status', { stdout: 'Running' });

      expect(await new ClusterService(runtime).checkExistingCluster()).toBe(true);
      expect(runtime.fake.find('minikube delete')?.args).toEqual(['delete', '-p', 'minikube']);
    });
  });

  it('should enable only the addons that are not enabled yet', async () => {
    const runtime = createTestRuntime();
    runtime.fake.on('minikube addons list', {
      stdout: '| metrics-server | minikube | enabled ✅ |\n| storage-provisioner | minikube | disabled |\n',
    });

    await new ClusterService(runtime).enableAddons();

    expect(runtime.fake.lines()).toEqual([
      'minikube addons list -p minikube',
      'minikube addons enable storage-provisioner -p minikube',
      'minikube addons enable default-storageclass -p minikube',
    ]);
    expect(runtime.output.lines).toEqual([
      '# Enabling Addons',
      '✓ metrics-server already enabled',
      'ℹ Enabling storage-provisioner...',
      'ℹ Enabling default-storageclass...',
    ]);
  });

  describe('waitForCluster', () => {
    it('should poll the API server and then wait for system pods', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('kubectl get nodes', { code: 1 }, { code: 0 });

      expect(await new ClusterService(runtime).waitForCluster()).toBe(true);
      expect(runtime.sleeps).toEqual([2000]);
      expect(runtime.fake.lines().at(-1)).toBe(
        'kubectl wait --for=condition=Ready pods --all -n kube-system --timeout=120s'
      );
      expect(runtime.output.lines).toEqual([
        '# Waiting for Cluster to be Ready',
        'ℹ Waiting for system pods...',
        '✓ Cluster is ready',
      ]);
    });

    it('should time out when the API server never answers', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('kubectl get nodes', { code: 1 });

      const service = new ClusterService(runtime, { apiAttempts: 3, apiIntervalMs: 100 });

      expect(await service.waitForCluster()).toBe(false);
      expect(runtime.fake.calls).toHaveLength(3);
      expect(runtime.sleeps).toEqual([100, 100]);
    });

    it('should fail when system pods do not become ready', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('kubectl wait', { code: 1 });

      expect(await new ClusterService(runtime).waitForCluster()).toBe(false);
      expect(runtime.output.lines.at(-1)).toBe('✖ System pods did not become ready');
    });
  });

  describe('status', () => {
    it('should report a missing cluster', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('minikube status', { code: 85 });

      expect(await new ClusterService(runtime).status()).toBe(false);
      expect(runtime.output.lines).toEqual([
        '# Minikube Cluster Status',
        "✖ Cluster 'minikube' not found",
        '',
        'To start: minidev cluster start',
      ]);
    });

    it('should list pod counts per namespace', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('kubectl get pods --all-namespaces', {
        stdout: 'kube-system a\nkube-system b\ndev c\n',
      });

      expect(await new ClusterService(runtime).status()).toBe(true);

      const lines = runtime.output.lines;
      const start = lines.indexOf('Pods by Namespace:');
      expect(lines.slice(start, start + 4)).toEqual(['Pods by Namespace:', '      2 kube-system', '      1 dev', '']);
      expect(runtime.fake.find('kubectl top')).toBeUndefined();
    });

    it('should show resource usage when the metrics API is registered', async () => {
      const runtime = createTestRuntime();
      runtime.fake.on('kubectl get apiservices', { stdout: 'v1beta1.metrics.k8s.io   kube-system/metrics-server   True\n' });
      runtime.fake.on('kubectl top pods', { stdout: '' });

      await new ClusterService(runtime).status();

      expect(runtime.fake.lines()).toContain('kubectl top pods --all-namespaces --sort-by=cpu');
      expect(runtime.fake.lines()).toContain('kubectl top pods --all-namespaces --sort-by=memory');
      expect(runtime.output.lines.filter((line) => line === 'No pods running')).toHaveLength(2);
    });
  });

  it('should leave a stopped cluster alone', async () => {
    const runtime = createTestRuntime();
    runtime.fake.on('minikube status', { code: 7 });

    expect(await new ClusterService(runtime).stop()).toBe(true);
    expect(runtime.fake.find('minikube stop')).toBeUndefined();
    expect(runtime.output.lines).toEqual(['# Stopping Minikube Cluster', "⚠ Cluster 'minikube' is not running"]);
  });

  it('should delete the cluster after confirmation', async () => {
    const runtime = createTestRuntime({ confirm: true });

    expect(await new ClusterService(runtime).delete()).toBe(true);
    expect(runtime.fake.lines()).toEqual(['minikube delete -p minikube']);
    expect(runtime.output.lines).toEqual([
      "⚠ This will delete the 'minikube' cluster and all data!",
      "✓ Cluster 'minikube' deleted",
    ]);
  });

  it('should do nothing when deletion is cancelled', async () => {
    const runtime = createTestRuntime();

    await new ClusterService(runtime).delete();

    expect(runtime.fake.calls).toHaveLength(0);
    expect(runtime.output.lines.at(-1)).toBe('ℹ Cancelled');
  });
});
