/**
 * Spark on Kubernetes
 *
 * There is no long-running Spark cluster: the manifest only provides RBAC for
 * spark-submit and a hostPath volume exposing the project directory. Driver
 * and executor pods are created per job.
 */

import { defineAction, defineService, type ServiceContext } from '@minidev/core';
import { ServiceError } from '../errors';
import { renderSparkManifest } from '../services/manifest.service';

const SPARK_IMAGE = 'apache/spark:3.5.3';
const DRIVER_SELECTOR = 'spark-role=driver';
const PVC = 'spark-project-pvc';

const COMPONENTS = [
  'ServiceAccount: spark',
  'Role: spark-role',
  'RoleBinding: spark-role-binding',
  'PersistentVolume: spark-project-pv',
  `PersistentVolumeClaim: ${PVC}`,
];

export function mountCommand(projectPath: string): string {
  return `minikube mount ${projectPath}:${projectPath} --9p-version=9p2000.L --uid=1000 --gid=1000 &`;
}

/**
 * `kubectl run` arguments for the bundled SparkPi example
 */
export function sparkPiArgs(namespace: string): string[] {
  return [
    'spark-example', '--rm', '-i', '--tty', '--restart=Never',
    `--namespace=${namespace}`,
    '--serviceaccount=spark',
    `--image=${SPARK_IMAGE}`,
    '--', '/opt/spark/bin/spark-submit',
    '--master', 'k8s://https://kubernetes.default.svc',
    '--deploy-mode', 'cluster',
    '--name', 'SparkPiExample',
    '--class', 'org.apache.spark.examples.SparkPi',
    '--conf', `spark.kubernetes.namespace=${namespace}`,
    '--conf', 'spark.kubernetes.authenticate.driver.serviceAccountName=spark',
    '--conf', `spark.kubernetes.container.image=${SPARK_IMAGE}`,
    '--conf', 'spark.executor.instances=2',
    'local:///opt/spark/examples/jars/spark-examples_2.12-3.5.3.jar', '1000',
  ];
}

function waitForPvc(ctx: ServiceContext, attempts: number): Promise<boolean> {
  return ctx.kube.waitForPhase('pvc', PVC, ctx.namespace, 'Bound', attempts, 2000);
}

async function showStatus(ctx: ServiceContext): Promise<void> {
  const { kube, namespace, out } = ctx;

  out.line();
  out.info('RBAC Resources:');
  for (const [kind, name, label] of [
    ['serviceaccount', 'spark', 'ServiceAccount'],
    ['role', 'spark-role', 'Role'],
    ['rolebinding', 'spark-role-binding', 'RoleBinding'],
  ]) {
    const result = await kube.get([kind, name], namespace);
    if (result !== null) {
      out.line(result.trimEnd());
      out.line(`  ✓ ${label}: ${name}`);
    }
  }

  out.line();
  out.info('Storage Resources:');
  const pv = await kube.get(['pv', 'spark-project-pv']);
  if (pv !== null) out.line(pv.trimEnd());
  out.line();
  const pvc = await kube.get(['pvc', PVC], namespace);
  if (pvc !== null) out.line(pvc.trimEnd());

  out.line();
  out.info('Dynamic Spark Pods (currently running):');
  const drivers = await kube.get(['pods', '-l', DRIVER_SELECTOR, '-o', 'name'], namespace);
  if (!drivers?.trim()) {
    out.line('  (none - pods are created on-demand when jobs run)');
  } else {
    const table = await kube.get(['pods', '-l', DRIVER_SELECTOR], namespace);
    out.line((table ?? drivers).trimEnd());
  }

  out.line();
  out.info('Usage:');
  out.line('  Quick start:');
  out.line('    # 1. Ensure minikube mount is active');
  out.line(`    ${mountCommand(ctx.projectPath)}`);
  out.line();
  out.line('    # 2. Submit a Spark job');
  out.line('    kubectl run spark-job --rm -i --tty --restart=Never \\');
  out.line(`      --namespace=${namespace} \\`);
  out.line('      --serviceaccount=spark \\');
  out.line(`      --image=${SPARK_IMAGE} \\`);
  out.line('      -- /opt/spark/bin/spark-submit \\');
  out.line('         --master k8s://https://kubernetes.default.svc \\');
  out.line('         --deploy-mode cluster \\');
  out.line(`         --conf spark.kubernetes.namespace=${namespace} \\`);
  out.line('         --conf spark.kubernetes.authenticate.driver.serviceAccountName=spark \\');
  out.line('         local:///project/target/your-app.jar');
}

export const spark = defineService({
  id: 'spark',
  name: 'Spark on Kubernetes',
  description: 'RBAC and project volume for spark-submit in cluster mode',
  manifest: 'spark.yaml',
  selector: DRIVER_SELECTOR,
  presence: { kind: 'serviceaccount', name: 'spark' },
  workloads: [],
  renderManifest: (content, ctx) => {
    ctx.out.info(`Using project path: ${ctx.projectPath}`);
    return renderSparkManifest(content, ctx.projectPath, ctx.namespace);
  },
  hooks: {
    afterApply: async (ctx) => {
      ctx.out.info('Waiting for Spark ServiceAccount...');
      if (!(await ctx.kube.resourceExists('serviceaccount', 'spark', ctx.namespace))) {
        throw new ServiceError('spark', 'Spark ServiceAccount creation failed');
      }

      ctx.out.info('Waiting for PVC to be bound...');
      if (await waitForPvc(ctx, 60)) {
        ctx.out.success('PVC is bound');
      } else {
        ctx.out.warning('PVC not bound yet. You may need to start minikube mount:');
        ctx.out.line();
        ctx.out.line(`  ${mountCommand(ctx.projectPath)}`);
        ctx.out.line();
      }

      ctx.out.info('Components deployed:');
      for (const component of COMPONENTS) {
        ctx.out.line(`  ✓ ${component}`);
      }
    },
    status: showStatus,
    logs: async (ctx, [podName, rawLines = '50', follow], followFlag) => {
      const lines = Number(rawLines);
      if (!Number.isInteger(lines) || lines <= 0) {
        throw new ServiceError('spark', `Invalid line count: ${rawLines}`);
      }

      ctx.out.header('Spark Pod Logs');
      let pod = podName;
      if (!pod) {
        const latest = await ctx.kube.latestPod(DRIVER_SELECTOR, ctx.namespace);
        if (!latest) {
          ctx.out.error('No Spark driver pods found');
          ctx.out.line();
          ctx.out.line('List all pods with:');
          ctx.out.line(`  kubectl get pods -n ${ctx.namespace} | grep spark`);
          return false;
        }
        pod = latest;
        ctx.out.info(`Showing logs for most recent driver: ${pod}`);
      }
      await ctx.kube.logs(pod, ctx.namespace, { lines, follow: followFlag || follow === 'true' });
      return true;
    },
  },
  actions: [
    defineAction({
      name: 'mount',
      aliases: ['setup-mount'],
      description: 'Mount the project directory into minikube',
      arguments: [{ name: 'path' }],
      run: async (ctx, [mountPath = ctx.projectPath]) => {
        ctx.out.header('Setting up Minikube Mount');

        const mounts = await ctx.cluster.activeMounts();
        if (mounts.some((line) => line.includes(`minikube mount ${mountPath}`))) {
          ctx.out.success(`Minikube mount already active for: ${mountPath}`);
          return;
        }

        ctx.out.info(`Starting minikube mount for: ${mountPath}`);
        const pid = ctx.cluster.mount(mountPath);
        ctx.out.success(`Minikube mount started (PID: ${pid ?? 'unknown'})`);
        ctx.out.info('Mount will remain active in background');

        await ctx.sleep(3000);

        ctx.out.info('Verifying PVC binding...');
        if (await waitForPvc(ctx, 30)) {
          ctx.out.success('PVC is now bound');
        } else {
          ctx.out.warning('PVC not bound yet, but mount is running');
        }
      },
    }),
    defineAction({
      name: 'check-mount',
      aliases: ['mount-status'],
      description: 'Check whether a minikube mount is active',
      run: async (ctx) => {
        ctx.out.header('Minikube Mount Status');
        const mounts = await ctx.cluster.activeMounts();
        if (mounts.length === 0) {
          ctx.out.warning('No minikube mount process found');
          ctx.out.line();
          ctx.out.line('Start mount with:');
          ctx.out.line('  minidev spark mount [path]');
          return false;
        }
        for (const line of mounts) {
          ctx.out.line(line);
        }
        ctx.out.line();
        ctx.out.success('Minikube mount is active');
        return true;
      },
    }),
    defineAction({
      name: 'example',
      aliases: ['submit-example'],
      description: 'Submit the SparkPi example job',
      run: async (ctx) => {
        ctx.out.header('Submitting Example Spark Job');
        const args = sparkPiArgs(ctx.namespace);
        ctx.out.line(`kubectl run ${args.join(' ')}`);
        ctx.out.line();
        if (await ctx.prompt.confirm('Run this example?', false)) {
          await ctx.kube.runInteractive(args);
        }
      },
    }),
  ],
  notes: [
    'Minikube mount must be active for PV access',
    'Pods are created dynamically when jobs run (no persistent cluster)',
  ],
  examples: [
    'minidev spark deploy',
    'SPARK_PROJECT_PATH=/home/me/my-project minidev spark mount',
    'minidev spark example',
    'minidev spark logs',
    'minidev spark logs my-driver-pod 100',
  ],
});
