/**
 * PersistentVolume manifest generator
 * Backs a volume with a hostPath directory inside the minikube node
 */

import type { GeneratedManifest, K8sPersistentVolume } from './types';
import { generateYamlDocument } from './yaml';

export interface VolumeOptions {
  name: string;
  /** Defaults to 1Gi */
  size?: string;
  /** Defaults to standard */
  storageClass?: string;
}

export const DEFAULT_VOLUME_SIZE = '1Gi';
export const DEFAULT_STORAGE_CLASS = 'standard';

export function buildPersistentVolume(options: VolumeOptions): K8sPersistentVolume {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolume',
    metadata: {
      name: options.name,
      labels: {
        'app.kubernetes.io/managed-by': 'minidev',
      },
    },
    spec: {
      capacity: { storage: options.size ?? DEFAULT_VOLUME_SIZE },
      accessModes: ['ReadWriteOnce'],
      storageClassName: options.storageClass ?? DEFAULT_STORAGE_CLASS,
      hostPath: { path: `/data/${options.name}` },
    },
  };
}

export function generatePersistentVolume(options: VolumeOptions): GeneratedManifest {
  return {
    filename: `${options.name}-pv.yaml`,
    content: generateYamlDocument(buildPersistentVolume(options)),
  };
}
