/**
 * Types for Kubernetes manifest generation
 */

// ============================================================================
// K8s Resource Types
// ============================================================================

// Plain type aliases without optional fields, so resources serialize through toYaml
export type K8sMetadata = {
  name: string;
  labels: Record<string, string>;
};

export type K8sAccessMode = 'ReadWriteOnce' | 'ReadOnlyMany' | 'ReadWriteMany';

export type K8sPersistentVolume = {
  apiVersion: 'v1';
  kind: 'PersistentVolume';
  metadata: K8sMetadata;
  spec: {
    capacity: { storage: string };
    accessModes: K8sAccessMode[];
    storageClassName: string;
    hostPath: { path: string };
  };
};

// ============================================================================
// Generator Types
// ============================================================================

export interface GeneratedManifest {
  filename: string;
  content: string;
}
