/**
 * Manifest Service
 *
 * Locates the YAML manifest for a service. Projects may override any bundled
 * manifest by dropping `<service>.yaml` into their own manifests directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../errors';

const MANIFESTS_DIRNAME = 'manifests';
const MAX_PARENT_LEVELS = 5;

/** Placeholder host path in the Spark manifest */
export const SPARK_PATH_PLACEHOLDER = 'path: /path/to/your/project';

/** Placeholder for the RoleBinding subject namespace in the Spark manifest */
export const SPARK_NAMESPACE_PLACEHOLDER = 'namespace: SPARK_NAMESPACE';

export interface ManifestLocations {
  /** Bundled manifests */
  defaultDir: string;
  /** Project-specific overrides, absolute */
  projectDir?: string;
}

/**
 * Find the bundled manifests directory by walking up from this module.
 * Works from both the sources and the bundled dist/index.js.
 */
export function findManifestsDir(
  startDir: string = path.dirname(fileURLToPath(import.meta.url))
): string {
  let dir = startDir;
  for (let level = 0; level <= MAX_PARENT_LEVELS; level++) {
    const candidate = path.join(dir, MANIFESTS_DIRNAME);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new ConfigError(
    `Could not find the ${MANIFESTS_DIRNAME} directory from ${startDir}. Set MINIDEV_MANIFESTS_DIR.`
  );
}

/**
 * Project manifest when one exists, otherwise the bundled default
 */
export function resolveManifestPath(manifest: string, locations: ManifestLocations): string {
  if (locations.projectDir) {
    const projectManifest = path.join(locations.projectDir, manifest);
    if (fs.existsSync(projectManifest)) {
      return projectManifest;
    }
  }
  return path.join(locations.defaultDir, manifest);
}

export function readManifest(file: string): string {
  return fs.readFileSync(file, 'utf-8');
}

/**
 * Point the Spark hostPath volume at the project directory and bind the
 * service account in the target namespace
 */
export function renderSparkManifest(content: string, projectPath: string, namespace: string): string {
  return content
    .split(SPARK_PATH_PLACEHOLDER)
    .join(`path: ${projectPath}`)
    .split(SPARK_NAMESPACE_PLACEHOLDER)
    .join(`namespace: ${namespace}`);
}
