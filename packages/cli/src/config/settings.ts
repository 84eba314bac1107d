/**
 * Settings for minidev, read from the environment
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse as parseDotenv } from 'dotenv';
import { ConfigError } from '../errors';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  NAMESPACE: z.string().default('default'),

  // Minikube
  MINIKUBE_CPUS: positiveInt.default(4),
  MINIKUBE_MEMORY: positiveInt.default(8192),
  MINIKUBE_DISK_SIZE: z.string().default('40g'),
  MINIKUBE_DRIVER: z.string().optional(),
  MINIKUBE_RUNTIME: z.string().default('containerd'),
  KUBERNETES_VERSION: z.string().default('v1.28.0'),
  MINIKUBE_PROFILE: z.string().default('minikube'),

  // Manifests and project paths
  PROJECT_MANIFESTS_DIR: z.string().optional(),
  PROJECT_ROOT: z.string().optional(),
  SPARK_PROJECT_PATH: z.string().optional(),
  MINIDEV_MANIFESTS_DIR: z.string().optional(),
});

export interface MinikubeSettings {
  cpus: number;
  memory: number;
  diskSize: string;
  driver?: string;
  runtime: string;
  kubernetesVersion: string;
  profile: string;
}

export interface Settings {
  namespace: string;
  minikube: MinikubeSettings;
  /** Project-specific manifest overrides, absolute */
  projectManifestsDir?: string;
  projectRoot: string;
  sparkProjectPath: string;
  /** Overrides the bundled manifests directory */
  manifestsDir?: string;
}

export type Environment = Record<string, string | undefined>;

/**
 * Parse settings from environment variables. Empty values count as unset.
 */
export function loadSettings(env: Environment = process.env, cwd: string = process.cwd()): Settings {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      defined[key] = value;
    }
  }

  const result = envSchema.safeParse(defined);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue.path.join('.');
    throw new ConfigError(`Invalid value for ${variable}: ${issue.message}`);
  }

  const vars = result.data;
  const projectRoot = path.resolve(cwd, vars.PROJECT_ROOT ?? '.');

  return {
    namespace: vars.NAMESPACE,
    minikube: {
      cpus: vars.MINIKUBE_CPUS,
      memory: vars.MINIKUBE_MEMORY,
      diskSize: vars.MINIKUBE_DISK_SIZE,
      driver: vars.MINIKUBE_DRIVER,
      runtime: vars.MINIKUBE_RUNTIME,
      kubernetesVersion: vars.KUBERNETES_VERSION,
      profile: vars.MINIKUBE_PROFILE,
    },
    projectManifestsDir: vars.PROJECT_MANIFESTS_DIR
      ? path.resolve(projectRoot, vars.PROJECT_MANIFESTS_DIR)
      : undefined,
    projectRoot,
    sparkProjectPath: path.resolve(cwd, vars.SPARK_PROJECT_PATH ?? '.'),
    manifestsDir: vars.MINIDEV_MANIFESTS_DIR ? path.resolve(cwd, vars.MINIDEV_MANIFESTS_DIR) : undefined,
  };
}

/**
 * Read a .env file into a plain record
 */
export function loadEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Environment file not found: ${filePath}`);
  }
  return parseDotenv(fs.readFileSync(filePath));
}
