/**
 * Helpers shared by every command: runtime construction and error handling
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadSettings, type Settings } from '../config/settings';
import { errorMessage } from '../errors';
import { logFullError } from '../logger';
import { createRuntime, type Runtime } from '../services/context';
import { ServiceLifecycle } from '../services/lifecycle.service';
import { findManifestsDir, type ManifestLocations } from '../services/manifest.service';

export interface GlobalOptions {
  namespace?: string;
}

export interface CommandRuntime {
  runtime: Runtime;
  lifecycle: ServiceLifecycle;
}

/**
 * Builds the runtime for a command invocation. Commands take this as a
 * parameter so tests can hand in fakes.
 */
export type RuntimeFactory = (command: Command, settings?: Settings) => CommandRuntime;

export function manifestLocations(settings: Settings): ManifestLocations {
  return {
    defaultDir: settings.manifestsDir ?? findManifestsDir(),
    projectDir: settings.projectManifestsDir,
  };
}

export const createCommandRuntime: RuntimeFactory = (command, settings = loadSettings()) => {
  const { namespace } = command.optsWithGlobals<GlobalOptions>();
  const runtime = createRuntime({ settings, namespace });
  return { runtime, lifecycle: new ServiceLifecycle(runtime, manifestLocations(settings)) };
};

/**
 * Run a command action. A false result sets exit code 1 (the failure was
 * already printed); a thrown error is logged, printed and exits with 1.
 */
export async function withErrorHandling(
  context: string,
  action: () => Promise<boolean | void>
): Promise<void> {
  try {
    if ((await action()) === false) {
      process.exitCode = 1;
    }
  } catch (error) {
    logFullError(context, error);
    console.error(chalk.red(`\nError: ${errorMessage(error)}\n`));
    process.exit(1);
  }
}
