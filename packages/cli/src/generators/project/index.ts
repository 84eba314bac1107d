/**
 * Project file generators
 * Produces the .env and setup-env.sh written by `minidev project generate`
 */

import * as path from 'path';
import { generateEnvContent, projectEnvSections } from './env';
import type { GeneratedFile, ProjectOptions } from './types';

export type { EnvSection, EnvVariable, GeneratedFile, ProjectOptions } from './types';

/** Handled by `minidev project`; any other first argument names a service */
const PROJECT_SUBCOMMANDS = [
  'start', 'deploy', 'stop', 'remove', 'restart', 'status', 'logs', 'minikube', 'service', 'help', '--help', '-h',
];

export function generateSetupScript(name: string): string {
  return [
    '#!/usr/bin/env bash',
    `# ${name} environment setup`,
    '# Delegates to minidev with this directory as the project',
    '',
    'SCRIPT_DIR="$(cd "$(dirname "${BASH_SOURCE[0]}")" && pwd)"',
    '',
    'case "${1:-status}" in',
    `  ${PROJECT_SUBCOMMANDS.join('|')})`,
    '    exec minidev project --dir "$SCRIPT_DIR" "${@:-status}" ;;',
    '  *)',
    '    exec minidev project --dir "$SCRIPT_DIR" service "$@" ;;',
    'esac',
    '',
  ].join('\n');
}

export function generateProjectFiles(options: ProjectOptions, targetDir: string): GeneratedFile[] {
  return [
    {
      path: path.join(targetDir, '.env'),
      content: generateEnvContent(projectEnvSections(options), options.name),
    },
    {
      path: path.join(targetDir, 'setup-env.sh'),
      content: generateSetupScript(options.name),
      mode: 0o755,
    },
  ];
}
