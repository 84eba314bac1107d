/**
 * Tool checks shared by `minidev doctor` and the project commands
 */

import { COMMAND_NOT_FOUND, type CommandRunner } from './process.service';

export interface CheckResult {
  name: string;
  status: 'ok' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

export interface ToolCheck {
  name: string;
  command: string;
  args: string[];
  fix: string;
}

export const TOOL_CHECKS: ToolCheck[] = [
  {
    name: 'minikube',
    command: 'minikube',
    args: ['version', '--short'],
    fix: 'Install from https://minikube.sigs.k8s.io/docs/start/',
  },
  {
    name: 'kubectl',
    command: 'kubectl',
    args: ['version', '--client'],
    fix: 'Install from https://kubernetes.io/docs/tasks/tools/',
  },
];

export async function checkTool(runner: CommandRunner, check: ToolCheck): Promise<CheckResult> {
  const result = await runner.run(check.command, check.args);
  if (result.code === COMMAND_NOT_FOUND) {
    return { name: check.name, status: 'fail', message: 'Not installed', fix: check.fix };
  }
  const version = result.stdout.split('\n')[0].trim();
  if (result.code !== 0 || !version) {
    return {
      name: check.name,
      status: 'warn',
      message: `Installed but \`${check.command} ${check.args.join(' ')}\` failed`,
      fix: check.fix,
    };
  }
  return { name: check.name, status: 'ok', message: version };
}

/**
 * The checks whose binary is not on PATH
 */
export async function findMissingTools(runner: CommandRunner): Promise<ToolCheck[]> {
  const missing: ToolCheck[] = [];
  for (const check of TOOL_CHECKS) {
    if ((await checkTool(runner, check)).status === 'fail') {
      missing.push(check);
    }
  }
  return missing;
}
