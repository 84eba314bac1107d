/**
 * minidev doctor
 *
 * Verify the tools minidev drives are installed.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { NodeCommandRunner, type CommandRunner } from '../services/process.service';
import { checkTool, TOOL_CHECKS, type CheckResult } from '../services/tools.service';
import { withErrorHandling } from './shared';

function displayResult(result: CheckResult): void {
  const icon =
    result.status === 'ok' ? chalk.green('✓') :
    result.status === 'warn' ? chalk.yellow('⚠') :
    chalk.red('✗');

  console.log(`  ${icon} ${result.name}`);
  console.log(chalk.gray(`    ${result.message}`));
  if (result.fix && result.status !== 'ok') {
    console.log(chalk.cyan(`    Fix: ${result.fix}`));
  }
}

export async function runDoctor(runner: CommandRunner = new NodeCommandRunner()): Promise<boolean> {
  console.log(chalk.bold('\n  minidev doctor\n'));

  const results: CheckResult[] = [];
  for (const check of TOOL_CHECKS) {
    const result = await checkTool(runner, check);
    results.push(result);
    displayResult(result);
  }

  const failed = results.filter((result) => result.status === 'fail').length;
  console.log('');
  if (failed > 0) {
    console.log(chalk.red(`  ${failed} required tool(s) missing\n`));
    return false;
  }
  console.log(chalk.green('  All required tools are installed\n'));
  return true;
}

export const doctorCommand = new Command('doctor')
  .description('Check that minikube and kubectl are installed')
  .action(() => withErrorHandling('doctor', () => runDoctor()));
