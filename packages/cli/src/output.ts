/**
 * Console output for minidev commands
 *
 * Every message is mirrored to the debug log.
 */

import chalk from 'chalk';
import type { Output } from '@minidev/core';
import { logError, logInfo, logWarn } from './logger';

const RULE = '='.repeat(46);

export class ConsoleOutput implements Output {
  header(title: string): void {
    logInfo(`== ${title}`);
    console.log('');
    console.log(chalk.blue(RULE));
    console.log(chalk.blue(title));
    console.log(chalk.blue(RULE));
  }

  success(message: string): void {
    logInfo(message);
    console.log(chalk.green(`✓ ${message}`));
  }

  warning(message: string): void {
    logWarn(message);
    console.log(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    logError(message);
    console.error(chalk.red(`✖ ${message}`));
  }

  info(message: string): void {
    logInfo(message);
    console.log(chalk.blue(`ℹ ${message}`));
  }

  line(message = ''): void {
    console.log(message);
  }
}

export const output = new ConsoleOutput();
