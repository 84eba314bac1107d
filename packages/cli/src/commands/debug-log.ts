/**
 * minidev debug-log
 *
 * Show, filter or clear the debug log written by every command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { errorMessage } from '../errors';
import { getLogPath } from '../logger';

/** One log record with its indented continuation lines */
export interface LogEntry {
  level: string;
  lines: string[];
}

const ENTRY_PATTERN = /^\[[^\]]+\] \[([A-Z]+)\]/;
const SESSION = 'SESSION';

const LEVEL_STYLES: Record<string, (text: string) => string> = {
  ERROR: chalk.red,
  STDERR: chalk.red,
  WARN: chalk.yellow,
  INFO: chalk.cyan,
  CMD: chalk.blue,
  STDOUT: chalk.gray,
  DEBUG: chalk.gray,
  [SESSION]: chalk.bold,
};

export function parseLogEntries(content: string): LogEntry[] {
  const entries: LogEntry[] = [];

  for (const line of content.split('\n')) {
    if (!line.trim()) continue;

    const match = ENTRY_PATTERN.exec(line);
    const last = entries.at(-1);
    if (match) {
      entries.push({ level: match[1], lines: [line] });
    } else if (line.startsWith('=') || line.includes('minidev session started')) {
      entries.push({ level: SESSION, lines: [line] });
    } else if (last) {
      last.lines.push(line);
    } else {
      entries.push({ level: SESSION, lines: [line] });
    }
  }

  return entries;
}

/**
 * Last `count` lines of the entries at `level` (all levels when omitted).
 * Session banners are dropped when filtering.
 */
export function selectLogLines(
  entries: LogEntry[],
  count: number,
  level?: string
): Array<{ level: string; line: string }> {
  const wanted = level?.toUpperCase();
  const lines = entries
    .filter((entry) => !wanted || entry.level === wanted)
    .flatMap((entry) => entry.lines.map((line) => ({ level: entry.level, line })));
  return lines.slice(Math.max(0, lines.length - count));
}

function clearLog(logPath: string): void {
  if (!fs.existsSync(logPath)) {
    console.log(chalk.gray(`\n  No log file exists at: ${logPath}\n`));
    return;
  }
  fs.unlinkSync(logPath);
  console.log(chalk.green(`\n  Cleared debug log: ${logPath}\n`));
}

interface DebugLogOptions {
  lines: string;
  level?: string;
  path?: boolean;
  clear?: boolean;
}

export const debugLogCommand = new Command('debug-log')
  .description('View the minidev debug log')
  .option('-n, --lines <count>', 'Number of lines to show', '50')
  .option('-l, --level <level>', 'Only show one level (ERROR, WARN, INFO, DEBUG, CMD, STDOUT, STDERR)')
  .option('--path', 'Show log file path only')
  .option('--clear', 'Clear the debug log')
  .action((options: DebugLogOptions) => {
    const logPath = getLogPath();

    if (options.path) {
      console.log(logPath);
      return;
    }

    try {
      if (options.clear) {
        clearLog(logPath);
        return;
      }
      if (!fs.existsSync(logPath)) {
        console.log(chalk.gray(`\n  No debug log found at: ${logPath}\n`));
        return;
      }

      const count = parseInt(options.lines, 10) || 50;
      const entries = parseLogEntries(fs.readFileSync(logPath, 'utf-8'));
      const selected = selectLogLines(entries, count, options.level);
      const scope = options.level ? ` ${options.level.toUpperCase()}` : '';

      console.log(chalk.bold(`\n  Debug Log (last ${selected.length}${scope} lines)`));
      console.log(chalk.gray(`  ${logPath}\n`));
      for (const { level, line } of selected) {
        const style = LEVEL_STYLES[level];
        console.log(style ? style(line) : line);
      }
      console.log(chalk.gray(`\n  ${entries.length} entries in log. Use --lines, --level or --clear.\n`));
    } catch (error) {
      console.log(chalk.red(`\n  Failed to read log: ${errorMessage(error)}\n`));
      process.exitCode = 1;
    }
  });
