/**
 * Debug logger for the minidev CLI
 * Writes debug output to .minidev/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const MINIDEV_DIR = '.minidev';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    // Try local .minidev first, fall back to home directory
    const localDir = path.join(process.cwd(), MINIDEV_DIR);
    const homeDir = path.join(homedir(), MINIDEV_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      if (!fs.existsSync(homeDir)) {
        fs.mkdirSync(homeDir, { recursive: true });
      }
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

/**
 * Point the logger at a specific file (tests, custom locations)
 */
export function setLogPath(filePath: string): void {
  logFilePath = filePath;
  sessionStarted = false;
}

/**
 * Initialize logging session with separator
 */
function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();

  // Rotate log if too large
  try {
    if (fs.existsSync(logPath)) {
      const stats = fs.statSync(logPath);
      if (stats.size > MAX_LOG_SIZE) {
        const backupPath = logPath + '.old';
        if (fs.existsSync(backupPath)) {
          fs.unlinkSync(backupPath);
        }
        fs.renameSync(logPath, backupPath);
      }
    }
  } catch {
    // Rotation is best effort
  }

  const timestamp = new Date().toISOString();
  const separator = '='.repeat(80);
  const header = `\n${separator}\n[${timestamp}] minidev session started: ${process.argv.slice(2).join(' ')}\n${separator}\n`;

  try {
    fs.appendFileSync(logPath, header);
  } catch {
    // Logging must never interrupt the CLI
  }
}

/**
 * Format a log entry
 */
export function formatEntry(level: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

function writeLog(level: string, message: string, data?: unknown): void {
  initSession();
  const entry = formatEntry(level, message, data);

  try {
    fs.appendFileSync(getLogPath(), entry);
  } catch {
    // Logging must never interrupt the CLI
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log an external command invocation
 */
export function logCommand(command: string, args: string[]): void {
  writeLog('CMD', `Executing: ${[command, ...args].join(' ')}`);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type.toUpperCase(), output.trim());
  }
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}
