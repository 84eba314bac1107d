/**
 * Process Service
 *
 * Runs kubectl, minikube and the other external tools minidev drives.
 * Everything that leaves the Node process goes through a CommandRunner so
 * it can be replaced in tests.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import { logCommand, logOutput, logWarn } from '../logger';

// =============================================================================
// Types
// =============================================================================

export interface RunOptions {
  /** Written to the process stdin */
  input?: string;
}

export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface InteractiveOptions {
  stdinPath?: string;
  stdoutPath?: string;
}

export interface CommandRunner {
  /** Capture output. Never rejects on a non-zero exit; a missing binary yields code 127. */
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
  /** Attach to the terminal and resolve with the exit code */
  interactive(command: string, args: string[], options?: InteractiveOptions): Promise<number>;
  /** Start a detached process and return its pid */
  background(command: string, args: string[]): number | undefined;
}

export const COMMAND_NOT_FOUND = 127;

// =============================================================================
// Node implementation
// =============================================================================

function isMissingBinary(error: NodeJS.ErrnoException): boolean {
  return error.code === 'ENOENT';
}

export class NodeCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    logCommand(command, args);

    return new Promise((resolve) => {
      const proc = spawn(command, args);

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: RunResult) => {
        if (settled) return;
        settled = true;
        logOutput('stdout', result.stdout);
        logOutput('stderr', result.stderr);
        resolve(result);
      };

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // A child that exits without reading its input closes the pipe under us
      proc.stdin.on('error', (error) => logWarn(`Could not write to ${command}`, error));
      proc.stdin.end(options.input);

      proc.on('error', (error: NodeJS.ErrnoException) => {
        finish({
          code: isMissingBinary(error) ? COMMAND_NOT_FOUND : 1,
          stdout,
          stderr: error.message,
        });
      });

      proc.on('close', (code) => {
        finish({ code: code ?? 1, stdout, stderr });
      });
    });
  }

  /**
   * Resolves once the process has exited and, with `stdoutPath`, the file is
   * flushed. A local file that cannot be opened kills the process and
   * resolves with 1.
   */
  interactive(command: string, args: string[], options: InteractiveOptions = {}): Promise<number> {
    logCommand(command, args);

    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        stdio: [options.stdinPath ? 'pipe' : 'inherit', options.stdoutPath ? 'pipe' : 'inherit', 'inherit'],
      });

      let settled = false;
      let exitCode: number | null = null;
      let flushed = !options.stdoutPath;

      const done = (code: number) => {
        if (settled) return;
        settled = true;
        resolve(code);
      };
      const abort = (message: string, error: Error) => {
        logWarn(message, error);
        proc.kill();
        done(1);
      };
      const doneWhenFlushed = () => {
        if (exitCode !== null && flushed) done(exitCode);
      };

      if (options.stdinPath && proc.stdin) {
        const source = fs.createReadStream(options.stdinPath);
        source.on('error', (error) => abort(`Cannot read ${options.stdinPath}`, error));
        proc.stdin.on('error', (error) => logWarn(`Could not write to ${command}`, error));
        source.pipe(proc.stdin);
      }
      if (options.stdoutPath && proc.stdout) {
        const target = fs.createWriteStream(options.stdoutPath);
        target.on('error', (error) => abort(`Cannot write ${options.stdoutPath}`, error));
        target.on('finish', () => {
          flushed = true;
          doneWhenFlushed();
        });
        proc.stdout.pipe(target);
      }

      proc.on('error', (error: NodeJS.ErrnoException) => {
        logWarn(`Failed to start ${command}`, error);
        done(isMissingBinary(error) ? COMMAND_NOT_FOUND : 1);
      });
      proc.on('close', (code) => {
        exitCode = code ?? 1;
        doneWhenFlushed();
      });
    });
  }

  background(command: string, args: string[]): number | undefined {
    logCommand(command, args);

    const proc = spawn(command, args, { detached: true, stdio: 'ignore' });
    proc.on('error', (error) => logWarn(`Background process ${command} failed`, error));
    proc.unref();
    return proc.pid;
  }
}
