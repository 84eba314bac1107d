/**
 * Error types surfaced by minidev commands
 */

/**
 * An external process exited non-zero where success was required
 */
export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly args: string[],
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim().split('\n')[0]}` : '';
    super(`${[command, ...args].join(' ')} exited with code ${exitCode}${detail}`);
    this.name = 'CommandFailedError';
  }
}

/**
 * A lifecycle step for a managed service failed
 */
export class ServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

/**
 * Invalid settings or project configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
