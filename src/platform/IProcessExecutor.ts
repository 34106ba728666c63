/**
 * Platform-agnostic process execution interface
 * Implementation uses execa
 */

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
  input?: string;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  command: string;
  timedOut: boolean;
}

export interface IProcessExecutor {
  /**
   * Execute command and wait for completion. Never throws on a non-zero exit.
   */
  execute(command: string, args?: string[], options?: ExecOptions): Promise<ExecResult>;
}
