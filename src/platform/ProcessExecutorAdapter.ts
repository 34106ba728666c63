/**
 * ProcessExecutorAdapter - Cross-platform process execution implementation
 * Uses execa for reliable cross-platform command execution
 */

import { IProcessExecutor, ExecOptions, ExecResult } from './IProcessExecutor.js';
import { execa } from 'execa';

export class ProcessExecutorAdapter implements IProcessExecutor {
  async execute(
    command: string,
    args: string[] = [],
    options: ExecOptions = {}
  ): Promise<ExecResult> {
    try {
      const result = await execa(command, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeout,
        input: options.input,
        reject: false, // Don't throw on non-zero exit codes
      });

      return {
        stdout: result.stdout,
        stderr: result.stderr,
        // undefined when the process could not be spawned at all
        exitCode: result.exitCode ?? 127,
        command: result.command,
        timedOut: result.timedOut,
      };
    } catch (error) {
      // Spawn failures; ENOENT maps to the shell's "command not found" code
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      return {
        stdout: '',
        stderr: error instanceof Error ? error.message : String(error),
        exitCode: code === 'ENOENT' ? 127 : 1,
        command: [command, ...args].join(' '),
        timedOut: false,
      };
    }
  }
}
