/**
 * Child-process command runner used to drive the orchestrator CLI
 * @module @capbench/core/infrastructure/command-runner
 */

import { execFile } from 'child_process';
import { OrchestratorCommandError } from '@capbench/shared';

/**
 * Captured output of a finished command
 */
export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Per-call options
 */
export interface CommandOptions {
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Runs an executable with arguments. Rejects with an
 * OrchestratorCommandError when the command exits non-zero, cannot be
 * spawned or times out.
 */
export interface CommandRunner {
  run(binary: string, args: readonly string[], options?: CommandOptions): Promise<CommandOutput>;
}

/**
 * CommandRunner backed by `execFile` (no shell)
 */
export class ExecFileCommandRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutMs = 30_000) {}

  run(binary: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandOutput> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const command = [binary, ...args.slice(0, 2)].join(' ');

    return new Promise((resolve, reject) => {
      execFile(
        binary,
        [...args],
        { timeout, encoding: 'utf8', maxBuffer: 10 * 1024 * 1024 },
        (error, stdout, stderr) => {
          if (error) {
            const detail = stderr.trim() || error.message;
            reject(
              new OrchestratorCommandError(
                command,
                detail,
                { args: [...args], exitCode: error.code ?? null, killed: error.killed ?? false },
                error,
              ),
            );
            return;
          }
          resolve({ stdout, stderr });
        },
      );
    });
  }
}
