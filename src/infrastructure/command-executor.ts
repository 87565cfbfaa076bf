/**
 * Command Executor - runs container engine commands
 *
 * Commands are spawned without a shell. `pipe` mode captures output for
 * short checks; `inherit` mode hands the terminal to the child so build output,
 * push progress and login prompts reach the operator directly.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';

export type StdioMode = 'pipe' | 'inherit';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdio?: StdioMode;
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: NodeJS.Signals;
}

export type Spawner = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export class CommandExecutor {
  constructor(
    private readonly logger: Logger,
    private readonly spawner: Spawner = spawn,
  ) {}

  /**
   * Execute a command and wait for it to exit.
   * Resolves with the exit status; rejects only when the process cannot start.
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      stdio = 'pipe',
      maxBuffer = 10 * 1024 * 1024, // 10MB
    } = options;

    this.logger.debug({ command, args, cwd, stdio }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
        stdio,
      };

      const child = this.spawner(command, args, spawnOptions);

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        // Killed by a signal: no exit code, count it as a failure
        const exitCode = code ?? 1;

        this.logger.debug({ command, exitCode, signal }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          ...(signal ? { signal } : {}),
        });
      });

      child.on('error', (error: Error) => {
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(error);
      });
    });
  }
}
