/**
 * Container engine backed by a docker-compatible CLI (docker, podman, nerdctl).
 */

import type { Logger } from 'pino';
import { CommandExecutor, type StdioMode } from '../command-executor';
import type { ContainerEngine, EngineBuildOptions, EngineResult } from '../container-engine';
import { Failure, Success } from '../../domain/types';
import { ErrorCodes, ReleaseError, type ErrorCode } from '../../lib/errors';

export interface CliEngineOptions {
  /** Engine binary on PATH (default: docker) */
  binary?: string;
  cwd?: string;
  executor?: CommandExecutor;
}

/**
 * Arguments for `<engine> build`, context last
 */
export function buildArgs(options: EngineBuildOptions): string[] {
  const args = ['build', '-t', options.tag];

  if (options.dockerfile) {
    args.push('-f', options.dockerfile);
  }

  if (options.platform) {
    args.push('--platform', options.platform);
  }

  for (const [key, value] of Object.entries(options.buildArgs ?? {})) {
    args.push('--build-arg', `${key}=${value}`);
  }

  args.push(options.context);
  return args;
}

export const createCliEngine = (logger: Logger, options: CliEngineOptions = {}): ContainerEngine => {
  const binary = options.binary ?? 'docker';
  const log = logger.child({ component: 'CliEngine', binary });
  const executor = options.executor ?? new CommandExecutor(log);

  async function run(
    args: string[],
    stdio: StdioMode,
    code: ErrorCode,
    failure: string,
  ): EngineResult {
    try {
      const result = await executor.execute(binary, args, {
        stdio,
        ...(options.cwd ? { cwd: options.cwd } : {}),
      });

      if (result.exitCode !== 0) {
        log.debug({ args, exitCode: result.exitCode, stderr: result.stderr }, failure);
        return Failure(
          new ReleaseError(failure, code, {
            // An unreachable daemon always exits 1, whatever status the engine reported
            exitCode: code === ErrorCodes.DAEMON_UNREACHABLE ? 1 : result.exitCode,
            details: { command: [binary, ...args].join(' '), stderr: result.stderr },
          }),
        );
      }

      return Success(undefined);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const notFound = 'code' in cause && cause.code === 'ENOENT';

      return Failure(
        new ReleaseError(
          notFound ? `${binary} not found on PATH` : `${failure}: ${cause.message}`,
          notFound ? ErrorCodes.ENGINE_NOT_FOUND : code,
          { exitCode: 1, cause },
        ),
      );
    }
  }

  return {
    binary,

    ping(): EngineResult {
      return run(['info'], 'pipe', ErrorCodes.DAEMON_UNREACHABLE, 'Container daemon is not running');
    },

    build(buildOptions: EngineBuildOptions): EngineResult {
      return run(
        buildArgs(buildOptions),
        'inherit',
        ErrorCodes.BUILD_FAILED,
        `Failed to build ${buildOptions.tag}`,
      );
    },

    tag(source: string, target: string): EngineResult {
      return run(['tag', source, target], 'pipe', ErrorCodes.TAG_FAILED, `Failed to tag ${target}`);
    },

    login(registry?: string): EngineResult {
      return run(
        registry ? ['login', registry] : ['login'],
        'inherit',
        ErrorCodes.LOGIN_FAILED,
        `Failed to log in to ${registry ?? 'Docker Hub'}`,
      );
    },

    push(reference: string): EngineResult {
      return run(['push', reference], 'inherit', ErrorCodes.PUSH_FAILED, `Failed to push ${reference}`);
    },
  };
};
