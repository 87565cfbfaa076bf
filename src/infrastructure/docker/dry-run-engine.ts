/**
 * Engine that prints the commands a release would run instead of running them.
 */

import type { Logger } from 'pino';
import type { ContainerEngine, EngineBuildOptions, EngineResult } from '../container-engine';
import { Success } from '../../domain/types';
import { buildArgs } from './cli-engine';

export const createDryRunEngine = (
  logger: Logger,
  print: (line: string) => void,
  binary = 'docker',
): ContainerEngine => {
  const log = logger.child({ component: 'DryRunEngine', binary });

  function show(args: string[]): EngineResult {
    const command = [binary, ...args].join(' ');
    log.debug({ command }, 'Skipping command (dry run)');
    print(`  would run: ${command}`);
    return Promise.resolve(Success(undefined));
  }

  return {
    binary,
    ping: () => show(['info']),
    build: (options: EngineBuildOptions) => show(buildArgs(options)),
    tag: (source: string, target: string) => show(['tag', source, target]),
    login: (registry?: string) => show(registry ? ['login', registry] : ['login']),
    push: (reference: string) => show(['push', reference]),
  };
};
