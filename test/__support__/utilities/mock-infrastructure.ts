/**
 * Shared fakes for unit tests
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { ContainerEngine, EngineBuildOptions, EngineResult } from '../../../src/infrastructure/container-engine';
import { Failure, Success } from '../../../src/domain/types';
import type { ReleaseError } from '../../../src/lib/errors';
import type { ReleaseReporter, StageEvent } from '../../../src/workflows/release';

/**
 * Logger that drops everything
 */
export function createMockLogger(): Logger {
  return pino({ level: 'silent' });
}

export interface FakeEngine extends ContainerEngine {
  /** Every call in order, e.g. `tag piper-tts:latest alice/piper-tts:latest` */
  calls: string[];
  buildOptions: EngineBuildOptions[];
}

/**
 * In-memory engine. `failOn` receives each call string and returns the error
 * that call should fail with, if any.
 */
export function createFakeEngine(
  failOn: (call: string) => ReleaseError | undefined = () => undefined,
): FakeEngine {
  const calls: string[] = [];
  const buildOptions: EngineBuildOptions[] = [];

  const record = (call: string): EngineResult => {
    calls.push(call);
    const error = failOn(call);
    return Promise.resolve(error ? Failure(error) : Success(undefined));
  };

  return {
    binary: 'docker',
    calls,
    buildOptions,
    ping: () => record('ping'),
    build: (options: EngineBuildOptions) => {
      buildOptions.push(options);
      return record(`build ${options.tag}`);
    },
    tag: (source: string, target: string) => record(`tag ${source} ${target}`),
    login: (registry?: string) => record(registry ? `login ${registry}` : 'login'),
    push: (reference: string) => record(`push ${reference}`),
  };
}

export interface RecordingReporter extends ReleaseReporter {
  events: string[];
}

export function createRecordingReporter(): RecordingReporter {
  const events: string[] = [];
  return {
    events,
    stageStarted: (event: StageEvent) => events.push(`start ${event.stage} ${event.index}/${event.total}`),
    stageCompleted: (event: StageEvent, summary: string) => events.push(`done ${event.stage}: ${summary}`),
    stageSkipped: (event: StageEvent, reason: string) => events.push(`skip ${event.stage}: ${reason}`),
    stageFailed: (event: StageEvent, error: ReleaseError) => events.push(`fail ${event.stage}: ${error.code}`),
  };
}
