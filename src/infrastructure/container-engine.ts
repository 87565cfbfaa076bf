/**
 * Container engine contract used by the release workflow.
 */

import type { Result } from '../domain/types';
import type { ReleaseError } from '../lib/errors';

export interface EngineBuildOptions {
  /** Build context directory */
  context: string;
  /** Tag for the local build output, e.g. `piper-tts:latest` */
  tag: string;
  /** Dockerfile path, relative to the working directory */
  dockerfile?: string;
  /** Target platform, e.g. `linux/amd64` */
  platform?: string;
  buildArgs?: Record<string, string>;
}

export type EngineResult = Promise<Result<void, ReleaseError>>;

export interface ContainerEngine {
  /** Engine binary name, used in messages */
  readonly binary: string;

  /** Check that the daemon answers */
  ping(): EngineResult;

  build(options: EngineBuildOptions): EngineResult;

  /** Point `target` at the image `source` refers to */
  tag(source: string, target: string): EngineResult;

  /** Interactive login; Docker Hub when no registry is given */
  login(registry?: string): EngineResult;

  push(reference: string): EngineResult;
}
