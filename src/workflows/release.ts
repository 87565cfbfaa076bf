/**
 * Release workflow: preflight, build, tag, login, push.
 *
 * Stages run strictly in order and the first failure ends the run.
 * Nothing is retried or rolled back; tags already created stay in place.
 */

import type { Logger } from 'pino';
import type { ContainerEngine } from '../infrastructure/container-engine';
import { formatLocalRef, formatRemoteRef, type ReleasePlan } from '../domain/image';
import { Failure, Success, type Result } from '../domain/types';
import { createTimer } from '../lib/logger';
import { toReleaseError, type ReleaseError } from '../lib/errors';

export const RELEASE_STAGES = ['preflight', 'build', 'tag', 'login', 'push'] as const;

export type ReleaseStage = (typeof RELEASE_STAGES)[number];

export const STAGE_LABELS: Record<ReleaseStage, string> = {
  preflight: 'Checking container daemon',
  build: 'Building image',
  tag: 'Tagging image for registry',
  login: 'Logging in to registry',
  push: 'Pushing to registry',
};

export interface StageEvent {
  stage: ReleaseStage;
  /** 1-based position */
  index: number;
  total: number;
  label: string;
}

export interface ReleaseReporter {
  stageStarted(event: StageEvent): void;
  stageCompleted(event: StageEvent, summary: string): void;
  stageSkipped(event: StageEvent, reason: string): void;
  stageFailed(event: StageEvent, error: ReleaseError): void;
}

export interface ReleaseBuildSettings {
  context: string;
  dockerfile?: string;
  platform?: string;
  buildArgs?: Record<string, string>;
}

export interface ReleaseDependencies {
  engine: ContainerEngine;
  logger: Logger;
  reporter: ReleaseReporter;
  build: ReleaseBuildSettings;
  /** Reuse stored registry credentials instead of prompting */
  skipLogin?: boolean;
  dryRun?: boolean;
}

export interface ReleaseReport {
  runId: string;
  localImage: string;
  tagged: string[];
  pushed: string[];
  completedStages: ReleaseStage[];
  skippedStages: ReleaseStage[];
  dryRun: boolean;
  durationMs: number;
}

type StageOutcome = Result<string | { skipped: string }, ReleaseError>;

/**
 * Run every stage of a planned release against the engine
 */
export async function runRelease(
  plan: ReleasePlan,
  deps: ReleaseDependencies,
): Promise<Result<ReleaseReport, ReleaseError>> {
  const { engine, reporter } = deps;
  const logger = deps.logger.child({ runId: plan.runId, workflow: 'release' });
  const started = Date.now();

  const localImage = formatLocalRef(plan.localImage);
  const remotes = plan.targets.map(formatRemoteRef);
  const tagged: string[] = [];
  const pushed: string[] = [];
  const completedStages: ReleaseStage[] = [];
  const skippedStages: ReleaseStage[] = [];

  logger.info({ localImage, remotes, dryRun: deps.dryRun ?? false }, 'Starting release');

  const stages: Record<ReleaseStage, () => Promise<StageOutcome>> = {
    async preflight() {
      const result = await engine.ping();
      return result.ok ? Success(`${engine.binary} daemon is running`) : result;
    },

    async build() {
      const result = await engine.build({ ...deps.build, tag: localImage });
      return result.ok ? Success(`Built ${localImage}`) : result;
    },

    async tag() {
      for (const remote of remotes) {
        const result = await engine.tag(localImage, remote);
        if (!result.ok) {
          return result;
        }
        tagged.push(remote);
      }
      return Success(`Tagged as: ${tagged.join(' and ')}`);
    },

    async login() {
      if (deps.skipLogin) {
        return Success({ skipped: 'using stored credentials' });
      }
      const result = await engine.login(plan.registry);
      return result.ok ? Success(`Logged in to ${plan.registry ?? 'Docker Hub'}`) : result;
    },

    async push() {
      for (const remote of remotes) {
        const result = await engine.push(remote);
        if (!result.ok) {
          return result;
        }
        pushed.push(remote);
      }
      return Success(`Pushed: ${pushed.join(' and ')}`);
    },
  };

  for (const [position, stage] of RELEASE_STAGES.entries()) {
    const event: StageEvent = {
      stage,
      index: position + 1,
      total: RELEASE_STAGES.length,
      label: STAGE_LABELS[stage],
    };
    const timer = createTimer(logger, `release:${stage}`);

    reporter.stageStarted(event);

    let outcome: StageOutcome;
    try {
      outcome = await stages[stage]();
    } catch (error) {
      outcome = Failure(toReleaseError(error));
    }

    if (!outcome.ok) {
      timer.error(outcome.error, { failure: outcome.error.toJSON() });
      reporter.stageFailed(event, outcome.error);
      return Failure(outcome.error);
    }

    if (typeof outcome.value === 'string') {
      timer.end();
      completedStages.push(stage);
      reporter.stageCompleted(event, outcome.value);
    } else {
      timer.end({ skipped: true });
      skippedStages.push(stage);
      reporter.stageSkipped(event, outcome.value.skipped);
    }
  }

  const report: ReleaseReport = {
    runId: plan.runId,
    localImage,
    tagged,
    pushed,
    completedStages,
    skippedStages,
    dryRun: deps.dryRun ?? false,
    durationMs: Date.now() - started,
  };

  logger.info({ pushed, durationMs: report.durationMs }, 'Release complete');
  return Success(report);
}
