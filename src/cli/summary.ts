/**
 * Closing lines printed after a successful release
 */

import { CONSTANTS, type AppConfig } from '../config';
import type { ReleasePlan } from '../domain/image';
import type { ReleaseReport } from '../workflows/release';

export function formatReleaseSummary(
  report: ReleaseReport,
  plan: ReleasePlan,
  config: AppConfig,
): string[] {
  const latest = `${plan.repository}:latest`;
  const { port, modelsDir } = config.service;
  // Docker Hub has a browsable page; other registries only have the repository path
  const location = plan.registry ? plan.repository : `${CONSTANTS.DOCKER_HUB_URL}/${plan.repository}`;

  return [
    '',
    report.dryRun ? '=== Dry run complete (nothing was built or pushed) ===' : '=== Push complete ===',
    report.dryRun ? 'The image would be available at:' : 'Your image is now available at:',
    `  ${location}`,
    '',
    'To pull and run:',
    `  ${config.engine} pull ${latest}`,
    `  ${config.engine} run -p ${port}:${port} -v $(pwd)/${modelsDir}:/app/models ${latest}`,
  ];
}
