/**
 * Terminal progress output for the release stages
 */

import type { ReleaseReporter, StageEvent } from '../workflows/release';
import type { ReleaseError } from '../lib/errors';

export type LineWriter = (line: string) => void;

export function createConsoleReporter(stdout: LineWriter, stderr: LineWriter): ReleaseReporter {
  const prefix = (event: StageEvent): string => `[${event.index}/${event.total}]`;

  return {
    stageStarted(event: StageEvent): void {
      stdout(`${prefix(event)} ${event.label}...`);
    },

    stageCompleted(_event: StageEvent, summary: string): void {
      stdout(`✅ ${summary}`);
    },

    stageSkipped(_event: StageEvent, reason: string): void {
      stdout(`⏭️  Skipped: ${reason}`);
    },

    stageFailed(event: StageEvent, error: ReleaseError): void {
      stderr(`❌ ${prefix(event)} ${error.message}`);
    },
  };
}
