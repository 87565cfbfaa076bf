/**
 * Unit Tests: dry-run engine
 */

import { describe, it, expect } from '@jest/globals';
import { createDryRunEngine } from '../../../src/infrastructure/docker/dry-run-engine';
import { createMockLogger } from '../../__support__/utilities/mock-infrastructure';

describe('createDryRunEngine', () => {
  it('should print each command instead of running it', async () => {
    const lines: string[] = [];
    const engine = createDryRunEngine(createMockLogger(), (line) => lines.push(line), 'podman');

    const results = [
      await engine.ping(),
      await engine.build({ context: '.', tag: 'piper-tts:latest', dockerfile: 'Dockerfile' }),
      await engine.tag('piper-tts:latest', 'alice/piper-tts:latest'),
      await engine.login('ghcr.io'),
      await engine.push('alice/piper-tts:latest'),
    ];

    expect(results.every((result) => result.ok)).toBe(true);
    expect(engine.binary).toBe('podman');
    expect(lines).toEqual([
      '  would run: podman info',
      '  would run: podman build -t piper-tts:latest -f Dockerfile .',
      '  would run: podman tag piper-tts:latest alice/piper-tts:latest',
      '  would run: podman login ghcr.io',
      '  would run: podman push alice/piper-tts:latest',
    ]);
  });

  it('should default to docker and Docker Hub login', async () => {
    const lines: string[] = [];
    const engine = createDryRunEngine(createMockLogger(), (line) => lines.push(line));

    await engine.login();

    expect(lines).toEqual(['  would run: docker login']);
  });
});
