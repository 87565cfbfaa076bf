/**
 * Release CLI
 *
 * `piper-release <username> [version]` builds the service image, tags it as
 * `<username>/<image>:latest` (plus `:<version>` when given), logs in and
 * pushes every tag. Returns the process exit code instead of exiting so the
 * whole flow can run under test.
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createAppConfig, parseBuildArgs } from '../config';
import { planRelease } from '../domain/image';
import { createCliEngine } from '../infrastructure/docker/cli-engine';
import { createDryRunEngine } from '../infrastructure/docker/dry-run-engine';
import type { ContainerEngine } from '../infrastructure/container-engine';
import { createLogger, type Logger, type LoggerSettings } from '../lib/logger';
import { runRelease } from '../workflows/release';
import { createConsoleReporter, type LineWriter } from './console-reporter';
import { formatReleaseSummary } from './summary';

export const PROGRAM_NAME = 'piper-release';

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  stdout?: LineWriter;
  stderr?: LineWriter;
  createLogger?: (settings: LoggerSettings) => Logger;
  createEngine?: (binary: string, logger: Logger) => ContainerEngine;
}

type CliOptions = {
  imageName?: string;
  context?: string;
  dockerfile?: string;
  registry?: string;
  engine?: string;
  platform?: string;
  buildArg: string[];
  skipLogin?: boolean;
  dryRun?: boolean;
  logLevel?: string;
  dev?: boolean;
};

function packageVersion(): string {
  const packageJsonPath = __dirname.includes('dist')
    ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
    : join(__dirname, '../../package.json'); // src/cli/ -> root
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

const collect = (value: string, previous: string[]): string[] => previous.concat([value]);

function usage(stderr: LineWriter): void {
  stderr(`Usage: ${PROGRAM_NAME} <username> [version]`);
  stderr(`Example: ${PROGRAM_NAME} alice 1.0.0`);
}

export function createProgram(stdout: LineWriter, stderr: LineWriter): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Build the Piper TTS image, tag it and push it to a container registry')
    .version(packageVersion())
    .argument('[username]', 'registry username (image namespace)')
    .argument('[version]', 'version tag to publish next to "latest"; omitted or "latest" publishes latest only')
    .option('--image-name <name>', 'local and remote image name (default: piper-tts)')
    .option('--context <path>', 'build context directory (default: .)')
    .option('--dockerfile <path>', 'Dockerfile path')
    .option('--registry <host>', 'registry host (default: Docker Hub)')
    .option('--engine <binary>', 'container engine CLI (default: docker)')
    .option('--platform <platform>', 'target platform, e.g. linux/amd64')
    .option('--build-arg <key=value>', 'build-time variable (repeatable)', collect, [])
    .option('--skip-login', 'reuse stored registry credentials instead of logging in')
    .option('--dry-run', 'print the engine commands without running them')
    .option('--log-level <level>', 'logging level: debug, info, warn, error (default: info)')
    .option('--dev', 'enable development mode with pretty debug logging')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    })
    .addHelpText(
      'after',
      `

Examples:
  $ ${PROGRAM_NAME} alice                 Build and push alice/piper-tts:latest
  $ ${PROGRAM_NAME} alice 2.1             Push alice/piper-tts:latest and alice/piper-tts:2.1
  $ ${PROGRAM_NAME} alice 2.1 --dry-run   Show the commands without running them

Environment Variables:
  CONTAINER_ENGINE   Engine CLI (docker, podman)
  IMAGE_NAME         Image name (piper-tts)
  BUILD_CONTEXT      Build context directory (.)
  DOCKERFILE         Dockerfile path
  BUILD_PLATFORM     Target platform
  REGISTRY           Registry host (Docker Hub when unset)
  SERVICE_PORT       Port shown in the run command (8000)
  MODELS_DIR         Model directory shown in the run command (models)
  LOG_LEVEL          Logging level
`,
    );
}

/**
 * Parse arguments, run the release and return the exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const env = deps.env ?? process.env;

  const program = createProgram(stdout, stderr);
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const username = program.args[0];
  const version = program.args[1];

  if (username === undefined || username.trim() === '') {
    stderr('❌ Error: registry username required');
    usage(stderr);
    return 1;
  }

  const buildArgs = parseBuildArgs(options.buildArg);
  if (!buildArgs.ok) {
    stderr(`❌ ${buildArgs.error.message}`);
    return buildArgs.error.exitCode;
  }

  const configResult = createAppConfig(env, {
    ...(options.logLevel ? { logLevel: options.logLevel } : {}),
    ...(options.engine ? { engine: options.engine } : {}),
    ...(options.imageName ? { imageName: options.imageName } : {}),
    ...(options.context ? { context: options.context } : {}),
    ...(options.dockerfile ? { dockerfile: options.dockerfile } : {}),
    ...(options.platform ? { platform: options.platform } : {}),
    ...(options.registry ? { registry: options.registry } : {}),
    ...(options.buildArg.length > 0 ? { buildArgs: buildArgs.value } : {}),
  });
  if (!configResult.ok) {
    stderr(`❌ ${configResult.error.message}`);
    return configResult.error.exitCode;
  }
  const config = configResult.value;

  const planResult = planRelease({
    username,
    ...(version !== undefined ? { version } : {}),
    imageName: config.image.name,
    ...(config.registry ? { registry: config.registry } : {}),
  });
  if (!planResult.ok) {
    stderr(`❌ Error: ${planResult.error.message}`);
    usage(stderr);
    return planResult.error.exitCode;
  }
  const plan = planResult.value;

  const logger = (deps.createLogger ?? createLogger)({
    level: config.logLevel,
    pretty: options.dev === true || config.nodeEnv === 'development',
  });

  const engine = options.dryRun
    ? createDryRunEngine(logger, stdout, config.engine)
    : (deps.createEngine ?? ((binary: string, log: Logger) => createCliEngine(log, { binary })))(
        config.engine,
        logger,
      );

  if (version === 'latest') {
    logger.debug('Explicit "latest" version: publishing the latest tag only');
  }

  stdout('=== Piper TTS release ===');
  stdout(`Username: ${username.trim()}`);
  stdout(`Image: ${plan.repository}`);
  stdout(`Version: ${plan.version}`);
  stdout('');

  const result = await runRelease(plan, {
    engine,
    logger,
    reporter: createConsoleReporter(stdout, stderr),
    build: {
      context: config.image.context,
      buildArgs: config.image.buildArgs,
      ...(config.image.dockerfile ? { dockerfile: config.image.dockerfile } : {}),
      ...(config.image.platform ? { platform: config.image.platform } : {}),
    },
    skipLogin: options.skipLogin === true,
    dryRun: options.dryRun === true,
  });

  if (!result.ok) {
    const stderrDetail = result.error.details.stderr;
    if (typeof stderrDetail === 'string' && stderrDetail !== '') {
      stderr(stderrDetail);
    }
    return result.error.exitCode;
  }

  for (const line of formatReleaseSummary(result.value, plan, config)) {
    stdout(line);
  }
  return 0;
}
