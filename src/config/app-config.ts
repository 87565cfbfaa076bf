/**
 * Unified Application Configuration
 *
 * Single source of truth for release settings with Zod validation.
 * Environment variables supply defaults; CLI options override them.
 */

import { z } from 'zod';
import { Failure, Success, type Result } from '../domain/types';
import { ErrorCodes, ReleaseError } from '../lib/errors';

export const CONSTANTS = {
  DEFAULTS: {
    ENGINE: 'docker',
    IMAGE_NAME: 'piper-tts',
    BUILD_CONTEXT: '.',
    SERVICE_PORT: 8000,
    MODELS_DIR: 'models',
  },
  DOCKER_HUB_URL: 'https://hub.docker.com/r',
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const AppConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  logLevel: LogLevelSchema,
  engine: z.string().min(1).default(CONSTANTS.DEFAULTS.ENGINE),
  image: z.object({
    name: z.string().min(1).default(CONSTANTS.DEFAULTS.IMAGE_NAME),
    context: z.string().min(1).default(CONSTANTS.DEFAULTS.BUILD_CONTEXT),
    dockerfile: z.string().min(1).optional(),
    platform: z.string().min(1).optional(),
    buildArgs: z.record(z.string()).default({}),
  }),
  registry: z.string().min(1).optional(),
  service: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(CONSTANTS.DEFAULTS.SERVICE_PORT),
    modelsDir: z.string().min(1).default(CONSTANTS.DEFAULTS.MODELS_DIR),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Settings the CLI can override */
export interface ConfigOverrides {
  logLevel?: string;
  engine?: string;
  imageName?: string;
  context?: string;
  dockerfile?: string;
  platform?: string;
  buildArgs?: Record<string, string>;
  registry?: string;
}

/**
 * Unset and empty variables both fall through to the default
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Create configuration from the environment and CLI overrides
 */
export function createAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): Result<AppConfig, ReleaseError> {
  const rawConfig = {
    nodeEnv: getEnvValue(env, 'NODE_ENV'),
    logLevel: overrides.logLevel ?? getEnvValue(env, 'LOG_LEVEL'),
    engine: overrides.engine ?? getEnvValue(env, 'CONTAINER_ENGINE'),
    image: {
      name: overrides.imageName ?? getEnvValue(env, 'IMAGE_NAME'),
      context: overrides.context ?? getEnvValue(env, 'BUILD_CONTEXT'),
      dockerfile: overrides.dockerfile ?? getEnvValue(env, 'DOCKERFILE'),
      platform: overrides.platform ?? getEnvValue(env, 'BUILD_PLATFORM'),
      buildArgs: overrides.buildArgs,
    },
    registry: overrides.registry ?? getEnvValue(env, 'REGISTRY'),
    service: {
      port: getEnvValue(env, 'SERVICE_PORT'),
      modelsDir: getEnvValue(env, 'MODELS_DIR'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Failure(
      new ReleaseError(`Configuration validation failed: ${issues.join('; ')}`, ErrorCodes.CONFIG_INVALID, {
        details: { issues },
      }),
    );
  }

  return Success(result.data);
}

/**
 * Parse repeated `KEY=VALUE` build arguments
 */
export function parseBuildArgs(pairs: string[]): Result<Record<string, string>, ReleaseError> {
  const buildArgs: Record<string, string> = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      return Failure(
        new ReleaseError(`Invalid build argument "${pair}": expected KEY=VALUE`, ErrorCodes.INVALID_ARGUMENT),
      );
    }
    buildArgs[pair.slice(0, separator)] = pair.slice(separator + 1);
  }

  return Success(buildArgs);
}
