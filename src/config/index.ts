/**
 * Configuration entry point
 */

export {
  CONSTANTS,
  createAppConfig,
  parseBuildArgs,
  type AppConfig,
  type ConfigOverrides,
} from './app-config';
