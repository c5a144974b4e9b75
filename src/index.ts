/**
 * attrflow - attribute-driven parameter completion for processing pipelines.
 *
 * Three layers:
 * 1. Processes and pipelines - typed parameters, links, dependency graphs
 * 2. Attributes - declared attribute sets, schemas and the factory registry
 * 3. Completion - engines that turn attributes into parameter values
 */

export * from './attributes/index.js';
export * from './completion/index.js';
export * from './process/index.js';
export * from './errors.js';

export {
  ATTRIBUTES_MODULE,
  DEFAULT_PATH_COMPLETION,
  DEFAULT_PROCESS_COMPLETION,
  StudyConfig,
  StudyConfigFileSchema,
  loadStudyConfig,
  parseStudyConfig,
} from './study/config.js';
export type { StudyConfigFile, StudyConfigOptions } from './study/config.js';

export { createLogger, getLogLevel } from './utils/logger.js';
export type { LogLevel, Logger } from './utils/logger.js';
