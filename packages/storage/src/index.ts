// src/index.ts

export * from './core/types.js';
export { InvalidArgumentError, ConfigurationError, isNotFoundError } from './core/errors.js';
export {
  S3_PREFIX,
  isS3Path,
  bucketKeyFromS3Path,
  toS3Path,
  joinPath,
  stripPrefix,
  removeS3Prefix,
  replacePrefix,
  type BucketKey,
} from './core/paths.js';
export {
  PathFactory,
  type PathFactoryOptions,
  COLUMN_CONCATENATED_FILES_DIR,
  TEMPORARY_ROW_FILES_DIR,
  ASSETS_DIR,
  SCHEMA_FILENAME,
} from './core/PathFactory.js';
export {
  parseConfig,
  loadConfigFile,
  resolveConfigPath,
  describeConfig,
  getConfig,
  resetConfig,
  CONFIG_PATH_ENV,
  DEFAULT_CONFIG_FILENAME,
} from './config/config.js';
export * from './adapters/storage/index.js';
