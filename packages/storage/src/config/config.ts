/**
 * Centralized configuration loading with validation.
 * The config file is snake_case JSON; the rest of the code sees camelCase TesseraConfig.
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { ConfigurationError } from '../core/errors.js';
import { S3_PREFIX } from '../core/paths.js';
import type {
  AwsS3Config,
  DynamoDbConfig,
  StorageAdapterType,
  StorageConfig,
  StorageDownloadConfig,
  TesseraConfig,
} from '../core/types.js';

export const CONFIG_PATH_ENV = 'TESSERA_CONFIG_PATH';
export const DEFAULT_CONFIG_FILENAME = '.tesseraconfig.json';

export const DEFAULT_CLIENT_CONFIG = {
  maxPoolConnections: 10,
  readTimeoutS: 140,
  connectTimeoutS: 140,
} as const;

export const DEFAULT_DOWNLOAD_CONFIG = {
  retries: 3,
  timeout: 150,
  retryBackoff: 5,
  retryDelayS: 4,
} as const;

type Env = Record<string, string | undefined>;
type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects problems while walking the raw config so they can be reported together.
 */
class FieldReader {
  readonly problems: string[] = [];

  section(parent: JsonObject, key: string, required: boolean): JsonObject {
    const value = parent[key];
    if (value === undefined) {
      if (required) this.problems.push(`${key} is required`);
      return {};
    }
    if (!isJsonObject(value)) {
      this.problems.push(`${key} must be an object`);
      return {};
    }
    return value;
  }

  string(section: string, obj: JsonObject, key: string, fallback?: string): string {
    const value = obj[key];
    if (value === undefined) {
      if (fallback === undefined) this.problems.push(`${section}.${key} is required`);
      return fallback ?? '';
    }
    if (typeof value !== 'string') {
      this.problems.push(`${section}.${key} must be a string`);
      return fallback ?? '';
    }
    return value;
  }

  number(section: string, obj: JsonObject, key: string, fallback: number): number {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      this.problems.push(`${section}.${key} must be a non-negative number`);
      return fallback;
    }
    return value;
  }

  boolean(section: string, obj: JsonObject, key: string, fallback: boolean): boolean {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.problems.push(`${section}.${key} must be a boolean`);
      return fallback;
    }
    return value;
  }
}

function parseAdapter(value: string, origin: string, problems: string[]): StorageAdapterType {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'fs' || normalized === 's3') return normalized;
  problems.push(`${origin} must be "fs" or "s3", got "${value}"`);
  return 's3';
}

/**
 * Validate raw config JSON and apply defaults and environment overrides.
 * Throws ConfigurationError listing every problem found.
 */
export function parseConfig(raw: unknown, env: Env = process.env): TesseraConfig {
  if (!isJsonObject(raw)) {
    throw new ConfigurationError(['config root must be a JSON object']);
  }

  const reader = new FieldReader();

  const s3Raw = reader.section(raw, 'aws_s3_config', true);
  const clientRaw = reader.section(s3Raw, 'client_config', false);
  const awsS3Config: AwsS3Config = {
    s3DatasetsPath: reader.string('aws_s3_config', s3Raw, 's3_datasets_path'),
    region: env.AWS_REGION || reader.string('aws_s3_config', s3Raw, 'region'),
    storeConcatenatedBytesFilesInDataset: reader.boolean(
      'aws_s3_config', s3Raw, 'store_concatenated_bytes_files_in_dataset', false
    ),
    clientConfig: {
      maxPoolConnections: reader.number('client_config', clientRaw, 'max_pool_connections', DEFAULT_CLIENT_CONFIG.maxPoolConnections),
      readTimeoutS: reader.number('client_config', clientRaw, 'read_timeout_s', DEFAULT_CLIENT_CONFIG.readTimeoutS),
      connectTimeoutS: reader.number('client_config', clientRaw, 'connect_timeout_s', DEFAULT_CLIENT_CONFIG.connectTimeoutS),
    },
  };

  if (awsS3Config.s3DatasetsPath && !awsS3Config.s3DatasetsPath.startsWith(S3_PREFIX)) {
    reader.problems.push(`aws_s3_config.s3_datasets_path must start with "${S3_PREFIX}"`);
  }

  let dynamodbConfig: DynamoDbConfig | undefined;
  if (raw.dynamodb_config !== undefined) {
    const dynamoRaw = reader.section(raw, 'dynamodb_config', false);
    dynamodbConfig = {
      tableName: reader.string('dynamodb_config', dynamoRaw, 'table_name'),
      region: reader.string('dynamodb_config', dynamoRaw, 'region'),
    };
  }

  const downloadRaw = reader.section(raw, 'storage_download_config', false);
  const storageDownloadConfig: StorageDownloadConfig = {
    retries: reader.number('storage_download_config', downloadRaw, 'retries', DEFAULT_DOWNLOAD_CONFIG.retries),
    timeout: reader.number('storage_download_config', downloadRaw, 'timeout', DEFAULT_DOWNLOAD_CONFIG.timeout),
    retryBackoff: reader.number('storage_download_config', downloadRaw, 'retry_backoff', DEFAULT_DOWNLOAD_CONFIG.retryBackoff),
    retryDelayS: reader.number('storage_download_config', downloadRaw, 'retry_delay_s', DEFAULT_DOWNLOAD_CONFIG.retryDelayS),
  };

  const storageRaw = reader.section(raw, 'storage', false);
  const adapterSetting = env.TESSERA_STORAGE_ADAPTER
    ? { value: env.TESSERA_STORAGE_ADAPTER, origin: 'TESSERA_STORAGE_ADAPTER' }
    : { value: reader.string('storage', storageRaw, 'adapter', 's3'), origin: 'storage.adapter' };
  const storage: StorageConfig = {
    adapter: parseAdapter(adapterSetting.value, adapterSetting.origin, reader.problems),
    prefixReplacePath: env.TESSERA_PREFIX_REPLACE_PATH ?? reader.string('storage', storageRaw, 'prefix_replace_path', ''),
  };

  if (reader.problems.length > 0) {
    throw new ConfigurationError(reader.problems);
  }

  return { awsS3Config, dynamodbConfig, storageDownloadConfig, storage };
}

/**
 * Where the config file is looked up when no explicit path is given
 */
export function resolveConfigPath(env: Env = process.env): string {
  const fromEnv = env[CONFIG_PATH_ENV];
  return fromEnv ? resolve(fromEnv) : join(homedir(), DEFAULT_CONFIG_FILENAME);
}

/**
 * Read and validate a config file
 */
export async function loadConfigFile(configPath: string, env: Env = process.env): Promise<TesseraConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError([
      `Failed to read config file ${configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError([
      `Failed to parse config file ${configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    ]);
  }

  return parseConfig(raw, env);
}

/**
 * One-line description of a loaded config
 */
export function describeConfig(config: TesseraConfig): string {
  const storage = config.storage.adapter === 's3'
    ? `S3 (${config.awsS3Config.region})`
    : 'Filesystem';
  const mount = config.storage.prefixReplacePath
    ? ` | Mount: ${config.storage.prefixReplacePath}`
    : '';
  const scoping = config.awsS3Config.storeConcatenatedBytesFilesInDataset ? 'per dataset' : 'shared';

  return `Root: ${config.awsS3Config.s3DatasetsPath} | Storage: ${storage}${mount} | Column files: ${scoping}`;
}

// Singleton config instance
let cachedConfig: TesseraConfig | null = null;

export async function getConfig(): Promise<TesseraConfig> {
  if (!cachedConfig) {
    cachedConfig = await loadConfigFile(resolveConfigPath());
  }
  return cachedConfig;
}

/**
 * Drop the cached config so the next getConfig() reads the file again
 */
export function resetConfig(): void {
  cachedConfig = null;
}
