// src/core/PathFactory.ts

import { InvalidArgumentError } from './errors.js';
import { joinPath, removeS3Prefix, replacePrefix, S3_PREFIX, stripPrefix } from './paths.js';
import type { AwsS3Config, ColumnConcatenatedPathOptions, DatasetId, TesseraConfig } from './types.js';

export const COLUMN_CONCATENATED_FILES_DIR = '__COLUMN_CONCATENATED_FILES__';
export const TEMPORARY_ROW_FILES_DIR = '__temp__';
export const ASSETS_DIR = 'assets';
export const SCHEMA_FILENAME = 'avro_schema.json';

export interface PathFactoryOptions {
  s3DatasetsPath: string;
  storeConcatenatedBytesFilesInDataset?: boolean;
  prefixReplacePath?: string;           // Local mount root standing in for the bucket
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function formatUuid(fileUuid: Uint8Array | string): string {
  if (typeof fileUuid === 'string') {
    if (!UUID_PATTERN.test(fileUuid)) {
      throw new InvalidArgumentError(`Invalid file UUID: "${fileUuid}"`);
    }
    return fileUuid.toLowerCase();
  }

  if (fileUuid.length !== 16) {
    throw new InvalidArgumentError(`File UUID must be 16 bytes, got ${fileUuid.length}`);
  }
  const hex = Buffer.from(fileUuid).toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Computes where dataset artifacts live.
 *
 * Layout under the datasets root:
 *
 *   s3://<root>/
 *     __COLUMN_CONCATENATED_FILES__/      (shared, or one per dataset when scoped)
 *     <dataset>/<version>/avro_schema.json
 *     <dataset>/<version>/assets/
 *     __temp__/<dataset>/<version>/
 *
 * Pure: no I/O, same inputs give the same path.
 */
export class PathFactory {
  readonly rootPath: string;
  readonly prefixReplacePath: string;
  readonly storeConcatenatedBytesFilesInDataset: boolean;

  constructor(options: PathFactoryOptions) {
    this.rootPath = options.s3DatasetsPath;
    this.prefixReplacePath = options.prefixReplacePath ?? '';
    this.storeConcatenatedBytesFilesInDataset = options.storeConcatenatedBytesFilesInDataset ?? false;
  }

  /**
   * Build a factory from the S3 section of a loaded config
   */
  static fromS3Config(s3Config: AwsS3Config, prefixReplacePath = ''): PathFactory {
    return new PathFactory({
      s3DatasetsPath: s3Config.s3DatasetsPath,
      storeConcatenatedBytesFilesInDataset: s3Config.storeConcatenatedBytesFilesInDataset,
      prefixReplacePath,
    });
  }

  /**
   * Build a factory from a full config, honouring its configured mount path
   */
  static fromConfig(config: TesseraConfig): PathFactory {
    return PathFactory.fromS3Config(config.awsS3Config, config.storage.prefixReplacePath);
  }

  getRootPath(): string {
    return this.rootPath;
  }

  getDatasetAssetsPath(datasetId: DatasetId, s3Prefix = true): string {
    const fullPath = joinPath(this.rootPath, datasetId.name, datasetId.version, ASSETS_DIR);
    return s3Prefix ? fullPath : removeS3Prefix(fullPath);
  }

  getDatasetSchemaPath(datasetId: DatasetId, s3Prefix = true): string {
    const fullPath = joinPath(this.rootPath, datasetId.name, datasetId.version, SCHEMA_FILENAME);
    return s3Prefix ? fullPath : removeS3Prefix(fullPath);
  }

  getTemporaryRowFilesPath(datasetId: DatasetId): string {
    return joinPath(this.rootPath, TEMPORARY_ROW_FILES_DIR, datasetId.name, datasetId.version);
  }

  /**
   * Root of the column-concatenated bytes files.
   *
   * Returned in URL form unless a rewrite is asked for: `s3Prefix: false` always
   * rewrites, and with a mount configured so does an explicit `cutPrefixOverride`.
   * Rewriting cuts `cutPrefixOverride` (default `s3://`) off the front and puts the
   * remainder under the mount, or leaves it bucket-relative when there is no mount.
   */
  getColumnConcatenatedBytesFilesPath(options: ColumnConcatenatedPathOptions = {}): string {
    const { datasetName, s3Prefix = true, cutPrefixOverride } = options;

    let fullPath: string;
    if (this.storeConcatenatedBytesFilesInDataset) {
      if (!datasetName) {
        throw new InvalidArgumentError('dataset name required when dataset-scoped storage is enabled');
      }
      fullPath = joinPath(this.rootPath, datasetName, COLUMN_CONCATENATED_FILES_DIR);
    } else {
      fullPath = joinPath(this.rootPath, COLUMN_CONCATENATED_FILES_DIR);
    }

    const cutPrefix = cutPrefixOverride ?? S3_PREFIX;

    if (!this.prefixReplacePath) {
      return s3Prefix ? fullPath : stripPrefix(fullPath, cutPrefix);
    }

    if (s3Prefix && cutPrefixOverride === undefined) {
      return fullPath;
    }
    return replacePrefix(fullPath, cutPrefix, this.prefixReplacePath);
  }

  /**
   * URL of one column-concatenated file, named by its UUID
   */
  getColumnConcatenatedBytesS3PathFromUuid(fileUuid: Uint8Array | string, datasetName?: string): string {
    const columnsRoot = this.getColumnConcatenatedBytesFilesPath({ datasetName });
    return joinPath(columnsRoot, formatUuid(fileUuid));
  }

  equals(other: PathFactory): boolean {
    return (
      this.rootPath === other.rootPath &&
      this.prefixReplacePath === other.prefixReplacePath &&
      this.storeConcatenatedBytesFilesInDataset === other.storeConcatenatedBytesFilesInDataset
    );
  }
}
