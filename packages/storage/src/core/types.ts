// src/core/types.ts

// ============ DATASETS ============

/**
 * One version of a named dataset
 */
export interface DatasetId {
  name: string;
  version: string;
}

// ============ CONFIGURATION ============

export type StorageAdapterType = 'fs' | 's3';

/**
 * Options forwarded to the S3 client. Retries and timeouts are enforced there, never here.
 */
export interface S3ClientOptions {
  maxPoolConnections: number;
  readTimeoutS: number;
  connectTimeoutS: number;
}

export interface AwsS3Config {
  s3DatasetsPath: string;             // Root of all datasets, URL form
  region: string;
  storeConcatenatedBytesFilesInDataset: boolean;
  clientConfig: S3ClientOptions;
}

// Consumed by the metadata store, carried through untouched
export interface DynamoDbConfig {
  tableName: string;
  region: string;
}

export interface StorageDownloadConfig {
  retries: number;
  timeout: number;
  retryBackoff: number;
  retryDelayS: number;
}

export interface StorageConfig {
  adapter: StorageAdapterType;
  prefixReplacePath: string;          // '' when no local mount stands in for the bucket
}

export interface TesseraConfig {
  awsS3Config: AwsS3Config;
  dynamodbConfig?: DynamoDbConfig;
  storageDownloadConfig: StorageDownloadConfig;
  storage: StorageConfig;
}

// ============ PATHS ============

export interface ColumnConcatenatedPathOptions {
  datasetName?: string;
  s3Prefix?: boolean;                 // Default: true
  cutPrefixOverride?: string;         // Default: the s3:// scheme
}
