/**
 * Storage adapter factory and exports.
 * Creates the configured storage backend.
 */

import type { TesseraConfig } from '../../core/types.js';
import type { IDataStorage } from './IDataStorage.js';
import { FileSystemDataStorage } from './FileSystemDataStorage.js';
import { S3DataStorage } from './S3DataStorage.js';

export type { DataStorageKind, FetchFileOptions, IDataStorage, IObjectStorage } from './IDataStorage.js';
export type { DownloadRequest, IObjectStoreClient, ObjectLocation } from './IObjectStoreClient.js';
export { FileSystemDataStorage } from './FileSystemDataStorage.js';
export { S3DataStorage, type S3DataStorageConfig } from './S3DataStorage.js';
export { S3ObjectStoreClient, type S3ObjectStoreClientConfig } from './S3ObjectStoreClient.js';

/**
 * Create the storage backend named by `config.storage.adapter`.
 */
export function createDataStorage(config: TesseraConfig): IDataStorage {
  if (config.storage.adapter === 'fs') {
    return new FileSystemDataStorage();
  }
  return S3DataStorage.fromConfig(config);
}
