import { describe, it, expect } from 'vitest';
import type { TesseraConfig } from '../../../core/types.js';
import { createDataStorage, FileSystemDataStorage, S3DataStorage } from '../index.js';

function configWith(adapter: 'fs' | 's3'): TesseraConfig {
  return {
    awsS3Config: {
      s3DatasetsPath: 's3://dummy_bucket/datasets/',
      region: 'us-east-1',
      storeConcatenatedBytesFilesInDataset: false,
      clientConfig: { maxPoolConnections: 10, readTimeoutS: 140, connectTimeoutS: 140 },
    },
    storageDownloadConfig: { retries: 2, timeout: 150, retryBackoff: 5, retryDelayS: 4 },
    storage: { adapter, prefixReplacePath: '' },
  };
}

describe('createDataStorage', () => {
  it('should create filesystem storage for fs', () => {
    const storage = createDataStorage(configWith('fs'));
    expect(storage).toBeInstanceOf(FileSystemDataStorage);
    expect(storage.kind).toBe('fs');
  });

  it('should create S3 storage for s3', () => {
    const storage = createDataStorage(configWith('s3'));
    expect(storage).toBeInstanceOf(S3DataStorage);
    expect(storage.kind).toBe('s3');
  });
});
