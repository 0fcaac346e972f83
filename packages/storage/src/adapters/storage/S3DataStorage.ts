/**
 * S3-backed data storage.
 * Translates s3:// addresses to bucket/key pairs and delegates I/O to an
 * IObjectStoreClient, so tests can swap the transport for a fake.
 */

import { mkdir } from 'fs/promises';
import { dirname, isAbsolute, join, relative, sep } from 'path';
import { InvalidArgumentError, isNotFoundError } from '../../core/errors.js';
import { bucketKeyFromS3Path, type BucketKey } from '../../core/paths.js';
import type { TesseraConfig } from '../../core/types.js';
import type { FetchFileOptions, IObjectStorage } from './IDataStorage.js';
import type { IObjectStoreClient } from './IObjectStoreClient.js';
import { isRegularFile } from './localFiles.js';
import { S3ObjectStoreClient, type S3ObjectStoreClientConfig } from './S3ObjectStoreClient.js';

export interface S3DataStorageConfig extends S3ObjectStoreClientConfig {
    client?: IObjectStoreClient;    // Injected transport; built from the rest of the config when absent
}

function escapesDirectory(fromDirectory: string): boolean {
    return fromDirectory === '..' || fromDirectory.startsWith(`..${sep}`) || isAbsolute(fromDirectory);
}

export class S3DataStorage implements IObjectStorage {
    readonly kind = 's3' as const;
    readonly client: IObjectStoreClient;

    constructor(config: S3DataStorageConfig = {}) {
        this.client = config.client ?? new S3ObjectStoreClient(config);
    }

    static fromConfig(config: TesseraConfig): S3DataStorage {
        return new S3DataStorage({
            region: config.awsS3Config.region,
            clientConfig: config.awsS3Config.clientConfig,
            retries: config.storageDownloadConfig.retries,
        });
    }

    bucketKeyFromS3Path(address: string): BucketKey {
        return bucketKeyFromS3Path(address);
    }

    async checkExists(address: string): Promise<boolean> {
        const location = bucketKeyFromS3Path(address);
        try {
            await this.client.headObject(location);
            return true;
        } catch (error) {
            if (isNotFoundError(error)) {
                return false;
            }
            throw error;
        }
    }

    async putObject(body: Uint8Array, address: string): Promise<void> {
        await this.client.putObject(bucketKeyFromS3Path(address), body);
    }

    async putFile(localPath: string, address: string): Promise<void> {
        await this.client.uploadFile(bucketKeyFromS3Path(address), localPath);
    }

    async fetchObject(address: string): Promise<Uint8Array> {
        return this.client.getObject(bucketKeyFromS3Path(address));
    }

    /**
     * Download to `<destinationDirectory>/<key>`, keeping the key's directory structure.
     * A missing object rejects with the transport's not-found error.
     */
    async fetchFile(address: string, destinationDirectory: string, options: FetchFileOptions = {}): Promise<string> {
        const { bucket, key } = bucketKeyFromS3Path(address);
        if (!key || key.endsWith('/')) {
            throw new InvalidArgumentError(`Cannot fetch "${address}" as a file: key is empty or directory-like`);
        }

        const filename = join(destinationDirectory, key);
        const fromDestination = relative(destinationDirectory, filename);
        if (!fromDestination || escapesDirectory(fromDestination)) {
            throw new InvalidArgumentError(`Key "${key}" escapes destination directory ${destinationDirectory}`);
        }

        await mkdir(dirname(filename), { recursive: true });

        if (options.skipIfPresent && await isRegularFile(filename)) {
            console.log(`   ⏭️  Skipped download of ${address} (already at ${filename})`);
            return filename;
        }

        await this.client.downloadFile({ bucket, key, filename });
        return filename;
    }
}
