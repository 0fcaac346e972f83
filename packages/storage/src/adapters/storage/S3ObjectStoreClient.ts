/**
 * Object store transport on AWS S3 (or any S3-compatible endpoint).
 * Implements IObjectStoreClient with @aws-sdk/client-s3.
 */

import { createReadStream, createWriteStream } from 'fs';
import { stat } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
    S3Client,
    GetObjectCommand,
    HeadObjectCommand,
    PutObjectCommand,
} from '@aws-sdk/client-s3';
import type { S3ClientOptions } from '../../core/types.js';
import type { DownloadRequest, IObjectStoreClient, ObjectLocation } from './IObjectStoreClient.js';
import { writeAtomically } from './localFiles.js';

export interface S3ObjectStoreClientConfig {
    region?: string;
    endpoint?: string;
    forcePathStyle?: boolean;
    clientConfig?: S3ClientOptions;
    retries?: number;          // Extra attempts after the first, enforced by the SDK
}

export class S3ObjectStoreClient implements IObjectStoreClient {
    private client: S3Client;

    constructor(config: S3ObjectStoreClientConfig = {}) {
        const clientConfig = config.clientConfig;
        this.client = new S3Client({
            region: config.region || process.env.AWS_REGION || 'us-east-1',
            endpoint: config.endpoint,
            forcePathStyle: config.forcePathStyle ?? false,
            maxAttempts: config.retries !== undefined ? config.retries + 1 : undefined,
            requestHandler: clientConfig
                ? {
                    connectionTimeout: clientConfig.connectTimeoutS * 1000,
                    requestTimeout: clientConfig.readTimeoutS * 1000,
                    httpsAgent: { maxSockets: clientConfig.maxPoolConnections },
                }
                : undefined,
        });
    }

    async headObject({ bucket, key }: ObjectLocation): Promise<void> {
        await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    }

    async putObject({ bucket, key }: ObjectLocation, body: Uint8Array): Promise<void> {
        await this.client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body }));
    }

    /**
     * Streams the file; the length is sent up front since S3 rejects unsized streams
     */
    async uploadFile({ bucket, key }: ObjectLocation, localPath: string): Promise<void> {
        const { size } = await stat(localPath);
        await this.client.send(
            new PutObjectCommand({
                Bucket: bucket,
                Key: key,
                Body: createReadStream(localPath),
                ContentLength: size,
            })
        );
    }

    /**
     * Streams the body to a temp sibling and renames it into place once complete
     */
    async downloadFile({ bucket, key, filename }: DownloadRequest): Promise<void> {
        const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        const body = response.Body;
        if (!(body instanceof Readable)) {
            throw new Error(`No readable body for s3://${bucket}/${key}`);
        }
        await writeAtomically(filename, (tempPath) => pipeline(body, createWriteStream(tempPath)));
    }

    async getObject({ bucket, key }: ObjectLocation): Promise<Uint8Array> {
        const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!response.Body) {
            throw new Error(`Empty body for s3://${bucket}/${key}`);
        }
        return response.Body.transformToByteArray();
    }

    /**
     * Release the connection pool
     */
    destroy(): void {
        this.client.destroy();
    }
}
