/**
 * Tests for the SDK-backed transport. The SDK itself is mocked; nothing leaves the process.
 */

import { ReadStream } from 'fs';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const s3Mocks = vi.hoisted(() => {
  const configs: Array<Record<string, unknown>> = [];
  const send = vi.fn();
  const destroy = vi.fn();
  class S3Client {
    public send = send;
    public destroy = destroy;
    constructor(config: Record<string, unknown>) {
      configs.push(config);
    }
  }
  class HeadObjectCommand {
    constructor(public input: Record<string, unknown>) {}
  }
  class PutObjectCommand {
    constructor(public input: Record<string, unknown>) {}
  }
  class GetObjectCommand {
    constructor(public input: Record<string, unknown>) {}
  }
  return { S3Client, HeadObjectCommand, PutObjectCommand, GetObjectCommand, send, destroy, configs };
});

vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: s3Mocks.S3Client,
  HeadObjectCommand: s3Mocks.HeadObjectCommand,
  PutObjectCommand: s3Mocks.PutObjectCommand,
  GetObjectCommand: s3Mocks.GetObjectCommand,
}));

import { S3ObjectStoreClient } from '../S3ObjectStoreClient.js';

const LOCATION = { bucket: 'foo', key: 'bar/baz/dummy' };

function bodyOf(bytes: Uint8Array) {
  return { Body: { transformToByteArray: async () => bytes } };
}

describe('S3ObjectStoreClient', () => {
  let tempDir: string;

  beforeEach(async () => {
    s3Mocks.send.mockReset();
    s3Mocks.configs.length = 0;
    tempDir = await mkdtemp(join(tmpdir(), 'tessera-transport-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should forward retries, timeouts and pool size to the SDK', () => {
    new S3ObjectStoreClient({
      region: 'eu-west-1',
      retries: 2,
      clientConfig: { maxPoolConnections: 10, readTimeoutS: 140, connectTimeoutS: 30 },
    });

    expect(s3Mocks.configs).toHaveLength(1);
    expect(s3Mocks.configs[0]).toMatchObject({
      region: 'eu-west-1',
      forcePathStyle: false,
      maxAttempts: 3,
      requestHandler: {
        connectionTimeout: 30000,
        requestTimeout: 140000,
        httpsAgent: { maxSockets: 10 },
      },
    });
  });

  it('should leave SDK defaults alone when nothing is configured', () => {
    new S3ObjectStoreClient({ region: 'us-east-1' });
    expect(s3Mocks.configs[0].maxAttempts).toBeUndefined();
    expect(s3Mocks.configs[0].requestHandler).toBeUndefined();
  });

  it('should check existence with HeadObject', async () => {
    s3Mocks.send.mockResolvedValueOnce({});
    await new S3ObjectStoreClient().headObject(LOCATION);

    const command = s3Mocks.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(s3Mocks.HeadObjectCommand);
    expect(command.input).toEqual({ Bucket: 'foo', Key: 'bar/baz/dummy' });
  });

  it('should propagate SDK errors untouched', async () => {
    const notFound = Object.assign(new Error('Not Found'), { name: 'NotFound' });
    s3Mocks.send.mockRejectedValueOnce(notFound);
    await expect(new S3ObjectStoreClient().headObject(LOCATION)).rejects.toBe(notFound);
  });

  it('should put bytes with PutObject', async () => {
    s3Mocks.send.mockResolvedValueOnce({});
    const body = new TextEncoder().encode('this is my object');
    await new S3ObjectStoreClient().putObject(LOCATION, body);

    const command = s3Mocks.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(s3Mocks.PutObjectCommand);
    expect(command.input).toEqual({ Bucket: 'foo', Key: 'bar/baz/dummy', Body: body });
  });

  it('should stream a file with its length', async () => {
    s3Mocks.send.mockResolvedValueOnce({});
    const localPath = join(tempDir, 'object.bin');
    await writeFile(localPath, 'this is my object');

    await new S3ObjectStoreClient().uploadFile(LOCATION, localPath);

    const command = s3Mocks.send.mock.calls[0][0];
    expect(command.input.Bucket).toBe('foo');
    expect(command.input.Key).toBe('bar/baz/dummy');
    expect(command.input.ContentLength).toBe(17);
    expect(command.input.Body).toBeInstanceOf(ReadStream);
    command.input.Body.destroy();
  });

  it('should read an object body into memory', async () => {
    s3Mocks.send.mockResolvedValueOnce(bodyOf(Uint8Array.from([1, 2, 3])));
    await expect(new S3ObjectStoreClient().getObject(LOCATION)).resolves.toEqual(Uint8Array.from([1, 2, 3]));

    const command = s3Mocks.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(s3Mocks.GetObjectCommand);
  });

  it('should fail on an empty response body', async () => {
    s3Mocks.send.mockResolvedValueOnce({});
    await expect(new S3ObjectStoreClient().getObject(LOCATION)).rejects.toThrow('Empty body for s3://foo/bar/baz/dummy');
  });

  it('should stream a downloaded object to the requested filename', async () => {
    s3Mocks.send.mockResolvedValueOnce({ Body: Readable.from([Buffer.from('pay'), Buffer.from('load')]) });
    const filename = join(tempDir, 'dummy');

    await new S3ObjectStoreClient().downloadFile({ ...LOCATION, filename });

    expect(await readFile(filename, 'utf-8')).toBe('payload');
    expect(await readdir(tempDir)).toEqual(['dummy']);
    const command = s3Mocks.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(s3Mocks.GetObjectCommand);
    expect(command.input).toEqual({ Bucket: 'foo', Key: 'bar/baz/dummy' });
  });

  it('should leave nothing behind when the body fails mid-download', async () => {
    async function* interrupted() {
      yield Buffer.from('partial');
      throw new Error('connection reset');
    }
    s3Mocks.send.mockResolvedValueOnce({ Body: Readable.from(interrupted()) });
    const filename = join(tempDir, 'dummy');

    await expect(new S3ObjectStoreClient().downloadFile({ ...LOCATION, filename })).rejects.toThrow('connection reset');

    expect(await readdir(tempDir)).toEqual([]);
  });

  it('should keep the previous file when a download fails', async () => {
    const filename = join(tempDir, 'dummy');
    await writeFile(filename, 'complete');
    s3Mocks.send.mockResolvedValueOnce(bodyOf(new TextEncoder().encode('not a stream')));

    await expect(new S3ObjectStoreClient().downloadFile({ ...LOCATION, filename }))
      .rejects.toThrow('No readable body for s3://foo/bar/baz/dummy');

    expect(await readFile(filename, 'utf-8')).toBe('complete');
  });

  it('should release the SDK client on destroy', () => {
    new S3ObjectStoreClient().destroy();
    expect(s3Mocks.destroy).toHaveBeenCalledTimes(1);
  });
});
