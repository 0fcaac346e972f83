/**
 * The calls the remote backend makes against an object store.
 * Retries, timeouts and connection pooling belong to the implementation.
 */

export interface ObjectLocation {
    bucket: string;
    key: string;
}

export interface DownloadRequest extends ObjectLocation {
    filename: string;
}

export interface IObjectStoreClient {
    /**
     * Metadata-only existence check. Resolves when the object exists, rejects with a
     * not-found error (see isNotFoundError) when it does not.
     */
    headObject(location: ObjectLocation): Promise<void>;

    putObject(location: ObjectLocation, body: Uint8Array): Promise<void>;

    uploadFile(location: ObjectLocation, localPath: string): Promise<void>;

    /**
     * Download to exactly `filename`; the parent directory must already exist
     */
    downloadFile(request: DownloadRequest): Promise<void>;

    getObject(location: ObjectLocation): Promise<Uint8Array>;
}
