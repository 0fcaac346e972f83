/**
 * Storage abstraction for the dataset pipeline.
 * Callers hold an IDataStorage and never learn whether bytes come from a
 * mounted filesystem or from an object store.
 */

export type DataStorageKind = 'fs' | 's3';

export interface FetchFileOptions {
    /**
     * Reuse a file already present at the destination instead of downloading it again.
     * Safe because objects are immutable once written under a key.
     */
    skipIfPresent?: boolean;
}

export interface IDataStorage {
    readonly kind: DataStorageKind;

    /**
     * Copy the object at `address` into `destinationDirectory` and return the local path
     */
    fetchFile(address: string, destinationDirectory: string, options?: FetchFileOptions): Promise<string>;
}

/**
 * A backend that can also check and write objects (the remote store)
 */
export interface IObjectStorage extends IDataStorage {
    /**
     * True if the object exists; false only when the store reports it missing
     */
    checkExists(address: string): Promise<boolean>;

    /**
     * Upload in-memory bytes
     */
    putObject(body: Uint8Array, address: string): Promise<void>;

    /**
     * Upload the contents of a local file
     */
    putFile(localPath: string, address: string): Promise<void>;

    /**
     * Download an object into memory
     */
    fetchObject(address: string): Promise<Uint8Array>;
}
