// src/core/paths.ts
// Pure string algebra over storage addresses. Nothing here touches the filesystem.

import { InvalidArgumentError } from './errors.js';

export const S3_PREFIX = 's3://';

const SEPARATOR = '/';

export interface BucketKey {
  bucket: string;
  key: string;
}

/**
 * True for URL-form addresses (`s3://bucket/key`)
 */
export function isS3Path(address: string): boolean {
  return address.startsWith(S3_PREFIX);
}

/**
 * Split a URL-form address into bucket and key.
 * The key is returned verbatim, trailing separator included.
 *
 * @example
 * bucketKeyFromS3Path('s3://hello/world/') // { bucket: 'hello', key: 'world/' }
 */
export function bucketKeyFromS3Path(address: string): BucketKey {
  if (!isS3Path(address)) {
    throw new InvalidArgumentError(`Expected an address starting with "${S3_PREFIX}", got "${address}"`);
  }

  const rest = address.slice(S3_PREFIX.length);
  const separatorIndex = rest.indexOf(SEPARATOR);
  if (separatorIndex === -1) {
    return { bucket: rest, key: '' };
  }

  return {
    bucket: rest.slice(0, separatorIndex),
    key: rest.slice(separatorIndex + 1),
  };
}

/**
 * Inverse of bucketKeyFromS3Path for addresses that carry a separator after the bucket.
 */
export function toS3Path({ bucket, key }: BucketKey): string {
  return `${S3_PREFIX}${bucket}${SEPARATOR}${key}`;
}

function trimLeadingSeparators(path: string): string {
  let start = 0;
  while (start < path.length && path[start] === SEPARATOR) start++;
  return path.slice(start);
}

function trimTrailingSeparators(path: string): string {
  let end = path.length;
  while (end > 0 && path[end - 1] === SEPARATOR) end--;
  return path.slice(0, end);
}

/**
 * Join a root with path segments, leaving exactly one separator at every join point.
 * A scheme root (`s3://`) is kept intact, and a bare `/` root stays absolute.
 */
export function joinPath(root: string, ...segments: string[]): string {
  const parts = segments
    .map((segment) => trimTrailingSeparators(trimLeadingSeparators(segment)))
    .filter((segment) => segment.length > 0);

  if (parts.length === 0) return root;
  if (root.length === 0) return parts.join(SEPARATOR);

  const tail = parts.join(SEPARATOR);
  if (root.endsWith('://')) return `${root}${tail}`;
  return `${trimTrailingSeparators(root)}${SEPARATOR}${tail}`;
}

/**
 * Remove `prefix` from the front of `address`.
 * An address that does not start with the prefix is rejected rather than passed through.
 */
export function stripPrefix(address: string, prefix: string): string {
  if (!address.startsWith(prefix)) {
    throw new InvalidArgumentError(`Cannot cut prefix "${prefix}" from "${address}": address does not start with it`);
  }
  return address.slice(prefix.length);
}

/**
 * Drop the `s3://` scheme, yielding a bucket-relative plain path.
 * Plain-form input is returned unchanged.
 */
export function removeS3Prefix(address: string): string {
  return isS3Path(address) ? address.slice(S3_PREFIX.length) : address;
}

/**
 * Swap `cutPrefix` at the front of `address` for `replacementRoot`.
 *
 * @example
 * replacePrefix('s3://bucket/a/b', 's3://', '/mnt/') // '/mnt/bucket/a/b'
 */
export function replacePrefix(address: string, cutPrefix: string, replacementRoot: string): string {
  return joinPath(replacementRoot, stripPrefix(address, cutPrefix));
}
