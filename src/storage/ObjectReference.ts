import { InvalidReferenceError } from '../errors/ObjectStoreError';
import { ObjectReference } from '../interfaces/ObjectStore';

export const S3_SCHEME = 's3';

/**
 * Components of a `scheme://host/path` string. Keys are not URL-encoded,
 * so `?`, `#` and `%` stay part of the path.
 */
export interface UriParts {
  scheme: string;
  host: string;
  path: string;
}

export function splitUri(uri: string): UriParts {
  const separator = uri.indexOf('://');
  if (separator <= 0 || !/^[A-Za-z][A-Za-z0-9+.-]*$/.test(uri.slice(0, separator))) {
    return { scheme: '', host: '', path: uri };
  }

  const remainder = uri.slice(separator + 3);
  const slash = remainder.indexOf('/');
  if (slash === -1) {
    return { scheme: uri.slice(0, separator), host: remainder, path: '' };
  }

  return {
    scheme: uri.slice(0, separator),
    host: remainder.slice(0, slash),
    path: remainder.slice(slash),
  };
}

/**
 * Parse `s3://bucket/key` into an immutable reference.
 */
export function parseObjectReference(uri: string): ObjectReference {
  const { scheme, host, path } = splitUri(uri.trim());

  if (scheme !== S3_SCHEME) {
    throw new InvalidReferenceError("S3 path doesn't start with 's3://'", uri);
  }
  if (host === '' || host === '.') {
    throw new InvalidReferenceError("S3 path doesn't contain a bucket name", uri);
  }

  const key = path.startsWith('/') ? path.slice(1) : path;
  if (key === '') {
    throw new InvalidReferenceError("S3 path doesn't contain an object name", uri);
  }

  return Object.freeze({ bucket: host, key });
}

export function formatObjectReference(reference: ObjectReference): string {
  return `${S3_SCHEME}://${reference.bucket}/${reference.key}`;
}
