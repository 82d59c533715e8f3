import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  HeadObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandInput,
  ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { Agent } from 'https';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { NotFoundError, TransportError } from '../errors/ObjectStoreError';
import { Logger } from '../interfaces/Logger';
import { ObjectMetadata, ObjectReference, ObjectStore } from '../interfaces/ObjectStore';
import { ProbeConfig } from '../interfaces/ProbeConfig';
import { CompiledGlobPattern, candidateForKey, compileGlobPattern } from '../storage/GlobPattern';
import { formatObjectReference, parseObjectReference } from '../storage/ObjectReference';
import { timed } from '../utils/timing';

const NOT_FOUND_ERRORS = ['NotFound', 'NoSuchKey'];

interface BackendErrorDetails {
  backendCode?: string;
  httpStatusCode?: number;
}

/**
 * ObjectStore implementation using AWS SDK v3.
 * Each call is a single request/response exchange; nothing is retried or cached.
 */
export class S3ObjectStore implements ObjectStore {
  private client: AWSS3Client;
  private logger: Logger;

  constructor(config: ProbeConfig, logger: Logger) {
    const clientConfig: S3ClientConfig = {
      region: config.region,
    };

    // Use custom endpoint if provided (for S3-compatible services)
    const endpoint = ConfigurationManager.resolveEndpoint(config);
    if (endpoint) {
      clientConfig.endpoint = endpoint;
      clientConfig.forcePathStyle = true;
    }

    if (
      config.connectTimeoutMs !== undefined ||
      config.requestTimeoutMs !== undefined ||
      !config.verifySsl
    ) {
      clientConfig.requestHandler = new NodeHttpHandler({
        connectionTimeout: config.connectTimeoutMs,
        requestTimeout: config.requestTimeoutMs,
        httpsAgent: config.verifySsl ? undefined : new Agent({ rejectUnauthorized: false }),
      });
    }

    this.client = new AWSS3Client(clientConfig);
    this.logger = logger;
  }

  /**
   * Metadata for the object at `uri`. A key with no object but with objects
   * below `key/` is reported as a directory of length 0.
   */
  async stat(uri: string): Promise<ObjectMetadata> {
    const reference = parseObjectReference(uri);
    const { result, durationMs } = await timed(() => this.inspect(reference));

    this.logger.logStat(uri, result.length, result.isDirectory, durationMs);
    return result;
  }

  async exists(uri: string): Promise<boolean> {
    try {
      await this.stat(uri);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  async getFileSize(uri: string): Promise<number> {
    const metadata = await this.stat(uri);
    return metadata.length;
  }

  /**
   * Every reference in the pattern's bucket whose key, or implied directory,
   * matches the glob. Pages are drained before returning; order follows the
   * backend and duplicates are dropped.
   */
  async listMatching(pattern: string): Promise<ObjectReference[]> {
    const compiled = compileGlobPattern(pattern);
    const { result, durationMs } = await timed(() => this.collectMatches(compiled));

    this.logger.logListing(pattern, result.matches.length, result.pageCount, durationMs);
    return result.matches;
  }

  /**
   * Names directly below a directory reference, relative to it
   */
  async listChildren(uri: string): Promise<string[]> {
    const reference = parseObjectReference(uri);
    const prefix = reference.key.endsWith('/') ? reference.key : `${reference.key}/`;
    const children: string[] = [];

    await this.forEachPage(
      { Bucket: reference.bucket, Prefix: prefix, Delimiter: '/' },
      page => {
        for (const commonPrefix of page.CommonPrefixes ?? []) {
          const entry = (commonPrefix.Prefix ?? '').slice(prefix.length).replace(/\/$/, '');
          if (entry.length > 0) {
            children.push(entry);
          }
        }
        for (const object of page.Contents ?? []) {
          const entry = (object.Key ?? '').slice(prefix.length);
          if (entry.length > 0) {
            children.push(entry);
          }
        }
      }
    );

    return children;
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      this.logger.error(
        'S3 connection test failed',
        error instanceof Error ? error : new Error(String(error)),
        { bucket }
      );
      return false;
    }
  }

  private async inspect(reference: ObjectReference): Promise<ObjectMetadata> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: reference.bucket, Key: reference.key })
      );
      return {
        length: response.ContentLength ?? 0,
        isDirectory: false,
        lastModified: response.LastModified,
      };
    } catch (error) {
      if (!S3ObjectStore.isNotFound(error)) {
        throw S3ObjectStore.toTransportError('HeadObject', error);
      }
    }

    const prefix = reference.key.endsWith('/') ? reference.key : `${reference.key}/`;
    let listing: ListObjectsV2CommandOutput;
    try {
      listing = await this.client.send(
        new ListObjectsV2Command({ Bucket: reference.bucket, Prefix: prefix, MaxKeys: 1 })
      );
    } catch (error) {
      throw S3ObjectStore.toTransportError('ListObjectsV2', error);
    }

    const child = listing.Contents?.[0];
    if (child) {
      return { length: 0, isDirectory: true, lastModified: child.LastModified };
    }

    throw new NotFoundError(formatObjectReference(reference));
  }

  private async collectMatches(
    compiled: CompiledGlobPattern
  ): Promise<{ matches: ObjectReference[]; pageCount: number }> {
    const seen = new Set<string>();
    const matches: ObjectReference[] = [];

    const pageCount = await this.forEachPage(
      { Bucket: compiled.bucket, Prefix: compiled.literalPrefix },
      page => {
        for (const object of page.Contents ?? []) {
          if (!object.Key) {
            continue;
          }
          const candidate = candidateForKey(object.Key, compiled.segmentCount);
          if (candidate === undefined || seen.has(candidate) || !compiled.regex.test(candidate)) {
            continue;
          }
          seen.add(candidate);
          matches.push(Object.freeze({ bucket: compiled.bucket, key: candidate }));
        }
      }
    );

    return { matches, pageCount };
  }

  /**
   * Follow continuation tokens until the listing is complete.
   * Returns the number of pages fetched.
   */
  private async forEachPage(
    input: ListObjectsV2CommandInput,
    onPage: (page: ListObjectsV2CommandOutput) => void
  ): Promise<number> {
    let continuationToken: string | undefined;
    let pageCount = 0;

    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.client.send(
          new ListObjectsV2Command({ ...input, ContinuationToken: continuationToken })
        );
      } catch (error) {
        throw S3ObjectStore.toTransportError('ListObjectsV2', error);
      }

      pageCount++;
      this.logger.debug('Fetched listing page', {
        bucket: input.Bucket,
        prefix: input.Prefix,
        page: pageCount,
        keyCount: page.Contents?.length ?? 0,
      });
      onPage(page);

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return pageCount;
  }

  private static backendErrorDetails(error: unknown): BackendErrorDetails {
    const details: BackendErrorDetails = {};
    if (error instanceof Error) {
      details.backendCode = error.name;
    }
    if (typeof error === 'object' && error !== null && '$metadata' in error) {
      const metadata = error.$metadata;
      if (
        typeof metadata === 'object' &&
        metadata !== null &&
        'httpStatusCode' in metadata &&
        typeof metadata.httpStatusCode === 'number'
      ) {
        details.httpStatusCode = metadata.httpStatusCode;
      }
    }
    return details;
  }

  /**
   * HEAD has no body, so a missing key surfaces as a bare 404
   */
  private static isNotFound(error: unknown): boolean {
    const { backendCode, httpStatusCode } = S3ObjectStore.backendErrorDetails(error);
    if (backendCode === 'NoSuchBucket') {
      return false;
    }
    return (
      (backendCode !== undefined && NOT_FOUND_ERRORS.includes(backendCode)) ||
      httpStatusCode === 404
    );
  }

  private static toTransportError(operation: string, error: unknown): TransportError {
    return new TransportError(operation, error, S3ObjectStore.backendErrorDetails(error));
  }
}
