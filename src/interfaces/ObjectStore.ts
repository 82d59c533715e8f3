/**
 * Identifies a single object in an S3-compatible store
 */
export interface ObjectReference {
  /** Bucket name */
  readonly bucket: string;

  /** Object key, without a leading slash */
  readonly key: string;
}

/**
 * Metadata returned by a stat call, produced fresh on each call
 */
export interface ObjectMetadata {
  /** Size of the object in bytes, 0 for directories */
  length: number;

  /** True when the reference names a key prefix rather than an object */
  isDirectory: boolean;

  /** Last modified timestamp, when the backend reports one */
  lastModified?: Date;
}

/**
 * Read-only inspection and enumeration of objects
 */
export interface ObjectStore {
  /** Return metadata for the object at `uri` */
  stat(uri: string): Promise<ObjectMetadata>;

  /** Whether an object or directory exists at `uri` */
  exists(uri: string): Promise<boolean>;

  /** Size in bytes of the object at `uri` */
  getFileSize(uri: string): Promise<number>;

  /** List every reference whose key matches the glob `pattern` */
  listMatching(pattern: string): Promise<ObjectReference[]>;

  /** List the immediate children of a directory reference */
  listChildren(uri: string): Promise<string[]>;

  /** Test S3 connectivity and permissions on the given bucket */
  testConnection(bucket: string): Promise<boolean>;
}
