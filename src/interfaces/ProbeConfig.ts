export interface ProbeConfig {
  /** Object to stat, `s3://bucket/key` */
  objectUri: string;

  /** Glob to list, `s3://bucket/prefix/*` */
  patternUri: string;

  region: string;
  endpoint?: string;
  useHttps: boolean;
  verifySsl: boolean;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
  logLevel: string;
}
