export interface EnvironmentConfig extends NodeJS.ProcessEnv {
  // Required unless given as CLI arguments
  PROBE_OBJECT_URI?: string;
  PROBE_PATTERN_URI?: string;

  // Optional
  AWS_REGION?: string;
  S3_REGION?: string;
  S3_ENDPOINT?: string;
  S3_USE_HTTPS?: string;
  S3_VERIFY_SSL?: string;
  S3_CONNECT_TIMEOUT_MSEC?: string;
  S3_REQUEST_TIMEOUT_MSEC?: string;
  LOG_LEVEL?: string;
}
