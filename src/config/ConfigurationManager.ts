import { ProbeConfig } from '../interfaces/ProbeConfig';
import { LogLevel } from '../interfaces/Logger';
import { EnvironmentConfig } from '../types/EnvironmentConfig';

export const DEFAULT_REGION = 'us-east-1';

export class ConfigurationError extends Error {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class ConfigurationManager {
  /**
   * Build the probe configuration from CLI positionals and the environment.
   * Positionals win over `PROBE_OBJECT_URI` / `PROBE_PATTERN_URI`.
   */
  static loadConfiguration(
    args: string[] = [],
    env: EnvironmentConfig = process.env
  ): ProbeConfig {
    const objectUri = args[0] || env.PROBE_OBJECT_URI;
    const patternUri = args[1] || env.PROBE_PATTERN_URI;

    const missing: string[] = [];
    if (!objectUri) missing.push('PROBE_OBJECT_URI');
    if (!patternUri) missing.push('PROBE_PATTERN_URI');

    if (!objectUri || !patternUri) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missing.join(', ')}`,
        missing[0]
      );
    }

    const config: ProbeConfig = {
      objectUri,
      patternUri,
      region: env.AWS_REGION || env.S3_REGION || DEFAULT_REGION,
      useHttps: ConfigurationManager.parseFlag(env.S3_USE_HTTPS, 'S3_USE_HTTPS'),
      verifySsl: ConfigurationManager.parseFlag(env.S3_VERIFY_SSL, 'S3_VERIFY_SSL'),
      logLevel: ConfigurationManager.parseLogLevel(env.LOG_LEVEL),
    };

    // Add optional properties only if they exist
    if (env.S3_ENDPOINT) {
      config.endpoint = env.S3_ENDPOINT;
    }

    const connectTimeoutMs = ConfigurationManager.parseTimeout(
      env.S3_CONNECT_TIMEOUT_MSEC,
      'S3_CONNECT_TIMEOUT_MSEC'
    );
    if (connectTimeoutMs !== undefined) {
      config.connectTimeoutMs = connectTimeoutMs;
    }

    const requestTimeoutMs = ConfigurationManager.parseTimeout(
      env.S3_REQUEST_TIMEOUT_MSEC,
      'S3_REQUEST_TIMEOUT_MSEC'
    );
    if (requestTimeoutMs !== undefined) {
      config.requestTimeoutMs = requestTimeoutMs;
    }

    return config;
  }

  /**
   * Endpoint URL for the SDK. A scheme-less endpoint gets `http://` when
   * HTTPS is switched off and `https://` otherwise.
   */
  static resolveEndpoint(config: ProbeConfig): string | undefined {
    if (!config.endpoint) {
      return undefined;
    }
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(config.endpoint)) {
      return config.endpoint;
    }
    return `${config.useHttps ? 'https' : 'http'}://${config.endpoint}`;
  }

  static sanitizeForLogging(config: ProbeConfig): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...config };
    if (config.endpoint) {
      // user:password@host
      sanitized.endpoint = config.endpoint.replace(/\/\/[^/@]*@/, '//[REDACTED]@');
    }
    return sanitized;
  }

  /** Unset means enabled; `0` disables, like the SDK's own env flags */
  private static parseFlag(value: string | undefined, field: string): boolean {
    if (value === undefined || value === '') {
      return true;
    }
    const normalized = value.trim().toLowerCase();
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
      return false;
    }
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    throw new ConfigurationError(`${field} must be 0 or 1`, field);
  }

  private static parseTimeout(value: string | undefined, field: string): number | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }
    if (!/^\d+$/.test(value.trim())) {
      throw new ConfigurationError(`${field} must be a non-negative integer`, field);
    }
    return parseInt(value, 10);
  }

  private static parseLogLevel(value: string | undefined): string {
    if (!value) {
      return LogLevel.INFO;
    }
    const normalized = value.toLowerCase();
    const levels: string[] = Object.values(LogLevel);
    if (!levels.includes(normalized)) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${levels.join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return normalized;
  }
}
