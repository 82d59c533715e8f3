#!/usr/bin/env node
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { S3ObjectStore } from './clients/S3ObjectStore';
import { ObjectStoreError } from './errors/ObjectStoreError';
import { LogLevel } from './interfaces/Logger';
import { ObjectStore } from './interfaces/ObjectStore';
import { ProbeConfig } from './interfaces/ProbeConfig';
import { timed } from './utils/timing';

export interface ProbeReport {
  objectLength: number;
  listingSeconds: number;
  matchCount: number;
}

export type OutputWriter = (line: string) => void;

/**
 * Stats one object, then times a wildcard listing.
 * Results go to the output writer (stdout); logs go to stderr.
 */
class ObjectProbeApplication {
  private logger: Logger;
  private config: ProbeConfig | null = null;
  private store: ObjectStore | null = null;
  private readonly write: OutputWriter;

  constructor(write: OutputWriter = line => process.stdout.write(`${line}\n`)) {
    // Reconfigured once the configuration is loaded
    this.logger = Logger.createFromEnvironment();
    this.write = write;
  }

  /**
   * Load configuration and build the object store client
   */
  initialize(args: string[] = []): void {
    try {
      this.config = ConfigurationManager.loadConfiguration(args);
      this.logger = new Logger(Logger.toLogLevel(this.config.logLevel) ?? LogLevel.INFO);
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(this.config));

      this.store = new S3ObjectStore(this.config, this.logger);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration error', error);
        process.exit(1);
      }
      throw error;
    }
  }

  /**
   * Print the object's byte length, then `<seconds> <match count>` for the listing
   */
  async run(): Promise<ProbeReport> {
    if (!this.store || !this.config) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    const store = this.store;
    const { objectUri, patternUri } = this.config;

    try {
      const metadata = await store.stat(objectUri);
      this.write(String(metadata.length));

      const listing = await timed(() => store.listMatching(patternUri));
      this.write(`${listing.seconds} ${listing.result.length}`);

      return {
        objectLength: metadata.length,
        listingSeconds: listing.seconds,
        matchCount: listing.result.length,
      };
    } catch (error) {
      if (error instanceof ObjectStoreError) {
        this.logger.logOperationError(error.code, error);
        process.exit(2);
      }
      throw error;
    }
  }
}

/**
 * Main application entry point
 */
async function main(args: string[] = process.argv.slice(2)): Promise<ProbeReport> {
  const app = new ObjectProbeApplication();
  app.initialize(args);
  return app.run();
}

// Export for testing
export { ObjectProbeApplication, main };

export { S3ObjectStore } from './clients/S3ObjectStore';
export { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
export * from './errors/ObjectStoreError';
export { ObjectMetadata, ObjectReference, ObjectStore } from './interfaces/ObjectStore';
export { ProbeConfig } from './interfaces/ProbeConfig';
export { compileGlobPattern } from './storage/GlobPattern';
export { formatObjectReference, parseObjectReference } from './storage/ObjectReference';
export { timed, TimedResult } from './utils/timing';

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running probe:', error);
    process.exit(3);
  });
}
