/**
 * Configuration for the MongoDB JSON store.
 */

import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Connection Options
// ============================================================================

/**
 * Read preference modes understood by the driver.
 */
export type ReadPreferenceMode =
  | 'primary'
  | 'primaryPreferred'
  | 'secondary'
  | 'secondaryPreferred'
  | 'nearest';

const READ_PREFERENCE_MODES: readonly ReadPreferenceMode[] = [
  'primary',
  'primaryPreferred',
  'secondary',
  'secondaryPreferred',
  'nearest',
];

/**
 * Options forwarded to the driver when the connection is dialed.
 */
export interface ConnectionOptions {
  /** Maximum number of connections in the pool. Default: 10 */
  maxPoolSize: number;
  /** Minimum number of connections in the pool. Default: 0 */
  minPoolSize: number;
  /** Socket connect timeout (ms). Default: 10000 */
  connectTimeoutMs: number;
  /** Server selection timeout (ms). Default: 30000 */
  serverSelectionTimeoutMs: number;
  /** Read preference. Default: 'primary' */
  readPreference: ReadPreferenceMode;
  /** Driver-level read retries. Default: false */
  retryReads: boolean;
  /** Driver-level write retries. Default: false */
  retryWrites: boolean;
  /** Application name reported to the server */
  appName?: string;
}

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * Store configuration. Frozen once built.
 */
export interface JsonStoreConfig {
  /** Connection URI ("mongodb://..." or "mongodb+srv://...") */
  readonly connectionUri: SecretString;
  /** Database holding the collection */
  readonly database: string;
  /** Collection every operation targets */
  readonly collection: string;
  /** Deadline applied to each operation (ms) */
  readonly operationTimeoutMs: number;
  readonly connectionOptions: Readonly<ConnectionOptions>;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_TIMEOUT_SECONDS = 3;

/** Largest delay a Node.js timer honours; longer delays fire after 1ms. */
export const MAX_OPERATION_TIMEOUT_MS = 2147483647;

export const DEFAULT_CONNECTION_OPTIONS: ConnectionOptions = {
  maxPoolSize: 10,
  minPoolSize: 0,
  connectTimeoutMs: 10000,
  serverSelectionTimeoutMs: 30000,
  readPreference: 'primary',
  retryReads: false,
  retryWrites: false,
};

// ============================================================================
// SecretString
// ============================================================================

/**
 * Keeps the connection URI out of logs and serialized config.
 * The value is only reachable through `expose()`.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Configuration Builder
// ============================================================================

function requireName(value: string, what: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError(`${what} cannot be empty`);
  }
  return trimmed;
}

function parseNumber(raw: string, variable: string): number {
  const value = Number(raw);
  if (raw.trim().length === 0 || !Number.isFinite(value)) {
    throw new ConfigurationError(`${variable} must be a number, got "${raw}"`);
  }
  return value;
}

function isReadPreferenceMode(value: string): value is ReadPreferenceMode {
  return READ_PREFERENCE_MODES.some((mode) => mode === value);
}

/**
 * Builder for `JsonStoreConfig`.
 *
 * @example
 * ```typescript
 * const config = new JsonStoreConfigBuilder()
 *   .withConnectionUri('mongodb://localhost:27017')
 *   .withDatabase('testing')
 *   .withCollection('persons')
 *   .withTimeoutSeconds(3)
 *   .build();
 * ```
 */
export class JsonStoreConfigBuilder {
  private connectionUri?: SecretString;
  private database?: string;
  private collection?: string;
  private operationTimeoutMs: number = DEFAULT_TIMEOUT_SECONDS * 1000;
  private connectionOptions: ConnectionOptions = { ...DEFAULT_CONNECTION_OPTIONS };

  /**
   * Sets the connection URI.
   */
  withConnectionUri(uri: string): this {
    const trimmed = requireName(uri, 'Connection URI');
    if (!trimmed.startsWith('mongodb://') && !trimmed.startsWith('mongodb+srv://')) {
      throw new ConfigurationError('Connection URI must start with "mongodb://" or "mongodb+srv://"');
    }
    this.connectionUri = new SecretString(trimmed);
    return this;
  }

  withDatabase(database: string): this {
    this.database = requireName(database, 'Database name');
    return this;
  }

  withCollection(collection: string): this {
    this.collection = requireName(collection, 'Collection name');
    return this;
  }

  /**
   * Sets the per-operation deadline in whole or fractional seconds.
   */
  withTimeoutSeconds(seconds: number): this {
    return this.withOperationTimeout(seconds * 1000);
  }

  /**
   * Sets the per-operation deadline in milliseconds.
   */
  withOperationTimeout(timeoutMs: number): this {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Operation timeout must be positive');
    }
    if (timeoutMs > MAX_OPERATION_TIMEOUT_MS) {
      throw new ConfigurationError(`Operation timeout cannot exceed ${MAX_OPERATION_TIMEOUT_MS}ms`);
    }
    this.operationTimeoutMs = timeoutMs;
    return this;
  }

  withConnectionOptions(options: Partial<ConnectionOptions>): this {
    const merged = { ...this.connectionOptions, ...options };

    if (merged.maxPoolSize <= 0) {
      throw new ConfigurationError('Max pool size must be positive');
    }
    if (merged.minPoolSize < 0) {
      throw new ConfigurationError('Min pool size must be non-negative');
    }
    if (merged.minPoolSize > merged.maxPoolSize) {
      throw new ConfigurationError('Min pool size cannot exceed max pool size');
    }
    if (merged.connectTimeoutMs <= 0) {
      throw new ConfigurationError('Connect timeout must be positive');
    }
    if (merged.serverSelectionTimeoutMs <= 0) {
      throw new ConfigurationError('Server selection timeout must be positive');
    }

    this.connectionOptions = merged;
    return this;
  }

  withReadPreference(readPreference: ReadPreferenceMode): this {
    this.connectionOptions.readPreference = readPreference;
    return this;
  }

  withAppName(appName: string): this {
    this.connectionOptions.appName = requireName(appName, 'App name');
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * Environment variables:
   * - MONGODB_URI: Connection URI (required)
   * - MONGODB_DATABASE: Database name (required)
   * - MONGODB_COLLECTION: Collection name (required)
   * - MONGODB_TIMEOUT_SECONDS: Per-operation timeout in seconds
   * - MONGODB_MAX_POOL_SIZE / MONGODB_MIN_POOL_SIZE: Pool sizes
   * - MONGODB_CONNECT_TIMEOUT_MS: Socket connect timeout
   * - MONGODB_READ_PREFERENCE: Read preference mode
   * - MONGODB_APP_NAME: Application name
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): JsonStoreConfigBuilder {
    const builder = new JsonStoreConfigBuilder();

    if (env.MONGODB_URI) {
      builder.withConnectionUri(env.MONGODB_URI);
    }
    if (env.MONGODB_DATABASE) {
      builder.withDatabase(env.MONGODB_DATABASE);
    }
    if (env.MONGODB_COLLECTION) {
      builder.withCollection(env.MONGODB_COLLECTION);
    }
    if (env.MONGODB_TIMEOUT_SECONDS) {
      builder.withTimeoutSeconds(parseNumber(env.MONGODB_TIMEOUT_SECONDS, 'MONGODB_TIMEOUT_SECONDS'));
    }

    const pool: Partial<ConnectionOptions> = {};
    if (env.MONGODB_MAX_POOL_SIZE) {
      pool.maxPoolSize = parseNumber(env.MONGODB_MAX_POOL_SIZE, 'MONGODB_MAX_POOL_SIZE');
    }
    if (env.MONGODB_MIN_POOL_SIZE) {
      pool.minPoolSize = parseNumber(env.MONGODB_MIN_POOL_SIZE, 'MONGODB_MIN_POOL_SIZE');
    }
    if (env.MONGODB_CONNECT_TIMEOUT_MS) {
      pool.connectTimeoutMs = parseNumber(env.MONGODB_CONNECT_TIMEOUT_MS, 'MONGODB_CONNECT_TIMEOUT_MS');
    }
    if (Object.keys(pool).length > 0) {
      builder.withConnectionOptions(pool);
    }

    const readPreference = env.MONGODB_READ_PREFERENCE;
    if (readPreference) {
      if (!isReadPreferenceMode(readPreference)) {
        throw new ConfigurationError(`Unknown read preference "${readPreference}"`);
      }
      builder.withReadPreference(readPreference);
    }

    if (env.MONGODB_APP_NAME) {
      builder.withAppName(env.MONGODB_APP_NAME);
    }

    return builder;
  }

  /**
   * Builds the configuration.
   * @throws ConfigurationError if the URI, database or collection is missing
   */
  build(): JsonStoreConfig {
    if (!this.connectionUri) {
      throw new ConfigurationError('Connection URI is required (MONGODB_URI)');
    }
    if (!this.database) {
      throw new ConfigurationError('Database name is required (MONGODB_DATABASE)');
    }
    if (!this.collection) {
      throw new ConfigurationError('Collection name is required (MONGODB_COLLECTION)');
    }

    return Object.freeze({
      connectionUri: this.connectionUri,
      database: this.database,
      collection: this.collection,
      operationTimeoutMs: this.operationTimeoutMs,
      connectionOptions: Object.freeze({ ...this.connectionOptions }),
    });
  }
}
