/**
 * Connection handle for the JSON store.
 *
 * `MongoDBClient` owns one `DriverConnection` from dial to disconnect. The
 * connection is an interface so the native driver can be replaced by the
 * in-process stand-in from `../testing` in tests.
 */

import {
  type Collection,
  type ConnectionClosedEvent,
  type ConnectionCreatedEvent,
  type ConnectionPoolClosedEvent,
  type ConnectionPoolCreatedEvent,
  type DeleteResult,
  type Document,
  type Filter,
  type InsertOneResult,
  MongoClient,
  type MongoClientOptions,
  ReadPreference,
  type ServerHeartbeatFailedEvent,
  type UpdateFilter,
  type UpdateResult,
} from 'mongodb';

import type { JsonStoreConfig } from '../config/index.js';
import {
  ConnectionFailedError,
  ConnectionTimeoutError,
  type MongoDBError,
  parseMongoDBError,
} from '../errors/index.js';
import {
  type Logger,
  MetricNames,
  type MetricsCollector,
  type Observability,
  createNoopObservability,
} from '../observability/index.js';
import { withDeadline } from '../services/deadline.js';

// ============================================================================
// Driver Seam
// ============================================================================

/**
 * Server-side cursor over query results.
 */
export interface DriverCursor {
  /** Next document, or `null` once the cursor is exhausted */
  next(): Promise<Document | null>;
  close(): Promise<void>;
}

/**
 * Read options forwarded to find operations.
 */
export interface DriverReadOptions {
  /** Server-side time limit for the query */
  maxTimeMS?: number;
}

/**
 * The collection operations the store dispatches.
 */
export interface DriverCollection {
  insertOne(doc: Document): Promise<InsertOneResult<Document>>;
  findOne(filter: Filter<Document>, options?: DriverReadOptions): Promise<Document | null>;
  find(filter: Filter<Document>, options?: DriverReadOptions): DriverCursor;
  deleteOne(filter: Filter<Document>): Promise<DeleteResult>;
  deleteMany(filter: Filter<Document>): Promise<DeleteResult>;
  updateOne(filter: Filter<Document>, update: UpdateFilter<Document>): Promise<UpdateResult<Document>>;
  updateMany(filter: Filter<Document>, update: UpdateFilter<Document>): Promise<UpdateResult<Document>>;
}

/**
 * A dialable connection to a server.
 */
export interface DriverConnection {
  connect(): Promise<void>;
  /** Round trip to the primary */
  ping(): Promise<void>;
  close(): Promise<void>;
  collection(database: string, name: string): DriverCollection;
}

export type DriverConnectionFactory = (
  uri: string,
  options: MongoClientOptions,
  observability: Observability
) => DriverConnection;

// ============================================================================
// Native Driver Connection
// ============================================================================

class NativeDriverCollection implements DriverCollection {
  private readonly collection: Collection<Document>;

  constructor(collection: Collection<Document>) {
    this.collection = collection;
  }

  insertOne(doc: Document): Promise<InsertOneResult<Document>> {
    return this.collection.insertOne(doc);
  }

  findOne(filter: Filter<Document>, options: DriverReadOptions = {}): Promise<Document | null> {
    return this.collection.findOne(filter, options);
  }

  find(filter: Filter<Document>, options: DriverReadOptions = {}): DriverCursor {
    return this.collection.find(filter, options);
  }

  deleteOne(filter: Filter<Document>): Promise<DeleteResult> {
    return this.collection.deleteOne(filter);
  }

  deleteMany(filter: Filter<Document>): Promise<DeleteResult> {
    return this.collection.deleteMany(filter);
  }

  updateOne(filter: Filter<Document>, update: UpdateFilter<Document>): Promise<UpdateResult<Document>> {
    return this.collection.updateOne(filter, update);
  }

  updateMany(filter: Filter<Document>, update: UpdateFilter<Document>): Promise<UpdateResult<Document>> {
    return this.collection.updateMany(filter, update);
  }
}

/**
 * `DriverConnection` backed by the official driver's `MongoClient`.
 */
export class NativeDriverConnection implements DriverConnection {
  private readonly client: MongoClient;

  constructor(client: MongoClient, observability: Observability) {
    this.client = client;
    attachDriverEvents(client, observability.logger, observability.metrics);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async ping(): Promise<void> {
    await this.client.db('admin').command({ ping: 1 }, { readPreference: ReadPreference.PRIMARY });
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  collection(database: string, name: string): DriverCollection {
    return new NativeDriverCollection(this.client.db(database).collection<Document>(name));
  }
}

/**
 * Logs pool and heartbeat events.
 */
function attachDriverEvents(client: MongoClient, logger: Logger, metrics: MetricsCollector): void {
  client.on('connectionPoolCreated', (event: ConnectionPoolCreatedEvent) => {
    logger.debug('Connection pool created', { address: event.address });
  });

  client.on('connectionPoolClosed', (event: ConnectionPoolClosedEvent) => {
    logger.debug('Connection pool closed', { address: event.address });
  });

  client.on('connectionCreated', (event: ConnectionCreatedEvent) => {
    logger.debug('Connection created', {
      connectionId: event.connectionId,
      address: event.address,
    });
  });

  client.on('connectionClosed', (event: ConnectionClosedEvent) => {
    logger.debug('Connection closed', {
      connectionId: event.connectionId,
      address: event.address,
      reason: event.reason,
    });
  });

  client.on('serverHeartbeatFailed', (event: ServerHeartbeatFailedEvent) => {
    logger.warn('Server heartbeat failed', {
      connectionId: event.connectionId,
      failure: event.failure.message,
    });
    metrics.increment(MetricNames.CONNECTION_ERRORS, 1, { type: 'heartbeat' });
  });
}

/**
 * Default factory: a `MongoClient` for the URI.
 */
export const createNativeConnection: DriverConnectionFactory = (uri, options, observability) =>
  new NativeDriverConnection(new MongoClient(uri, options), observability);

// ============================================================================
// MongoDB Client
// ============================================================================

/**
 * Owns the connection for one store.
 */
export class MongoDBClient {
  private readonly config: JsonStoreConfig;
  private readonly observability: Observability;
  private readonly connectionFactory: DriverConnectionFactory;
  private connection: DriverConnection | null = null;

  constructor(
    config: JsonStoreConfig,
    observability: Observability = createNoopObservability(),
    connectionFactory: DriverConnectionFactory = createNativeConnection
  ) {
    this.config = config;
    this.observability = observability;
    this.connectionFactory = connectionFactory;
  }

  get logger(): Logger {
    return this.observability.logger;
  }

  get metrics(): MetricsCollector {
    return this.observability.metrics;
  }

  get configuration(): JsonStoreConfig {
    return this.config;
  }

  /**
   * Dials the server and pings the primary, both within the operation
   * timeout. A no-op when already connected.
   *
   * @throws ConnectionFailedError when the dial or the ping fails or times out
   */
  async connect(): Promise<void> {
    if (this.connection) {
      this.logger.debug('Already connected to MongoDB');
      return;
    }

    this.logger.info('Connecting to MongoDB', {
      database: this.config.database,
      collection: this.config.collection,
    });

    let connection: DriverConnection;
    try {
      connection = this.connectionFactory(
        this.config.connectionUri.expose(),
        this.buildConnectionOptions(),
        this.observability
      );
    } catch (error) {
      throw this.connectFailed(parseMongoDBError(error));
    }

    const timeoutMs = this.config.operationTimeoutMs;
    try {
      await withDeadline(
        timeoutMs,
        undefined,
        async (deadline) => {
          await deadline.race(connection.connect());
          await deadline.race(connection.ping());
        },
        () => new ConnectionTimeoutError(timeoutMs)
      );
    } catch (error) {
      await this.closeQuietly(connection);
      throw this.connectFailed(parseMongoDBError(error));
    }

    this.connection = connection;
    this.logger.info('Database responded to ping');
    this.metrics.gauge(MetricNames.CONNECTIONS_ACTIVE, 1);
  }

  /**
   * Closes the connection. A no-op when not connected.
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      this.logger.debug('No active connection to disconnect');
      return;
    }

    this.connection = null;
    this.metrics.gauge(MetricNames.CONNECTIONS_ACTIVE, 0);
    this.logger.info('Disconnecting from MongoDB');

    try {
      await connection.close();
    } catch (error) {
      const mongoError = parseMongoDBError(error);
      this.logger.error('Error during disconnect', { error: mongoError.message });
      throw mongoError;
    }
  }

  isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * The configured collection.
   *
   * @throws ConnectionFailedError when not connected
   */
  getCollection(): DriverCollection {
    if (!this.connection) {
      throw new ConnectionFailedError('not connected to MongoDB');
    }
    return this.connection.collection(this.config.database, this.config.collection);
  }

  private connectFailed(cause: MongoDBError): ConnectionFailedError {
    this.logger.error('Failed to connect to MongoDB', { error: cause.message, code: cause.code });
    this.metrics.increment(MetricNames.CONNECTION_ERRORS, 1, { type: 'connect' });
    return cause instanceof ConnectionFailedError ? cause : new ConnectionFailedError(cause.message, cause);
  }

  /**
   * Releases a connection that never became usable. The dial failure is the
   * error reported to the caller, so a close failure is only logged.
   */
  private async closeQuietly(connection: DriverConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.logger.warn('Failed to release connection after dial failure', {
        error: parseMongoDBError(error).message,
      });
    }
  }

  private buildConnectionOptions(): MongoClientOptions {
    const opts = this.config.connectionOptions;
    const options: MongoClientOptions = {
      maxPoolSize: opts.maxPoolSize,
      minPoolSize: opts.minPoolSize,
      connectTimeoutMS: opts.connectTimeoutMs,
      serverSelectionTimeoutMS: opts.serverSelectionTimeoutMs,
      readPreference: opts.readPreference,
      retryReads: opts.retryReads,
      retryWrites: opts.retryWrites,
    };
    if (opts.appName) {
      options.appName = opts.appName;
    }
    return options;
  }
}
