/**
 * JSON document store.
 *
 * `JsonDocumentStore` accepts JSON payloads, dispatches one driver call per
 * operation against the configured collection, and returns tagged values.
 * Every operation runs under its own deadline built from the configured
 * timeout and the caller's optional `AbortSignal`.
 */

import { randomUUID } from 'node:crypto';

import { ObjectId } from 'mongodb';

import {
  type DriverCollection,
  type DriverConnectionFactory,
  type DriverCursor,
  MongoDBClient,
} from '../client/index.js';
import { parseDocument, parseIdentifier, parseUpdateDocument, tagDocument } from '../codec/index.js';
import type { JsonStoreConfig } from '../config/index.js';
import {
  CursorIterationError,
  type MongoDBError,
  MalformedPayloadError,
  NotFoundError,
  ServerError,
  StoreOperationFailedError,
  parseMongoDBError,
} from '../errors/index.js';
import {
  type Logger,
  MetricNames,
  type MetricsCollector,
  type Observability,
  createNoopObservability,
} from '../observability/index.js';
import {
  type DeleteResult,
  type Document,
  type Filter,
  type Identifier,
  type JsonPayload,
  type TaggedDocument,
  type UpdateResult,
  isPlainDocument,
} from '../types/index.js';
import { type Deadline, withDeadline } from './deadline.js';

/**
 * Per-call options.
 */
export interface OperationOptions {
  /** Aborts the call; the earlier of this and the configured timeout wins */
  signal?: AbortSignal;
}

/**
 * Capabilities injected into a store.
 */
export interface JsonDocumentStoreOptions {
  observability?: Observability;
  /** Replaces the native driver, e.g. with `InMemoryDriverConnection` */
  connectionFactory?: DriverConnectionFactory;
}

export type StoreOperation =
  | 'insertOne'
  | 'findOne'
  | 'findById'
  | 'findManyFilterJSON'
  | 'findManyFilterBSON'
  | 'deleteOne'
  | 'deleteAll'
  | 'updateById'
  | 'updateOne'
  | 'updateMany';

type OperationTask<T> = (collection: DriverCollection, deadline: Deadline) => Promise<T>;

/**
 * Field names of a filter, for logging. Values are never logged.
 */
function filterFields(filter: Document): string[] {
  return Object.keys(filter);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * CRUD facade over a single collection.
 *
 * @example
 * ```typescript
 * const config = JsonStoreConfigBuilder.fromEnv().build();
 * const store = await JsonDocumentStore.open(config, {
 *   observability: createConsoleObservability(),
 * });
 *
 * const id = await store.insertOne('{"Name": "john", "Age": 43}');
 * await store.updateById(id, '{"$set": {"Age": 44}}');
 * const john = await store.findById(id);
 * ```
 */
export class JsonDocumentStore {
  readonly config: JsonStoreConfig;
  private readonly client: MongoDBClient;

  constructor(config: JsonStoreConfig, options: JsonDocumentStoreOptions = {}) {
    this.config = config;
    this.client = new MongoDBClient(
      config,
      options.observability ?? createNoopObservability(),
      options.connectionFactory
    );
  }

  /**
   * Creates a store and connects it.
   *
   * @throws ConnectionFailedError when the server cannot be reached or does
   * not answer a ping within the operation timeout
   */
  static async open(config: JsonStoreConfig, options: JsonDocumentStoreOptions = {}): Promise<JsonDocumentStore> {
    const store = new JsonDocumentStore(config, options);
    await store.connect();
    return store;
  }

  get database(): string {
    return this.config.database;
  }

  get collection(): string {
    return this.config.collection;
  }

  get timeoutMs(): number {
    return this.config.operationTimeoutMs;
  }

  private get logger(): Logger {
    return this.client.logger;
  }

  private get metrics(): MetricsCollector {
    return this.client.metrics;
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  // ==========================================================================
  // Insert
  // ==========================================================================

  /**
   * Inserts one JSON document and returns its identifier.
   *
   * An `_id` supplied in the payload must be an ObjectId (`{"$oid": "..."}`).
   *
   * The deadline bounds the wait, not the write: an insert that fails with a
   * `TimeoutError` or `OperationAbortedError` cause may still have been stored.
   */
  async insertOne(payload: JsonPayload, options: OperationOptions = {}): Promise<Identifier> {
    const doc = this.decode('insertOne', () => {
      const parsed = parseDocument(payload);
      if ('_id' in parsed && !(parsed._id instanceof ObjectId)) {
        throw new MalformedPayloadError('_id must be an ObjectId');
      }
      return parsed;
    });

    const id = await this.run('insertOne', options, async (collection, deadline) => {
      const result = await deadline.race(collection.insertOne(doc));
      const insertedId: unknown = result.insertedId;
      if (!(insertedId instanceof ObjectId)) {
        throw new ServerError(`insert returned a non-ObjectId identifier: ${String(insertedId)}`);
      }
      return insertedId;
    });

    this.metrics.increment(MetricNames.DOCUMENTS_WRITTEN, 1, { collection: this.collection });
    this.logger.info('Document inserted', { collection: this.collection, id: id.toHexString() });
    return id;
  }

  // ==========================================================================
  // Find
  // ==========================================================================

  /**
   * The first document matching a JSON filter.
   *
   * @throws NotFoundError when nothing matches
   */
  async findOne(filter: JsonPayload, options: OperationOptions = {}): Promise<TaggedDocument> {
    const query = this.decode('findOne', () => parseDocument(filter));
    return this.findSingle('findOne', query, options);
  }

  /**
   * The document with the given identifier.
   *
   * @throws NotFoundError when no document has the identifier
   */
  async findById(id: Identifier | string, options: OperationOptions = {}): Promise<TaggedDocument> {
    const oid = this.decode('findById', () => parseIdentifier(id));
    return this.findSingle('findById', { _id: oid }, options);
  }

  /**
   * Every document matching a JSON filter; empty when nothing matches.
   */
  async findManyFilterJSON(filter: JsonPayload, options: OperationOptions = {}): Promise<TaggedDocument[]> {
    const query = this.decode('findManyFilterJSON', () => parseDocument(filter));
    return this.findMany('findManyFilterJSON', query, options);
  }

  /**
   * Every document matching an already-built driver filter.
   */
  async findManyFilterBSON(filter: Filter<Document>, options: OperationOptions = {}): Promise<TaggedDocument[]> {
    return this.findMany('findManyFilterBSON', filter, options);
  }

  private async findSingle(
    operation: StoreOperation,
    filter: Filter<Document>,
    options: OperationOptions
  ): Promise<TaggedDocument> {
    const doc = await this.run(operation, options, (collection, deadline) =>
      deadline.race(collection.findOne(filter, { maxTimeMS: this.serverTimeLimit(deadline) })),
      { filter: filterFields(filter) }
    );

    if (doc === null) {
      throw new NotFoundError(operation, { collection: this.collection });
    }

    this.metrics.increment(MetricNames.DOCUMENTS_READ, 1, { collection: this.collection });
    return tagDocument(doc);
  }

  private async findMany(
    operation: StoreOperation,
    filter: Filter<Document>,
    options: OperationOptions
  ): Promise<TaggedDocument[]> {
    const docs = await this.run(
      operation,
      options,
      async (collection, deadline) => {
        const cursor = collection.find(filter, { maxTimeMS: this.serverTimeLimit(deadline) });
        try {
          return await this.drain(operation, cursor, deadline);
        } finally {
          await this.closeCursor(operation, cursor, deadline);
        }
      },
      { filter: filterFields(filter) }
    );

    this.metrics.increment(MetricNames.DOCUMENTS_READ, docs.length, { collection: this.collection });
    return docs.map((doc) => tagDocument(doc));
  }

  /**
   * Reads a cursor to exhaustion. A failure on the first fetch is the query
   * failing; any later failure is an iteration failure.
   */
  private async drain(operation: StoreOperation, cursor: DriverCursor, deadline: Deadline): Promise<Document[]> {
    const docs: Document[] = [];

    for (;;) {
      const position = docs.length;
      let next: unknown;
      try {
        next = await deadline.race(cursor.next());
      } catch (error) {
        const cause = parseMongoDBError(error);
        if (position === 0) {
          throw new StoreOperationFailedError(operation, cause);
        }
        throw new CursorIterationError(position, cause.message, cause);
      }

      if (next === null) {
        return docs;
      }
      if (!isPlainDocument(next)) {
        throw new CursorIterationError(position, 'cursor returned a non-document entry');
      }
      docs.push(next);
    }
  }

  /**
   * Closes the cursor within what is left of the deadline. A close still
   * pending when the deadline fires is left to finish on its own.
   */
  private async closeCursor(operation: StoreOperation, cursor: DriverCursor, deadline: Deadline): Promise<void> {
    try {
      await deadline.race(cursor.close());
    } catch (error) {
      this.logger.warn('Failed to close cursor', { operation, error: errorMessage(error) });
    }
  }

  // ==========================================================================
  // Delete
  // ==========================================================================

  /**
   * Deletes the first document matching a JSON filter.
   */
  async deleteOne(filter: JsonPayload, options: OperationOptions = {}): Promise<DeleteResult> {
    const query = this.decode('deleteOne', () => parseDocument(filter));
    return this.remove('deleteOne', query, options, (collection) => collection.deleteOne(query));
  }

  /**
   * Deletes every document matching a JSON filter.
   */
  async deleteAll(filter: JsonPayload, options: OperationOptions = {}): Promise<DeleteResult> {
    const query = this.decode('deleteAll', () => parseDocument(filter));
    return this.remove('deleteAll', query, options, (collection) => collection.deleteMany(query));
  }

  /**
   * Runs a delete under the deadline. As with inserts, a delete reported as
   * timed out or aborted may still have been applied by the server.
   */
  private async remove(
    operation: StoreOperation,
    filter: Document,
    options: OperationOptions,
    dispatch: (collection: DriverCollection) => Promise<DeleteResult>
  ): Promise<DeleteResult> {
    const result = await this.run(
      operation,
      options,
      (collection, deadline) => deadline.race(dispatch(collection)),
      { filter: filterFields(filter) }
    );

    this.metrics.increment(MetricNames.DOCUMENTS_DELETED, result.deletedCount, { collection: this.collection });
    this.logger.info('Documents deleted', { operation, deletedCount: result.deletedCount });
    return result;
  }

  // ==========================================================================
  // Update
  // ==========================================================================

  /**
   * Applies a JSON update (`{"$set": {...}}`) to the document with the given identifier.
   */
  async updateById(id: Identifier | string, update: JsonPayload, options: OperationOptions = {}): Promise<UpdateResult> {
    const [oid, changes] = this.decode('updateById', () => [parseIdentifier(id), parseUpdateDocument(update)] as const);
    return this.modify('updateById', { _id: oid }, options, (collection) => collection.updateOne({ _id: oid }, changes));
  }

  /**
   * Applies a JSON update to the first document matching a JSON filter.
   */
  async updateOne(filter: JsonPayload, update: JsonPayload, options: OperationOptions = {}): Promise<UpdateResult> {
    const [query, changes] = this.decode('updateOne', () => [parseDocument(filter), parseUpdateDocument(update)] as const);
    return this.modify('updateOne', query, options, (collection) => collection.updateOne(query, changes));
  }

  /**
   * Applies a JSON update to every document matching a JSON filter.
   */
  async updateMany(filter: JsonPayload, update: JsonPayload, options: OperationOptions = {}): Promise<UpdateResult> {
    const [query, changes] = this.decode('updateMany', () => [parseDocument(filter), parseUpdateDocument(update)] as const);
    return this.modify('updateMany', query, options, (collection) => collection.updateMany(query, changes));
  }

  /**
   * Runs an update under the deadline. The deadline only stops the wait: an
   * update reported as timed out or aborted may still have been applied.
   */
  private async modify(
    operation: StoreOperation,
    filter: Document,
    options: OperationOptions,
    dispatch: (collection: DriverCollection) => Promise<UpdateResult>
  ): Promise<UpdateResult> {
    const result = await this.run(
      operation,
      options,
      (collection, deadline) => deadline.race(dispatch(collection)),
      { filter: filterFields(filter) }
    );

    this.metrics.increment(MetricNames.DOCUMENTS_WRITTEN, result.modifiedCount, { collection: this.collection });
    this.logger.info('Documents updated', {
      operation,
      matchedCount: result.matchedCount,
      modifiedCount: result.modifiedCount,
    });
    return result;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Converts caller input. Failures are counted and rethrown before any
   * driver call is made.
   */
  private decode<T>(operation: StoreOperation, convert: () => T): T {
    try {
      return convert();
    } catch (error) {
      const mongoError = parseMongoDBError(error);
      this.logger.warn('Rejected malformed input', { operation, error: mongoError.message });
      this.metrics.increment(MetricNames.ERRORS_TOTAL, 1, { operation, code: mongoError.code });
      throw mongoError;
    }
  }

  /**
   * Runs one operation under a fresh deadline, recording latency and outcome.
   * Failures other than the store's own are wrapped in `StoreOperationFailedError`.
   */
  private async run<T>(
    operation: StoreOperation,
    options: OperationOptions,
    task: OperationTask<T>,
    context: Record<string, unknown> = {}
  ): Promise<T> {
    const startTime = Date.now();
    const correlationId = randomUUID();
    const labels = { operation, collection: this.collection };

    this.logger.debug(`Running ${operation}`, {
      ...context,
      correlationId,
      database: this.database,
      collection: this.collection,
    });

    try {
      const result = await withDeadline(this.timeoutMs, options.signal, async (deadline) => {
        if (deadline.expired) {
          throw deadline.signal.reason;
        }
        return task(this.client.getCollection(), deadline);
      });

      this.metrics.increment(MetricNames.OPERATIONS_TOTAL, 1, { ...labels, status: 'success' });
      this.metrics.timing(MetricNames.OPERATION_LATENCY, Date.now() - startTime, labels);
      return result;
    } catch (error) {
      const failure = this.classify(operation, error);

      this.metrics.increment(MetricNames.OPERATIONS_TOTAL, 1, { ...labels, status: 'error' });
      this.metrics.timing(MetricNames.OPERATION_LATENCY, Date.now() - startTime, labels);
      this.metrics.increment(MetricNames.ERRORS_TOTAL, 1, { operation, code: failure.code });
      this.logger.error(`${operation} failed`, {
        correlationId,
        error: failure.message,
        code: failure.code,
      });
      throw failure;
    }
  }

  private classify(operation: StoreOperation, error: unknown): MongoDBError {
    if (error instanceof StoreOperationFailedError || error instanceof CursorIterationError) {
      return error;
    }
    return new StoreOperationFailedError(operation, parseMongoDBError(error));
  }

  /**
   * `maxTimeMS` for the server. Zero would mean no limit, so it is at least 1.
   */
  private serverTimeLimit(deadline: Deadline): number {
    return Math.max(1, deadline.remainingMs());
  }
}
