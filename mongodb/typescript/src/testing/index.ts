/**
 * In-process stand-in for the MongoDB driver.
 *
 * `InMemoryDriverConnection` implements the `DriverConnection` seam over
 * plain arrays so stores can be exercised without a server. It records every
 * driver call, and can inject failures and latency.
 *
 * Supported query operators: `$eq`, `$ne`, `$gt`, `$gte`, `$lt`, `$lte`,
 * `$in`, `$nin`, `$exists`, and top-level `$and`, `$or`, `$nor`.
 * Supported update operators: `$set`, `$unset`, `$inc`.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import {
  type DeleteResult,
  type Document,
  type Filter,
  type InsertOneResult,
  ObjectId,
  type UpdateFilter,
  type UpdateResult,
} from 'mongodb';

import type {
  DriverCollection,
  DriverConnection,
  DriverConnectionFactory,
  DriverCursor,
  DriverReadOptions,
} from '../client/index.js';
import { isPlainDocument, setField } from '../types/index.js';

export type DriverMethod =
  | 'connect'
  | 'ping'
  | 'close'
  | 'insertOne'
  | 'findOne'
  | 'find'
  | 'cursor.next'
  | 'cursor.close'
  | 'deleteOne'
  | 'deleteMany'
  | 'updateOne'
  | 'updateMany';

/**
 * A driver call as seen by the stand-in.
 */
export interface RecordedCall {
  method: DriverMethod;
  namespace?: string;
  args: unknown[];
}

// ============================================================================
// Value helpers
// ============================================================================

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => cloneValue(item));
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (isPlainDocument(value)) {
    const copy: Document = {};
    for (const [key, item] of Object.entries(value)) {
      setField(copy, key, cloneValue(item));
    }
    return copy;
  }
  return value;
}

function cloneDocument(doc: Document): Document {
  const copy: Document = {};
  for (const [key, value] of Object.entries(doc)) {
    setField(copy, key, cloneValue(value));
  }
  return copy;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof ObjectId || b instanceof ObjectId) {
    return a instanceof ObjectId && b instanceof ObjectId && a.equals(b);
  }
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    return Array.isArray(a) && Array.isArray(b) &&
      a.length === b.length && a.every((item: unknown, i: number) => valuesEqual(item, b[i]));
  }
  if (isPlainDocument(a) || isPlainDocument(b)) {
    if (!isPlainDocument(a) || !isPlainDocument(b)) return false;
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length &&
      keys.every((key) => key in b && valuesEqual(a[key], b[key]));
  }
  return a === b;
}

function compareValues(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  return undefined;
}

function getPath(doc: Document, path: string): unknown {
  let current: unknown = doc;
  for (const segment of path.split('.')) {
    if (!isPlainDocument(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function setPath(doc: Document, path: string, value: unknown): void {
  const segments = path.split('.');
  const last = segments.pop() ?? path;
  let current: Document = doc;
  for (const segment of segments) {
    const next: unknown = current[segment];
    if (isPlainDocument(next)) {
      current = next;
    } else {
      const created: Document = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

function unsetPath(doc: Document, path: string): void {
  const segments = path.split('.');
  const last = segments.pop() ?? path;
  const parent = segments.length === 0 ? doc : getPath(doc, segments.join('.'));
  if (isPlainDocument(parent)) {
    delete parent[last];
  }
}

// ============================================================================
// Matching
// ============================================================================

function equalsOrContains(actual: unknown, expected: unknown): boolean {
  if (Array.isArray(actual) && !Array.isArray(expected)) {
    return actual.some((item: unknown) => valuesEqual(item, expected));
  }
  return valuesEqual(actual, expected);
}

function toArray(operand: unknown, operator: string): unknown[] {
  if (!Array.isArray(operand)) {
    throw new Error(`${operator} needs an array`);
  }
  return operand;
}

function evaluateOperator(actual: unknown, operator: string, operand: unknown): boolean {
  switch (operator) {
    case '$eq':
      return equalsOrContains(actual, operand);
    case '$ne':
      return !equalsOrContains(actual, operand);
    case '$gt':
    case '$gte':
    case '$lt':
    case '$lte': {
      const order = compareValues(actual, operand);
      if (order === undefined) return false;
      if (operator === '$gt') return order > 0;
      if (operator === '$gte') return order >= 0;
      if (operator === '$lt') return order < 0;
      return order <= 0;
    }
    case '$in':
      return toArray(operand, operator).some((candidate) => equalsOrContains(actual, candidate));
    case '$nin':
      return !toArray(operand, operator).some((candidate) => equalsOrContains(actual, candidate));
    case '$exists':
      return (actual !== undefined) === Boolean(operand);
    default:
      throw new Error(`unknown operator: ${operator}`);
  }
}

function isOperatorObject(value: unknown): value is Document {
  return isPlainDocument(value) && Object.keys(value).length > 0 &&
    Object.keys(value).every((key) => key.startsWith('$'));
}

function subFilters(operand: unknown, operator: string): Document[] {
  return toArray(operand, operator).map((item) => {
    if (!isPlainDocument(item)) {
      throw new Error(`${operator} entries must be objects`);
    }
    return item;
  });
}

/**
 * Evaluates a query filter against a document.
 *
 * @throws Error for unsupported operators, as a server would reject them
 */
export function matchesFilter(doc: Document, filter: Document): boolean {
  for (const [key, condition] of Object.entries(filter)) {
    if (key === '$and') {
      if (!subFilters(condition, key).every((sub) => matchesFilter(doc, sub))) return false;
      continue;
    }
    if (key === '$or') {
      if (!subFilters(condition, key).some((sub) => matchesFilter(doc, sub))) return false;
      continue;
    }
    if (key === '$nor') {
      if (subFilters(condition, key).some((sub) => matchesFilter(doc, sub))) return false;
      continue;
    }
    if (key.startsWith('$')) {
      throw new Error(`unknown top level operator: ${key}`);
    }

    const actual = getPath(doc, key);
    if (isOperatorObject(condition)) {
      for (const [operator, operand] of Object.entries(condition)) {
        if (!evaluateOperator(actual, operator, operand)) return false;
      }
    } else if (!equalsOrContains(actual, condition)) {
      return false;
    }
  }
  return true;
}

/**
 * Applies an operator update to a copy of `doc`.
 *
 * @throws Error for replacement documents and unsupported operators
 */
export function applyUpdate(doc: Document, update: Document): Document {
  if (!isOperatorObject(update)) {
    throw new Error('Update document requires atomic operators');
  }

  const next = cloneDocument(doc);
  for (const [operator, fields] of Object.entries(update)) {
    if (!isPlainDocument(fields)) {
      throw new Error(`Modifiers operate on fields but ${operator} was given a non-object`);
    }
    for (const [path, value] of Object.entries(fields)) {
      if (path === '_id') {
        throw new Error("Performing an update on the path '_id' would modify the immutable field '_id'");
      }
      switch (operator) {
        case '$set':
          setPath(next, path, cloneValue(value));
          break;
        case '$unset':
          unsetPath(next, path);
          break;
        case '$inc': {
          const current = getPath(next, path) ?? 0;
          if (typeof value !== 'number' || typeof current !== 'number') {
            throw new Error(`Cannot apply $inc to ${path}`);
          }
          setPath(next, path, current + value);
          break;
        }
        default:
          throw new Error(`Unknown modifier: ${operator}`);
      }
    }
  }
  return next;
}

// ============================================================================
// Stand-in Driver
// ============================================================================

export class InMemoryCursor implements DriverCursor {
  private readonly documents: Document[];
  private readonly connection: InMemoryDriverConnection;
  private readonly failure?: Error;
  private position = 0;
  closed = false;

  constructor(documents: Document[], connection: InMemoryDriverConnection, failure?: Error) {
    this.documents = documents;
    this.connection = connection;
    this.failure = failure;
  }

  async next(): Promise<Document | null> {
    await this.connection.enter('cursor.next', undefined, [this.position]);
    if (this.failure && this.position === 0) {
      throw this.failure;
    }
    const failAt = this.connection.takeCursorFailure(this.position);
    if (failAt) {
      throw failAt;
    }
    const doc = this.documents[this.position];
    if (doc === undefined) {
      return null;
    }
    this.position += 1;
    return doc;
  }

  async close(): Promise<void> {
    await this.connection.enter('cursor.close', undefined, [this.position]);
    this.closed = true;
  }
}

export class InMemoryCollection implements DriverCollection {
  private readonly namespace: string;
  private readonly documents: Document[];
  private readonly connection: InMemoryDriverConnection;

  constructor(namespace: string, documents: Document[], connection: InMemoryDriverConnection) {
    this.namespace = namespace;
    this.documents = documents;
    this.connection = connection;
  }

  async insertOne(doc: Document): Promise<InsertOneResult<Document>> {
    await this.connection.enter('insertOne', this.namespace, [doc]);
    const stored = cloneDocument(doc);
    if (stored._id === undefined) {
      stored._id = new ObjectId();
    }
    if (this.documents.some((existing) => valuesEqual(existing._id, stored._id))) {
      throw Object.assign(
        new Error(`E11000 duplicate key error collection: ${this.namespace} index: _id_ dup key: { _id: ${String(stored._id)} }`),
        { code: 11000, keyValue: { _id: stored._id } }
      );
    }
    this.documents.push(stored);
    return { acknowledged: true, insertedId: stored._id };
  }

  async findOne(filter: Filter<Document>, options?: DriverReadOptions): Promise<Document | null> {
    await this.connection.enter('findOne', this.namespace, [filter, options]);
    const found = this.documents.find((doc) => matchesFilter(doc, filter));
    return found ? cloneDocument(found) : null;
  }

  find(filter: Filter<Document>, options?: DriverReadOptions): DriverCursor {
    this.connection.record('find', this.namespace, [filter, options]);
    const failure = this.connection.takeFailure('find');
    let matched: Document[] = [];
    let queryError: Error | undefined = failure;
    if (!queryError) {
      try {
        matched = this.documents.filter((doc) => matchesFilter(doc, filter)).map(cloneDocument);
      } catch (error) {
        queryError = error instanceof Error ? error : new Error(String(error));
      }
    }
    const cursor = new InMemoryCursor(matched, this.connection, queryError);
    this.connection.cursors.push(cursor);
    return cursor;
  }

  async deleteOne(filter: Filter<Document>): Promise<DeleteResult> {
    await this.connection.enter('deleteOne', this.namespace, [filter]);
    const index = this.documents.findIndex((doc) => matchesFilter(doc, filter));
    if (index === -1) {
      return { acknowledged: true, deletedCount: 0 };
    }
    this.documents.splice(index, 1);
    return { acknowledged: true, deletedCount: 1 };
  }

  async deleteMany(filter: Filter<Document>): Promise<DeleteResult> {
    await this.connection.enter('deleteMany', this.namespace, [filter]);
    const kept = this.documents.filter((doc) => !matchesFilter(doc, filter));
    const deletedCount = this.documents.length - kept.length;
    this.documents.splice(0, this.documents.length, ...kept);
    return { acknowledged: true, deletedCount };
  }

  async updateOne(filter: Filter<Document>, update: UpdateFilter<Document>): Promise<UpdateResult<Document>> {
    await this.connection.enter('updateOne', this.namespace, [filter, update]);
    const index = this.documents.findIndex((doc) => matchesFilter(doc, filter));
    return this.applyAt(index === -1 ? [] : [index], update);
  }

  async updateMany(filter: Filter<Document>, update: UpdateFilter<Document>): Promise<UpdateResult<Document>> {
    await this.connection.enter('updateMany', this.namespace, [filter, update]);
    const indexes: number[] = [];
    this.documents.forEach((doc, index) => {
      if (matchesFilter(doc, filter)) indexes.push(index);
    });
    return this.applyAt(indexes, update);
  }

  private applyAt(indexes: number[], update: Document): UpdateResult<Document> {
    const updated = indexes.map((index) => applyUpdate(this.documents[index] ?? {}, update));
    let modifiedCount = 0;
    indexes.forEach((index, i) => {
      const next = updated[i];
      if (next !== undefined && !valuesEqual(this.documents[index], next)) {
        this.documents[index] = next;
        modifiedCount += 1;
      }
    });
    return {
      acknowledged: true,
      matchedCount: indexes.length,
      modifiedCount,
      upsertedCount: 0,
      upsertedId: null,
    };
  }
}

/**
 * In-memory `DriverConnection`.
 *
 * @example
 * ```typescript
 * const connection = new InMemoryDriverConnection();
 * const store = await JsonDocumentStore.open(config, {
 *   connectionFactory: connection.factory(),
 * });
 * ```
 */
export class InMemoryDriverConnection implements DriverConnection {
  readonly calls: RecordedCall[] = [];
  readonly cursors: InMemoryCursor[] = [];
  private readonly namespaces = new Map<string, Document[]>();
  private readonly failures = new Map<DriverMethod, Error[]>();
  private readonly cursorFailures = new Map<number, Error>();
  private latencyMs = 0;
  private connected = false;

  /**
   * A factory that always hands out this connection.
   */
  factory(): DriverConnectionFactory {
    return () => this;
  }

  /**
   * The next call to `method` rejects with `error`.
   * For `find`, the query fails on the cursor's first fetch.
   */
  failNext(method: DriverMethod, error: Error): this {
    const queue = this.failures.get(method) ?? [];
    queue.push(error);
    this.failures.set(method, queue);
    return this;
  }

  /**
   * The next cursor fetch at `position` (0-based) rejects with `error`.
   */
  failCursorAt(position: number, error: Error): this {
    this.cursorFailures.set(position, error);
    return this;
  }

  /**
   * Delays every driver call by `ms`.
   */
  setLatency(ms: number): this {
    this.latencyMs = ms;
    return this;
  }

  /**
   * Replaces the contents of a collection.
   */
  seed(database: string, collection: string, documents: Document[]): this {
    this.namespaces.set(`${database}.${collection}`, documents.map(cloneDocument));
    return this;
  }

  /**
   * Copies of the documents stored in a collection.
   */
  documents(database: string, collection: string): Document[] {
    return (this.namespaces.get(`${database}.${collection}`) ?? []).map(cloneDocument);
  }

  /**
   * Calls made against collections, excluding connection lifecycle calls.
   */
  operationCalls(): RecordedCall[] {
    return this.calls.filter((call) => call.namespace !== undefined || call.method.startsWith('cursor.'));
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    await this.enter('connect', undefined, []);
    this.connected = true;
  }

  async ping(): Promise<void> {
    await this.enter('ping', undefined, []);
    if (!this.connected) {
      throw new Error('MongoNotConnectedError: client must be connected before running operations');
    }
  }

  async close(): Promise<void> {
    await this.enter('close', undefined, []);
    this.connected = false;
  }

  collection(database: string, name: string): DriverCollection {
    const namespace = `${database}.${name}`;
    let documents = this.namespaces.get(namespace);
    if (!documents) {
      documents = [];
      this.namespaces.set(namespace, documents);
    }
    return new InMemoryCollection(namespace, documents, this);
  }

  /** @internal */
  record(method: DriverMethod, namespace: string | undefined, args: unknown[]): void {
    this.calls.push({ method, namespace, args });
  }

  /** @internal */
  takeFailure(method: DriverMethod): Error | undefined {
    return this.failures.get(method)?.shift();
  }

  /** @internal */
  takeCursorFailure(position: number): Error | undefined {
    const failure = this.cursorFailures.get(position);
    this.cursorFailures.delete(position);
    return failure;
  }

  /** @internal */
  async enter(method: DriverMethod, namespace: string | undefined, args: unknown[]): Promise<void> {
    this.record(method, namespace, args);
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
    const failure = this.takeFailure(method);
    if (failure) {
      throw failure;
    }
  }
}
