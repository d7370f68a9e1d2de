/**
 * Document, identifier and result types for the JSON store.
 */

import type {
  DeleteResult as DriverDeleteResult,
  Document,
  Filter,
  ObjectId,
  UpdateResult as DriverUpdateResult,
} from 'mongodb';

// ============================================================================
// Base Document Types
// ============================================================================

export type { Document, Filter };

/**
 * Server-assigned document identifier.
 */
export type Identifier = ObjectId;

/**
 * JSON text, as raw UTF-8 bytes or an already decoded string.
 */
export type JsonPayload = Uint8Array | string;

/**
 * Top-level fields of a document as ordered `[key, value]` pairs.
 */
export type OrderedDocument = ReadonlyArray<readonly [string, unknown]>;

/**
 * Outcome of delete operations, as returned by the driver.
 */
export type DeleteResult = DriverDeleteResult;

/**
 * Outcome of update operations, as returned by the driver.
 */
export type UpdateResult = DriverUpdateResult<Document>;

// ============================================================================
// Tagged Field Values
// ============================================================================

/**
 * A document field value, tagged by kind so callers can switch over it
 * exhaustively instead of probing `unknown` at runtime.
 *
 * `extended` covers the BSON types with no native JavaScript counterpart
 * (`Decimal128`, `Long`, `Timestamp`, `BSONRegExp`, ...); `bsonType` holds the
 * driver's type name.
 */
export type FieldValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'objectId'; value: ObjectId }
  | { kind: 'date'; value: Date }
  | { kind: 'binary'; value: Uint8Array; subType: number }
  | { kind: 'array'; items: FieldValue[] }
  | { kind: 'document'; fields: TaggedDocument }
  | { kind: 'extended'; bsonType: string; value: unknown };

export type FieldKind = FieldValue['kind'];

/**
 * A document whose values are tagged.
 */
export interface TaggedDocument {
  [field: string]: FieldValue;
}

// ============================================================================
// Validation
// ============================================================================

/** 24 hexadecimal characters. */
export const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * True for a plain key/value object: not an array, `null`, class instance
 * (`ObjectId`, `Date`, ...) or any other non-object.
 */
export function isPlainDocument(value: unknown): value is Document {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * True when a document only uses top-level update operators (`$set`, `$inc`, ...).
 */
export function isOperatorDocument(doc: Document): boolean {
  const keys = Object.keys(doc);
  return keys.length > 0 && keys.every((key) => key.startsWith('$'));
}

/**
 * Writes `value` as an own enumerable property. Unlike `target[key] = value`,
 * a `__proto__` key becomes a field instead of replacing the prototype.
 */
export function setField<T>(target: { [field: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
