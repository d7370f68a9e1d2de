/**
 * JSON to document conversion and back.
 *
 * Payloads are read as relaxed Extended JSON, so `{"$oid": "..."}` and
 * `{"$date": "..."}` wrappers become `ObjectId` and `Date` values while
 * ordinary JSON stays as it is. Every function here is pure.
 */

import { BSON, Binary, ObjectId } from 'mongodb';

import { MalformedPayloadError } from '../errors/index.js';
import {
  type Document,
  type FieldValue,
  type Identifier,
  type JsonPayload,
  OBJECT_ID_PATTERN,
  type OrderedDocument,
  type TaggedDocument,
  isOperatorDocument,
  isPlainDocument,
  setField,
} from '../types/index.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeText(payload: JsonPayload): string {
  if (typeof payload === 'string') {
    return payload;
  }
  try {
    return utf8.decode(payload);
  } catch (error) {
    throw new MalformedPayloadError('payload is not valid UTF-8', error);
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') {
    const bsonType = bsonTypeOf(value);
    return bsonType ? `a ${bsonType} value` : 'a non-plain object';
  }
  return `a ${typeof value}`;
}

function bsonTypeOf(value: object): string | undefined {
  if ('_bsontype' in value && typeof value._bsontype === 'string') {
    return value._bsontype;
  }
  return undefined;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parses a JSON payload into a document.
 *
 * @throws MalformedPayloadError when the bytes are not UTF-8, the text is not
 * JSON (or holds an invalid Extended JSON wrapper), or the top level is not an object
 */
export function parseDocument(payload: JsonPayload): Document {
  const text = decodeText(payload);

  let parsed: unknown;
  try {
    parsed = BSON.EJSON.parse(text, { relaxed: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedPayloadError(reason, error);
  }

  if (!isPlainDocument(parsed)) {
    throw new MalformedPayloadError(`expected a JSON object, got ${describe(parsed)}`);
  }
  return parsed;
}

/**
 * Parses a JSON payload into ordered top-level `[key, value]` pairs.
 *
 * Pairs follow JavaScript property order: source order, except that
 * integer-like keys come first in ascending order.
 */
export function parseOrderedDocument(payload: JsonPayload): OrderedDocument {
  return Object.entries(parseDocument(payload));
}

/**
 * Parses an update payload. Only operator documents (`{"$set": {...}}`)
 * are accepted; a bare replacement document is rejected.
 */
export function parseUpdateDocument(payload: JsonPayload): Document {
  const update = parseDocument(payload);
  if (!isOperatorDocument(update)) {
    throw new MalformedPayloadError('update must only contain operators such as $set');
  }
  return update;
}

/**
 * Accepts an `ObjectId` or its 24-character hex form.
 */
export function parseIdentifier(id: Identifier | string): Identifier {
  if (id instanceof ObjectId) {
    return id;
  }
  if (!OBJECT_ID_PATTERN.test(id)) {
    throw new MalformedPayloadError(`"${id}" is not a 24-character hex identifier`);
  }
  return ObjectId.createFromHexString(id);
}

/**
 * Serializes a document as relaxed Extended JSON.
 */
export function stringifyDocument(doc: Document): string {
  return BSON.EJSON.stringify(doc, { relaxed: true });
}

// ============================================================================
// Tagging
// ============================================================================

export function tagValue(value: unknown): FieldValue {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'number') {
    return { kind: 'number', value };
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (typeof value !== 'object') {
    return { kind: 'extended', bsonType: typeof value, value };
  }

  if (Array.isArray(value)) {
    return { kind: 'array', items: value.map((item: unknown) => tagValue(item)) };
  }
  if (value instanceof ObjectId) {
    return { kind: 'objectId', value };
  }
  if (value instanceof Date) {
    return { kind: 'date', value };
  }
  if (value instanceof Binary) {
    return {
      kind: 'binary',
      value: value.buffer.subarray(0, value.position),
      subType: value.sub_type,
    };
  }
  if (isPlainDocument(value)) {
    return { kind: 'document', fields: tagDocument(value) };
  }
  return { kind: 'extended', bsonType: bsonTypeOf(value) ?? 'object', value };
}

export function tagDocument(doc: Document): TaggedDocument {
  const fields: TaggedDocument = {};
  for (const [key, value] of Object.entries(doc)) {
    setField(fields, key, tagValue(value));
  }
  return fields;
}

export function untagValue(field: FieldValue): unknown {
  switch (field.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
    case 'objectId':
    case 'date':
    case 'extended':
      return field.value;
    case 'binary':
      return new Binary(field.value, field.subType);
    case 'array':
      return field.items.map((item) => untagValue(item));
    case 'document':
      return untagDocument(field.fields);
    default: {
      const unreachable: never = field;
      return unreachable;
    }
  }
}

export function untagDocument(tagged: TaggedDocument): Document {
  const doc: Document = {};
  for (const [key, field] of Object.entries(tagged)) {
    setField(doc, key, untagValue(field));
  }
  return doc;
}
