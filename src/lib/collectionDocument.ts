import {
  COLLECTION_VERSION,
  CollectionDocumentSchema,
  type Collection,
  type CollectionDocument,
} from '../models/Collection.js';
import { err, errorMessage, ok, type ParseError, type Result } from './errors.js';

export function toDocument(collection: Collection): CollectionDocument {
  // Keys are spelled out in document order so output bytes never depend on input key order.
  return {
    version: COLLECTION_VERSION,
    name: collection.name,
    type: 'collection',
    items: collection.items.map((item) => ({
      uid: item.uid,
      name: item.name,
      type: 'http',
      method: item.method,
      url: item.url,
      headers: item.headers.map((h) => ({ uid: h.uid, name: h.name, value: h.value, enabled: h.enabled })),
      body: { mode: 'raw', raw: item.bodyRaw },
    })),
  };
}

export function fromDocument(doc: CollectionDocument): Collection {
  return {
    name: doc.name,
    items: doc.items.map((item) => ({
      uid: item.uid,
      name: item.name,
      method: item.method,
      url: item.url,
      headers: item.headers.map((h) => ({ uid: h.uid, name: h.name, value: h.value, enabled: h.enabled })),
      bodyRaw: item.body.raw,
    })),
  };
}

export function serializeCollection(collection: Collection): string {
  return JSON.stringify(toDocument(collection), null, 2) + '\n';
}

export function parseJson(text: string): Result<unknown, ParseError> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (e) {
    return err<ParseError>({ kind: 'malformed_json', message: errorMessage(e) });
  }
}

export function deserializeCollection(text: string): Result<Collection, ParseError> {
  const json = parseJson(text);
  if (!json.ok) return json;

  const parsed = CollectionDocumentSchema.safeParse(json.value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return err<ParseError>({ kind: 'invalid_document', message: 'document does not match the collection shape', issues });
  }
  return ok(fromDocument(parsed.data));
}
