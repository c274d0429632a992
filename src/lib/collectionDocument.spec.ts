import { describe, it, expect } from 'vitest';
import { deserializeCollection, serializeCollection, toDocument } from './collectionDocument.js';
import type { Collection } from '../models/Collection.js';

const sample: Collection = {
  name: 'TS_01_Covid_Collection',
  items: [
    {
      uid: 'item-1',
      name: 'TC#01_12345#rvn001#00W5#LR',
      method: 'POST',
      url: '{{baseUrl}}/api/validate/{{tc_id}}',
      headers: [
        { uid: 'h-1', name: 'Content-Type', value: 'application/json', enabled: true },
        { uid: 'h-2', name: 'X-Test-Type', value: 'LR', enabled: true },
      ],
      bodyRaw: '{\n    "claim": 1\n}',
    },
  ],
};

describe('collectionDocument', () => {
  describe('serializeCollection', () => {
    it('writes the documented top-level shape', () => {
      const doc = JSON.parse(serializeCollection(sample));
      expect(Object.keys(doc)).toEqual(['version', 'name', 'type', 'items']);
      expect(doc.version).toBe('1');
      expect(doc.type).toBe('collection');
      expect(Object.keys(doc.items[0])).toEqual(['uid', 'name', 'type', 'method', 'url', 'headers', 'body']);
      expect(doc.items[0].body).toEqual({ mode: 'raw', raw: '{\n    "claim": 1\n}' });
    });

    it('is byte-identical for equal values regardless of key order', () => {
      const reordered: Collection = {
        items: sample.items.map((i) => ({
          bodyRaw: i.bodyRaw,
          headers: i.headers.map((h) => ({ enabled: h.enabled, value: h.value, name: h.name, uid: h.uid })),
          url: i.url,
          method: i.method,
          name: i.name,
          uid: i.uid,
        })),
        name: sample.name,
      };
      expect(serializeCollection(reordered)).toBe(serializeCollection(sample));
    });

    it('ends with a newline and uses two-space indentation', () => {
      const text = serializeCollection({ name: 'Empty', items: [] });
      expect(text).toBe('{\n  "version": "1",\n  "name": "Empty",\n  "type": "collection",\n  "items": []\n}\n');
    });
  });

  describe('deserializeCollection', () => {
    it('round-trips a collection', () => {
      const back = deserializeCollection(serializeCollection(sample));
      expect(back).toEqual({ ok: true, value: sample });
    });

    it('rejects malformed JSON', () => {
      const result = deserializeCollection('{ not json');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('malformed_json');
    });

    it('rejects documents missing required fields', () => {
      const result = deserializeCollection(JSON.stringify({ version: '1', name: 'x', type: 'collection' }));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('invalid_document');
        expect(result.error.issues).toEqual(['items: Required']);
      }
    });

    it('rejects a wrong document type', () => {
      const doc = { ...toDocument(sample), type: 'folder' };
      const result = deserializeCollection(JSON.stringify(doc));
      expect(result.ok).toBe(false);
    });
  });
});
