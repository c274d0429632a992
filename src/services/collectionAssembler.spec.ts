import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { deserializeCollection, serializeCollection } from '../lib/collectionDocument.js';
import { BatchError } from '../lib/errors.js';
import { assembleCollection, buildRequestDescriptor, writeCollection } from './collectionAssembler.js';

const counter = () => {
  let n = 0;
  return () => `uid-${++n}`;
};

describe('collectionAssembler', () => {
  let tmp: string;

  const put = (dir: string, name: string, body = '{}') => {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, name), body, 'utf8');
  };

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'assembler-'));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  describe('buildRequestDescriptor', () => {
    it('derives name and headers from the filename', () => {
      const parsed = { caseId: 'TC', testId: '01_12345', editId: 'E1', code: 'C1', testType: 'LR', stem: 'TC#01_12345#E1#C1#LR' };
      expect(buildRequestDescriptor(parsed, '{"a":1}', counter())).toEqual({
        uid: 'uid-1',
        name: 'TC#01_12345#E1#C1#LR',
        method: 'POST',
        url: '{{baseUrl}}/api/validate/{{tc_id}}',
        headers: [
          { uid: 'uid-2', name: 'Content-Type', value: 'application/json', enabled: true },
          { uid: 'uid-3', name: 'X-Edit-ID', value: 'E1', enabled: true },
          { uid: 'uid-4', name: 'X-EOB-Code', value: 'C1', enabled: true },
          { uid: 'uid-5', name: 'X-Test-Type', value: 'LR', enabled: true },
        ],
        bodyRaw: '{"a":1}',
      });
    });
  });

  describe('assembleCollection', () => {
    it('takes top-level payloads first, then the regression folder', () => {
      put(tmp, 'TC#02#E1#C1#NR.json', '{"b":2}');
      put(tmp, 'TC#01#E1#C1#LR.json', '{"a":1}');
      put(path.join(tmp, 'regression'), 'TC#00#E1#C1#EX.json');
      put(tmp, 'notes.txt', 'ignored');

      const { collection, warnings, filesSeen } = assembleCollection(tmp, 'Demo', { newUid: counter() });

      expect(collection.name).toBe('Demo');
      expect(collection.items.map((i) => i.name)).toEqual(['TC#01#E1#C1#LR', 'TC#02#E1#C1#NR', 'TC#00#E1#C1#EX']);
      expect(collection.items[0].bodyRaw).toBe('{"a":1}');
      expect(collection.items[2].headers[3]).toEqual({ uid: 'uid-15', name: 'X-Test-Type', value: 'EX', enabled: true });
      expect(warnings).toEqual([]);
      expect(filesSeen).toBe(3);
    });

    it('skips payloads whose names do not have five fields', () => {
      put(tmp, 'TC#01#E1#C1#LR.json');
      put(tmp, 'notes.json');

      const { collection, warnings, filesSeen } = assembleCollection(tmp, 'Demo', { newUid: counter() });

      expect(collection.items).toHaveLength(1);
      expect(warnings).toEqual([
        { file: path.join(tmp, 'notes.json'), kind: 'wrong_field_count', message: 'expected 5 fields, found 1' },
      ]);
      expect(filesSeen).toBe(2);
    });

    it('embeds a body that is not valid JSON as raw text', () => {
      put(tmp, 'TC#01#E1#C1#LR.json', 'not json {');

      const { collection } = assembleCollection(tmp, 'Demo', { newUid: counter() });

      expect(collection.items[0].bodyRaw).toBe('not json {');
    });

    it('returns an empty collection with a warning for an empty directory', () => {
      const { collection, warnings } = assembleCollection(tmp, 'Empty', { newUid: counter() });

      expect(collection).toEqual({ name: 'Empty', items: [] });
      expect(warnings).toEqual([{ file: tmp, kind: 'empty_collection', message: "no requests for collection 'Empty'" }]);
    });

    it('throws missing_source_directory for an absent directory', () => {
      const missing = path.join(tmp, 'missing');
      expect(() => assembleCollection(missing, 'Demo')).toThrow(BatchError);
      expect(() => assembleCollection(missing, 'Demo')).toThrow(`collection directory not found: ${missing}`);
    });

    it('produces the same document for the same directory and uids', () => {
      put(tmp, 'TC#01#E1#C1#LR.json', '{"a":1}');
      put(tmp, 'TC#02#E1#C1#NR.json', '{"b":2}');

      const first = serializeCollection(assembleCollection(tmp, 'Demo', { newUid: counter() }).collection);
      const second = serializeCollection(assembleCollection(tmp, 'Demo', { newUid: counter() }).collection);

      expect(second).toBe(first);
    });

    it('assigns unique uids by default', () => {
      put(tmp, 'TC#01#E1#C1#LR.json');
      put(tmp, 'TC#02#E1#C1#NR.json');

      const { collection } = assembleCollection(tmp, 'Demo');
      const uids = collection.items.flatMap((i) => [i.uid, ...i.headers.map((h) => h.uid)]);

      expect(new Set(uids).size).toBe(10);
    });
  });

  describe('writeCollection', () => {
    it('writes the serialized document, creating the output directory', () => {
      put(tmp, 'TC#01#E1#C1#LR.json', '{"a":1}');
      const { collection } = assembleCollection(tmp, 'Demo', { newUid: counter() });
      const outDir = path.join(tmp, 'out', 'Demo');

      const filePath = writeCollection(collection, outDir, 'demo.json');

      expect(filePath).toBe(path.join(outDir, 'demo.json'));
      const text = fs.readFileSync(filePath, 'utf8');
      expect(text).toBe(serializeCollection(collection));
      expect(deserializeCollection(text)).toEqual({ ok: true, value: collection });
    });
  });
});
