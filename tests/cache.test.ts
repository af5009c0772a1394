import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MetadataCache, parseSnapshot } from '../src/core/cache.js';
import { LoadError, MalformedMetadataError } from '../src/utils/errors.js';

describe('parseSnapshot', () => {
  it('maps column descriptors and keeps their order', () => {
    const snapshot = parseSnapshot('mem', JSON.stringify({
      users: [
        { column_name: 'id', data_type: 'integer', is_nullable: 'NO', ordinal: 1 },
        { column_name: 'email', data_type: 'text', is_nullable: true },
      ],
      empty: [],
    }));

    expect(Array.from(snapshot.keys())).toEqual(['users', 'empty']);
    expect(snapshot.get('users')).toEqual([
      { name: 'id', dataType: 'integer', isNullable: 'NO' },
      { name: 'email', dataType: 'text', isNullable: true },
    ]);
    expect(snapshot.get('empty')).toEqual([]);
  });

  it('keeps a table named __proto__', () => {
    const snapshot = parseSnapshot('mem', '{"__proto__": [{"column_name": "id", "data_type": "integer", "is_nullable": "NO"}], "users": []}');

    expect(Array.from(snapshot.keys())).toEqual(['__proto__', 'users']);
    expect(snapshot.get('__proto__')).toEqual([{ name: 'id', dataType: 'integer', isNullable: 'NO' }]);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseSnapshot('broken.json', '{ users: ')).toThrow(LoadError);
  });

  it('rejects documents that are not a table to column list mapping', () => {
    expect(() => parseSnapshot('a.json', '[]')).toThrow(LoadError);
    expect(() => parseSnapshot('b.json', '{"users": {"id": {}}}')).toThrow(LoadError);
    expect(() => parseSnapshot('c.json', '{"users": ["id"]}')).toThrow(LoadError);
  });

  it('names the missing column field', () => {
    const text = JSON.stringify({
      users: [
        { column_name: 'id', data_type: 'integer', is_nullable: 'NO' },
        { column_name: 'email', is_nullable: 'YES' },
      ],
    });

    expect(() => parseSnapshot('db.json', text)).toThrow(MalformedMetadataError);
    try {
      parseSnapshot('db.json', text);
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedMetadataError);
      if (error instanceof MalformedMetadataError) {
        expect(error.table).toBe('users');
        expect(error.index).toBe(1);
        expect(error.field).toBe('data_type');
        expect(error.message).toBe('Malformed metadata in db.json: table "users" column #1 has no valid "data_type"');
      }
    }
  });

  it('rejects a nullability that is neither string nor boolean', () => {
    const text = JSON.stringify({ t: [{ column_name: 'c', data_type: 'int', is_nullable: 1 }] });
    expect(() => parseSnapshot('db.json', text)).toThrow(MalformedMetadataError);
  });
});

describe('MetadataCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pgdrift-cache-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns the same snapshot without reading the file again', async () => {
    const file = path.join(dir, 'db1.json');
    await fs.writeJson(file, { users: [{ column_name: 'id', data_type: 'int', is_nullable: 'NO' }] });

    const cache = new MetadataCache();
    const first = await cache.load(file);
    await fs.remove(file);
    const second = await cache.load(file);

    expect(second).toBe(first);
    expect(cache.size).toBe(1);
  });

  it('shares one read between concurrent loads', async () => {
    const reader = vi.fn(async () => '{"t": []}');
    const cache = new MetadataCache(reader);

    const [a, b] = await Promise.all([cache.load('src'), cache.load('src')]);

    expect(a).toBe(b);
    expect(reader).toHaveBeenCalledTimes(1);
  });

  it('keys snapshots by source id', async () => {
    const reader = vi.fn(async (sourceId: string) => JSON.stringify({ [sourceId]: [] }));
    const cache = new MetadataCache(reader);

    const a = await cache.load('a');
    const b = await cache.load('b');

    expect(Array.from(a.keys())).toEqual(['a']);
    expect(Array.from(b.keys())).toEqual(['b']);
    expect(reader).toHaveBeenCalledTimes(2);
  });

  it('wraps unreadable sources in LoadError', async () => {
    const cache = new MetadataCache();
    await expect(cache.load(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(LoadError);
  });

  it('does not keep a failed load', async () => {
    const reader = vi.fn()
      .mockRejectedValueOnce(new Error('EACCES'))
      .mockResolvedValueOnce('{}');
    const cache = new MetadataCache(reader);

    await expect(cache.load('src')).rejects.toThrow('Failed to load metadata from src: EACCES');
    expect(cache.size).toBe(0);
    await expect(cache.load('src')).resolves.toEqual(new Map());
    expect(reader).toHaveBeenCalledTimes(2);
  });
});
