/**
 * Integration tests for the JSONL record store against a temporary directory
 */

import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '../../core/errors.js';
import { DefaultStoreFactory, createRecordStore } from '../../storage/factory.js';
import { JSONLRecordStore } from '../../storage/jsonl-store.js';
import { TestHelpers } from '../setup.js';

const { node, edge } = TestHelpers;

describe('JSONLRecordStore', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'kg-jsonl-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  async function openStore(compactOnLoad = false): Promise<JSONLRecordStore> {
    const store = new JSONLRecordStore({ type: 'jsonl', directory, compactOnLoad });
    await store.initialize();
    return store;
  }

  async function logLines(collection: string, file: string): Promise<string[]> {
    const content = await fs.readFile(join(directory, collection, file), 'utf-8');
    return content.split('\n').filter(line => line.length > 0);
  }

  test('should persist records across store instances', async () => {
    const first = await openStore();
    await first.upsert('kg1', 'node', node('p1', 'Alice', 'Person', { tags: ['a', 'b'] }));
    await first.upsert('kg1', 'node', node('p2', 'Bob'));
    await first.upsert('kg1', 'edge', edge('e1', 'p1', 'p2', 'knows', { weight: 0.5 }));
    await first.close();

    const second = await openStore();
    const alice = await second.get('kg1', 'node', 'p1');

    expect(alice).toEqual(node('p1', 'Alice', 'Person', { tags: ['a', 'b'] }));
    expect(alice?.createdAt).toBeInstanceOf(Date);
    expect((await second.get('kg1', 'edge', 'e1'))?.weight).toBe(0.5);
    expect((await second.list('kg1', 'node')).map(n => n.id)).toEqual(['p1', 'p2']);
  });

  test('should append a tombstone on delete', async () => {
    const store = await openStore();
    await store.upsert('kg1', 'node', node('p1', 'Alice'));
    expect(await store.delete('kg1', 'node', 'p1')).toBe(true);
    expect(await store.delete('kg1', 'node', 'p1')).toBe(false);

    const lines = await logLines('kg1', 'nodes.jsonl');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? '')).toEqual({ op: 'delete', id: 'p1' });

    const reopened = await openStore();
    expect(await reopened.get('kg1', 'node', 'p1')).toBeUndefined();
  });

  test('should skip malformed lines when replaying', async () => {
    await fs.mkdir(join(directory, 'kg1'), { recursive: true });
    const valid = JSON.stringify({ op: 'upsert', record: node('p1', 'Alice') });
    await fs.writeFile(
      join(directory, 'kg1', 'nodes.jsonl'),
      ['not json', valid, JSON.stringify({ op: 'upsert', record: { id: 'broken' } })].join('\n') + '\n'
    );

    const store = await openStore();

    expect((await store.list('kg1', 'node')).map(n => n.id)).toEqual(['p1']);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  test('should compact a log to its live records', async () => {
    const store = await openStore();
    await store.upsert('kg1', 'node', node('p1', 'Alice'));
    await store.upsert('kg1', 'node', node('p1', 'Alicia'));
    await store.upsert('kg1', 'node', node('p2', 'Bob'));
    await store.delete('kg1', 'node', 'p2');

    expect(await store.compact('kg1')).toEqual({ nodes: 1, edges: 0 });

    const lines = await logLines('kg1', 'nodes.jsonl');
    expect(lines).toHaveLength(1);
    const reopened = await openStore();
    expect((await reopened.get('kg1', 'node', 'p1'))?.name).toBe('Alicia');
  });

  test('should compact on load when configured', async () => {
    const writer = await openStore();
    await writer.upsert('kg1', 'node', node('p1', 'Alice'));
    await writer.upsert('kg1', 'node', node('p1', 'Alicia'));

    const reader = await openStore(true);
    expect((await reader.get('kg1', 'node', 'p1'))?.name).toBe('Alicia');
    expect(await logLines('kg1', 'nodes.jsonl')).toHaveLength(1);
  });

  test('should list collections with live records only', async () => {
    const store = await openStore();
    await store.upsert('kg1', 'node', node('p1', 'Alice'));
    await store.upsert('gone', 'node', node('x', 'X', null, {}, 'gone'));
    await store.delete('gone', 'node', 'x');

    expect(await store.listCollections()).toEqual(['kg1']);
  });

  test('should refuse to operate before initialize', async () => {
    const store = new JSONLRecordStore({ type: 'jsonl', directory, compactOnLoad: false });

    await expect(store.get('kg1', 'node', 'p1')).rejects.toThrow('Storage not initialized');
  });
});

describe('DefaultStoreFactory', () => {
  test('should list the available backends', () => {
    expect(new DefaultStoreFactory().getAvailableTypes()).toEqual(['memory', 'jsonl']);
  });

  test('should reject a jsonl configuration without a directory', async () => {
    const factory = new DefaultStoreFactory();
    const config = { type: 'jsonl' as const, directory: ' ', compactOnLoad: false };

    expect(factory.validateConfig(config)).toEqual({ valid: false, errors: ['Directory is required'] });
    await expect(factory.create(config)).rejects.toBeInstanceOf(ValidationError);
  });

  test('should create an initialized in-memory store', async () => {
    const store = await createRecordStore({ type: 'memory', directory: '', compactOnLoad: false });
    await store.upsert('kg1', 'node', TestHelpers.node('p1', 'Alice'));

    expect(await store.listCollections()).toEqual(['kg1']);
  });
});
