/**
 * JSONL-based record store
 *
 * Each collection lives in its own directory with one append-only log per
 * record kind (`nodes.jsonl`, `edges.jsonl`). Every line is either an
 * upsert carrying the full record or a delete tombstone. Logs are replayed
 * into memory on first access; `compact` rewrites a log to its live records.
 *
 * References:
 * - JSONL specification: https://jsonlines.org/
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { GraphEdge, GraphNode, RecordKind, RecordMap } from '../core/types.js';
import { storedEdgeSchema, storedNodeSchema } from '../utils/validation.js';
import { selectRecords } from './filter.js';
import { cloneRecord } from './memory-store.js';
import type { ListOptions, RecordStore, StorageConfig } from './types.js';

type CollectionRecords = { [K in RecordKind]: Map<string, RecordMap[K]> };

const LOG_FILES: Record<RecordKind, string> = {
  node: 'nodes.jsonl',
  edge: 'edges.jsonl'
};

const deleteLineSchema = z.object({ op: z.literal('delete'), id: z.string() });
const nodeLineSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('upsert'), record: storedNodeSchema }),
  deleteLineSchema
]);
const edgeLineSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('upsert'), record: storedEdgeSchema }),
  deleteLineSchema
]);

/**
 * Append-only JSONL record store
 */
export class JSONLRecordStore implements RecordStore {
  private loaded: Map<string, CollectionRecords> = new Map();
  private loading: Map<string, Promise<CollectionRecords>> = new Map();
  private initialized = false;

  constructor(private readonly config: StorageConfig) {}

  async initialize(): Promise<void> {
    await fs.mkdir(this.config.directory, { recursive: true });
    this.initialized = true;
  }

  async get<K extends RecordKind>(collection: string, kind: K, id: string): Promise<RecordMap[K] | undefined> {
    const records = await this.load(collection);
    const record = records[kind].get(id);
    return record ? cloneRecord(record) : undefined;
  }

  async list<K extends RecordKind>(collection: string, kind: K, options?: ListOptions): Promise<Array<RecordMap[K]>> {
    const records = await this.load(collection);
    return selectRecords(kind, records[kind].values(), options).map(cloneRecord);
  }

  async upsert<K extends RecordKind>(collection: string, kind: K, record: RecordMap[K]): Promise<void> {
    const records = await this.load(collection);
    await this.appendLine(collection, kind, JSON.stringify({ op: 'upsert', record }));
    records[kind].set(record.id, cloneRecord(record));
  }

  async delete(collection: string, kind: RecordKind, id: string): Promise<boolean> {
    const records = await this.load(collection);
    if (!records[kind].has(id)) {
      return false;
    }
    await this.appendLine(collection, kind, JSON.stringify({ op: 'delete', id }));
    records[kind].delete(id);
    return true;
  }

  async listCollections(): Promise<string[]> {
    this.assertInitialized();
    const entries = await fs.readdir(this.config.directory, { withFileTypes: true });
    const names: string[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const records = await this.load(entry.name);
      if (records.node.size > 0 || records.edge.size > 0) {
        names.push(entry.name);
      }
    }

    return names.sort();
  }

  /**
   * Rewrite both logs of a collection so they hold only live records
   */
  async compact(collection: string): Promise<{ nodes: number; edges: number }> {
    const records = await this.load(collection);
    await this.rewriteLog(collection, 'node', [...records.node.values()]);
    await this.rewriteLog(collection, 'edge', [...records.edge.values()]);
    return { nodes: records.node.size, edges: records.edge.size };
  }

  async close(): Promise<void> {
    await Promise.all(this.loading.values());
    this.loaded.clear();
    this.loading.clear();
    this.initialized = false;
  }

  // Private helper methods

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new Error('Storage not initialized');
    }
  }

  private collectionDir(collection: string): string {
    return join(this.config.directory, collection);
  }

  private logPath(collection: string, kind: RecordKind): string {
    return join(this.collectionDir(collection), LOG_FILES[kind]);
  }

  private async load(collection: string): Promise<CollectionRecords> {
    this.assertInitialized();

    const cached = this.loaded.get(collection);
    if (cached) {
      return cached;
    }

    let pending = this.loading.get(collection);
    if (!pending) {
      pending = this.replay(collection);
      this.loading.set(collection, pending);
    }

    try {
      const records = await pending;
      this.loaded.set(collection, records);
      return records;
    } finally {
      this.loading.delete(collection);
    }
  }

  private async replay(collection: string): Promise<CollectionRecords> {
    const records: CollectionRecords = {
      node: new Map<string, GraphNode>(),
      edge: new Map<string, GraphEdge>()
    };

    let replayedLines = 0;
    for (const line of await this.readLines(collection, 'node')) {
      replayedLines++;
      const entry = parseLine(nodeLineSchema, line, this.logPath(collection, 'node'));
      if (!entry) continue;
      if (entry.op === 'upsert') {
        records.node.set(entry.record.id, entry.record);
      } else {
        records.node.delete(entry.id);
      }
    }

    for (const line of await this.readLines(collection, 'edge')) {
      replayedLines++;
      const entry = parseLine(edgeLineSchema, line, this.logPath(collection, 'edge'));
      if (!entry) continue;
      if (entry.op === 'upsert') {
        records.edge.set(entry.record.id, entry.record);
      } else {
        records.edge.delete(entry.id);
      }
    }

    const liveRecords = records.node.size + records.edge.size;
    if (this.config.compactOnLoad && replayedLines > liveRecords) {
      await this.rewriteLog(collection, 'node', [...records.node.values()]);
      await this.rewriteLog(collection, 'edge', [...records.edge.values()]);
      console.log(`🗜️  Compacted ${collection}: ${replayedLines} log lines -> ${liveRecords} records`);
    }

    return records;
  }

  private async readLines(collection: string, kind: RecordKind): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath(collection, kind), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
    return content.split('\n').filter(line => line.trim().length > 0);
  }

  private async appendLine(collection: string, kind: RecordKind, line: string): Promise<void> {
    await fs.mkdir(this.collectionDir(collection), { recursive: true });
    await fs.appendFile(this.logPath(collection, kind), line + '\n', 'utf-8');
  }

  private async rewriteLog(collection: string, kind: RecordKind, records: Array<GraphNode | GraphEdge>): Promise<void> {
    const target = this.logPath(collection, kind);
    const temporary = `${target}.tmp`;
    const content = records.map(record => JSON.stringify({ op: 'upsert', record }) + '\n').join('');

    await fs.mkdir(this.collectionDir(collection), { recursive: true });
    await fs.writeFile(temporary, content, 'utf-8');
    await fs.rename(temporary, target);
  }
}

function parseLine<S extends z.ZodTypeAny>(schema: S, line: string, source: string): z.output<S> | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    console.warn(`⚠️ Skipping unparseable line in ${source}`);
    return undefined;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    console.warn(`⚠️ Skipping invalid record in ${source}: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    return undefined;
  }
  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
