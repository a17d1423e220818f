/**
 * Tests for start-up seeding from an export document on disk
 */

import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { seedCollectionFromFile } from '../../server/seed.js';
import { TestHelpers } from '../setup.js';

describe('seedCollectionFromFile', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'kg-seed-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  test('should skip a missing file', async () => {
    const { service } = TestHelpers.createService();

    const result = await seedCollectionFromFile(service, join(directory, 'absent.json'), 'demo');

    expect(result).toEqual({ success: true, seeded: false, errors: [] });
  });

  test('should import the document into the collection', async () => {
    const { service } = TestHelpers.createService();
    const file = join(directory, 'seed.json');
    await fs.writeFile(file, JSON.stringify({
      nodes: [{ node_id: 'a', name: 'A' }, { node_id: 'b', name: 'B' }],
      edges: [{ source_node_id: 'a', target_node_id: 'b', relation_type: 'links' }]
    }));

    const result = await seedCollectionFromFile(service, file, 'demo');

    expect(result.success).toBe(true);
    expect(result.result).toMatchObject({ nodesCreated: 2, edgesCreated: 1 });
    expect((await service.getEdge('demo', 'a_links_b')).relationType).toBe('links');
  });

  test('should report unreadable documents without throwing', async () => {
    const { service } = TestHelpers.createService();
    const file = join(directory, 'broken.json');
    await fs.writeFile(file, '{ "nodes": [');

    const result = await seedCollectionFromFile(service, file, 'demo', { verbose: false });

    expect(result.success).toBe(false);
    expect(result.seeded).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(await service.listCollections()).toEqual([]);
  });
});
