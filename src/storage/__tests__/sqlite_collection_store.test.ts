/**
 * @fileoverview Tests for the SQLite collection store
 *
 * Every test runs against its own `:memory:` database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { StorageError, ValidationError } from '../../core/errors.js';
import type { AnswerSynthesizer, EmbeddingFunction } from '../../retrieval/types.js';
import { SqliteCollectionStore } from '../sqlite_collection_store.js';
import type { ChunkNode } from '../types.js';

// ============================================================================
// FIXTURES
// ============================================================================

/** Every query embeds to the x axis, so a leaf's score is its x component. */
const embedAlongX: EmbeddingFunction = async (texts) => texts.map(() => [1, 0]);

/** Answers with the retrieved ids, to make retrieval visible. */
const listIds: AnswerSynthesizer = async (_query, chunks) => chunks.map((chunk) => chunk.id).join(',');

const META = { filename: 'pump.pdf', file_path: '/manuals/pump.pdf' };

function leaf(id: string, parentId: string | null, embedding: number[], page: number): ChunkNode {
  return { id, parentId, level: 1, text: `text ${id}`, metadata: { ...META, page }, embedding };
}

/** Section `sec` holds leaves a, b, c; a is closest to the query. */
const TREE: ChunkNode[] = [
  { id: 'sec', parentId: null, level: 0, text: 'text sec', metadata: { ...META, page: 1, start_page: 1, end_page: 2 } },
  leaf('a', 'sec', [1, 0], 1),
  leaf('b', 'sec', [0.8, 0.6], 1),
  leaf('c', 'sec', [0, 1], 2),
];

// ============================================================================
// TESTS
// ============================================================================

describe('SqliteCollectionStore', () => {
  let db: Database.Database;
  let store: SqliteCollectionStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = new SqliteCollectionStore(db, { synthesize: listIds });
  });

  afterEach(() => {
    store.close();
  });

  describe('collections', () => {
    it('lists collections by name', async () => {
      store.createCollection('zeta');
      store.createCollection('alpha', { sourceFile: '/docs/alpha.pdf' });

      expect(await store.listCollections()).toEqual(['alpha', 'zeta']);
    });

    it('describes node counts and docstore presence', () => {
      store.createCollection('pump', { sourceFile: '/manuals/pump.pdf' });
      store.addNodes('pump', TREE);

      expect(store.describeCollection('pump')).toMatchObject({
        name: 'pump',
        sourceFile: '/manuals/pump.pdf',
        nodeCount: 4,
        leafCount: 3,
        hasDocstore: true,
      });
    });

    it('reports no docstore for a flat collection', () => {
      store.createCollection('flat');
      store.addNodes('flat', [leaf('x', null, [1, 0], 1)]);

      expect(store.describeCollection('flat')?.hasDocstore).toBe(false);
    });

    it('replaces the nodes of an existing collection', () => {
      store.createCollection('pump');
      store.addNodes('pump', TREE);

      store.createCollection('pump', { replace: true });

      expect(store.describeCollection('pump')?.nodeCount).toBe(0);
    });

    it('replaces a collection in one write', () => {
      store.createCollection('pump');
      store.addNodes('pump', TREE);

      expect(store.replaceCollection('pump', [leaf('x', null, [1, 0], 3)], { sourceFile: '/manuals/pump.pdf' })).toBe(1);
      expect(store.describeCollection('pump')).toMatchObject({
        sourceFile: '/manuals/pump.pdf',
        nodeCount: 1,
        leafCount: 1,
        hasDocstore: false,
      });
    });

    it('keeps the old nodes when a replacement fails', () => {
      store.createCollection('pump');
      store.addNodes('pump', TREE);
      const duplicated = [leaf('x', null, [1, 0], 3), leaf('x', null, [0, 1], 4)];

      expect(() => store.replaceCollection('pump', duplicated)).toThrow(
        /^Storage write failed: replace collection pump: /
      );
      expect(store.describeCollection('pump')).toMatchObject({ nodeCount: 4, leafCount: 3 });
    });

    it('creates the collection it replaces', async () => {
      store.replaceCollection('fresh', [leaf('x', null, [1, 0], 1)]);

      expect(await store.listCollections()).toEqual(['fresh']);
    });

    it('deletes a collection and its nodes', async () => {
      store.createCollection('pump');
      store.addNodes('pump', TREE);

      expect(store.deleteCollection('pump')).toBe(true);
      expect(store.deleteCollection('pump')).toBe(false);
      expect(await store.listCollections()).toEqual([]);
    });
  });

  describe('addNodes', () => {
    it('rejects nodes for a missing collection', () => {
      expect(() => store.addNodes('ghost', TREE)).toThrow(StorageError);
    });

    it('rejects malformed metadata before writing anything', () => {
      store.createCollection('pump');
      const bad: ChunkNode = { ...leaf('bad', null, [1, 0], 1), metadata: { page: -4 } };

      expect(() => store.addNodes('pump', [leaf('ok', null, [1, 0], 1), bad])).toThrow(ValidationError);
      expect(store.describeCollection('pump')?.nodeCount).toBe(0);
    });

    it('wraps duplicate ids in a StorageError', () => {
      store.createCollection('pump');
      store.addNodes('pump', TREE);

      expect(() => store.addNodes('pump', [TREE[1]])).toThrow(/^Storage write failed: add 1 nodes to pump: /);
    });
  });

  describe('loadIndex', () => {
    beforeEach(() => {
      store.createCollection('pump');
      store.addNodes('pump', TREE);
    });

    it('rejects a missing collection', async () => {
      await expect(store.loadIndex('ghost', embedAlongX)).rejects.toThrow(
        'Storage open failed: collection "ghost" does not exist'
      );
    });

    it('returns the top-K leaves by cosine similarity in flat mode', async () => {
      const { handle, hasDocstore } = await store.loadIndex('pump', embedAlongX);

      const response = await handle.query('pressure', { topK: 2, mode: 'flat' });

      expect(hasDocstore).toBe(true);
      expect(response.answer).toBe('a,b');
      expect(response.chunks.map((chunk) => chunk.score)).toEqual([1, expect.closeTo(0.8, 5)]);
    });

    it('round-trips chunk metadata', async () => {
      const { handle } = await store.loadIndex('pump', embedAlongX);

      const { chunks } = await handle.query('pressure', { topK: 1, mode: 'flat' });

      expect(chunks[0]).toEqual({
        id: 'a',
        text: 'text a',
        score: 1,
        metadata: { filename: 'pump.pdf', file_path: '/manuals/pump.pdf', page: 1 },
      });
    });

    it('merges retrieved siblings into their parent in hierarchical mode', async () => {
      const { handle } = await store.loadIndex('pump', embedAlongX);

      const response = await handle.query('pressure', { topK: 2, mode: 'hierarchical' });

      expect(response.answer).toBe('sec');
      expect(response.chunks[0]?.metadata).toEqual({ ...META, page: 1, start_page: 1, end_page: 2 });
      expect(response.chunks[0]?.score).toBeCloseTo(0.9, 5);
    });

    it('keeps leaves when too few siblings are retrieved', async () => {
      const { handle } = await store.loadIndex('pump', embedAlongX);

      const response = await handle.query('pressure', { topK: 1, mode: 'hierarchical' });

      expect(response.answer).toBe('a');
    });

    it('reports corrupt metadata as a StorageError', async () => {
      const { handle } = await store.loadIndex('pump', embedAlongX);
      db.prepare('UPDATE pagecite_chunks SET metadata = ? WHERE id = ?').run('{not json', 'b');

      await expect(handle.query('pressure', { topK: 1, mode: 'flat' })).rejects.toThrow(
        'Storage read failed: corrupt metadata for chunk b'
      );
    });

    it('answers from the leaves stored at query time', async () => {
      const { handle } = await store.loadIndex('pump', embedAlongX);
      store.replaceCollection('pump', [leaf('fresh', null, [1, 0], 9)]);

      const response = await handle.query('pressure', { topK: 2, mode: 'flat' });

      expect(response.answer).toBe('fresh');
    });

    it('rejects queries once the collection is deleted', async () => {
      const { handle } = await store.loadIndex('pump', embedAlongX);
      store.deleteCollection('pump');

      await expect(handle.query('pressure', { topK: 1, mode: 'flat' })).rejects.toThrow(
        'Storage query failed: collection "pump" does not exist'
      );
    });
  });

  describe('open', () => {
    it('opens a throwaway in-memory store', async () => {
      const memory = SqliteCollectionStore.open(':memory:');

      expect(await memory.listCollections()).toEqual([]);
      memory.close();
    });
  });
});
