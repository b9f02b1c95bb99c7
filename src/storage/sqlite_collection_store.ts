/**
 * @fileoverview SQLite collection store
 *
 * Persists named collections of chunk trees in one better-sqlite3 database.
 * Leaf embeddings are Float32 BLOBs; similarity search is brute-force cosine
 * over the leaves of the queried collection, read on every query.
 *
 * Tables:
 * - pagecite_collections: one row per collection
 * - pagecite_chunks: every node of every collection, keyed by (collection, id)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { parseChunkMetadata } from '../citations/chunk_schema.js';
import type { Chunk } from '../citations/types.js';
import { StorageError, describeError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { extractiveSynthesizer } from '../providers/extractive_synthesizer.js';
import type {
  AnswerSynthesizer,
  EmbeddingFunction,
  IndexHandle,
  LoadedIndex,
  StorageProvider,
} from '../retrieval/types.js';
import { logDebug, logError, logInfo } from '../telemetry/logger.js';
import { autoMerge, type ChunkHierarchy } from './auto_merge.js';
import type { ChunkNode, CollectionInfo, CreateCollectionOptions } from './types.js';
import { cosineSimilarity, decodeEmbedding, encodeEmbedding } from './vectors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SqliteCollectionStoreOptions {
  /** Fraction of a parent's children retrieved before they merge (default: 0.5) */
  autoMergeRatio?: number;
  /** Turns retrieved chunks into answer text (default: extractive) */
  synthesize?: AnswerSynthesizer;
}

interface CollectionRow {
  name: string;
  source_file: string | null;
  created_at: number;
  node_count: number;
  leaf_count: number;
  parent_links: number;
}

interface ChunkRow {
  id: string;
  text: string;
  metadata: string;
}

interface LeafRow extends ChunkRow {
  embedding: Buffer;
}

/** collection, id, parent_id, level, position, text, metadata, embedding */
type ChunkInsertParams = [string, string, string | null, number, number, string, string, Buffer | null];

interface IndexedLeaf {
  chunk: Chunk;
  vector: Float32Array;
}

function byScoreDescending(a: Chunk, b: Chunk): number {
  return (b.score ?? 0) - (a.score ?? 0);
}

// ============================================================================
// STORE
// ============================================================================

export class SqliteCollectionStore implements StorageProvider {
  private readonly db: Database.Database;
  private readonly autoMergeRatio: number;
  private readonly synthesize: AnswerSynthesizer;

  private readonly stmtInsertCollection: Database.Statement<[string, string | null, number]>;
  private readonly stmtDescribe: Database.Statement<[string], CollectionRow>;
  private readonly stmtList: Database.Statement<[], { name: string }>;
  private readonly stmtDeleteChunks: Database.Statement<[string]>;
  private readonly stmtDeleteCollection: Database.Statement<[string]>;
  private readonly stmtInsertChunk: Database.Statement<ChunkInsertParams>;
  private readonly stmtLeaves: Database.Statement<[string], LeafRow>;
  private readonly stmtChunk: Database.Statement<[string, string], ChunkRow>;
  private readonly stmtParentOf: Database.Statement<[string, string], { parent_id: string | null }>;
  private readonly stmtChildCount: Database.Statement<[string, string], { count: number }>;

  constructor(db: Database.Database, options: SqliteCollectionStoreOptions = {}) {
    this.db = db;
    this.autoMergeRatio = options.autoMergeRatio ?? 0.5;
    this.synthesize = options.synthesize ?? extractiveSynthesizer;

    this.ensureTables();

    this.stmtInsertCollection = this.db.prepare<[string, string | null, number]>(`
      INSERT INTO pagecite_collections (name, source_file, created_at)
      VALUES (?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET source_file = COALESCE(excluded.source_file, source_file)
    `);

    this.stmtDescribe = this.db.prepare<[string], CollectionRow>(`
      SELECT
        c.name,
        c.source_file,
        c.created_at,
        COUNT(n.id) AS node_count,
        COUNT(n.embedding) AS leaf_count,
        COUNT(n.parent_id) AS parent_links
      FROM pagecite_collections c
      LEFT JOIN pagecite_chunks n ON n.collection = c.name
      WHERE c.name = ?
      GROUP BY c.name
    `);

    this.stmtList = this.db.prepare<[], { name: string }>(`
      SELECT name FROM pagecite_collections ORDER BY name
    `);

    this.stmtDeleteChunks = this.db.prepare<[string]>(`
      DELETE FROM pagecite_chunks WHERE collection = ?
    `);

    this.stmtDeleteCollection = this.db.prepare<[string]>(`
      DELETE FROM pagecite_collections WHERE name = ?
    `);

    this.stmtInsertChunk = this.db.prepare<ChunkInsertParams>(`
      INSERT INTO pagecite_chunks (collection, id, parent_id, level, position, text, metadata, embedding)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.stmtLeaves = this.db.prepare<[string], LeafRow>(`
      SELECT id, text, metadata, embedding FROM pagecite_chunks
      WHERE collection = ? AND embedding IS NOT NULL
      ORDER BY position
    `);

    this.stmtChunk = this.db.prepare<[string, string], ChunkRow>(`
      SELECT id, text, metadata FROM pagecite_chunks
      WHERE collection = ? AND id = ?
    `);

    this.stmtParentOf = this.db.prepare<[string, string], { parent_id: string | null }>(`
      SELECT parent_id FROM pagecite_chunks
      WHERE collection = ? AND id = ?
    `);

    this.stmtChildCount = this.db.prepare<[string, string], { count: number }>(`
      SELECT COUNT(*) AS count FROM pagecite_chunks
      WHERE collection = ? AND parent_id = ?
    `);
  }

  /**
   * Open (creating if needed) a store file. `:memory:` gives a throwaway store.
   *
   * @throws StorageError when the database cannot be opened
   */
  static open(filePath: string, options: SqliteCollectionStoreOptions = {}): SqliteCollectionStore {
    try {
      if (filePath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      }
      const db = new Database(filePath);
      db.pragma('journal_mode = WAL');
      logDebug(`Opened collection store at ${filePath}`);
      return new SqliteCollectionStore(db, options);
    } catch (error) {
      throw new StorageError(
        'open',
        false,
        `cannot open store ${filePath}: ${describeError(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private ensureTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pagecite_collections (
        name TEXT PRIMARY KEY,
        source_file TEXT,
        created_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS pagecite_chunks (
        collection TEXT NOT NULL REFERENCES pagecite_collections(name) ON DELETE CASCADE,
        id TEXT NOT NULL,
        parent_id TEXT,
        level INTEGER NOT NULL,
        position INTEGER NOT NULL,
        text TEXT NOT NULL,
        metadata TEXT NOT NULL,
        embedding BLOB,
        PRIMARY KEY (collection, id)
      );
      CREATE INDEX IF NOT EXISTS idx_chunks_parent ON pagecite_chunks(collection, parent_id);
    `);
  }

  close(): void {
    this.db.close();
  }

  // --------------------------------------------------------------------------
  // Collections
  // --------------------------------------------------------------------------

  createCollection(name: string, options: CreateCollectionOptions = {}): void {
    const create = this.db.transaction(() => {
      if (options.replace) {
        this.stmtDeleteChunks.run(name);
      }
      this.stmtInsertCollection.run(name, options.sourceFile ?? null, Date.now());
    });
    this.write(`create collection ${name}`, () => create());
    logInfo(`Collection ${name} ready${options.replace ? ' (replaced)' : ''}`);
  }

  deleteCollection(name: string): boolean {
    const remove = this.db.transaction(() => {
      this.stmtDeleteChunks.run(name);
      return this.stmtDeleteCollection.run(name).changes > 0;
    });
    return this.write(`delete collection ${name}`, () => remove());
  }

  hasCollection(name: string): boolean {
    return this.stmtDescribe.get(name) !== undefined;
  }

  describeCollection(name: string): CollectionInfo | undefined {
    const row = this.stmtDescribe.get(name);
    if (!row) return undefined;
    return {
      name: row.name,
      sourceFile: row.source_file,
      createdAt: new Date(row.created_at),
      nodeCount: row.node_count,
      leafCount: row.leaf_count,
      hasDocstore: row.parent_links > 0,
    };
  }

  async listCollections(): Promise<string[]> {
    return this.stmtList.all().map((row) => row.name);
  }

  /**
   * Append nodes to a collection. Metadata is validated before anything is
   * written; the batch is written in one transaction.
   *
   * @throws ValidationError for malformed metadata
   * @throws StorageError when the collection is missing or the write fails
   */
  addNodes(collectionName: string, nodes: readonly ChunkNode[]): number {
    const info = this.describeCollection(collectionName);
    if (!info) {
      throw new StorageError('write', false, `collection "${collectionName}" does not exist`);
    }

    const rows = this.toRows(nodes);
    const insert = this.db.transaction(() => this.insertRows(collectionName, rows, info.nodeCount));
    this.write(`add ${rows.length} nodes to ${collectionName}`, () => insert());

    logDebug(`Stored ${rows.length} nodes in ${collectionName}`);
    return rows.length;
  }

  /**
   * Create or overwrite a collection with `nodes`. The old nodes are dropped
   * in the same transaction, so a failed write leaves them in place.
   *
   * @throws ValidationError for malformed metadata
   * @throws StorageError when the write fails
   */
  replaceCollection(name: string, nodes: readonly ChunkNode[], options: { sourceFile?: string } = {}): number {
    const rows = this.toRows(nodes);
    const replace = this.db.transaction(() => {
      this.stmtDeleteChunks.run(name);
      this.stmtInsertCollection.run(name, options.sourceFile ?? null, Date.now());
      this.insertRows(name, rows, 0);
    });
    this.write(`replace collection ${name}`, () => replace());

    logInfo(`Collection ${name} replaced with ${rows.length} nodes`);
    return rows.length;
  }

  private toRows(nodes: readonly ChunkNode[]): Array<{ node: ChunkNode; metadata: string }> {
    return nodes.map((node) => ({
      node,
      metadata: JSON.stringify(parseChunkMetadata(node.metadata)),
    }));
  }

  private insertRows(
    collectionName: string,
    rows: ReadonlyArray<{ node: ChunkNode; metadata: string }>,
    firstPosition: number
  ): void {
    rows.forEach(({ node, metadata }, index) => {
      this.stmtInsertChunk.run(
        collectionName,
        node.id,
        node.parentId,
        node.level,
        firstPosition + index,
        node.text,
        metadata,
        node.embedding ? encodeEmbedding(node.embedding) : null
      );
    });
  }

  private write<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      logError(`Write to collection store failed: ${what}`, { error: describeError(error) });
      throw new StorageError('write', false, `${what}: ${describeError(error)}`, error instanceof Error ? error : undefined);
    }
  }

  // --------------------------------------------------------------------------
  // Index
  // --------------------------------------------------------------------------

  /**
   * The handle reads leaves on every query; a corrupt row fails that query.
   *
   * @throws StorageError when the collection is missing
   */
  async loadIndex(collectionName: string, embed: EmbeddingFunction): Promise<LoadedIndex> {
    const info = this.describeCollection(collectionName);
    if (!info) {
      throw new StorageError('open', false, `collection "${collectionName}" does not exist`);
    }

    const handle: IndexHandle = {
      query: async (queryText, { topK, mode }) => {
        const [queryVector] = await embed([queryText]);
        if (queryVector === undefined) {
          throw new StorageError('query', false, 'embedding function returned no vector');
        }

        const retrieved = this.leavesOf(collectionName)
          .map(({ chunk, vector }) => ({ ...chunk, score: cosineSimilarity(queryVector, vector) }))
          .sort(byScoreDescending)
          .slice(0, topK);

        const chunks = mode === 'hierarchical'
          ? autoMerge(retrieved, this.hierarchyOf(collectionName), this.autoMergeRatio)
          : retrieved;

        return { answer: await this.synthesize(queryText, chunks), chunks };
      },
    };

    return { handle, hasDocstore: info.hasDocstore };
  }

  /**
   * Read at query time so a handle follows re-ingestion and deletion.
   *
   * @throws StorageError when the collection no longer exists
   */
  private leavesOf(collectionName: string): IndexedLeaf[] {
    if (!this.hasCollection(collectionName)) {
      throw new StorageError('query', false, `collection "${collectionName}" does not exist`);
    }
    const leaves = this.stmtLeaves.all(collectionName).map((row) => ({
      chunk: this.toChunk(row),
      vector: decodeEmbedding(row.embedding),
    }));
    logDebug(`Loaded ${leaves.length} leaves for ${collectionName}`);
    return leaves;
  }

  private hierarchyOf(collectionName: string): ChunkHierarchy {
    return {
      parentOf: (chunkId) => this.stmtParentOf.get(collectionName, chunkId)?.parent_id ?? undefined,
      childCount: (parentId) => this.stmtChildCount.get(collectionName, parentId)?.count ?? 0,
      chunk: (chunkId) => {
        const row = this.stmtChunk.get(collectionName, chunkId);
        return row ? this.toChunk(row) : undefined;
      },
    };
  }

  private toChunk(row: ChunkRow): Chunk {
    const metadata = safeSync(() => parseChunkMetadata(JSON.parse(row.metadata)));
    if (!metadata.ok) {
      throw new StorageError('read', false, `corrupt metadata for chunk ${row.id}`, metadata.error);
    }
    return { id: row.id, text: row.text, metadata: metadata.value };
  }
}
