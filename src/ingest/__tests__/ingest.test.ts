import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StorageError, ValidationError } from '../../core/errors.js';
import { createHashedEmbedder } from '../../providers/hashed_embedder.js';
import type { EmbeddingFunction } from '../../retrieval/types.js';
import { SqliteCollectionStore } from '../../storage/sqlite_collection_store.js';
import { ingestDocument } from '../ingest.js';
import { parsePageDocument, type PageDocument } from '../types.js';

const DOCUMENT: PageDocument = {
  filePath: '/manuals/Pump Guide.pdf',
  pages: [
    { page: 1, text: 'alpha beta gamma' },
    { page: 2, text: 'delta epsilon' },
  ],
};

describe('ingestDocument', () => {
  let store: SqliteCollectionStore;
  const embed = createHashedEmbedder(16);

  beforeEach(() => {
    store = SqliteCollectionStore.open(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('stores the chunk tree under the derived collection name', async () => {
    const report = await ingestDocument(store, DOCUMENT, { embed, chunkSizes: [20, 8] });

    expect(report).toEqual({
      collectionName: 'pump_guide',
      filePath: '/manuals/Pump Guide.pdf',
      pageCount: 2,
      nodeCount: 7,
      leafCount: 5,
    });
    expect(store.describeCollection('pump_guide')).toMatchObject({
      sourceFile: '/manuals/Pump Guide.pdf',
      nodeCount: 7,
      leafCount: 5,
      hasDocstore: true,
    });
  });

  it('replaces a collection on re-ingestion', async () => {
    await ingestDocument(store, DOCUMENT, { embed, chunkSizes: [20, 8] });
    await ingestDocument(store, DOCUMENT, { embed, chunkSizes: [20, 8] });

    expect(store.describeCollection('pump_guide')?.nodeCount).toBe(7);
  });

  it('honours an explicit collection name and embeds in batches', async () => {
    const batchSizes: number[] = [];
    const countingEmbed: EmbeddingFunction = async (texts) => {
      batchSizes.push(texts.length);
      return embed(texts);
    };

    await ingestDocument(store, DOCUMENT, {
      embed: countingEmbed,
      chunkSizes: [20, 8],
      collectionName: 'pumps',
      embedBatchSize: 2,
    });

    expect(batchSizes).toEqual([2, 2, 1]);
    expect(await store.listCollections()).toEqual(['pumps']);
  });

  it('rejects a document without text', async () => {
    const empty: PageDocument = { filePath: '/manuals/blank.pdf', pages: [{ page: 1, text: '  ' }] };

    await expect(ingestDocument(store, empty, { embed, chunkSizes: [20] })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('rejects an embedding function that drops vectors', async () => {
    const lossy: EmbeddingFunction = async (texts) => texts.slice(1).map(() => [1]);

    await expect(ingestDocument(store, DOCUMENT, { embed: lossy, chunkSizes: [20] })).rejects.toBeInstanceOf(
      StorageError
    );
    expect(await store.listCollections()).toEqual([]);
  });
});

describe('parsePageDocument', () => {
  it('accepts a page document', () => {
    expect(parsePageDocument({ filePath: '/a.pdf', pages: [{ page: 3, text: 'x' }] })).toEqual({
      filePath: '/a.pdf',
      pages: [{ page: 3, text: 'x' }],
    });
  });

  it('reports the offending field', () => {
    expect(() => parsePageDocument({ filePath: '/a.pdf', pages: [{ page: 0, text: 'x' }] })).toThrow(
      /^Validation failed for document: expected page document, got pages\.0\.page /
    );
  });
});
