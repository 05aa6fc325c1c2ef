import * as assert from 'assert';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { folderExists } from '../../src/ingestion/documents.js';
import { createDocumentIngestor, type ChunkWriter, type StoredChunk } from '../../src/ingestion/ingest.js';

// One-dimensional "vector": the text length
const lengthEmbeddings: EmbeddingsInterface = {
  embedDocuments: async (documents) => documents.map((doc) => [doc.length]),
  embedQuery: async (doc) => [doc.length],
};

const recordingWriter = () => {
  const writes: Array<{ source: string; chunks: StoredChunk[] }> = [];
  const writer: ChunkWriter = {
    replaceSource: async (source, chunks) => {
      writes.push({ source, chunks });
    },
  };
  return { writer, writes };
};

suite('createDocumentIngestor', () => {
  let folder = '';

  setup(async () => {
    folder = await mkdtemp(join(tmpdir(), 'tonecraft-ingest-'));
  });

  teardown(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  test('chunks, embeds and stores each supported document', async () => {
    await writeFile(join(folder, 'a.md'), 'Alpha text.');
    await mkdir(join(folder, 'notes'));
    await writeFile(join(folder, 'notes', 'b.txt'), 'Beta text.');
    await writeFile(join(folder, 'scan.pdf'), 'binary');
    await writeFile(join(folder, 'empty.txt'), '   \n');
    const { writer, writes } = recordingWriter();

    const ingestor = createDocumentIngestor({ embeddings: lengthEmbeddings, writer, chunkSize: 1000, chunkOverlap: 200 });
    const summary = await ingestor.ingestFolder(folder);

    assert.deepStrictEqual(summary, { documentsProcessed: 2, chunksStored: 2 });
    assert.deepStrictEqual(writes, [
      { source: 'a.md', chunks: [{ chunkIndex: 0, content: 'Alpha text.', embedding: [11] }] },
      { source: join('notes', 'b.txt'), chunks: [{ chunkIndex: 0, content: 'Beta text.', embedding: [10] }] },
    ]);
  });

  test('a folder without documents stores nothing', async () => {
    const { writer, writes } = recordingWriter();
    const ingestor = createDocumentIngestor({ embeddings: lengthEmbeddings, writer, chunkSize: 1000, chunkOverlap: 200 });

    assert.deepStrictEqual(await ingestor.ingestFolder(folder), { documentsProcessed: 0, chunksStored: 0 });
    assert.deepStrictEqual(writes, []);
  });

  test('folderExists tells directories from files and missing paths', async () => {
    await writeFile(join(folder, 'a.md'), 'Alpha text.');

    assert.strictEqual(await folderExists(folder), true);
    assert.strictEqual(await folderExists(join(folder, 'a.md')), false);
    assert.strictEqual(await folderExists(join(folder, 'missing')), false);
  });
});
