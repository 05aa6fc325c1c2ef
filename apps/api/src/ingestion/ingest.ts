import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { eq } from 'drizzle-orm';
import type { Database } from '../db/index.js';
import { documentChunks } from '../db/schema.js';
import { chunkText, type ChunkOptions } from './chunk.js';
import { readDocuments } from './documents.js';
import { embedTexts } from './embed.js';

export interface StoredChunk {
  chunkIndex: number;
  content: string;
  embedding: number[];
}

/** Persists the chunks of one source, replacing whatever it contributed last time. */
export interface ChunkWriter {
  replaceSource(source: string, chunks: StoredChunk[]): Promise<void>;
}

export interface IngestionSummary {
  documentsProcessed: number;
  chunksStored: number;
}

export interface DocumentIngestor {
  ingestFolder(folder: string): Promise<IngestionSummary>;
}

export interface DocumentIngestorDeps extends ChunkOptions {
  embeddings: EmbeddingsInterface;
  writer: ChunkWriter;
}

export const createChunkWriter = (db: Database): ChunkWriter => ({
  replaceSource: async (source, chunks) => {
    await db.transaction(async (tx) => {
      await tx.delete(documentChunks).where(eq(documentChunks.source, source));
      await tx.insert(documentChunks).values(chunks.map((chunk) => ({ source, ...chunk })));
    });
  },
});

export const createDocumentIngestor = ({
  embeddings,
  writer,
  chunkSize,
  chunkOverlap,
}: DocumentIngestorDeps): DocumentIngestor => ({
  ingestFolder: async (folder) => {
    console.log(`\n=== Ingesting documents from ${folder} ===\n`);
    const documents = await readDocuments(folder);
    console.log(`Found ${documents.length} documents\n`);

    let documentsProcessed = 0;
    let chunksStored = 0;
    for (let i = 0; i < documents.length; i++) {
      const doc = documents[i];
      console.log(`[${i + 1}/${documents.length}] ${doc.source}`);

      const chunks = await chunkText(doc.text, { chunkSize, chunkOverlap });
      console.log(`  Chunks: ${chunks.length}`);
      if (chunks.length === 0) continue;

      const vectors = await embedTexts(embeddings, chunks.map((c) => c.text));
      await writer.replaceSource(
        doc.source,
        chunks.map((chunk, idx) => ({ chunkIndex: chunk.index, content: chunk.text, embedding: vectors[idx] })),
      );
      console.log(`  Stored ${chunks.length} chunks`);
      documentsProcessed += 1;
      chunksStored += chunks.length;
    }

    console.log(`\n=== Done: ${documentsProcessed} documents, ${chunksStored} chunks ===\n`);
    return { documentsProcessed, chunksStored };
  },
});
