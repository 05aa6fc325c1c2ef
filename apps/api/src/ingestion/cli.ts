import 'dotenv/config';
import { loadConfig } from '../lib/config.js';
import { createEmbeddingsModel } from '../lib/openai.js';
import { createDatabase } from '../db/index.js';
import { createChunkWriter, createDocumentIngestor } from './ingest.js';

const args = process.argv.slice(2);
const getArg = (name: string): string | undefined => {
  const idx = args.findIndex((a) => a.startsWith(`--${name}=`));
  if (idx >= 0) return args[idx].split('=')[1];
  const flagIdx = args.findIndex((a) => a === `--${name}`);
  if (flagIdx >= 0 && args[flagIdx + 1]) return args[flagIdx + 1];
  return undefined;
};

const folder = getArg('folder') || 'documents';

const ingest = async () => {
  const config = loadConfig();
  if (!config.databaseUrl) throw new Error('DATABASE_URL is not set');

  const { db, close } = createDatabase(config.databaseUrl);
  try {
    const ingestor = createDocumentIngestor({
      embeddings: createEmbeddingsModel(config.openai),
      writer: createChunkWriter(db),
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
    });
    await ingestor.ingestFolder(folder);
  } finally {
    await close();
  }
};

ingest().catch((err) => {
  console.error('Ingestion failed:', err);
  process.exit(1);
});
