import type { EmbeddingsInterface } from '@langchain/core/embeddings';

const BATCH_SIZE = 100;

export const embedTexts = async (embeddings: EmbeddingsInterface, texts: string[]): Promise<number[][]> => {
  const results: number[][] = [];

  for (let i = 0; i < texts.length; i += BATCH_SIZE) {
    const batch = texts.slice(i, i + BATCH_SIZE);
    console.log(`  Embedding batch ${Math.floor(i / BATCH_SIZE) + 1}/${Math.ceil(texts.length / BATCH_SIZE)} (${batch.length} chunks)`);
    const batchEmbeddings = await embeddings.embedDocuments(batch);
    results.push(...batchEmbeddings);
  }

  return results;
};
