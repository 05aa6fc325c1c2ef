import * as assert from 'assert';
import { loadConfig } from '../../src/lib/config.js';
import { createEmbeddingsModel } from '../../src/lib/openai.js';
import { documentChunks, EMBEDDING_DIMENSIONS } from '../../src/db/schema.js';

suite('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig({});
    assert.strictEqual(config.port, 5001);
    assert.strictEqual(config.databaseUrl, undefined);
    assert.strictEqual(config.openai.apiKey, undefined);
    assert.strictEqual(config.openai.chatModel, 'gpt-4o');
    assert.deepStrictEqual(config.finetune, {
      url: 'http://localhost:8010',
      healthTimeoutMs: 5000,
      generateTimeoutMs: 30000,
    });
    assert.deepStrictEqual(config.rag, { topK: 5, minSimilarity: 0.3, chunkSize: 1000, chunkOverlap: 200 });
  });

  test('builds the specialized url from host and port', () => {
    const config = loadConfig({ RUNPOD_IP: '10.0.0.7', FINETUNE_INFERENCE_PORT: '9000' });
    assert.strictEqual(config.finetune.url, 'http://10.0.0.7:9000');
  });

  test('an override url wins', () => {
    const config = loadConfig({ RUNPOD_IP: '10.0.0.7', FINETUNE_URL_OVERRIDE: 'https://gpu.example.test' });
    assert.strictEqual(config.finetune.url, 'https://gpu.example.test');
  });

  test('coerces numeric settings', () => {
    const config = loadConfig({ API_PORT: '8080', RAG_TOP_K: '3', RAG_MIN_SIMILARITY: '0.5' });
    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.rag.topK, 3);
    assert.strictEqual(config.rag.minSimilarity, 0.5);
  });

  test('invalid values name the failing key', () => {
    assert.throws(
      () => loadConfig({ API_PORT: 'not-a-port', RAG_MIN_SIMILARITY: '2' }),
      (err: unknown) =>
        err instanceof Error &&
        err.message.startsWith('Invalid configuration: ') &&
        err.message.includes('API_PORT: ') &&
        err.message.includes('RAG_MIN_SIMILARITY: '),
    );
  });

  test('embeddings are requested at the width of the vector column', () => {
    const embeddings = createEmbeddingsModel(loadConfig({ OPENAI_API_KEY: 'test-key' }).openai);
    assert.strictEqual(documentChunks.embedding.dimensions, EMBEDDING_DIMENSIONS);
    assert.strictEqual(embeddings.dimensions, EMBEDDING_DIMENSIONS);
  });
});
