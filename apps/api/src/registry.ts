import type { AppConfig } from './lib/config.js';
import { createChatModel, createEmbeddingsModel, createLanguageGenerationService } from './lib/openai.js';
import { errorMessage } from './lib/errors.js';
import { available, unavailable, type Capability } from './lib/outcome.js';
import { createDatabase } from './db/index.js';
import { createPromptTemplateService } from './prompts/style-prompts.js';
import { createStyleConversionEngine, type StyleConversionEngine } from './conversion/engine.js';
import { createSpecializedInferenceClient } from './finetune/inference-client.js';
import { createFormalConversionPipeline, type FormalConversionPipeline } from './finetune/pipeline.js';
import { PgVectorDocumentIndex, type DocumentIndex } from './rag/document-index.js';
import { RetrievalStyleGenerator } from './rag/generator.js';
import { FeedbackAdaptationRouter } from './feedback/router.js';
import { createChunkWriter, createDocumentIngestor, type DocumentIngestor } from './ingestion/ingest.js';
import { DrizzlePreferenceStore, type PreferenceStore } from './preferences/store.js';

/** Everything the routes need, built once at startup. */
export interface ServiceRegistry {
  engine: Capability<StyleConversionEngine>;
  pipeline: Capability<FormalConversionPipeline>;
  rag: Capability<RetrievalStyleGenerator>;
  feedback: FeedbackAdaptationRouter;
  preferences: Capability<PreferenceStore>;
  documentIndex: Capability<DocumentIndex>;
  ingestion: Capability<DocumentIngestor>;
  close: () => Promise<void>;
}

const NO_DATABASE = 'DATABASE_URL is not set';

const attempt = <T>(label: string, build: () => T): Capability<T> => {
  try {
    return available(build());
  } catch (err) {
    console.warn(`[Registry] ${label} unavailable: ${errorMessage(err)}`);
    return unavailable(errorMessage(err));
  }
};

export const createServiceRegistry = async (config: AppConfig): Promise<ServiceRegistry> => {
  const prompts = createPromptTemplateService();
  const database = config.databaseUrl ? createDatabase(config.databaseUrl) : null;

  const preferences: Capability<PreferenceStore> = database
    ? available(new DrizzlePreferenceStore(database.db))
    : unavailable(NO_DATABASE);

  const embeddings = attempt('Embeddings model', () => createEmbeddingsModel(config.openai));

  const documentIndex: Capability<DocumentIndex> = !database
    ? unavailable(NO_DATABASE)
    : embeddings.available
      ? available(new PgVectorDocumentIndex(database.db, embeddings.handle, {
          minSimilarity: config.rag.minSimilarity,
        }))
      : unavailable(embeddings.reason);

  const ingestion: Capability<DocumentIngestor> = !database
    ? unavailable(NO_DATABASE)
    : embeddings.available
      ? available(createDocumentIngestor({
          embeddings: embeddings.handle,
          writer: createChunkWriter(database.db),
          chunkSize: config.rag.chunkSize,
          chunkOverlap: config.rag.chunkOverlap,
        }))
      : unavailable(embeddings.reason);

  const chatLlm = attempt('Chat model', () =>
    createLanguageGenerationService(createChatModel(config.openai), config.openai.chatModel));

  const engine: Capability<StyleConversionEngine> = chatLlm.available
    ? available(createStyleConversionEngine({ llm: chatLlm.handle, prompts }))
    : unavailable(chatLlm.reason);

  const pipeline: Capability<FormalConversionPipeline> = chatLlm.available
    ? available(await createFormalConversionPipeline({
        client: createSpecializedInferenceClient({
          baseUrl: config.finetune.url,
          healthTimeoutMs: config.finetune.healthTimeoutMs,
          generateTimeoutMs: config.finetune.generateTimeoutMs,
        }),
        llm: chatLlm.handle,
        prompts,
      }))
    : unavailable(chatLlm.reason);

  const answerModel = attempt('RAG model', () =>
    createLanguageGenerationService(
      createChatModel(config.openai, { model: config.openai.ragModel, temperature: config.openai.ragTemperature }),
      config.openai.ragModel,
    ));

  const rag: Capability<RetrievalStyleGenerator> = engine.available && answerModel.available
    ? available(new RetrievalStyleGenerator({
        index: documentIndex,
        engine: engine.handle,
        answerModel: answerModel.handle,
        topK: config.rag.topK,
      }))
    : unavailable(engine.available ? 'RAG model is not configured' : engine.reason);

  const feedback = new FeedbackAdaptationRouter({ preferences, adjuster: engine });

  console.log(
    `[Registry] engine=${engine.available} pipeline=${pipeline.available} rag=${rag.available} ` +
    `preferences=${preferences.available} documentIndex=${documentIndex.available} ingestion=${ingestion.available}`,
  );

  return {
    engine,
    pipeline,
    rag,
    feedback,
    preferences,
    documentIndex,
    ingestion,
    close: async () => {
      if (database) await database.close();
    },
  };
};
