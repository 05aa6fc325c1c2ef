import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import type { OpenAIConfig } from './config.js';
import { EMBEDDING_DIMENSIONS } from '../db/schema.js';

export interface GenerateOptions {
  signal?: AbortSignal;
}

/** Produces text from a prompt. The core sees nothing of the model behind it. */
export interface LanguageGenerationService {
  readonly modelName: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

const getApiKey = (config: OpenAIConfig): string => {
  const key = config.apiKey;
  if (!key) throw new Error('OPENAI_API_KEY is not set');
  console.log(`[OpenAI] API key present (${key.slice(0, 3)}...)`);
  return key;
};

const clientConfiguration = (config: OpenAIConfig) =>
  config.baseURL ? { baseURL: config.baseURL } : undefined;

export const createChatModel = (config: OpenAIConfig, options?: {
  model?: string;
  temperature?: number;
}) => {
  return new ChatOpenAI({
    model: options?.model ?? config.chatModel,
    temperature: options?.temperature ?? config.chatTemperature,
    apiKey: getApiKey(config),
    configuration: clientConfiguration(config),
  });
};

export const createEmbeddingsModel = (config: OpenAIConfig): OpenAIEmbeddings => {
  return new OpenAIEmbeddings({
    model: config.embeddingModel,
    dimensions: EMBEDDING_DIMENSIONS,
    apiKey: getApiKey(config),
    configuration: clientConfiguration(config),
  });
};

export const createLanguageGenerationService = (
  model: ChatOpenAI,
  modelName: string,
): LanguageGenerationService => ({
  modelName,
  generate: async (prompt, options) => {
    const response = await model.invoke(
      [{ role: 'user', content: prompt }],
      { signal: options?.signal },
    );
    console.log(`[OpenAI] ${modelName} responded (${String(response.content).length} chars)`);
    return String(response.content).trim();
  },
});
