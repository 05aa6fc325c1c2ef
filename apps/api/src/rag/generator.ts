import type { ConversionResult, RetrievedPassage, StyleProfile } from '@tonecraft/shared';
import type { StyleConversionEngine } from '../conversion/engine.js';
import type { LanguageGenerationService } from '../lib/openai.js';
import { errorMessage, REQUEST_CANCELLED } from '../lib/errors.js';
import type { Capability } from '../lib/outcome.js';
import {
  EXPRESSION_QUERY_TEMPLATE,
  fillTemplate,
  GRAMMAR_QUERY_TEMPLATE,
  RAG_ANSWER_TEMPLATE,
} from '../prompts/templates.js';
import type { DocumentIndex } from './document-index.js';
import {
  buildGroundingBlock,
  buildStyledQuestion,
  ragContextPreview,
  toCitations,
  withContext,
} from './grounding.js';

export interface RetrievalStyleGeneratorDeps {
  index: Capability<DocumentIndex>;
  engine: StyleConversionEngine;
  // Answers plain questions; styled answers go through the engine
  answerModel: LanguageGenerationService;
  topK: number;
}

export interface RagStatus {
  ragStatus: 'ready' | 'not_ready';
  docCount: number;
  servicesAvailable: boolean;
}

export interface AskOptions {
  signal?: AbortSignal;
}

type Retrieval =
  | { ok: true; passages: RetrievedPassage[] }
  | { ok: false; error: string };

const NOT_INITIALIZED = 'Document index is not initialized.';
const NO_DOCUMENTS = 'No related documents found.';

export class RetrievalStyleGenerator {
  constructor(private readonly deps: RetrievalStyleGeneratorDeps) {}

  private modelUsed(model: { modelName: string }): string {
    return `${model.modelName} + pgvector`;
  }

  private failure(error: string, extra?: Partial<ConversionResult['metadata']>): ConversionResult {
    return {
      success: false,
      convertedTexts: {},
      sources: [],
      metadata: { modelUsed: 'none', timestamp: new Date().toISOString(), ...extra },
      error,
    };
  }

  private cancelled(): ConversionResult {
    console.log('[RAG] Request cancelled by caller');
    return this.failure(REQUEST_CANCELLED);
  }

  private async retrieve(query: string, options: AskOptions): Promise<Retrieval> {
    const { index } = this.deps;
    if (!index.available) {
      return { ok: false, error: `${NOT_INITIALIZED} (${index.reason})` };
    }
    const status = await index.handle.status();
    if (!status.ready) return { ok: false, error: NOT_INITIALIZED };

    const passages = await index.handle.retrieve(query, this.deps.topK, { signal: options.signal });
    console.log(`[RAG] Retrieved ${passages.length} passages`);
    if (passages.length === 0) return { ok: false, error: NO_DOCUMENTS };
    return { ok: true, passages };
  }

  /** Answers grounded in retrieved passages, rendered in the three tone variants. */
  async askWithStyles(
    query: string,
    profile: StyleProfile,
    context: string = 'personal',
    options: AskOptions = {},
  ): Promise<ConversionResult> {
    try {
      const retrieval = await this.retrieve(query, options);
      if (!retrieval.ok) return this.failure(retrieval.error);

      const block = buildGroundingBlock(retrieval.passages);
      const result = await this.deps.engine.convertText(
        buildStyledQuestion(query, block),
        profile,
        context,
        undefined,
        { signal: options.signal },
      );

      if (!result.success) return { ...result, sources: [] };

      return {
        ...result,
        sources: toCitations(retrieval.passages),
        ragContext: ragContextPreview(block),
        metadata: {
          ...result.metadata,
          documentsRetrieved: retrieval.passages.length,
          modelUsed: this.modelUsed(this.deps.engine),
        },
      };
    } catch (err) {
      if (options.signal?.aborted) return this.cancelled();
      console.error('[RAG] Styled answer failed:', errorMessage(err));
      return this.failure(`Error occurred during style conversion: ${errorMessage(err)}`);
    }
  }

  /** Single grounded answer, no tone variants. */
  async ask(query: string, context?: string, options: AskOptions = {}): Promise<ConversionResult> {
    try {
      const retrieval = await this.retrieve(query, options);
      if (!retrieval.ok) return this.failure(retrieval.error);

      const prompt = fillTemplate(RAG_ANSWER_TEMPLATE, {
        context: buildGroundingBlock(retrieval.passages),
        question: withContext(query, context),
      });
      const answer = await this.deps.answerModel.generate(prompt, { signal: options.signal });

      return {
        success: true,
        convertedTexts: {},
        answer,
        sources: toCitations(retrieval.passages),
        metadata: {
          modelUsed: this.modelUsed(this.deps.answerModel),
          timestamp: new Date().toISOString(),
          documentsRetrieved: retrieval.passages.length,
          ...(context ? { context } : {}),
        },
      };
    } catch (err) {
      if (options.signal?.aborted) return this.cancelled();
      console.error('[RAG] Answer failed:', errorMessage(err));
      return this.failure(`Error occurred: ${errorMessage(err)}`);
    }
  }

  async analyzeGrammar(text: string, options?: AskOptions): Promise<ConversionResult> {
    const result = await this.ask(fillTemplate(GRAMMAR_QUERY_TEMPLATE, { text }), undefined, options);
    return {
      ...result,
      metadata: { ...result.metadata, analysisType: 'grammar_check', originalText: text },
    };
  }

  async suggestExpressions(
    text: string,
    contextType: string = 'business',
    options?: AskOptions,
  ): Promise<ConversionResult> {
    const query = fillTemplate(EXPRESSION_QUERY_TEMPLATE, { contextType, text });
    const result = await this.ask(query, undefined, options);
    return {
      ...result,
      metadata: {
        ...result.metadata,
        analysisType: 'expression_improvement',
        originalText: text,
        context: contextType,
      },
    };
  }

  async getStatus(): Promise<RagStatus> {
    const { index } = this.deps;
    if (!index.available) return { ragStatus: 'not_ready', docCount: 0, servicesAvailable: false };
    try {
      const status = await index.handle.status();
      return {
        ragStatus: status.ready ? 'ready' : 'not_ready',
        docCount: status.count,
        servicesAvailable: true,
      };
    } catch (err) {
      console.warn('[RAG] Status check failed:', errorMessage(err));
      return { ragStatus: 'not_ready', docCount: 0, servicesAvailable: true };
    }
  }
}
