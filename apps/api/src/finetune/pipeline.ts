import type { FormalConversionResult, RoutingReason, StyleProfile } from '@tonecraft/shared';
import type { LanguageGenerationService } from '../lib/openai.js';
import { errorMessage, REQUEST_CANCELLED } from '../lib/errors.js';
import type { PromptTemplateService } from '../prompts/style-prompts.js';
import { decide } from './decision.js';
import { createFormalConversionGraph, type FormalConversionGraph } from './graph.js';
import type { SpecializedInferenceClient } from './inference-client.js';

export interface FormalPipelineDeps {
  client: SpecializedInferenceClient;
  llm: LanguageGenerationService;
  prompts: PromptTemplateService;
}

export interface FormalPipelineStatus {
  specializedEndpoint: string;
  specializedReachable: boolean;
  refinementModel: string;
  pipeline: 'lora_gpt' | 'gpt_only';
}

export interface ConvertOptions {
  signal?: AbortSignal;
}

const NOT_ESCALATED_ERROR = 'Does not meet formal document conversion conditions.';

/**
 * Routes a text through the specialized model (when reachable) and a refinement pass.
 * `convert` never throws; a caller abort ends in `method: 'error'` without a fallback.
 */
export class FormalConversionPipeline {
  private readonly graph: FormalConversionGraph;

  constructor(
    private readonly deps: FormalPipelineDeps,
    private readonly reachable: boolean,
  ) {
    this.graph = createFormalConversionGraph(deps);
  }

  async convert(
    text: string,
    profile: StyleProfile,
    context: string = 'business',
    forceConvert: boolean = false,
    options: ConvertOptions = {},
  ): Promise<FormalConversionResult> {
    let reason: RoutingReason = 'condition_not_met';
    try {
      const decision = decide(profile, context, forceConvert);
      reason = decision.reason;

      if (!decision.escalate) {
        console.log(`[FormalPipeline] Not escalated (${decision.reason})`);
        return this.result({
          success: false,
          convertedText: '',
          primaryOutput: null,
          method: 'none',
          reason,
          forced: forceConvert,
          degradations: [],
          error: NOT_ESCALATED_ERROR,
        });
      }

      const state = await this.graph.invoke(
        { text, context, profile, reachable: this.reachable },
        { signal: options.signal },
      );

      console.log(`[FormalPipeline] Converted via ${state.method} (${state.degradations.length} degradations)`);
      return this.result({
        success: true,
        convertedText: state.convertedText,
        primaryOutput: state.method === 'lora_gpt' ? state.primaryOutput : null,
        method: state.method,
        reason,
        forced: forceConvert,
        degradations: state.degradations,
      });
    } catch (err) {
      const cancelled = options.signal?.aborted === true;
      if (cancelled) {
        console.log('[FormalPipeline] Conversion cancelled by caller');
      } else {
        console.error('[FormalPipeline] Conversion failed:', errorMessage(err));
      }
      return this.result({
        success: false,
        convertedText: '',
        primaryOutput: null,
        method: 'error',
        reason,
        forced: forceConvert,
        degradations: [],
        error: cancelled ? REQUEST_CANCELLED : `Error occurred during conversion: ${errorMessage(err)}`,
      });
    }
  }

  convertByUserRequest(text: string, profile: StyleProfile, context: string = 'business', options?: ConvertOptions) {
    return this.convert(text, profile, context, true, options);
  }

  convertToBusiness(text: string, profile: StyleProfile, options?: ConvertOptions) {
    return this.convert(text, profile, 'business', true, options);
  }

  convertToReport(text: string, profile: StyleProfile, options?: ConvertOptions) {
    return this.convert(text, profile, 'report', true, options);
  }

  getStatus(): FormalPipelineStatus {
    return {
      specializedEndpoint: this.deps.client.baseUrl,
      specializedReachable: this.reachable,
      refinementModel: this.deps.llm.modelName,
      pipeline: this.reachable ? 'lora_gpt' : 'gpt_only',
    };
  }

  private result(fields: Omit<FormalConversionResult, 'timestamp'>): FormalConversionResult {
    return { ...fields, timestamp: new Date().toISOString() };
  }
}

/** Probes the specialized endpoint once; the answer is kept for the pipeline's lifetime. */
export const createFormalConversionPipeline = async (
  deps: FormalPipelineDeps,
): Promise<FormalConversionPipeline> => {
  const reachable = await deps.client.probeHealth();
  if (!reachable) {
    console.warn('[FormalPipeline] Specialized endpoint unreachable, refinement only');
  }
  return new FormalConversionPipeline(deps, reachable);
};
