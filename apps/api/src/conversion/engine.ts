import type {
  ConversionResult,
  NegativePreferences,
  StyleProfile,
  StyleVariant,
} from '@tonecraft/shared';
import { STYLE_VARIANTS } from '@tonecraft/shared';
import type { LanguageGenerationService } from '../lib/openai.js';
import { errorMessage, REQUEST_CANCELLED } from '../lib/errors.js';
import { mergeNegativePreferences } from '../profile/levels.js';
import type { PromptTemplateService } from '../prompts/style-prompts.js';
import { fillTemplate, VARIANT_CONVERSION_TEMPLATE } from '../prompts/templates.js';
import { applyAdjustments, feedbackAdjustments, type StyleAdjustments } from './feedback-rules.js';

export interface HeuristicFeedbackResult {
  updatedProfile: StyleProfile;
  styleAdjustments: StyleAdjustments;
}

/** The part of the engine the feedback router falls back to. */
export interface FeedbackAdjuster {
  processFeedback(
    feedbackText: string,
    profile: StyleProfile,
    selectedVariant?: StyleVariant,
    rating?: number,
  ): Promise<HeuristicFeedbackResult>;
}

export interface StyleConversionEngine extends FeedbackAdjuster {
  readonly modelName: string;
  convertText(
    text: string,
    profile: StyleProfile,
    context: string,
    negativeOverrides?: NegativePreferences,
    options?: { signal?: AbortSignal },
  ): Promise<ConversionResult>;
}

export interface StyleConversionEngineDeps {
  llm: LanguageGenerationService;
  prompts: PromptTemplateService;
}

export const createStyleConversionEngine = ({ llm, prompts }: StyleConversionEngineDeps): StyleConversionEngine => ({
  modelName: llm.modelName,

  convertText: async (text, profile, context, negativeOverrides, options) => {
    const negatives = mergeNegativePreferences(profile.negativePreferences, negativeOverrides);
    const instructions = prompts.buildConversionPrompts(profile, context, negatives);

    console.log(`[StyleEngine] Generating ${STYLE_VARIANTS.length} variants (${context})`);
    const settled = await Promise.allSettled(
      STYLE_VARIANTS.map((variant) =>
        llm.generate(fillTemplate(VARIANT_CONVERSION_TEMPLATE, { instructions: instructions[variant], text }), {
          signal: options?.signal,
        }),
      ),
    );
    const metadata = { modelUsed: llm.modelName, timestamp: new Date().toISOString(), context };
    if (options?.signal?.aborted) {
      console.log('[StyleEngine] Conversion cancelled by caller');
      return { success: false, convertedTexts: {}, sources: [], metadata, error: REQUEST_CANCELLED };
    }

    const convertedTexts: Partial<Record<StyleVariant, string>> = {};
    const failures: StyleVariant[] = [];
    settled.forEach((outcome, i) => {
      const variant = STYLE_VARIANTS[i];
      if (outcome.status === 'fulfilled' && outcome.value.length > 0) {
        convertedTexts[variant] = outcome.value;
      } else {
        if (outcome.status === 'rejected') {
          console.warn(`[StyleEngine] ${variant} failed: ${errorMessage(outcome.reason)}`);
        }
        failures.push(variant);
      }
    });

    if (failures.length > 0) {
      return {
        success: false,
        convertedTexts,
        sources: [],
        metadata,
        error: `Style conversion failed for: ${failures.join(', ')}`,
      };
    }
    return { success: true, convertedTexts, sources: [], metadata };
  },

  processFeedback: async (feedbackText, profile, selectedVariant, rating) => {
    const styleAdjustments = feedbackAdjustments(feedbackText, selectedVariant, rating);
    console.log(`[StyleEngine] Heuristic feedback adjustments: ${JSON.stringify(styleAdjustments)}`);
    return {
      updatedProfile: applyAdjustments(profile, styleAdjustments),
      styleAdjustments,
    };
  },
});
