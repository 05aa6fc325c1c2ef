import type { FeedbackOutcome, StyleProfile, StyleVariant } from '@tonecraft/shared';
import type { FeedbackAdjuster } from '../conversion/engine.js';
import { errorMessage } from '../lib/errors.js';
import type { Capability } from '../lib/outcome.js';
import type { PreferenceStore } from '../preferences/store.js';

export interface FeedbackAdaptationRouterDeps {
  preferences: Capability<PreferenceStore>;
  adjuster: Capability<FeedbackAdjuster>;
}

/**
 * Sends feedback to persistent learning when it can, otherwise to the
 * in-request heuristic. Exactly one path takes effect per call.
 */
export class FeedbackAdaptationRouter {
  constructor(private readonly deps: FeedbackAdaptationRouterDeps) {}

  async processFeedback(
    feedbackText: string,
    profile: StyleProfile,
    rating?: number,
    selectedVariant: StyleVariant = 'neutral',
  ): Promise<FeedbackOutcome> {
    try {
      const { preferences, adjuster } = this.deps;

      if (rating !== undefined && preferences.available) {
        const learned = await this.tryAdvanced(preferences.handle, profile, feedbackText, rating, selectedVariant);
        if (learned) {
          return {
            success: true,
            updatedProfile: profile,
            styleAdjustments: {},
            advancedLearning: true,
            feedbackProcessed: feedbackText,
            processingMethod: 'advanced',
          };
        }
      }

      if (adjuster.available) {
        const { updatedProfile, styleAdjustments } = await adjuster.handle.processFeedback(
          feedbackText,
          profile,
          selectedVariant,
          rating,
        );
        return {
          success: true,
          updatedProfile,
          styleAdjustments,
          advancedLearning: false,
          feedbackProcessed: feedbackText,
          processingMethod: 'basic',
        };
      }

      console.warn('[Feedback] No feedback processor available');
      return {
        success: false,
        updatedProfile: profile,
        styleAdjustments: {},
        advancedLearning: false,
        feedbackProcessed: feedbackText,
        processingMethod: 'none',
        error: 'Feedback processing service is not initialized.',
      };
    } catch (err) {
      console.error('[Feedback] Processing failed:', errorMessage(err));
      return {
        success: false,
        updatedProfile: profile,
        styleAdjustments: {},
        advancedLearning: false,
        feedbackProcessed: feedbackText,
        processingMethod: 'error',
        error: errorMessage(err),
      };
    }
  }

  private async tryAdvanced(
    store: PreferenceStore,
    profile: StyleProfile,
    feedbackText: string,
    rating: number,
    selectedVariant: StyleVariant,
  ): Promise<boolean> {
    const userId = profile.userId ?? 'unknown';
    try {
      return await store.adaptStyle(userId, feedbackText, rating, selectedVariant);
    } catch (err) {
      console.warn(`[Feedback] Persistent learning failed for ${userId}: ${errorMessage(err)}`);
      return false;
    }
  }
}
