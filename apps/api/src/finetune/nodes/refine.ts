import type { RunnableConfig } from '@langchain/core/runnables';
import type { LanguageGenerationService } from '../../lib/openai.js';
import { errorMessage } from '../../lib/errors.js';
import { CONSERVATIVE_LEVEL, resolveLevel, styleForDirectness } from '../../profile/levels.js';
import type { PromptTemplateService } from '../../prompts/style-prompts.js';
import { fillTemplate, REFINEMENT_TEMPLATE } from '../../prompts/templates.js';
import type { FormalConversionStateType } from '../state.js';

export interface RefineNodeDeps {
  llm: LanguageGenerationService;
  prompts: PromptTemplateService;
}

export const createRefineNode = ({ llm, prompts }: RefineNodeDeps) =>
  async (
    state: FormalConversionStateType,
    config?: RunnableConfig,
  ): Promise<Partial<FormalConversionStateType>> => {
    const variant = styleForDirectness(resolveLevel(state.profile, 'directness', CONSERVATIVE_LEVEL));
    const instructions = prompts.buildConversionPrompts(
      state.profile,
      state.context,
      state.profile.negativePreferences,
    )[variant];

    const prompt = fillTemplate(REFINEMENT_TEMPLATE, {
      originalText: state.text,
      primaryOutput: state.primaryOutput,
      instructions,
    });

    try {
      console.log(`[FormalPipeline] Refining with ${llm.modelName} (${variant})`);
      const refined = await llm.generate(prompt, { signal: config?.signal });
      return { convertedText: refined };
    } catch (err) {
      if (config?.signal?.aborted) throw err;
      console.warn(`[FormalPipeline] Refinement failed, keeping primary output: ${errorMessage(err)}`);
      return {
        convertedText: state.primaryOutput,
        degradations: [`refinement: ${errorMessage(err)}`],
      };
    }
  };
