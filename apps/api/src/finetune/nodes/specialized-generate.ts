import type { RunnableConfig } from '@langchain/core/runnables';
import type { SpecializedInferenceClient } from '../inference-client.js';
import type { FormalConversionStateType } from '../state.js';

export const createSpecializedGenerateNode = (client: SpecializedInferenceClient) =>
  async (
    state: FormalConversionStateType,
    config?: RunnableConfig,
  ): Promise<Partial<FormalConversionStateType>> => {
    console.log(`[FormalPipeline] Primary conversion via ${client.baseUrl}`);
    const outcome = await client.generate(state.text, { signal: config?.signal });

    switch (outcome.status) {
      case 'ok':
        return { primaryOutput: outcome.value, method: 'lora_gpt' };
      case 'degraded':
        return {
          primaryOutput: outcome.value,
          method: 'gpt_only',
          degradations: [`primary: ${outcome.reason}`],
        };
      case 'failed':
        // No substitute output: stop the run instead of refining the raw text
        throw new Error(`primary: ${outcome.reason}`);
    }
  };

/** Entry used when the specialized endpoint was unreachable at startup. */
export const skipSpecializedNode = async (
  state: FormalConversionStateType,
): Promise<Partial<FormalConversionStateType>> => ({
  primaryOutput: state.text,
  method: 'gpt_only',
  degradations: ['primary: specialized endpoint unreachable'],
});
