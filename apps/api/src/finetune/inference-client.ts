import { z } from 'zod';
import { degraded, failed, ok, timeoutSignal, type StageOutcome } from '../lib/outcome.js';
import { errorMessage, REQUEST_CANCELLED } from '../lib/errors.js';

const GenerateResponseSchema = z.object({
  result: z.string(),
});

/** HTTP client for the fine-tuned (LoRA) inference server. */
export interface SpecializedInferenceClient {
  readonly baseUrl: string;
  probeHealth(): Promise<boolean>;
  /**
   * Never rejects. A transport failure degrades to the prompt itself;
   * a caller abort is `failed`, with nothing substituted.
   */
  generate(prompt: string, options?: { signal?: AbortSignal }): Promise<StageOutcome<string>>;
}

export interface InferenceClientOptions {
  baseUrl: string;
  healthTimeoutMs?: number;
  generateTimeoutMs?: number;
  maxNewTokens?: number;
  temperature?: number;
  fetch?: typeof fetch;
}

export const createSpecializedInferenceClient = ({
  baseUrl,
  healthTimeoutMs = 5_000,
  generateTimeoutMs = 30_000,
  maxNewTokens = 256,
  temperature = 0.7,
  fetch: fetchImpl = fetch,
}: InferenceClientOptions): SpecializedInferenceClient => {
  const root = baseUrl.replace(/\/+$/, '');

  return {
    baseUrl: root,

    probeHealth: async () => {
      try {
        const response = await fetchImpl(`${root}/health`, {
          method: 'GET',
          signal: AbortSignal.timeout(healthTimeoutMs),
        });
        if (response.status === 200) {
          console.log(`[Inference] Server reachable at ${root}`);
          return true;
        }
        console.warn(`[Inference] Health check returned ${response.status}`);
        return false;
      } catch (err) {
        console.warn(`[Inference] Health check failed: ${errorMessage(err)}`);
        return false;
      }
    },

    generate: async (prompt, options) => {
      try {
        const response = await fetchImpl(`${root}/generate`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            prompt,
            max_new_tokens: maxNewTokens,
            temperature,
            do_sample: true,
          }),
          signal: timeoutSignal(generateTimeoutMs, options?.signal),
        });

        if (!response.ok) {
          console.error(`[Inference] /generate failed (${response.status})`);
          return degraded(prompt, `inference server responded ${response.status}`);
        }

        const parsed = GenerateResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          console.error('[Inference] /generate returned a malformed body');
          return degraded(prompt, 'inference server returned a malformed body');
        }
        return ok(parsed.data.result);
      } catch (err) {
        if (options?.signal?.aborted) {
          console.log('[Inference] /generate cancelled by caller');
          return failed<string>(REQUEST_CANCELLED);
        }
        console.error(`[Inference] /generate request failed: ${errorMessage(err)}`);
        return degraded(prompt, `inference request failed: ${errorMessage(err)}`);
      }
    },
  };
};
