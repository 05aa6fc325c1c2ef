import * as assert from 'assert';
import { createStyleConversionEngine } from '../../src/conversion/engine.js';
import { feedbackAdjustments } from '../../src/conversion/feedback-rules.js';
import { createPromptTemplateService } from '../../src/prompts/style-prompts.js';
import { REQUEST_CANCELLED } from '../../src/lib/errors.js';
import { fakeLlm, variantEcho } from './fakes.js';

const prompts = createPromptTemplateService();

suite('StyleConversionEngine.convertText', () => {
  test('returns all three variants', async () => {
    const llm = fakeLlm(variantEcho, 'gpt-4o');
    const engine = createStyleConversionEngine({ llm, prompts });

    const result = await engine.convertText('meeting moved to 3pm', {}, 'business');

    assert.strictEqual(result.success, true);
    assert.deepStrictEqual(result.convertedTexts, {
      direct: 'direct:meeting moved to 3pm',
      gentle: 'gentle:meeting moved to 3pm',
      neutral: 'neutral:meeting moved to 3pm',
    });
    assert.deepStrictEqual(result.sources, []);
    assert.strictEqual(result.metadata.modelUsed, 'gpt-4o');
    assert.strictEqual(result.metadata.context, 'business');
    assert.strictEqual(llm.prompts.length, 3);
  });

  test('a failed or empty variant fails the conversion but keeps the rest', async () => {
    const llm = fakeLlm((prompt) => {
      if (prompt.includes('Write a GENTLE version')) throw new Error('rate limited');
      if (prompt.includes('Write a NEUTRAL version')) return '';
      return 'direct text';
    });
    const engine = createStyleConversionEngine({ llm, prompts });

    const result = await engine.convertText('hi', {}, 'casual');

    assert.strictEqual(result.success, false);
    assert.deepStrictEqual(result.convertedTexts, { direct: 'direct text' });
    assert.strictEqual(result.error, 'Style conversion failed for: gentle, neutral');
  });

  test('a caller abort returns a cancelled result instead of partial variants', async () => {
    const controller = new AbortController();
    const llm = fakeLlm((prompt, options) => {
      if (prompt.includes('Write a NEUTRAL version')) controller.abort();
      if (options?.signal?.aborted) throw new DOMException('aborted', 'AbortError');
      return 'done';
    });
    const engine = createStyleConversionEngine({ llm, prompts });

    const result = await engine.convertText('hi', {}, 'casual', undefined, { signal: controller.signal });

    assert.strictEqual(result.success, false);
    assert.deepStrictEqual(result.convertedTexts, {});
    assert.strictEqual(result.error, REQUEST_CANCELLED);
    assert.strictEqual(result.metadata.context, 'casual');
  });

  test('request negatives are merged over the profile', async () => {
    const llm = fakeLlm(() => 'ok');
    const engine = createStyleConversionEngine({ llm, prompts });

    await engine.convertText(
      'hi',
      { negativePreferences: { emoticonUsage: 'strict' } },
      'casual',
      { bulletPointUsage: 'strict' },
    );

    assert.ok(llm.prompts.every((p) => p.includes('- Do not use bullet points.')));
    assert.ok(llm.prompts.every((p) => p.includes('- Do not use emoticons or emoji.')));
  });
});

suite('StyleConversionEngine.processFeedback', () => {
  const engine = createStyleConversionEngine({ llm: fakeLlm(() => 'ok'), prompts });

  test('keywords and variant rating combine per trait', async () => {
    const { updatedProfile, styleAdjustments } = await engine.processFeedback(
      'Way too blunt, make it more formal',
      { base: { formality: 6, directness: 7 } },
      'direct',
      2,
    );

    assert.deepStrictEqual(styleAdjustments, { formality: 1, directness: -2 });
    assert.deepStrictEqual(updatedProfile.session, { formality: 7, directness: 5 });
    assert.deepStrictEqual(updatedProfile.base, { formality: 6, directness: 7 });
  });

  test('session levels start from the effective level and stay clamped', async () => {
    const { updatedProfile } = await engine.processFeedback(
      'friendlier please',
      { session: { friendliness: 10 } },
      'gentle',
      5,
    );
    assert.deepStrictEqual(updatedProfile.session, { friendliness: 10 });
  });

  test('a missing level starts from 5', async () => {
    const { updatedProfile } = await engine.processFeedback('', {}, 'direct', 4);
    assert.deepStrictEqual(updatedProfile.session, { directness: 6 });
  });
});

suite('feedbackAdjustments', () => {
  test('neutral selections and middling ratings change nothing', () => {
    assert.deepStrictEqual(feedbackAdjustments('', 'neutral', 5), {});
    assert.deepStrictEqual(feedbackAdjustments('', 'direct', 3), {});
  });

  test('opposing deltas cancel out', () => {
    assert.deepStrictEqual(feedbackAdjustments('more direct', 'direct', 1), {});
  });

  test('keyword matching is case-insensitive', () => {
    assert.deepStrictEqual(feedbackAdjustments('TOO EMOTIONAL'), { emotion: -1 });
  });
});
