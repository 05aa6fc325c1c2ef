import * as assert from 'assert';
import {
  createPromptTemplateService,
  describeContext,
  negativeConstraints,
} from '../../src/prompts/style-prompts.js';
import { fillTemplate, REFINEMENT_TEMPLATE } from '../../src/prompts/templates.js';

suite('buildConversionPrompts', () => {
  const service = createPromptTemplateService();

  test('renders levels, variant instruction and constraints', () => {
    const prompts = service.buildConversionPrompts(
      { base: { formality: 8, friendliness: 2, emotion: 5, directness: 9 } },
      'business',
      { emoticonUsage: 'strict', bulletPointUsage: 'lenient', customNegativePrompts: ['  No slang ', ''] },
    );

    assert.strictEqual(
      prompts.direct,
      [
        'You are rewriting a message for a business communication with colleagues or clients.',
        '',
        'Target tone:',
        '- Formality: 8/10 (formal, professional wording)',
        '- Friendliness: 2/10 (reserved and matter-of-fact)',
        '- Emotional expressiveness: 5/10 (lightly expressive)',
        '- Directness: 9/10 (direct and to the point)',
        '',
        'Write a DIRECT version: lead with the main point, use short declarative sentences, and leave out hedging.',
        '',
        'Constraints:',
        '- Do not use emoticons or emoji.',
        '- No slang',
        '- Keep the original meaning and language of the text.',
        '',
        'Return only the rewritten text.',
      ].join('\n'),
    );
  });

  test('produces one prompt per variant', () => {
    const prompts = service.buildConversionPrompts({}, 'casual');
    assert.deepStrictEqual(Object.keys(prompts).sort(), ['direct', 'gentle', 'neutral']);
    assert.ok(prompts.gentle.includes('Write a GENTLE version'));
    assert.ok(prompts.neutral.includes('Write a NEUTRAL version'));
  });

  test('missing levels default to 5', () => {
    const prompts = service.buildConversionPrompts({}, 'casual');
    assert.ok(prompts.neutral.includes('- Formality: 5/10 (polite but relaxed wording)'));
  });

  test('explicit negatives replace the profile switches', () => {
    const profile = { negativePreferences: { emoticonUsage: 'strict' as const } };
    assert.ok(service.buildConversionPrompts(profile, 'casual').direct.includes('Do not use emoticons or emoji.'));
    assert.ok(!service.buildConversionPrompts(profile, 'casual', {}).direct.includes('emoticons'));
  });
});

suite('describeContext', () => {
  test('unknown contexts fall back to a general description', () => {
    assert.strictEqual(describeContext('report'), 'a formal report or official document');
    assert.strictEqual(describeContext('wedding-speech'), 'everyday written communication');
  });
});

suite('negativeConstraints', () => {
  test('lenient switches add nothing', () => {
    assert.deepStrictEqual(negativeConstraints({ avoidFloweryLanguage: 'lenient', commaUsageStyle: 'moderate' }), [
      'Do not overuse commas.',
    ]);
  });
});

suite('fillTemplate', () => {
  test('replaces every occurrence literally', () => {
    assert.strictEqual(fillTemplate('{a} and {a} but {b}', { a: '$1', b: 'x' }), '$1 and $1 but x');
  });

  test('leaves unknown placeholders', () => {
    assert.strictEqual(fillTemplate('{a} {missing}', { a: 'ok' }), 'ok {missing}');
  });

  test('refinement template embeds both texts', () => {
    const prompt = fillTemplate(REFINEMENT_TEMPLATE, {
      originalText: 'orig',
      primaryOutput: 'primary',
      instructions: 'be formal',
    });
    assert.ok(prompt.includes('[Original Text]\norig\n'));
    assert.ok(prompt.includes('[Primary Conversion Result]\nprimary\n'));
    assert.ok(prompt.includes('[Task Instructions]\nbe formal\n'));
  });
});
