import * as assert from 'assert';
import type { StyleProfile } from '@tonecraft/shared';
import { decide } from '../../src/finetune/decision.js';

const CONTEXTS = ['business', 'report', 'personal', 'casual'];
const LEVELS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

// Every way a formality level can reach the decision: base alone, or session over a contrary base
const placements = (level: number): StyleProfile[] => [
  { base: { formality: level } },
  { base: { formality: level < 5 ? 10 : 1 }, session: { formality: level } },
];

suite('decide', () => {
  test('formality of 5 or more escalates in every context', () => {
    for (const level of LEVELS.filter((l) => l >= 5)) {
      for (const context of CONTEXTS) {
        for (const profile of placements(level)) {
          assert.deepStrictEqual(
            decide(profile, context, false),
            { escalate: true, reason: 'auto_condition' },
            `formality ${level} in ${context}: ${JSON.stringify(profile)}`,
          );
        }
      }
    }
  });

  test('formality of 3 or less never escalates without a request or document mode', () => {
    for (const level of LEVELS.filter((l) => l <= 3)) {
      for (const context of CONTEXTS) {
        for (const profile of placements(level)) {
          assert.deepStrictEqual(
            decide(profile, context, false),
            { escalate: false, reason: 'condition_not_met' },
            `formality ${level} in ${context}: ${JSON.stringify(profile)}`,
          );
        }
      }
    }
  });

  test('formality of 4 escalates exactly in the formal contexts', () => {
    for (const context of CONTEXTS) {
      for (const profile of placements(4)) {
        const expected = context === 'business' || context === 'report';
        assert.strictEqual(decide(profile, context, false).escalate, expected, `${context}: ${JSON.stringify(profile)}`);
      }
    }
  });

  test('an explicit request or document mode escalates at every level', () => {
    for (const level of LEVELS) {
      for (const context of CONTEXTS) {
        for (const profile of placements(level)) {
          assert.strictEqual(decide(profile, context, true).reason, 'user_explicit_request');
          assert.deepStrictEqual(decide({ ...profile, formalDocumentMode: true }, context, false), {
            escalate: true,
            reason: 'auto_condition',
          });
        }
      }
    }
  });

  test('explicit request escalates regardless of profile', () => {
    assert.deepStrictEqual(decide({ base: { formality: 1 } }, 'casual', true), {
      escalate: true,
      reason: 'user_explicit_request',
    });
  });

  test('formal document mode escalates', () => {
    assert.deepStrictEqual(decide({ formalDocumentMode: true }, 'casual', false), {
      escalate: true,
      reason: 'auto_condition',
    });
  });

  test('formality of 5 escalates in any context', () => {
    assert.deepStrictEqual(decide({ base: { formality: 5 } }, 'personal', false), {
      escalate: true,
      reason: 'auto_condition',
    });
  });

  test('formality of 4 escalates only for business and report', () => {
    const profile = { base: { formality: 4 } };
    assert.strictEqual(decide(profile, 'business', false).escalate, true);
    assert.strictEqual(decide(profile, 'report', false).escalate, true);
    assert.deepStrictEqual(decide(profile, 'personal', false), {
      escalate: false,
      reason: 'condition_not_met',
    });
  });

  test('session formality wins over base', () => {
    assert.strictEqual(decide({ base: { formality: 8 }, session: { formality: 2 } }, 'business', false).escalate, false);
    assert.strictEqual(decide({ base: { formality: 2 }, session: { formality: 6 } }, 'casual', false).escalate, true);
  });

  test('an empty profile never escalates on its own', () => {
    assert.deepStrictEqual(decide({}, 'business', false), {
      escalate: false,
      reason: 'condition_not_met',
    });
  });

  test('explicit request outranks formal document mode in the reason', () => {
    assert.strictEqual(decide({ formalDocumentMode: true }, 'business', true).reason, 'user_explicit_request');
  });
});
