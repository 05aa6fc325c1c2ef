import * as assert from 'assert';
import { adaptSessionLevels } from '../../src/preferences/adaptation.js';
import { summarizeFeedback } from '../../src/preferences/stats.js';

suite('adaptSessionLevels', () => {
  test('a single top rating pulls halfway toward the variant target', () => {
    assert.deepStrictEqual(adaptSessionLevels({ directness: 5, friendliness: 5 }, [{ selectedVariant: 'direct', rating: 5 }]), {
      directness: 6.5,
      friendliness: 4.5,
    });
  });

  test('newer entries weigh more and low ratings push away', () => {
    const adapted = adaptSessionLevels({ directness: 5, friendliness: 5 }, [
      { selectedVariant: 'gentle', rating: 5 },
      { selectedVariant: 'direct', rating: 1 },
    ]);
    assert.strictEqual(adapted.directness, 3.5);
    assert.strictEqual(adapted.friendliness, 6.1);
  });

  test('ratings of 3 carry no weight', () => {
    assert.deepStrictEqual(adaptSessionLevels({ directness: 5 }, [{ selectedVariant: 'direct', rating: 3 }]), {});
    assert.deepStrictEqual(adaptSessionLevels({}, []), {});
  });

  test('missing base levels start from 5 and results stay in range', () => {
    const adapted = adaptSessionLevels({ directness: 10 }, [{ selectedVariant: 'gentle', rating: 1 }]);
    assert.strictEqual(adapted.directness, 10);
    assert.strictEqual(adapted.friendliness, 3.5);
  });
});

suite('summarizeFeedback', () => {
  test('counts variants and averages ratings to two decimals', () => {
    const stats = summarizeFeedback('user-1', [
      { selectedVariant: 'direct', rating: 5, createdAt: new Date('2026-03-01T10:00:00Z') },
      { selectedVariant: 'direct', rating: 4, createdAt: new Date('2026-03-03T10:00:00Z') },
      { selectedVariant: 'gentle', rating: 4, createdAt: new Date('2026-03-02T10:00:00Z') },
    ]);
    assert.deepStrictEqual(stats, {
      userId: 'user-1',
      totalFeedback: 3,
      averageRating: 4.33,
      variantCounts: { direct: 2, gentle: 1, neutral: 0 },
      lastFeedbackAt: '2026-03-03T10:00:00.000Z',
    });
  });

  test('no rows gives zeroed stats', () => {
    assert.deepStrictEqual(summarizeFeedback('user-2', []), {
      userId: 'user-2',
      totalFeedback: 0,
      averageRating: 0,
      variantCounts: { direct: 0, gentle: 0, neutral: 0 },
      lastFeedbackAt: null,
    });
  });
});
