import * as assert from 'assert';
import {
  buildGroundingBlock,
  buildStyledQuestion,
  ragContextPreview,
  toCitations,
  withContext,
} from '../../src/rag/grounding.js';

const longContent = 'a'.repeat(150);

suite('grounding', () => {
  test('numbers passages and joins them with a blank line', () => {
    const block = buildGroundingBlock([
      { source: 'guide.md', content: 'First.', rank: 1 },
      { source: 'faq.txt', content: 'Second.', rank: 2 },
    ]);
    assert.strictEqual(block, '[Reference Document 1] (guide.md):\nFirst.\n\n[Reference Document 2] (faq.txt):\nSecond.');
  });

  test('citation previews cut at 100 characters', () => {
    const [long, short] = toCitations([
      { source: 'a.md', content: longContent, rank: 1 },
      { source: 'b.md', content: 'short', rank: 2 },
    ]);
    assert.strictEqual(long.content, `${'a'.repeat(100)}...`);
    assert.deepStrictEqual(short, { rank: 2, source: 'b.md', content: 'short' });
  });

  test('rag context preview cuts at 300 characters', () => {
    assert.strictEqual(ragContextPreview('b'.repeat(301)), `${'b'.repeat(300)}...`);
    assert.strictEqual(ragContextPreview('b'.repeat(300)), 'b'.repeat(300));
  });

  test('styled question places the documents after the query', () => {
    assert.strictEqual(buildStyledQuestion('How?', 'DOCS'), 'Question: How?\n\nReference Documents:\nDOCS');
  });

  test('a non-empty context prefixes the question', () => {
    assert.strictEqual(withContext('How?', 'onboarding'), 'Context: onboarding\n\nQuestion: How?');
    assert.strictEqual(withContext('How?', '   '), 'How?');
    assert.strictEqual(withContext('How?'), 'How?');
  });
});
