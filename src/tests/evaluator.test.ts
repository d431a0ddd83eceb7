/**
 * Tests for judge reply parsing and round scoring
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { EvaluationError } from '../errors.js';
import { LlmRoundEvaluator, overallScore, parseJudgeReply } from '../evaluator.js';
import { EVALUATION_SYSTEM_PROMPT } from '../prompts/evaluation.js';
import type { ChatFn, ChatOptions } from '../providers.js';
import { relinkTree } from '../tree.js';
import { node, sourcePost } from './fixtures.js';

function reply(content: string): { content: string; provider: 'anthropic'; model: string } {
  return { content, provider: 'anthropic', model: 'test-model' };
}

// r1 -> s2 (synthetic reply), s1 (synthetic top-level), r2
function judgedPost() {
  const roots = [
    node('r1', [node('s2', [], { isSynthetic: true, content: 'made up reply' })]),
    node('s1', [], { isSynthetic: true, content: 'made up take' }),
    node('r2'),
  ];
  relinkTree(roots);
  return sourcePost(roots);
}

const HUMAN_SCORES: Record<string, number> = { 'made up reply': 6, 'made up take': 8 };

interface JudgeScript {
  mixed?: (lines: Array<{ n: number; text: string }>) => string;
  diversity?: string;
  appropriateness?: string;
}

/** Routes each judge prompt by the answer format it asks for */
function judgeChat(script: JudgeScript = {}, seen: Array<{ prompt: string; options?: ChatOptions }> = []): ChatFn {
  return async (prompt, options) => {
    seen.push({ prompt, options });
    if (prompt.includes('comment_scores')) {
      const lines = [...prompt.matchAll(/^Comment (\d+): (.*)$/gm)].map(m => ({ n: Number(m[1]), text: m[2] }));
      const answer = script.mixed ?? (ls => JSON.stringify({ comment_scores: ls.map(l => HUMAN_SCORES[l.text] ?? 2) }));
      return reply(answer(lines));
    }
    if (prompt.includes('diversity_score')) {
      return reply(script.diversity ?? '{"diversity_score": 6, "main_issue": "two start with lol"}');
    }
    return reply(script.appropriateness ?? '```json\n{"appropriateness_score": 8 // casual enough\n}\n```');
  };
}

describe('Round evaluation', () => {
  describe('parseJudgeReply', () => {
    const Schema = z.object({ score: z.number(), note: z.string().optional() });

    it('reads JSON wrapped in prose', () => {
      assert.deepStrictEqual(parseJudgeReply('Here you go: {"score": 4} hope that helps', Schema, 'test'), { score: 4 });
    });

    it('drops line comments but keeps URLs inside strings', () => {
      const text = '{\n  "score": 4, // middling\n  "note": "see https://example.test"\n}';
      assert.deepStrictEqual(parseJudgeReply(text, Schema, 'test'), { score: 4, note: 'see https://example.test' });
    });

    it('fails without a JSON object', () => {
      assert.throws(() => parseJudgeReply('I would say about a 7', Schema, 'diversity'), /diversity: no JSON object in judge reply/);
    });

    it('fails on broken JSON', () => {
      assert.throws(() => parseJudgeReply('{"score": }', Schema, 'test'), EvaluationError);
    });

    it('fails when the object has the wrong shape', () => {
      assert.throws(() => parseJudgeReply('{"score": "high"}', Schema, 'test'), /test: score Expected number, received string/);
    });
  });

  describe('overallScore', () => {
    it('weights mixed reality highest', () => {
      assert.strictEqual(overallScore({ mixedReality: 7, diversity: 6, appropriateness: 8 }), 6.9);
      assert.strictEqual(overallScore({ mixedReality: 10, diversity: 10, appropriateness: 10 }), 10);
      assert.strictEqual(overallScore({ mixedReality: 2, diversity: 10, appropriateness: 10 }), 6);
    });
  });

  describe('LlmRoundEvaluator', () => {
    it('scores a round from three judge calls', async () => {
      const seen: Array<{ prompt: string; options?: ChatOptions }> = [];
      const evaluator = new LlmRoundEvaluator({ chat: judgeChat({}, seen), timeoutMs: 1234 });

      const scores = await evaluator.evaluate(judgedPost());

      assert.deepStrictEqual(scores, { mixedReality: 7, diversity: 6, appropriateness: 8, overall: 6.9 });
      assert.strictEqual(seen.length, 3);
      for (const call of seen) {
        assert.strictEqual(call.options?.systemPrompt, EVALUATION_SYSTEM_PROMPT);
        assert.strictEqual(call.options?.temperature, 0.1);
        assert.strictEqual(call.options?.timeout, 1234);
      }
    });

    it('shows the judge every comment, and only synthetic ones for diversity', async () => {
      const seen: Array<{ prompt: string; options?: ChatOptions }> = [];
      await new LlmRoundEvaluator({ chat: judgeChat({}, seen) }).evaluate(judgedPost());

      const mixed = seen.find(c => c.prompt.includes('comment_scores'));
      const diversity = seen.find(c => c.prompt.includes('diversity_score'));
      const tone = seen.find(c => c.prompt.includes('appropriateness_score'));
      assert.ok(mixed && diversity && tone);

      const shown = [...mixed.prompt.matchAll(/^Comment \d+: (.*)$/gm)].map(m => m[1]).sort();
      assert.deepStrictEqual(shown, ['Comment r1', 'Comment r2', 'made up reply', 'made up take']);
      assert.ok(diversity.prompt.includes('AI Comment 1: made up reply\n\nAI Comment 2: made up take'));
      assert.ok(!diversity.prompt.includes('Comment r1'));
      assert.ok(tone.prompt.includes('TOP-LEVEL COMMENTS:\n- made up take\n\nREPLIES:\n- made up reply'));
    });

    it('shuffles comments the same way for the same post', async () => {
      const first: Array<{ prompt: string; options?: ChatOptions }> = [];
      const second: Array<{ prompt: string; options?: ChatOptions }> = [];
      await new LlmRoundEvaluator({ chat: judgeChat({}, first) }).evaluate(judgedPost());
      await new LlmRoundEvaluator({ chat: judgeChat({}, second) }).evaluate(judgedPost());

      const mixedPrompt = (calls: typeof first) => calls.find(c => c.prompt.includes('comment_scores'))?.prompt;
      assert.strictEqual(mixedPrompt(first), mixedPrompt(second));
    });

    it('accepts scores keyed by comment number', async () => {
      const chat = judgeChat({
        mixed: lines => JSON.stringify({
          comment_scores: Object.fromEntries(lines.map(l => [String(l.n), HUMAN_SCORES[l.text] ?? 3])),
        }),
      });
      const scores = await new LlmRoundEvaluator({ chat }).evaluate(judgedPost());
      assert.strictEqual(scores.mixedReality, 7);
    });

    it('fails when the judge skips comments', async () => {
      const chat = judgeChat({ mixed: () => '{"comment_scores": [5, 5]}' });
      await assert.rejects(
        new LlmRoundEvaluator({ chat }).evaluate(judgedPost()),
        /mixed reality: expected 4 scores, got 2/
      );
    });

    it('fails on scores outside 1-10', async () => {
      const chat = judgeChat({ diversity: '{"diversity_score": 11}' });
      await assert.rejects(new LlmRoundEvaluator({ chat }).evaluate(judgedPost()), EvaluationError);
    });

    it('passes provider errors through', async () => {
      const failing: ChatFn = async () => {
        throw new Error('provider down');
      };
      await assert.rejects(new LlmRoundEvaluator({ chat: failing }).evaluate(judgedPost()), /provider down/);
    });

    it('refuses a round without synthetic comments', async () => {
      const roots = [node('r1'), node('r2')];
      relinkTree(roots);
      await assert.rejects(
        new LlmRoundEvaluator({ chat: judgeChat() }).evaluate(sourcePost(roots)),
        /no synthetic comments/
      );
    });
  });
});
