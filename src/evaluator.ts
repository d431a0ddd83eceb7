/**
 * Model-as-judge scoring of an assembled round.
 *
 * Three judge calls per round, each scored 1-10:
 * - mixed reality: how human the synthetic comments look next to the real ones
 * - diversity: how different the synthetic comments are from each other
 * - appropriateness: how well they fit Reddit and their top-level/reply role
 */

import { z } from 'zod';
import { EvaluationError } from './errors.js';
import { logger } from './logger.js';
import {
  buildAppropriatenessPrompt,
  buildDiversityPrompt,
  buildMixedRealityPrompt,
  EVALUATION_SYSTEM_PROMPT,
} from './prompts/evaluation.js';
import { chat as defaultChat, type ChatFn, type ChatOptions } from './providers.js';
import { createRng, shuffle } from './random.js';
import { stripControlChars } from './security.js';
import { flattenTree, type CommentNode, type Post } from './tree.js';

/** Stored next to each evaluation so scores from different judge prompts are not mixed */
export const EVALUATION_VERSION = 'judge-v1';

export interface EvaluationScores {
  mixedReality: number;
  diversity: number;
  appropriateness: number;
  overall: number;
}

export interface RoundEvaluator {
  evaluate(post: Post): Promise<EvaluationScores>;
}

const WEIGHTS = { mixedReality: 0.5, diversity: 0.3, appropriateness: 0.2 } as const;

const Score = z.coerce.number().min(1).max(10);

const CommentScoresSchema = z.object({
  comment_scores: z.union([z.array(Score), z.record(z.string(), Score)]),
});

const DiversitySchema = z.object({
  diversity_score: Score,
  main_issue: z.string().optional(),
});

const AppropriatenessSchema = z.object({
  appropriateness_score: Score,
  tone_issue: z.string().optional(),
});

function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}

export function overallScore(scores: Omit<EvaluationScores, 'overall'>): number {
  return roundScore(
    scores.mixedReality * WEIGHTS.mixedReality +
    scores.diversity * WEIGHTS.diversity +
    scores.appropriateness * WEIGHTS.appropriateness
  );
}

/**
 * Read the JSON object out of a judge reply. Judges wrap it in prose or
 * annotate it with `//` comments now and then.
 */
export function parseJudgeReply<S extends z.ZodTypeAny>(text: string, schema: S, label: string): z.output<S> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new EvaluationError(`${label}: no JSON object in judge reply`);
  }

  const candidate = stripControlChars(text.slice(start, end + 1)).replace(/(^|\s)\/\/[^\n]*/g, '$1');
  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch (error) {
    throw new EvaluationError(`${label}: judge reply is not valid JSON`, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new EvaluationError(`${label}: ${issue?.path.join('.') || 'reply'} ${issue?.message ?? 'is invalid'}`);
  }
  return result.data;
}

// Scores come back as a list or as {"1": 9, "2": 3, ...}
function scoreList(scores: number[] | Record<string, number>, count: number): number[] {
  if (Array.isArray(scores)) {
    if (scores.length !== count) {
      throw new EvaluationError(`mixed reality: expected ${count} scores, got ${scores.length}`);
    }
    return scores;
  }
  return Array.from({ length: count }, (_, i) => {
    const score: number | undefined = scores[String(i + 1)];
    if (score === undefined) {
      throw new EvaluationError(`mixed reality: no score for comment ${i + 1}`);
    }
    return score;
  });
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export interface LlmEvaluatorOptions {
  chat?: ChatFn;
  timeoutMs?: number;
}

export class LlmRoundEvaluator implements RoundEvaluator {
  private readonly chat: ChatFn;
  private readonly timeoutMs: number;

  constructor(options: LlmEvaluatorOptions = {}) {
    this.chat = options.chat ?? defaultChat;
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  async evaluate(post: Post): Promise<EvaluationScores> {
    const comments = flattenTree(post.comments);
    const synthetic = comments.filter(c => c.isSynthetic);
    if (synthetic.length === 0) {
      throw new EvaluationError('Round has no synthetic comments to judge');
    }

    const [mixedReality, diversity, appropriateness] = await Promise.all([
      this.judgeMixedReality(post, comments),
      this.judgeDiversity(synthetic),
      this.judgeAppropriateness(post, synthetic),
    ]);

    const scores = {
      mixedReality: roundScore(mixedReality),
      diversity: roundScore(diversity),
      appropriateness: roundScore(appropriateness),
    };
    logger.debug('Judged round', { post: post.id, ...scores });
    return { ...scores, overall: overallScore(scores) };
  }

  private async ask(prompt: string, maxTokens: number): Promise<string> {
    const options: ChatOptions = {
      systemPrompt: EVALUATION_SYSTEM_PROMPT,
      maxTokens,
      temperature: 0.1,
      timeout: this.timeoutMs,
    };
    const response = await this.chat(prompt, options);
    return response.content;
  }

  // Average "human" rating the judge gave the synthetic comments
  private async judgeMixedReality(post: Post, comments: readonly CommentNode[]): Promise<number> {
    const order = shuffle(createRng(`judge:${post.id}`), comments);
    const text = await this.ask(buildMixedRealityPrompt(post.title, order.map(c => c.content)), 500);
    const parsed = parseJudgeReply(text, CommentScoresSchema, 'mixed reality');
    const scores = scoreList(parsed.comment_scores, order.length);
    return mean(order.flatMap((c, i) => (c.isSynthetic ? [scores[i]] : [])));
  }

  private async judgeDiversity(synthetic: readonly CommentNode[]): Promise<number> {
    const text = await this.ask(buildDiversityPrompt(synthetic.map(c => c.content)), 300);
    const parsed = parseJudgeReply(text, DiversitySchema, 'diversity');
    if (parsed.main_issue) logger.debug('Diversity issue', { issue: parsed.main_issue });
    return parsed.diversity_score;
  }

  private async judgeAppropriateness(post: Post, synthetic: readonly CommentNode[]): Promise<number> {
    const topLevel = synthetic.filter(c => c.depth === 0).map(c => c.content);
    const replies = synthetic.filter(c => c.depth > 0).map(c => c.content);
    const text = await this.ask(buildAppropriatenessPrompt(post.title, topLevel, replies), 300);
    const parsed = parseJudgeReply(text, AppropriatenessSchema, 'appropriateness');
    if (parsed.tone_issue) logger.debug('Tone issue', { issue: parsed.tone_issue });
    return parsed.appropriateness_score;
  }
}
