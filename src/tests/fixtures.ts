/**
 * Builders for Reddit responses, comment trees and scripted generators
 * shared by the test files.
 */
import type { EvaluationScores, RoundEvaluator } from '../evaluator.js';
import type { CommentGenerator, GeneratedComment, GenerationSlot, PostContext } from '../mixer.js';
import { relinkTree, type CommentNode, type Post } from '../tree.js';

// ============================================================================
// RAW REDDIT JSON
// ============================================================================

export interface CommentSpec {
  id: string;
  author?: string;
  body?: string;
  score?: number;
  replies?: CommentSpec[];
}

export function listing(children: unknown[]): { kind: 'Listing'; data: { children: unknown[] } } {
  return { kind: 'Listing', data: { children } };
}

export function commentThing(spec: CommentSpec): unknown {
  return {
    kind: 't1',
    data: {
      id: spec.id,
      author: spec.author ?? `user_${spec.id}`,
      body: spec.body ?? `Comment ${spec.id}`,
      score: spec.score ?? 10,
      // Reddit sends an empty string for "no replies"
      replies: spec.replies && spec.replies.length > 0 ? listing(spec.replies.map(commentThing)) : '',
    },
  };
}

export function moreThing(): unknown {
  return { kind: 'more', data: { count: 12, children: ['zz1', 'zz2'] } };
}

export interface ThreadSpec {
  id?: string;
  title?: string;
  selftext?: string;
  author?: string;
  subreddit?: string;
  score?: number;
  comments: CommentSpec[];
}

export function redditThread(spec: ThreadSpec): unknown[] {
  return [
    listing([{
      kind: 't3',
      data: {
        id: spec.id ?? 'abc123',
        title: spec.title ?? 'What is the best way to store leftover rice?',
        selftext: spec.selftext ?? 'Asking for a friend who keeps getting sick.',
        author: spec.author ?? 'original_poster',
        subreddit: spec.subreddit ?? 'AskReddit',
        score: spec.score ?? 1234,
      },
    }]),
    listing(spec.comments.map(commentThing)),
  ];
}

/** 20 comments in three top-level threads */
export function sampleComments(): CommentSpec[] {
  return [
    {
      id: 'a',
      replies: [
        { id: 'a1', replies: [{ id: 'a1x' }, { id: 'a1y' }] },
        { id: 'a2' },
        { id: 'a3', replies: [{ id: 'a3x' }] },
      ],
    },
    {
      id: 'b',
      replies: [
        { id: 'b1', replies: [{ id: 'b1x' }] },
        { id: 'b2' },
        { id: 'b3' },
      ],
    },
    {
      id: 'c',
      replies: [
        { id: 'c1' },
        { id: 'c2' },
        { id: 'c3', replies: [{ id: 'c3x', replies: [{ id: 'c3xx' }] }] },
        { id: 'c4' },
        { id: 'c5' },
      ],
    },
  ];
}

// ============================================================================
// PARSED TREES
// ============================================================================

export function node(id: string, children: CommentNode[] = [], overrides: Partial<CommentNode> = {}): CommentNode {
  return {
    id,
    author: `user_${id}`,
    content: `Comment ${id}`,
    score: 10,
    depth: 0,
    parentId: null,
    isSynthetic: false,
    children,
    ...overrides,
  };
}

/** Convert specs straight into a linked CommentNode tree */
export function treeFromSpecs(specs: CommentSpec[]): CommentNode[] {
  const build = (spec: CommentSpec): CommentNode => node(spec.id, (spec.replies ?? []).map(build), {
    author: spec.author ?? `user_${spec.id}`,
    content: spec.body ?? `Comment ${spec.id}`,
    score: spec.score ?? 10,
  });
  const roots = specs.map(build);
  relinkTree(roots);
  return roots;
}

export function sourcePost(comments: CommentNode[], overrides: Partial<Post> = {}): Post {
  return {
    id: 'abc123',
    title: 'What is the best way to store leftover rice?',
    body: 'Asking for a friend who keeps getting sick.',
    author: 'original_poster',
    subreddit: 'AskReddit',
    score: 1234,
    comments,
    ...overrides,
  };
}

// ============================================================================
// GENERATORS
// ============================================================================

/**
 * Answers call N with the first plan[N] requested slots (all slots once the
 * plan runs out). An Error in the plan is thrown instead.
 */
export class ScriptedGenerator implements CommentGenerator {
  readonly calls: GenerationSlot[][] = [];
  readonly contexts: PostContext[] = [];
  private readonly plan: Array<number | Error>;

  constructor(plan: Array<number | Error> = []) {
    this.plan = plan;
  }

  async generate(slots: readonly GenerationSlot[], context: PostContext): Promise<GeneratedComment[]> {
    const step = this.plan[this.calls.length];
    this.calls.push([...slots]);
    this.contexts.push(context);
    if (step instanceof Error) {
      throw step;
    }
    const count = step ?? slots.length;
    return slots.slice(0, count).map(s => ({
      slot: s.slot,
      content: `Synthetic comment ${s.slot}`,
      archetype: 'generic:joker',
    }));
  }
}

/** Answers every evaluation with `outcome`, or throws it */
export class ScriptedEvaluator implements RoundEvaluator {
  readonly posts: Post[] = [];
  private readonly outcome: EvaluationScores | Error;

  constructor(outcome: EvaluationScores | Error) {
    this.outcome = outcome;
  }

  async evaluate(post: Post): Promise<EvaluationScores> {
    this.posts.push(post);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}
