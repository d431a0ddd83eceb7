import { timingSafeEqual } from 'crypto';
import { Hono, type Context, type MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { APP_NAME, APP_VERSION } from './config.js';
import { NotFoundError, UnauthorizedError, ValidationError, isReplicantError } from './errors.js';
import type { EvaluationScores } from './evaluator.js';
import type { GameService, GuessOutcome } from './game.js';
import { logger } from './logger.js';
import { LIMITS } from './security.js';
import {
  GUESS_VALUES,
  type GameStats,
  type PostProgress,
  type PostSummary,
  type StoredEvaluation,
  type StoredPost,
  type User,
} from './store.js';
import type { CommentNode } from './tree.js';

type AppEnv = { Variables: { user: User } };

export interface AppOptions {
  /** Admin routes refuse every request when unset */
  adminToken?: string;
  /** Origins allowed for browser clients, default any */
  corsOrigins?: string[];
}

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

const SubmitSchema = z.object({
  url: z.string().min(1).max(LIMITS.URL_MAX_LENGTH),
  overwrite: z.boolean().optional().default(false),
});

const commentId = z.string().min(1).max(LIMITS.COMMENT_ID_MAX_LENGTH);

const GuessSchema = z.object({
  post_id: z.number().int().positive(),
  comment_id: commentId,
  guess: z.enum(GUESS_VALUES),
});

const FlagSchema = z.object({
  post_id: z.number().int().positive(),
  comment_id: commentId,
});

async function readBody<S extends z.ZodTypeAny>(c: Context<AppEnv>, schema: S): Promise<z.infer<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be JSON');
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') ?? '';
    throw new ValidationError(`${where ? `${where}: ` : ''}${issue?.message ?? 'invalid body'}`);
  }
  return result.data;
}

function parseId(value: string, name = 'id'): number {
  if (!/^\d{1,12}$/.test(value) || Number(value) === 0) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
  return Number(value);
}

function isTruthy(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

// ============================================================================
// WIRE FORMAT (snake_case)
// ============================================================================

interface WireComment {
  id: string;
  author: string;
  content: string;
  score: number;
  depth: number;
  parent_id: string | null;
  is_synthetic: boolean;
  children: WireComment[];
}

export function toWireComment(node: CommentNode): WireComment {
  return {
    id: node.id,
    author: node.author,
    content: node.content,
    score: node.score,
    depth: node.depth,
    parent_id: node.parentId,
    is_synthetic: node.isSynthetic,
    children: node.children.map(toWireComment),
  };
}

function toWireSummary(summary: PostSummary) {
  return {
    id: summary.id,
    reddit_url: summary.redditUrl,
    title: summary.title,
    subreddit: summary.subreddit,
    ai_count: summary.aiCount,
    total_count: summary.totalCount,
    created_at: summary.createdAt,
    is_deleted: summary.isDeleted,
  };
}

function toWirePost(stored: StoredPost) {
  return {
    ...toWireSummary(stored),
    post: {
      title: stored.post.title,
      body: stored.post.body,
      author: stored.post.author,
      subreddit: stored.post.subreddit,
      score: stored.post.score,
    },
    comments: stored.post.comments.map(toWireComment),
  };
}

function toWireProgress(progress: PostProgress) {
  return {
    post_id: progress.postId,
    total: progress.total,
    correct: progress.correct,
    accuracy: progress.accuracy,
    guesses: progress.guesses.map(g => ({
      comment_id: g.commentId,
      guess: g.guess,
      is_correct: g.isCorrect,
      is_synthetic: g.isSynthetic,
      flagged_obvious: g.flaggedObvious,
      guessed_at: g.guessedAt,
    })),
  };
}

function toWireOutcome(outcome: GuessOutcome) {
  return {
    post_id: outcome.postId,
    comment_id: outcome.commentId,
    guess: outcome.guess,
    is_correct: outcome.isCorrect,
    is_synthetic: outcome.isSynthetic,
    author: outcome.author,
    progress: outcome.progress,
  };
}

function toWireStats(stats: GameStats) {
  return {
    posts: stats.posts,
    users: stats.users,
    overall: stats.overall,
    synthetic: stats.synthetic,
    real: stats.real,
    flagged_obvious: stats.flaggedObvious,
  };
}

function toWireScores(scores: EvaluationScores) {
  return {
    mixed_reality_score: scores.mixedReality,
    diversity_score: scores.diversity,
    appropriateness_score: scores.appropriateness,
    overall_score: scores.overall,
  };
}

function toWireEvaluation(evaluation: StoredEvaluation) {
  return {
    post_id: evaluation.postId,
    ...toWireScores(evaluation),
    evaluation_version: evaluation.version,
    evaluated_at: evaluation.evaluatedAt,
  };
}

function errorResponse(status: number, code: string, message: string, retryable: boolean): Response {
  return new Response(JSON.stringify({ error: { code, message, retryable } }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

// ============================================================================
// APP
// ============================================================================

export function createApp(service: GameService, options: AppOptions = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  const isAdmin = (c: Context<AppEnv>): boolean => {
    const given = c.req.header('x-admin-token');
    return !!options.adminToken && !!given && tokensMatch(given, options.adminToken);
  };

  const requireUser: MiddlewareHandler<AppEnv> = async (c, next) => {
    const header = c.req.header('Authorization');
    const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : undefined;
    c.set('user', await service.authenticate(token));
    await next();
  };

  const requireAdmin: MiddlewareHandler<AppEnv> = async (c, next) => {
    if (!isAdmin(c)) {
      throw new UnauthorizedError('Admin token required');
    }
    await next();
  };

  app.use('*', async (c, next) => {
    const started = Date.now();
    await next();
    logger.request(c.req.method, c.req.path, c.res.status, Date.now() - started);
  });

  const origins = options.corsOrigins ?? ['*'];
  app.use('/api/*', cors({
    origin: origins.includes('*') ? '*' : origins,
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'x-admin-token'],
    maxAge: 600,
  }));

  app.onError((err, c) => {
    if (isReplicantError(err)) {
      return errorResponse(err.status, err.code, err.message, err.retryable);
    }
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, err);
    return errorResponse(500, 'internal_error', 'Internal server error', true);
  });

  app.notFound(() => errorResponse(404, 'not_found', 'Route not found', false));

  app.get('/api', c => c.json({ name: APP_NAME, version: APP_VERSION, status: 'ok' }));

  // Posts
  app.post('/api/posts', async c => {
    const body = await readBody(c, SubmitSchema);
    const result = await service.submitPost(body.url, { overwrite: body.overwrite });
    return c.json({
      id: result.id,
      reddit_url: result.redditUrl,
      stats: {
        real: result.stats.real,
        synthetic: result.stats.synthetic,
        total: result.stats.total,
        top_level_synthetic: result.stats.topLevelSynthetic,
        reply_synthetic: result.stats.replySynthetic,
      },
      evaluation: result.evaluation ? toWireScores(result.evaluation) : null,
    }, 201);
  });

  app.get('/api/posts', async c => {
    const includeDeleted = isTruthy(c.req.query('include_deleted'));
    if (includeDeleted && !isAdmin(c)) {
      throw new UnauthorizedError('Admin token required to list deleted posts');
    }
    const subreddit = c.req.query('subreddit')?.slice(0, LIMITS.SUBREDDIT_MAX_LENGTH) || undefined;
    const posts = await service.listPosts({ subreddit, includeDeleted });
    return c.json({ posts: posts.map(toWireSummary) });
  });

  app.get('/api/posts/:id', async c => {
    const stored = await service.getPost(parseId(c.req.param('id')));
    return c.json(toWirePost(stored));
  });

  // Sessions and guesses
  app.post('/api/sessions', async c => {
    const user = await service.createSession();
    return c.json({ token: user.token }, 201);
  });

  app.post('/api/guesses', requireUser, async c => {
    const body = await readBody(c, GuessSchema);
    const outcome = await service.recordGuess(c.get('user'), body.post_id, body.comment_id, body.guess);
    return c.json(toWireOutcome(outcome));
  });

  app.post('/api/guesses/flag', requireUser, async c => {
    const body = await readBody(c, FlagSchema);
    await service.flagObvious(c.get('user'), body.post_id, body.comment_id);
    return c.json({ flagged: true });
  });

  app.get('/api/progress', requireUser, async c => {
    const progress = await service.getAllProgress(c.get('user'));
    return c.json({
      posts: progress.map(p => ({
        post_id: p.postId,
        title: p.title,
        subreddit: p.subreddit,
        total: p.total,
        correct: p.correct,
        accuracy: p.accuracy,
      })),
    });
  });

  app.get('/api/progress/:postId', requireUser, async c => {
    const progress = await service.getProgress(c.get('user'), parseId(c.req.param('postId'), 'postId'));
    return c.json(toWireProgress(progress));
  });

  app.delete('/api/progress/:postId', requireUser, async c => {
    const cleared = await service.resetProgress(c.get('user'), parseId(c.req.param('postId'), 'postId'));
    return c.json({ cleared });
  });

  app.get('/api/stats', async c => c.json(toWireStats(await service.stats())));

  // Admin
  app.post('/api/admin/posts/:id/delete', requireAdmin, async c => {
    const changed = await service.deletePost(parseId(c.req.param('id')));
    return c.json({ deleted: true, changed });
  });

  app.post('/api/admin/posts/:id/restore', requireAdmin, async c => {
    const changed = await service.restorePost(parseId(c.req.param('id')));
    return c.json({ restored: true, changed });
  });

  app.get('/api/admin/posts/:id/evaluation', requireAdmin, async c => {
    const id = parseId(c.req.param('id'));
    const evaluation = await service.getEvaluation(id);
    if (!evaluation) {
      throw new NotFoundError(`Post ${id} has not been evaluated`);
    }
    return c.json(toWireEvaluation(evaluation));
  });

  return app;
}
