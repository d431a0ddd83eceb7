/**
 * Game service: submission pipeline, round reads and guess bookkeeping.
 * Shared by the HTTP API and the CLI.
 */

import { randomUUID } from 'crypto';
import type { RuntimeSettings } from './config.js';
import { DuplicatePostError, NotFoundError, UnauthorizedError, ValidationError } from './errors.js';
import { EVALUATION_VERSION, LlmRoundEvaluator, type EvaluationScores, type RoundEvaluator } from './evaluator.js';
import { LlmCommentGenerator } from './generator.js';
import { logger } from './logger.js';
import { assemblePost, type CommentGenerator, type RoundStats } from './mixer.js';
import { createThreadFetcher, type ThreadFetcher } from './reddit/fetcher.js';
import { parseRedditThread } from './reddit/parser.js';
import { isRedditPostUrl, normalizeRedditUrl } from './reddit/url.js';
import { LIMITS } from './security.js';
import {
  LibsqlPostStore,
  type GameStats,
  type GuessValue,
  type PostFilter,
  type PostProgress,
  type PostStore,
  type PostSummary,
  type ProgressSummary,
  type StoredEvaluation,
  type StoredPost,
  type User,
} from './store.js';
import { countNodes, findNode, type CommentNode, type Post } from './tree.js';

/** Author shown for a synthetic comment once it has been guessed */
export const SYNTHETIC_AUTHOR_LABEL = '[replicant]';

export interface GameServiceDeps {
  store: PostStore;
  generator: CommentGenerator;
  fetchThread: ThreadFetcher;
  /** Scores each stored round; rounds are kept when it fails */
  evaluator?: RoundEvaluator;
}

export interface SubmitResult {
  id: number;
  redditUrl: string;
  stats: RoundStats;
  evaluation: EvaluationScores | null;
}

export interface GuessOutcome {
  postId: number;
  commentId: string;
  guess: GuessValue;
  isCorrect: boolean;
  isSynthetic: boolean;
  author: string;
  progress: {
    total: number;
    correct: number;
    accuracy: number;
    remaining: number;
  };
}

export function revealedAuthor(comment: CommentNode): string {
  return comment.isSynthetic ? SYNTHETIC_AUTHOR_LABEL : comment.author;
}

export class GameService {
  private readonly store: PostStore;
  private readonly generator: CommentGenerator;
  private readonly fetchThread: ThreadFetcher;
  private readonly evaluator: RoundEvaluator | undefined;

  constructor(deps: GameServiceDeps) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.fetchThread = deps.fetchThread;
    this.evaluator = deps.evaluator;
  }

  // ==========================================================================
  // SUBMISSION
  // ==========================================================================

  /**
   * Fetch, parse, assemble and store one Reddit post. Nothing is written
   * unless the round assembled completely.
   */
  async submitPost(url: string, options: { overwrite?: boolean } = {}): Promise<SubmitResult> {
    const trimmed = url.trim();
    if (!isRedditPostUrl(trimmed)) {
      throw new ValidationError(
        'Invalid Reddit URL. Expected https://www.reddit.com/r/<subreddit>/comments/<id>/...'
      );
    }
    const redditUrl = normalizeRedditUrl(trimmed);
    const overwrite = options.overwrite ?? false;

    if (!overwrite && await this.store.exists(redditUrl)) {
      throw new DuplicatePostError(redditUrl);
    }

    const started = Date.now();
    const source = parseRedditThread(await this.fetchThread(redditUrl));
    const round = await assemblePost(source, this.generator);

    const id = await this.store.save(
      {
        redditUrl,
        post: round.post,
        aiCount: round.stats.synthetic,
        totalCount: round.stats.total,
      },
      { overwrite }
    );

    logger.info(`Stored post ${id} from r/${source.subreddit}`, {
      ...round.stats,
      ms: Date.now() - started,
    });

    const evaluation = await this.evaluateRound(id, round.post);
    return { id, redditUrl, stats: round.stats, evaluation };
  }

  private async evaluateRound(id: number, post: Post): Promise<EvaluationScores | null> {
    if (!this.evaluator) return null;
    try {
      const scores = await this.evaluator.evaluate(post);
      await this.store.saveEvaluation(id, scores, EVALUATION_VERSION);
      logger.info(`Evaluated post ${id}`, { ...scores });
      return scores;
    } catch (error) {
      logger.warn(`Evaluation failed for post ${id}, keeping the round`, { error: String(error) });
      return null;
    }
  }

  /** Stored judge scores for a round, null when it was never evaluated */
  async getEvaluation(id: number): Promise<StoredEvaluation | null> {
    if (!(await this.store.load(id))) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    return this.store.getEvaluation(id);
  }

  // ==========================================================================
  // POSTS
  // ==========================================================================

  async getPost(id: number): Promise<StoredPost> {
    const stored = await this.store.load(id);
    if (!stored || stored.isDeleted) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    return stored;
  }

  listPosts(filter: PostFilter = {}): Promise<PostSummary[]> {
    return this.store.list(filter);
  }

  /** Hide a post from players. False when it was already hidden. */
  async deletePost(id: number): Promise<boolean> {
    if (!(await this.store.load(id))) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    return this.store.softDelete(id);
  }

  async restorePost(id: number): Promise<boolean> {
    if (!(await this.store.load(id))) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    return this.store.restore(id);
  }

  // ==========================================================================
  // SESSIONS
  // ==========================================================================

  createSession(): Promise<User> {
    return this.store.createUser(randomUUID());
  }

  async authenticate(token: string | undefined): Promise<User> {
    if (!token || token.length > LIMITS.TOKEN_MAX_LENGTH) {
      throw new UnauthorizedError();
    }
    const user = await this.store.findUserByToken(token);
    if (!user) {
      throw new UnauthorizedError();
    }
    return user;
  }

  // ==========================================================================
  // GUESSES
  // ==========================================================================

  /** Correctness is decided here from the stored tree, never by the client */
  async recordGuess(user: User, postId: number, commentId: string, guess: GuessValue): Promise<GuessOutcome> {
    const stored = await this.getPost(postId);
    const comment = findNode(stored.post.comments, commentId);
    if (!comment) {
      throw new NotFoundError(`Comment ${commentId} not found in post ${postId}`);
    }

    const isCorrect = (guess === 'replicant') === comment.isSynthetic;
    await this.store.recordGuess({
      userId: user.id,
      postId,
      commentId,
      guess,
      isCorrect,
      isSynthetic: comment.isSynthetic,
    });

    const progress = await this.store.getProgress(user.id, postId);
    return {
      postId,
      commentId,
      guess,
      isCorrect,
      isSynthetic: comment.isSynthetic,
      author: revealedAuthor(comment),
      progress: {
        total: progress.total,
        correct: progress.correct,
        accuracy: progress.accuracy,
        remaining: countNodes(stored.post.comments) - progress.total,
      },
    };
  }

  async flagObvious(user: User, postId: number, commentId: string): Promise<void> {
    await this.getPost(postId);
    if (!(await this.store.flagObvious(user.id, postId, commentId))) {
      throw new NotFoundError(`No guess recorded for comment ${commentId}`);
    }
  }

  async getProgress(user: User, postId: number): Promise<PostProgress> {
    await this.getPost(postId);
    return this.store.getProgress(user.id, postId);
  }

  getAllProgress(user: User): Promise<ProgressSummary[]> {
    return this.store.getAllProgress(user.id);
  }

  async resetProgress(user: User, postId: number): Promise<number> {
    await this.getPost(postId);
    const cleared = await this.store.resetProgress(user.id, postId);
    logger.debug(`Cleared ${cleared} guesses`, { user: user.id, post: postId });
    return cleared;
  }

  stats(): Promise<GameStats> {
    return this.store.stats();
  }

  close(): void {
    this.store.close();
  }
}

/** Wire the service to the configured database, model provider and Reddit */
export async function createGameService(settings: RuntimeSettings): Promise<GameService> {
  const store = await LibsqlPostStore.open({
    url: settings.databaseUrl,
    authToken: settings.databaseAuthToken,
  });
  return new GameService({
    store,
    generator: new LlmCommentGenerator({ timeoutMs: settings.generationTimeoutMs }),
    fetchThread: createThreadFetcher(settings.redditTimeoutMs),
    evaluator: settings.evaluateRounds
      ? new LlmRoundEvaluator({ timeoutMs: settings.generationTimeoutMs })
      : undefined,
  });
}
