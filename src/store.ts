import { createClient, type Client, type Row } from '@libsql/client';
import { z } from 'zod';
import { DuplicatePostError, ParseError } from './errors.js';
import type { EvaluationScores } from './evaluator.js';
import { logger } from './logger.js';
import type { CommentNode, Post } from './tree.js';

// ============================================================================
// TYPES
// ============================================================================

export const GUESS_VALUES = ['reddit', 'replicant'] as const;
export type GuessValue = typeof GUESS_VALUES[number];

export interface PostRecord {
  redditUrl: string;
  post: Post;
  aiCount: number;
  totalCount: number;
}

export interface PostSummary {
  id: number;
  redditUrl: string;
  title: string;
  subreddit: string;
  aiCount: number;
  totalCount: number;
  createdAt: string;
  isDeleted: boolean;
  deletedAt: string | null;
}

export interface StoredPost extends PostSummary {
  post: Post;
}

export interface PostFilter {
  subreddit?: string;
  includeDeleted?: boolean;
}

export interface User {
  id: number;
  token: string;
  createdAt: string;
}

export interface GuessInput {
  userId: number;
  postId: number;
  commentId: string;
  guess: GuessValue;
  isCorrect: boolean;
  isSynthetic: boolean;
}

export interface GuessRecord {
  commentId: string;
  guess: GuessValue;
  isCorrect: boolean;
  isSynthetic: boolean;
  flaggedObvious: boolean;
  guessedAt: string;
}

export interface PostProgress {
  postId: number;
  total: number;
  correct: number;
  accuracy: number;
  guesses: GuessRecord[];
}

export interface ProgressSummary {
  postId: number;
  title: string;
  subreddit: string;
  total: number;
  correct: number;
  accuracy: number;
}

export interface AccuracyBreakdown {
  guesses: number;
  correct: number;
  accuracy: number;
}

export interface GameStats {
  posts: number;
  users: number;
  overall: AccuracyBreakdown;
  synthetic: AccuracyBreakdown;
  real: AccuracyBreakdown;
  flaggedObvious: number;
}

export interface StoredEvaluation extends EvaluationScores {
  postId: number;
  version: string;
  evaluatedAt: string;
}

/**
 * Persistence for rounds, players and guesses. Rounds are written once per
 * submission and read back unchanged.
 */
export interface PostStore {
  save(record: PostRecord, options?: { overwrite?: boolean }): Promise<number>;
  load(id: number): Promise<StoredPost | null>;
  list(filter?: PostFilter): Promise<PostSummary[]>;
  exists(redditUrl: string): Promise<boolean>;
  softDelete(id: number): Promise<boolean>;
  restore(id: number): Promise<boolean>;

  createUser(token: string): Promise<User>;
  findUserByToken(token: string): Promise<User | null>;

  recordGuess(input: GuessInput): Promise<void>;
  getProgress(userId: number, postId: number): Promise<PostProgress>;
  getAllProgress(userId: number): Promise<ProgressSummary[]>;
  resetProgress(userId: number, postId: number): Promise<number>;
  flagObvious(userId: number, postId: number, commentId: string): Promise<boolean>;
  stats(): Promise<GameStats>;

  /** One evaluation per round; saving again replaces it */
  saveEvaluation(postId: number, scores: EvaluationScores, version: string): Promise<void>;
  getEvaluation(postId: number): Promise<StoredEvaluation | null>;

  close(): void;
}

export function accuracy(correct: number, total: number): number {
  return total === 0 ? 0 : Math.round((correct / total) * 1000) / 1000;
}

export function isGuessValue(value: string): value is GuessValue {
  return GUESS_VALUES.some(g => g === value);
}

// ============================================================================
// TREE SERIALIZATION
// ============================================================================

const CommentNodeSchema: z.ZodType<CommentNode> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    author: z.string(),
    content: z.string(),
    score: z.number(),
    depth: z.number().int().min(0),
    parentId: z.string().nullable(),
    isSynthetic: z.boolean(),
    archetype: z.string().optional(),
    children: z.array(CommentNodeSchema),
  })
);

const StoredTreeSchema = z.object({
  id: z.string(),
  title: z.string(),
  body: z.string(),
  author: z.string(),
  subreddit: z.string(),
  score: z.number(),
  comments: z.array(CommentNodeSchema),
});

export function serializePost(post: Post): string {
  return JSON.stringify(post);
}

export function deserializePost(json: string): Post {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ParseError('Stored comment tree is not valid JSON', error);
  }
  const result = StoredTreeSchema.safeParse(raw);
  if (!result.success) {
    throw new ParseError(`Stored comment tree is malformed: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

// ============================================================================
// LIBSQL IMPLEMENTATION
// ============================================================================

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS posts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    reddit_url TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL,
    subreddit TEXT NOT NULL,
    tree_json TEXT NOT NULL,
    ai_count INTEGER NOT NULL,
    total_count INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    token TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS user_guesses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users(id),
    post_id INTEGER NOT NULL REFERENCES posts(id),
    comment_id TEXT NOT NULL,
    guess TEXT NOT NULL CHECK (guess IN ('reddit', 'replicant')),
    is_correct INTEGER NOT NULL,
    is_synthetic INTEGER NOT NULL,
    flagged_obvious INTEGER NOT NULL DEFAULT 0,
    guessed_at TEXT NOT NULL,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at TEXT,
    UNIQUE (user_id, post_id, comment_id)
  )`,
  `CREATE TABLE IF NOT EXISTS evaluations (
    post_id INTEGER PRIMARY KEY REFERENCES posts(id),
    mixed_reality_score REAL NOT NULL,
    diversity_score REAL NOT NULL,
    appropriateness_score REAL NOT NULL,
    overall_score REAL NOT NULL,
    evaluation_version TEXT NOT NULL,
    evaluated_at TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_posts_subreddit ON posts (subreddit)',
  'CREATE INDEX IF NOT EXISTS idx_guesses_user_post ON user_guesses (user_id, post_id)',
];

// Row readers: libsql rows are loosely typed

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  throw new Error(`Column ${column} is not text`);
}

function optionalText(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

function int(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value === null) return 0;
  throw new Error(`Column ${column} is not an integer`);
}

function real(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new Error(`Column ${column} is not a number`);
}

function flag(row: Row, column: string): boolean {
  return int(row, column) !== 0;
}

function guessValue(row: Row, column: string): GuessValue {
  const value = text(row, column);
  if (!isGuessValue(value)) {
    throw new Error(`Column ${column} holds unknown guess ${value}`);
  }
  return value;
}

function toSummary(row: Row): PostSummary {
  return {
    id: int(row, 'id'),
    redditUrl: text(row, 'reddit_url'),
    title: text(row, 'title'),
    subreddit: text(row, 'subreddit'),
    aiCount: int(row, 'ai_count'),
    totalCount: int(row, 'total_count'),
    createdAt: text(row, 'created_at'),
    isDeleted: flag(row, 'is_deleted'),
    deletedAt: optionalText(row, 'deleted_at'),
  };
}

function toUser(row: Row): User {
  return {
    id: int(row, 'id'),
    token: text(row, 'token'),
    createdAt: text(row, 'created_at'),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && error.message.includes('UNIQUE constraint failed');
}

function now(): string {
  return new Date().toISOString();
}

const SUMMARY_COLUMNS =
  'id, reddit_url, title, subreddit, ai_count, total_count, created_at, is_deleted, deleted_at';

export interface LibsqlStoreOptions {
  url: string;
  authToken?: string;
}

export class LibsqlPostStore implements PostStore {
  private readonly client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  /** Connect and create tables if they are missing */
  static async open(options: LibsqlStoreOptions): Promise<LibsqlPostStore> {
    const client = createClient({ url: options.url, authToken: options.authToken });
    const store = new LibsqlPostStore(client);
    await store.init();
    logger.debug('Database ready', { url: options.url.startsWith('file:') ? options.url : '(remote)' });
    return store;
  }

  async init(): Promise<void> {
    await this.client.batch(SCHEMA, 'write');
  }

  close(): void {
    this.client.close();
  }

  // ==========================================================================
  // POSTS
  // ==========================================================================

  async save(record: PostRecord, options: { overwrite?: boolean } = {}): Promise<number> {
    const existing = await this.client.execute({
      sql: 'SELECT id FROM posts WHERE reddit_url = ?',
      args: [record.redditUrl],
    });

    if (existing.rows.length > 0) {
      if (!options.overwrite) {
        throw new DuplicatePostError(record.redditUrl);
      }
      const id = int(existing.rows[0], 'id');
      // Old round and every guess made against it go together
      await this.client.batch([
        {
          sql: `UPDATE posts
                SET title = ?, subreddit = ?, tree_json = ?, ai_count = ?, total_count = ?,
                    created_at = ?, is_deleted = 0, deleted_at = NULL
                WHERE id = ?`,
          args: [
            record.post.title,
            record.post.subreddit,
            serializePost(record.post),
            record.aiCount,
            record.totalCount,
            now(),
            id,
          ],
        },
        { sql: 'DELETE FROM user_guesses WHERE post_id = ?', args: [id] },
        { sql: 'DELETE FROM evaluations WHERE post_id = ?', args: [id] },
      ], 'write');
      logger.info(`Replaced post ${id}`, { url: record.redditUrl });
      return id;
    }

    try {
      const result = await this.client.execute({
        sql: `INSERT INTO posts (reddit_url, title, subreddit, tree_json, ai_count, total_count, created_at)
              VALUES (?, ?, ?, ?, ?, ?, ?)`,
        args: [
          record.redditUrl,
          record.post.title,
          record.post.subreddit,
          serializePost(record.post),
          record.aiCount,
          record.totalCount,
          now(),
        ],
      });
      if (result.lastInsertRowid === undefined) {
        throw new Error('Insert did not return a row id');
      }
      return Number(result.lastInsertRowid);
    } catch (error) {
      // Lost a race with a concurrent submission of the same URL
      if (isUniqueViolation(error)) {
        throw new DuplicatePostError(record.redditUrl);
      }
      throw error;
    }
  }

  async load(id: number): Promise<StoredPost | null> {
    const result = await this.client.execute({
      sql: `SELECT ${SUMMARY_COLUMNS}, tree_json FROM posts WHERE id = ?`,
      args: [id],
    });
    if (result.rows.length === 0) return null;

    const row = result.rows[0];
    return { ...toSummary(row), post: deserializePost(text(row, 'tree_json')) };
  }

  async list(filter: PostFilter = {}): Promise<PostSummary[]> {
    const where: string[] = [];
    const args: string[] = [];
    if (!filter.includeDeleted) {
      where.push('is_deleted = 0');
    }
    if (filter.subreddit) {
      where.push('subreddit = ? COLLATE NOCASE');
      args.push(filter.subreddit);
    }

    const result = await this.client.execute({
      sql: `SELECT ${SUMMARY_COLUMNS} FROM posts
            ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
            ORDER BY created_at DESC, id DESC`,
      args,
    });
    return result.rows.map(toSummary);
  }

  async exists(redditUrl: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: 'SELECT 1 FROM posts WHERE reddit_url = ?',
      args: [redditUrl],
    });
    return result.rows.length > 0;
  }

  async softDelete(id: number): Promise<boolean> {
    const result = await this.client.execute({
      sql: 'UPDATE posts SET is_deleted = 1, deleted_at = ? WHERE id = ? AND is_deleted = 0',
      args: [now(), id],
    });
    return result.rowsAffected > 0;
  }

  async restore(id: number): Promise<boolean> {
    const result = await this.client.execute({
      sql: 'UPDATE posts SET is_deleted = 0, deleted_at = NULL WHERE id = ? AND is_deleted = 1',
      args: [id],
    });
    return result.rowsAffected > 0;
  }

  // ==========================================================================
  // USERS
  // ==========================================================================

  async createUser(token: string): Promise<User> {
    await this.client.execute({
      sql: 'INSERT INTO users (token, created_at) VALUES (?, ?)',
      args: [token, now()],
    });
    const user = await this.findUserByToken(token);
    if (!user) {
      throw new Error('User vanished after insert');
    }
    return user;
  }

  async findUserByToken(token: string): Promise<User | null> {
    const result = await this.client.execute({
      sql: 'SELECT id, token, created_at FROM users WHERE token = ?',
      args: [token],
    });
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  // ==========================================================================
  // GUESSES
  // ==========================================================================

  async recordGuess(input: GuessInput): Promise<void> {
    await this.client.execute({
      sql: `INSERT INTO user_guesses
              (user_id, post_id, comment_id, guess, is_correct, is_synthetic, guessed_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT (user_id, post_id, comment_id) DO UPDATE SET
              guess = excluded.guess,
              is_correct = excluded.is_correct,
              is_synthetic = excluded.is_synthetic,
              guessed_at = excluded.guessed_at,
              is_deleted = 0,
              deleted_at = NULL`,
      args: [
        input.userId,
        input.postId,
        input.commentId,
        input.guess,
        input.isCorrect ? 1 : 0,
        input.isSynthetic ? 1 : 0,
        now(),
      ],
    });
  }

  async getProgress(userId: number, postId: number): Promise<PostProgress> {
    const result = await this.client.execute({
      sql: `SELECT comment_id, guess, is_correct, is_synthetic, flagged_obvious, guessed_at
            FROM user_guesses
            WHERE user_id = ? AND post_id = ? AND is_deleted = 0
            ORDER BY id`,
      args: [userId, postId],
    });

    const guesses = result.rows.map(row => ({
      commentId: text(row, 'comment_id'),
      guess: guessValue(row, 'guess'),
      isCorrect: flag(row, 'is_correct'),
      isSynthetic: flag(row, 'is_synthetic'),
      flaggedObvious: flag(row, 'flagged_obvious'),
      guessedAt: text(row, 'guessed_at'),
    }));
    const correct = guesses.filter(g => g.isCorrect).length;

    return {
      postId,
      total: guesses.length,
      correct,
      accuracy: accuracy(correct, guesses.length),
      guesses,
    };
  }

  async getAllProgress(userId: number): Promise<ProgressSummary[]> {
    const result = await this.client.execute({
      sql: `SELECT g.post_id, p.title, p.subreddit,
                   COUNT(*) AS total, COALESCE(SUM(g.is_correct), 0) AS correct
            FROM user_guesses g
            JOIN posts p ON p.id = g.post_id
            WHERE g.user_id = ? AND g.is_deleted = 0 AND p.is_deleted = 0
            GROUP BY g.post_id, p.title, p.subreddit
            ORDER BY g.post_id`,
      args: [userId],
    });

    return result.rows.map(row => {
      const total = int(row, 'total');
      const correct = int(row, 'correct');
      return {
        postId: int(row, 'post_id'),
        title: text(row, 'title'),
        subreddit: text(row, 'subreddit'),
        total,
        correct,
        accuracy: accuracy(correct, total),
      };
    });
  }

  async resetProgress(userId: number, postId: number): Promise<number> {
    const result = await this.client.execute({
      sql: `UPDATE user_guesses SET is_deleted = 1, deleted_at = ?
            WHERE user_id = ? AND post_id = ? AND is_deleted = 0`,
      args: [now(), userId, postId],
    });
    return result.rowsAffected;
  }

  async flagObvious(userId: number, postId: number, commentId: string): Promise<boolean> {
    const result = await this.client.execute({
      sql: `UPDATE user_guesses SET flagged_obvious = 1
            WHERE user_id = ? AND post_id = ? AND comment_id = ? AND is_deleted = 0`,
      args: [userId, postId, commentId],
    });
    return result.rowsAffected > 0;
  }

  async stats(): Promise<GameStats> {
    const counts = await this.client.execute(
      `SELECT
         (SELECT COUNT(*) FROM posts WHERE is_deleted = 0) AS posts,
         (SELECT COUNT(*) FROM users) AS users`
    );
    const guesses = await this.client.execute(
      `SELECT
         COUNT(*) AS total,
         COALESCE(SUM(is_correct), 0) AS correct,
         COALESCE(SUM(is_synthetic), 0) AS synthetic_total,
         COALESCE(SUM(CASE WHEN is_synthetic = 1 AND is_correct = 1 THEN 1 ELSE 0 END), 0) AS synthetic_correct,
         COALESCE(SUM(flagged_obvious), 0) AS flagged
       FROM user_guesses
       WHERE is_deleted = 0`
    );

    const c = counts.rows[0];
    const g = guesses.rows[0];
    const total = int(g, 'total');
    const correct = int(g, 'correct');
    const syntheticTotal = int(g, 'synthetic_total');
    const syntheticCorrect = int(g, 'synthetic_correct');

    return {
      posts: int(c, 'posts'),
      users: int(c, 'users'),
      overall: { guesses: total, correct, accuracy: accuracy(correct, total) },
      synthetic: {
        guesses: syntheticTotal,
        correct: syntheticCorrect,
        accuracy: accuracy(syntheticCorrect, syntheticTotal),
      },
      real: {
        guesses: total - syntheticTotal,
        correct: correct - syntheticCorrect,
        accuracy: accuracy(correct - syntheticCorrect, total - syntheticTotal),
      },
      flaggedObvious: int(g, 'flagged'),
    };
  }

  // ==========================================================================
  // EVALUATIONS
  // ==========================================================================

  async saveEvaluation(postId: number, scores: EvaluationScores, version: string): Promise<void> {
    await this.client.execute({
      sql: `INSERT INTO evaluations
              (post_id, mixed_reality_score, diversity_score, appropriateness_score,
               overall_score, evaluation_version, evaluated_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT (post_id) DO UPDATE SET
              mixed_reality_score = excluded.mixed_reality_score,
              diversity_score = excluded.diversity_score,
              appropriateness_score = excluded.appropriateness_score,
              overall_score = excluded.overall_score,
              evaluation_version = excluded.evaluation_version,
              evaluated_at = excluded.evaluated_at`,
      args: [
        postId,
        scores.mixedReality,
        scores.diversity,
        scores.appropriateness,
        scores.overall,
        version,
        now(),
      ],
    });
  }

  async getEvaluation(postId: number): Promise<StoredEvaluation | null> {
    const result = await this.client.execute({
      sql: `SELECT post_id, mixed_reality_score, diversity_score, appropriateness_score,
                   overall_score, evaluation_version, evaluated_at
            FROM evaluations WHERE post_id = ?`,
      args: [postId],
    });
    if (result.rows.length === 0) return null;

    const row = result.rows[0];
    return {
      postId: int(row, 'post_id'),
      mixedReality: real(row, 'mixed_reality_score'),
      diversity: real(row, 'diversity_score'),
      appropriateness: real(row, 'appropriateness_score'),
      overall: real(row, 'overall_score'),
      version: text(row, 'evaluation_version'),
      evaluatedAt: text(row, 'evaluated_at'),
    };
  }
}
