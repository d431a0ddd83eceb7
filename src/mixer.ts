/**
 * Round assembly: turns a parsed Reddit thread into a game round of exactly
 * REAL_TARGET real and AI_TARGET synthetic comments.
 *
 * Steps:
 * 1. Flatten the real tree depth-first and keep the first REAL_TARGET usable
 *    comments. A kept reply whose parent was not kept moves to the top level.
 * 2. Replace every author with a generated alias.
 * 3. Plan the synthetic slots: TOP_LEVEL_SYNTHETIC top-level comments, the
 *    rest as replies under kept real comments.
 * 4. Ask the generator for all slots; one compensating request covers any
 *    shortfall, after which a remaining gap fails the round.
 * 5. Insert, assign fresh ids, recompute depths, check and freeze.
 *
 * Every random choice comes from an RNG seeded by the source post id, so the
 * same thread assembles to the same round.
 */

import { GenerationError, InsufficientCommentsError, InsufficientGenerationError } from './errors.js';
import { logger } from './logger.js';
import { createRng, pick, randomInt, type Rng } from './random.js';
import {
  countProvenance,
  findTreeProblems,
  flattenTree,
  freezeTree,
  relinkTree,
  type CommentNode,
  type Post,
} from './tree.js';
import { createUsernamePool, type UsernamePool } from './usernames.js';

export const REAL_TARGET = 8;
export const AI_TARGET = 8;
export const TOP_LEVEL_SYNTHETIC = 4;
export const REPLY_SYNTHETIC = AI_TARGET - TOP_LEVEL_SYNTHETIC;

// Reply parents: shallow real comments, each taking at most this many children
const MAX_REPLY_PARENT_DEPTH = 1;
const MAX_PARENT_CHILDREN = 2;

const ID_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 7;

const DEFAULT_SCORE_RANGE: ScoreRange = { min: 1, max: 50 };

const REMOVED_BODIES = new Set(['[deleted]', '[removed]']);
const DELETED_AUTHOR = '[deleted]';

// ============================================================================
// TYPES
// ============================================================================

export type Placement =
  | { kind: 'top-level' }
  | { kind: 'reply'; parentId: string };

export interface GenerationSlot {
  slot: number;
  placement: Placement;
}

/** What the generator sees of the post: metadata plus the kept real comments */
export interface PostContext {
  title: string;
  body: string;
  subreddit: string;
  comments: readonly CommentNode[];
}

export interface GeneratedComment {
  slot: number;
  content: string;
  archetype?: string;
}

/**
 * Produces synthetic comment text for the requested slots. May return fewer
 * results than slots; missing slots count as failed.
 */
export interface CommentGenerator {
  generate(slots: readonly GenerationSlot[], context: PostContext): Promise<GeneratedComment[]>;
}

export interface ScoreRange {
  min: number;
  max: number;
}

export interface RoundStats {
  real: number;
  synthetic: number;
  total: number;
  topLevelSynthetic: number;
  replySynthetic: number;
}

export interface AssembledRound {
  /** Source post with its author aliased and the mixed, frozen comment tree */
  post: Post;
  stats: RoundStats;
}

export interface AssembleOptions {
  /** Defaults to the source post id */
  seed?: string;
}

// ============================================================================
// REAL SUBSET
// ============================================================================

function isUsable(node: CommentNode): boolean {
  return !REMOVED_BODIES.has(node.content.trim()) && node.content.trim().length > 0;
}

/**
 * First `target` usable comments in depth-first order, as a fresh tree.
 * A reply whose parent is not in the subset is promoted to the top level,
 * after the thread it came from. Top-level order follows the source;
 * depth-first order can change when a reply is promoted.
 */
export function selectRealSubset(roots: readonly CommentNode[], target = REAL_TARGET): CommentNode[] {
  const chosen = flattenTree(roots).filter(isUsable).slice(0, target);
  const clones = new Map<string, CommentNode>();
  const result: CommentNode[] = [];

  for (const node of chosen) {
    const clone: CommentNode = {
      id: node.id,
      author: node.author,
      content: node.content,
      score: node.score,
      depth: node.depth,
      parentId: node.parentId,
      isSynthetic: false,
      children: [],
    };
    clones.set(node.id, clone);

    const parent = node.parentId === null ? undefined : clones.get(node.parentId);
    if (parent) {
      parent.children.push(clone);
    } else {
      result.push(clone);
    }
  }

  relinkTree(result);
  return result;
}

export function countUsable(roots: readonly CommentNode[]): number {
  return flattenTree(roots).filter(isUsable).length;
}

/** Positive real scores bound synthetic ones; 1..50 when there are none */
export function scoreRange(roots: readonly CommentNode[]): ScoreRange {
  const scores = flattenTree(roots).map(n => n.score).filter(s => s > 0);
  if (scores.length === 0) return { ...DEFAULT_SCORE_RANGE };
  return { min: Math.max(1, Math.min(...scores)), max: Math.max(...scores) };
}

function anonymize(roots: readonly CommentNode[], pool: UsernamePool): void {
  for (const node of flattenTree(roots)) {
    // Deleted accounts are different people; give each its own name
    node.author = node.author === DELETED_AUTHOR ? pool.next() : pool.aliasFor(node.author);
  }
}

// ============================================================================
// PLACEMENT
// ============================================================================

/**
 * Slot plan: TOP_LEVEL_SYNTHETIC top-level slots followed by reply slots.
 * Reply parents are real comments at depth <= 1 with fewer than two
 * children, counting replies already planned; when none qualify the least
 * crowded shallow comment takes the reply.
 */
export function planPlacements(realRoots: readonly CommentNode[], rng: Rng): GenerationSlot[] {
  const slots: GenerationSlot[] = [];
  for (let i = 0; i < TOP_LEVEL_SYNTHETIC; i++) {
    slots.push({ slot: slots.length, placement: { kind: 'top-level' } });
  }

  const candidates = flattenTree(realRoots).filter(n => n.depth <= MAX_REPLY_PARENT_DEPTH);
  const childCounts = new Map(candidates.map(n => [n.id, n.children.length]));
  const countOf = (node: CommentNode): number => childCounts.get(node.id) ?? 0;

  for (let i = 0; i < REPLY_SYNTHETIC && candidates.length > 0; i++) {
    const open = candidates.filter(n => countOf(n) < MAX_PARENT_CHILDREN);
    const parent = open.length > 0
      ? pick(rng, open)
      : candidates.reduce((best, n) => (countOf(n) < countOf(best) ? n : best));

    childCounts.set(parent.id, countOf(parent) + 1);
    slots.push({ slot: slots.length, placement: { kind: 'reply', parentId: parent.id } });
  }

  return slots;
}

// ============================================================================
// GENERATION
// ============================================================================

async function requestSlots(
  generator: CommentGenerator,
  slots: readonly GenerationSlot[],
  context: PostContext
): Promise<GeneratedComment[]> {
  try {
    return await generator.generate(slots, context);
  } catch (error) {
    // Configuration problems (no API key) will not fix themselves on retry
    if (error instanceof GenerationError && !error.retryable) {
      throw error;
    }
    logger.warn('Comment generator failed, counting all slots as missing', { error: String(error) });
    return [];
  }
}

function acceptResults(
  results: readonly GeneratedComment[],
  slots: readonly GenerationSlot[],
  accepted: Map<number, GeneratedComment>
): void {
  const wanted = new Set(slots.map(s => s.slot));
  for (const result of results) {
    if (!wanted.has(result.slot) || accepted.has(result.slot)) continue;
    const content = result.content.trim();
    if (!content) continue;
    accepted.set(result.slot, { ...result, content });
  }
}

/**
 * Generate every slot, with exactly one compensating request for the slots
 * the first request left empty.
 */
export async function collectGenerated(
  generator: CommentGenerator,
  slots: readonly GenerationSlot[],
  context: PostContext
): Promise<Map<number, GeneratedComment>> {
  const accepted = new Map<number, GeneratedComment>();
  acceptResults(await requestSlots(generator, slots, context), slots, accepted);

  const missing = slots.filter(s => !accepted.has(s.slot));
  if (missing.length > 0) {
    logger.warn(`Generated ${accepted.size} of ${slots.length} comments, requesting ${missing.length} more`);
    acceptResults(await requestSlots(generator, missing, context), missing, accepted);
  }

  if (accepted.size < slots.length) {
    throw new InsufficientGenerationError(slots.length, accepted.size);
  }
  return accepted;
}

// ============================================================================
// ASSEMBLY
// ============================================================================

function randomId(rng: Rng): string {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_ALPHABET[Math.floor(rng() * ID_ALPHABET.length)];
  }
  return id;
}

/** Fresh ids for every node, in depth-first order */
function reassignIds(roots: readonly CommentNode[], rng: Rng): void {
  const used = new Set<string>();
  for (const node of flattenTree(roots)) {
    let id = randomId(rng);
    while (used.has(id)) id = randomId(rng);
    used.add(id);
    node.id = id;
  }
}

/**
 * Merge synthetic comments into the real tree. Real comments keep their
 * relative order; synthetic ones go in at seeded positions.
 */
export function assembleTree(
  realRoots: CommentNode[],
  slots: readonly GenerationSlot[],
  generated: ReadonlyMap<number, GeneratedComment>,
  rng: Rng,
  pool: UsernamePool,
  scores: ScoreRange = DEFAULT_SCORE_RANGE
): CommentNode[] {
  const realById = new Map(flattenTree(realRoots).map(n => [n.id, n]));
  const roots = realRoots.slice();

  for (const slot of slots) {
    const result = generated.get(slot.slot);
    if (!result) {
      throw new InsufficientGenerationError(slots.length, generated.size);
    }

    const node: CommentNode = {
      id: `synthetic-${slot.slot}`,
      author: pool.next(),
      content: result.content,
      score: randomInt(rng, scores.min, scores.max),
      depth: 0,
      parentId: null,
      isSynthetic: true,
      children: [],
    };
    if (result.archetype) node.archetype = result.archetype;

    if (slot.placement.kind === 'top-level') {
      roots.splice(randomInt(rng, 0, roots.length), 0, node);
      continue;
    }

    const parent = realById.get(slot.placement.parentId);
    if (!parent) {
      throw new Error(`Reply slot ${slot.slot} targets unknown comment ${slot.placement.parentId}`);
    }
    parent.children.splice(randomInt(rng, 0, parent.children.length), 0, node);
  }

  reassignIds(roots, rng);
  relinkTree(roots);
  return roots;
}

export function roundStats(roots: readonly CommentNode[]): RoundStats {
  const { real, synthetic } = countProvenance(roots);
  const topLevelSynthetic = roots.filter(n => n.isSynthetic).length;
  return {
    real,
    synthetic,
    total: real + synthetic,
    topLevelSynthetic,
    replySynthetic: synthetic - topLevelSynthetic,
  };
}

/** Problems that must keep a round from being stored or served */
export function validateRound(roots: readonly CommentNode[]): string[] {
  const problems = findTreeProblems(roots);
  const { real, synthetic } = countProvenance(roots);
  if (real !== REAL_TARGET) problems.push(`expected ${REAL_TARGET} real comments, found ${real}`);
  if (synthetic !== AI_TARGET) problems.push(`expected ${AI_TARGET} synthetic comments, found ${synthetic}`);
  return problems;
}

export async function assemblePost(
  source: Post,
  generator: CommentGenerator,
  options: AssembleOptions = {}
): Promise<AssembledRound> {
  const rng = createRng(options.seed ?? source.id);

  const real = selectRealSubset(source.comments);
  if (flattenTree(real).length < REAL_TARGET) {
    throw new InsufficientCommentsError(REAL_TARGET, countUsable(source.comments));
  }

  const pool = createUsernamePool(rng);
  const author = source.author === DELETED_AUTHOR ? pool.next() : pool.aliasFor(source.author);
  anonymize(real, pool);

  const slots = planPlacements(real, rng);
  const context: PostContext = {
    title: source.title,
    body: source.body,
    subreddit: source.subreddit,
    comments: real,
  };

  logger.info(`Generating ${slots.length} comments for r/${source.subreddit}`, { post: source.id });
  const generated = await collectGenerated(generator, slots, context);

  const comments = assembleTree(real, slots, generated, rng, pool, scoreRange(real));
  const problems = validateRound(comments);
  if (problems.length > 0) {
    throw new Error(`Assembled round failed its structural check: ${problems.join('; ')}`);
  }

  return {
    post: {
      id: source.id,
      title: source.title,
      body: source.body,
      author,
      subreddit: source.subreddit,
      score: source.score,
      comments: freezeTree(comments),
    },
    stats: roundStats(comments),
  };
}
