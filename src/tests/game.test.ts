/**
 * Tests for the game service over the in-memory store, a scripted generator
 * and a canned Reddit response.
 */
import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import {
  DuplicatePostError,
  FetchError,
  InsufficientCommentsError,
  InsufficientGenerationError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../errors.js';
import { GameService, SYNTHETIC_AUTHOR_LABEL } from '../game.js';
import { flattenTree, type CommentNode } from '../tree.js';
import type { User } from '../store.js';
import { MemoryPostStore } from './fakes.js';
import { ScriptedEvaluator, ScriptedGenerator, redditThread, sampleComments, type CommentSpec } from './fixtures.js';

const POST_URL = 'https://old.reddit.com/r/AskReddit/comments/abc123/rice/?utm_source=share';
const NORMALIZED = 'https://www.reddit.com/r/askreddit/comments/abc123/';

interface Harness {
  service: GameService;
  store: MemoryPostStore;
  generator: ScriptedGenerator;
  fetched: string[];
}

function harness(
  options: {
    comments?: CommentSpec[];
    plan?: Array<number | Error>;
    fetchError?: Error;
    evaluator?: ScriptedEvaluator;
  } = {}
): Harness {
  const store = new MemoryPostStore();
  const generator = new ScriptedGenerator(options.plan);
  const fetched: string[] = [];
  const service = new GameService({
    store,
    generator,
    fetchThread: async url => {
      fetched.push(url);
      if (options.fetchError) throw options.fetchError;
      return redditThread({ comments: options.comments ?? sampleComments() });
    },
    evaluator: options.evaluator,
  });
  return { service, store, generator, fetched };
}

function commentsOf(round: { post: { comments: readonly CommentNode[] } }): CommentNode[] {
  return flattenTree(round.post.comments);
}

describe('GameService', () => {
  describe('submitPost', () => {
    it('fetches, assembles and stores a round', async () => {
      const { service, store, fetched } = harness();
      const result = await service.submitPost(POST_URL);

      assert.deepStrictEqual(result, {
        id: 1,
        redditUrl: NORMALIZED,
        stats: { real: 8, synthetic: 8, total: 16, topLevelSynthetic: 4, replySynthetic: 4 },
        evaluation: null,
      });
      assert.deepStrictEqual(fetched, [NORMALIZED]);

      const stored = await store.load(1);
      assert.ok(stored);
      assert.strictEqual(stored.aiCount, 8);
      assert.strictEqual(stored.totalCount, 16);
      assert.strictEqual(stored.subreddit, 'AskReddit');
      assert.strictEqual(commentsOf(stored).length, 16);
    });

    it('rejects URLs that are not Reddit posts', async () => {
      const { service, fetched } = harness();
      await assert.rejects(service.submitPost('https://www.reddit.com/r/AskReddit/'), ValidationError);
      await assert.rejects(service.submitPost('ftp://reddit.com/r/a/comments/b'), ValidationError);
      assert.deepStrictEqual(fetched, []);
    });

    it('refuses a URL it already stored, before fetching', async () => {
      const { service, fetched } = harness();
      await service.submitPost(POST_URL);
      await assert.rejects(service.submitPost(NORMALIZED), DuplicatePostError);
      assert.strictEqual(fetched.length, 1);
    });

    it('treats other spellings of the same post as duplicates', async () => {
      const { service, store } = harness();
      await service.submitPost('https://www.reddit.com/r/AskReddit/comments/abc123/rice/');
      await assert.rejects(service.submitPost('https://www.reddit.com/r/AskReddit/comments/abc123/'), DuplicatePostError);
      await assert.rejects(service.submitPost('https://www.reddit.com/r/askreddit/comments/abc123/rice/'), DuplicatePostError);
      await assert.rejects(service.submitPost('https://reddit.com/r/ASKREDDIT/comments/ABC123.json'), DuplicatePostError);
      assert.strictEqual(store.posts.length, 1);
    });

    it('replaces a stored round when asked to overwrite', async () => {
      const { service, store, fetched } = harness();
      await service.submitPost(POST_URL);
      const again = await service.submitPost(POST_URL, { overwrite: true });

      assert.strictEqual(again.id, 1);
      assert.strictEqual(fetched.length, 2);
      assert.strictEqual(store.posts.length, 1);
    });

    it('stores nothing when the thread is too small', async () => {
      const { service, store, generator } = harness({ comments: [{ id: 'x' }, { id: 'y' }] });
      await assert.rejects(service.submitPost(POST_URL), InsufficientCommentsError);
      assert.strictEqual(store.saveCalls, 0);
      assert.strictEqual(generator.calls.length, 0);
    });

    it('stores nothing when generation falls short', async () => {
      const { service, store } = harness({ plan: [6, 1] });
      await assert.rejects(service.submitPost(POST_URL), InsufficientGenerationError);
      assert.strictEqual(store.saveCalls, 0);
    });

    it('stores nothing when Reddit is unreachable', async () => {
      const { service, store } = harness({ fetchError: new FetchError('Failed to reach Reddit') });
      await assert.rejects(service.submitPost(POST_URL), FetchError);
      assert.strictEqual(store.saveCalls, 0);
    });
  });

  describe('evaluation', () => {
    const SCORES = { mixedReality: 7, diversity: 6, appropriateness: 8, overall: 6.9 };

    it('judges the stored round and keeps the scores', async () => {
      const evaluator = new ScriptedEvaluator(SCORES);
      const { service, store } = harness({ evaluator });

      const result = await service.submitPost(POST_URL);

      assert.deepStrictEqual(result.evaluation, SCORES);
      assert.strictEqual(evaluator.posts.length, 1);
      assert.strictEqual(flattenTree(evaluator.posts[0].comments).filter(c => c.isSynthetic).length, 8);

      const stored = await service.getEvaluation(1);
      assert.ok(stored);
      assert.strictEqual(stored.postId, 1);
      assert.strictEqual(stored.overall, 6.9);
      assert.strictEqual(stored.version, 'judge-v1');
      assert.strictEqual(store.evaluations.size, 1);
    });

    it('keeps the round when the judge fails', async () => {
      const evaluator = new ScriptedEvaluator(new Error('judge unavailable'));
      const { service, store } = harness({ evaluator });

      const result = await service.submitPost(POST_URL);

      assert.strictEqual(result.id, 1);
      assert.strictEqual(result.evaluation, null);
      assert.strictEqual(store.posts.length, 1);
      assert.strictEqual(await service.getEvaluation(1), null);
    });

    it('does not judge rounds that failed to assemble', async () => {
      const evaluator = new ScriptedEvaluator(SCORES);
      const { service } = harness({ evaluator, plan: [6, 1] });
      await assert.rejects(service.submitPost(POST_URL), InsufficientGenerationError);
      assert.strictEqual(evaluator.posts.length, 0);
    });

    it('fails for unknown posts', async () => {
      const { service } = harness();
      await assert.rejects(service.getEvaluation(3), NotFoundError);
    });
  });

  describe('posts', () => {
    let h: Harness;

    beforeEach(async () => {
      h = harness();
      await h.service.submitPost(POST_URL);
    });

    it('reads a stored round back', async () => {
      const post = await h.service.getPost(1);
      assert.strictEqual(post.redditUrl, NORMALIZED);
      assert.strictEqual(post.post.title, 'What is the best way to store leftover rice?');
    });

    it('hides deleted posts from players', async () => {
      assert.strictEqual(await h.service.deletePost(1), true);
      await assert.rejects(h.service.getPost(1), NotFoundError);
      assert.deepStrictEqual(await h.service.listPosts(), []);
      assert.strictEqual((await h.service.listPosts({ includeDeleted: true })).length, 1);
    });

    it('reports whether delete and restore changed anything', async () => {
      assert.strictEqual(await h.service.deletePost(1), true);
      assert.strictEqual(await h.service.deletePost(1), false);
      assert.strictEqual(await h.service.restorePost(1), true);
      assert.strictEqual(await h.service.restorePost(1), false);
      assert.strictEqual((await h.service.getPost(1)).id, 1);
    });

    it('fails for unknown posts', async () => {
      await assert.rejects(h.service.getPost(7), NotFoundError);
      await assert.rejects(h.service.deletePost(7), NotFoundError);
      await assert.rejects(h.service.restorePost(7), NotFoundError);
    });
  });

  describe('sessions', () => {
    it('issues tokens that authenticate', async () => {
      const { service } = harness();
      const user = await service.createSession();
      assert.match(user.token, /^[0-9a-f-]{36}$/);
      assert.deepStrictEqual(await service.authenticate(user.token), user);
    });

    it('rejects missing, unknown and oversized tokens', async () => {
      const { service } = harness();
      await assert.rejects(service.authenticate(undefined), UnauthorizedError);
      await assert.rejects(service.authenticate('not-a-session'), UnauthorizedError);
      await assert.rejects(service.authenticate('x'.repeat(201)), UnauthorizedError);
    });
  });

  describe('guesses', () => {
    let h: Harness;
    let user: User;
    let real: CommentNode;
    let synthetic: CommentNode;

    beforeEach(async () => {
      h = harness();
      await h.service.submitPost(POST_URL);
      user = await h.service.createSession();
      const all = commentsOf(await h.service.getPost(1));
      const firstReal = all.find(c => !c.isSynthetic);
      const firstSynthetic = all.find(c => c.isSynthetic);
      assert.ok(firstReal && firstSynthetic);
      real = firstReal;
      synthetic = firstSynthetic;
    });

    it('scores a correct guess on a synthetic comment', async () => {
      const outcome = await h.service.recordGuess(user, 1, synthetic.id, 'replicant');
      assert.deepStrictEqual(outcome, {
        postId: 1,
        commentId: synthetic.id,
        guess: 'replicant',
        isCorrect: true,
        isSynthetic: true,
        author: SYNTHETIC_AUTHOR_LABEL,
        progress: { total: 1, correct: 1, accuracy: 1, remaining: 15 },
      });
    });

    it('scores a wrong guess on a real comment and reveals its author', async () => {
      const outcome = await h.service.recordGuess(user, 1, real.id, 'replicant');
      assert.strictEqual(outcome.isCorrect, false);
      assert.strictEqual(outcome.isSynthetic, false);
      assert.strictEqual(outcome.author, real.author);
    });

    it('counts progress across comments', async () => {
      await h.service.recordGuess(user, 1, real.id, 'reddit');
      const outcome = await h.service.recordGuess(user, 1, synthetic.id, 'reddit');
      assert.deepStrictEqual(outcome.progress, { total: 2, correct: 1, accuracy: 0.5, remaining: 14 });
    });

    it('fails for unknown comments and hidden posts', async () => {
      await assert.rejects(h.service.recordGuess(user, 1, 'nope', 'reddit'), NotFoundError);
      await h.service.deletePost(1);
      await assert.rejects(h.service.recordGuess(user, 1, real.id, 'reddit'), NotFoundError);
    });

    it('flags an existing guess as obvious', async () => {
      await assert.rejects(h.service.flagObvious(user, 1, synthetic.id), /No guess recorded/);
      await h.service.recordGuess(user, 1, synthetic.id, 'replicant');
      await h.service.flagObvious(user, 1, synthetic.id);

      const progress = await h.service.getProgress(user, 1);
      assert.strictEqual(progress.guesses[0].flaggedObvious, true);
      assert.strictEqual((await h.service.stats()).flaggedObvious, 1);
    });

    it('resets progress for one post', async () => {
      await h.service.recordGuess(user, 1, real.id, 'reddit');
      await h.service.recordGuess(user, 1, synthetic.id, 'replicant');

      assert.strictEqual(await h.service.resetProgress(user, 1), 2);
      assert.strictEqual((await h.service.getProgress(user, 1)).total, 0);
      assert.deepStrictEqual(await h.service.getAllProgress(user), []);
    });

    it('keeps players apart', async () => {
      const other = await h.service.createSession();
      await h.service.recordGuess(user, 1, real.id, 'reddit');
      assert.strictEqual((await h.service.getProgress(other, 1)).total, 0);
      assert.strictEqual((await h.service.getAllProgress(user)).length, 1);
    });
  });

  it('closes the store', () => {
    const { service, store } = harness();
    service.close();
    assert.strictEqual(store.closed, true);
  });
});
