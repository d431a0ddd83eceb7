/**
 * Reddit thread loader: turns the raw `.json` listing pair Reddit serves for a
 * post into a `Post` with a `CommentNode` tree.
 *
 * The whole parse fails with `ParseError` on the first structural problem;
 * a partial tree is never returned. Entries that are not comments ("load
 * more" stubs, kind `more`) are dropped.
 */

import { z } from 'zod';
import { ParseError } from '../errors.js';
import { limitLength, stripControlChars, LIMITS } from '../security.js';
import type { CommentNode, Post } from '../tree.js';

const ThingSchema = z.object({
  kind: z.string(),
  data: z.unknown(),
});

const ListingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    children: z.array(ThingSchema),
  }),
});

const CommentDataSchema = z.object({
  id: z.string().min(1),
  author: z.string(),
  body: z.string(),
  score: z.number(),
  replies: z.unknown().optional(),
});

const PostDataSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  selftext: z.string().default(''),
  author: z.string().default('[deleted]'),
  subreddit: z.string(),
  score: z.number().default(0),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function cleanText(text: string): string {
  return limitLength(stripControlChars(text), LIMITS.COMMENT_MAX_LENGTH);
}

function parseListing(raw: unknown, where: string): z.infer<typeof ListingSchema> {
  const result = ListingSchema.safeParse(raw);
  if (!result.success) {
    throw new ParseError(`${where} is not a comment listing (${describeIssues(result.error)})`);
  }
  return result.data;
}

function parseChildren(
  children: z.infer<typeof ThingSchema>[],
  depth: number,
  parentId: string | null,
  where: string
): CommentNode[] {
  const nodes: CommentNode[] = [];

  children.forEach((thing, index) => {
    if (thing.kind !== 't1') return;

    const location = `${where}[${index}]`;
    const result = CommentDataSchema.safeParse(thing.data);
    if (!result.success) {
      throw new ParseError(`Malformed comment at ${location} (${describeIssues(result.error)})`);
    }
    const data = result.data;

    // Reddit sends an empty string when a comment has no replies
    let replies: CommentNode[] = [];
    if (data.replies !== undefined && data.replies !== null && data.replies !== '') {
      const listing = parseListing(data.replies, `replies of ${data.id}`);
      replies = parseChildren(listing.data.children, depth + 1, data.id, `${location}.replies`);
    }

    nodes.push({
      id: data.id,
      author: data.author,
      content: cleanText(data.body),
      score: data.score,
      depth,
      parentId,
      isSynthetic: false,
      children: replies,
    });
  });

  return nodes;
}

/** Parse one comment listing (the second element of a thread response) */
export function parseCommentListing(raw: unknown): CommentNode[] {
  const listing = parseListing(raw, 'Comment listing');
  return parseChildren(listing.data.children, 0, null, 'comments');
}

/** Parse a full thread response: `[postListing, commentListing]` */
export function parseRedditThread(raw: unknown): Post {
  if (!Array.isArray(raw) || raw.length < 2) {
    throw new ParseError('Reddit thread must be an array of two listings');
  }

  const postListing = parseListing(raw[0], 'Post listing');
  const postThing = postListing.data.children[0];
  if (!postThing || postThing.kind !== 't3') {
    throw new ParseError('Post listing does not contain a post');
  }

  const postResult = PostDataSchema.safeParse(postThing.data);
  if (!postResult.success) {
    throw new ParseError(`Malformed post (${describeIssues(postResult.error)})`);
  }
  const post = postResult.data;

  return {
    id: post.id,
    title: limitLength(stripControlChars(post.title), LIMITS.TITLE_MAX_LENGTH),
    body: cleanText(post.selftext),
    author: post.author,
    subreddit: post.subreddit,
    score: post.score,
    comments: parseCommentListing(raw[1]),
  };
}
