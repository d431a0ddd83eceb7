import { ValidationError } from '../errors.js';
import { LIMITS } from '../security.js';

const REDDIT_POST_URL = /^https?:\/\/(?:www\.|old\.)?reddit\.com\/r\/\w+\/comments\/\w+(?:\/|\.json|$)/i;
const POST_PATH = /^\/r\/(\w+)\/comments\/(\w+)/i;

/** True for a Reddit post (comments page) URL */
export function isRedditPostUrl(url: string): boolean {
  return url.length <= LIMITS.URL_MAX_LENGTH && REDDIT_POST_URL.test(url.trim());
}

/**
 * Canonical form of a post URL, used as the storage key:
 * https://www.reddit.com/r/<sub>/comments/<id>/, lowercased, with no slug,
 * `.json` suffix, query or fragment.
 */
export function normalizeRedditUrl(url: string): string {
  const path = new URL(url.trim()).pathname.replace(/\.json$/i, '');
  const match = path.match(POST_PATH);
  if (!match) {
    throw new ValidationError(`Not a Reddit post URL: ${url}`);
  }
  const [, subreddit, postId] = match;
  return `https://www.reddit.com/r/${subreddit.toLowerCase()}/comments/${postId.toLowerCase()}/`;
}

export function redditJsonUrl(url: string): string {
  return `${normalizeRedditUrl(url)}.json`;
}
