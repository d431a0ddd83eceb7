import { FetchError, NotFoundError, ParseError, ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import { isRedditPostUrl, redditJsonUrl } from './url.js';

const USER_AGENT = 'Replicant/1.0 (comment guessing game)';
const DEFAULT_TIMEOUT_MS = 30000;

export type ThreadFetcher = (url: string) => Promise<unknown>;

/**
 * Fetch the raw `.json` response for a Reddit post.
 * Returns the listing pair unparsed; the parser owns structural validation.
 */
export async function fetchRedditThread(
  url: string,
  options: { timeoutMs?: number } = {}
): Promise<unknown> {
  if (!isRedditPostUrl(url)) {
    throw new ValidationError('Invalid Reddit URL format');
  }

  const jsonUrl = redditJsonUrl(url);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  logger.debug('Fetching Reddit thread', { url: jsonUrl });

  let response: Response;
  try {
    response = await fetch(jsonUrl, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new FetchError(`Reddit did not answer within ${timeoutMs}ms`, error);
    }
    throw new FetchError('Failed to reach Reddit', error);
  }

  if (response.status === 404) {
    throw new NotFoundError('Reddit post not found');
  }
  if (response.status === 403) {
    throw new FetchError('Access forbidden - Reddit may be blocking requests');
  }
  if (!response.ok) {
    const text = await response.text();
    throw new FetchError(`Reddit returned HTTP ${response.status}: ${text.slice(0, 200)}`);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ParseError('Invalid JSON response from Reddit', error);
  }
}

export function createThreadFetcher(timeoutMs: number): ThreadFetcher {
  return url => fetchRedditThread(url, { timeoutMs });
}
