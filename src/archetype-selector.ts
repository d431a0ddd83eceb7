import { getAvailableArchetypes, getGenericArchetypes } from './archetypes.js';
import { logger } from './logger.js';
import type { PostContext } from './mixer.js';
import { buildSelectionPrompt, SELECTION_SYSTEM_PROMPT } from './prompts/generation.js';
import type { ChatFn } from './providers.js';
import { pick, shuffle, type Rng } from './random.js';

const FALLBACK_COUNT = 4;

export function fallbackArchetypes(): string[] {
  return getGenericArchetypes().slice(0, FALLBACK_COUNT).map(a => a.key);
}

/**
 * Ask the model which archetypes fit the post. Any failure falls back to the
 * first generic archetypes; selection never blocks generation.
 */
export async function selectArchetypes(
  context: PostContext,
  chat: ChatFn,
  limit = 6,
  timeout?: number
): Promise<string[]> {
  const available = getAvailableArchetypes(context.subreddit);
  const known = new Set(available.map(a => a.key));

  let text: string;
  try {
    const response = await chat(buildSelectionPrompt(context, available), {
      systemPrompt: SELECTION_SYSTEM_PROMPT,
      maxTokens: 200,
      temperature: 0.3,
      timeout,
    });
    text = response.content;
  } catch (error) {
    logger.warn('Archetype selection failed, using fallback', { error: String(error) });
    return fallbackArchetypes();
  }

  const selected: string[] = [];
  for (const line of text.split('\n')) {
    // Tolerate list markers and stray punctuation around the key
    const key = line.trim().replace(/^[-*\d.)\s]+/, '').replace(/[`"',.]+$/g, '').replace(/^[`"']+/, '');
    if (known.has(key) && !selected.includes(key)) {
      selected.push(key);
    }
    if (selected.length >= limit) break;
  }

  if (selected.length === 0) {
    logger.warn('No known archetypes in selection response, using fallback');
    return fallbackArchetypes();
  }

  logger.debug('Selected archetypes', { subreddit: context.subreddit, selected });
  return selected;
}

/**
 * Spread `labels` over `count` slots: each label at most
 * min(2, max(1, floor(count / labels))) times, topped up at random.
 */
export function assignArchetypes(labels: readonly string[], count: number, rng: Rng): string[] {
  if (labels.length === 0 || count <= 0) return [];

  const perLabel = Math.min(2, Math.max(1, Math.floor(count / labels.length)));
  const pool: string[] = [];
  for (const label of labels) {
    for (let i = 0; i < perLabel && pool.length < count; i++) {
      pool.push(label);
    }
  }
  while (pool.length < count) {
    pool.push(pick(rng, labels));
  }
  return shuffle(rng, pool);
}
