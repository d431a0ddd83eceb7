import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { pick, randomInt, type Rng } from './random.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Path to data folder (relative to src/ or dist/)
const WORDS_PATH = join(__dirname, '..', 'data', 'usernames.json');

const WordListsSchema = z.object({
  adjectives: z.array(z.string().min(1)).min(1),
  nouns: z.array(z.string().min(1)).min(1),
  firstNames: z.array(z.string().min(1)).min(1),
});

type WordLists = z.infer<typeof WordListsSchema>;

export const USERNAME_MAX_LENGTH = 20;

let cachedWords: WordLists | null = null;

function loadWords(): WordLists {
  if (!cachedWords) {
    cachedWords = WordListsSchema.parse(JSON.parse(readFileSync(WORDS_PATH, 'utf-8')));
  }
  return cachedWords;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

const PATTERNS: Array<(rng: Rng, words: WordLists) => string> = [
  // QuietOtter42
  (rng, w) => `${capitalize(pick(rng, w.adjectives))}${capitalize(pick(rng, w.nouns))}${randomInt(rng, 1, 99)}`,
  // salty_pickle
  (rng, w) => `${pick(rng, w.adjectives)}_${pick(rng, w.nouns)}`,
  // jordan1987
  (rng, w) => `${pick(rng, w.firstNames)}${randomInt(rng, 1970, 2005)}`,
  // Wobbly-Badger-7731
  (rng, w) => `${capitalize(pick(rng, w.adjectives))}-${capitalize(pick(rng, w.nouns))}-${randomInt(rng, 1000, 9999)}`,
  // not_a_raccoon
  (rng, w) => `not_a_${pick(rng, w.nouns)}`,
  // kai_waffle
  (rng, w) => `${pick(rng, w.firstNames)}_${pick(rng, w.nouns)}`,
];

/** Reddit allows letters, digits, `_` and `-`, up to 20 characters */
export function sanitizeUsername(raw: string): string {
  return raw.replace(/[^A-Za-z0-9_-]/g, '').slice(0, USERNAME_MAX_LENGTH);
}

export function generateUsername(rng: Rng): string {
  const words = loadWords();
  return sanitizeUsername(pick(rng, PATTERNS)(rng, words));
}

export interface UsernamePool {
  /** A name not handed out before by this pool */
  next(): string;
  /** Stable alias for a real author */
  aliasFor(realName: string): string;
}

/**
 * Hands out names unique within one post. Real authors keep one alias for
 * every comment they wrote.
 */
export function createUsernamePool(rng: Rng): UsernamePool {
  const used = new Set<string>();
  const aliases = new Map<string, string>();

  const next = (): string => {
    for (let attempt = 0; attempt < 50; attempt++) {
      const name = generateUsername(rng);
      if (name && !used.has(name)) {
        used.add(name);
        return name;
      }
    }
    // Word lists exhausted for this seed; fall back to a numbered name
    let n = used.size;
    let name = `user_${n}`;
    while (used.has(name)) {
      n++;
      name = `user_${n}`;
    }
    used.add(name);
    return name;
  };

  return {
    next,
    aliasFor(realName: string): string {
      const existing = aliases.get(realName);
      if (existing) return existing;
      const alias = next();
      aliases.set(realName, alias);
      return alias;
    },
  };
}
