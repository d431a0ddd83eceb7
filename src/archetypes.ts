/**
 * Archetype catalogue: named comment personas loaded from data/archetypes.json
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const ARCHETYPES_PATH = join(__dirname, '..', 'data', 'archetypes.json');

export const LENGTH_CLASSES = ['short', 'medium', 'long'] as const;
export type LengthClass = typeof LENGTH_CLASSES[number];

// Upper bound on words per length class
export const WORD_LIMITS: Record<LengthClass, number> = {
  short: 15,
  medium: 30,
  long: 50,
};

const ArchetypeDefSchema = z.object({
  description: z.string().min(1),
  lengthClass: z.enum(LENGTH_CLASSES),
  prompt: z.string().min(1),
});

const CatalogueSchema = z.object({
  context: z.string(),
  requirements: z.string(),
  categories: z.record(z.record(ArchetypeDefSchema)).refine(
    categories => 'generic' in categories,
    { message: 'a generic category is required' }
  ),
});

type Catalogue = z.infer<typeof CatalogueSchema>;

export interface Archetype {
  /** `category:name` */
  key: string;
  category: string;
  name: string;
  description: string;
  lengthClass: LengthClass;
  prompt: string;
}

export interface PromptVars {
  subreddit: string;
  postTitle: string;
  postBody: string;
  examples: string;
}

let cached: Catalogue | null = null;

function loadCatalogue(): Catalogue {
  if (!cached) {
    cached = CatalogueSchema.parse(JSON.parse(readFileSync(ARCHETYPES_PATH, 'utf-8')));
  }
  return cached;
}

function categoryArchetypes(category: string): Archetype[] {
  const defs = loadCatalogue().categories[category] ?? {};
  return Object.entries(defs).map(([name, def]) => ({
    key: `${category}:${name}`,
    category,
    name,
    ...def,
  }));
}

/** Subreddit-specific archetypes first, then the generic ones */
export function getAvailableArchetypes(subreddit: string): Archetype[] {
  const category = subreddit.toLowerCase();
  const specific = category === 'generic' ? [] : categoryArchetypes(category);
  return [...specific, ...categoryArchetypes('generic')];
}

export function getGenericArchetypes(): Archetype[] {
  return categoryArchetypes('generic');
}

export function getArchetype(key: string): Archetype | undefined {
  const sep = key.indexOf(':');
  if (sep <= 0) return undefined;
  const category = key.slice(0, sep);
  const name = key.slice(sep + 1);
  return categoryArchetypes(category).find(a => a.name === name);
}

export function renderTemplate(template: string, vars: PromptVars): string {
  return template.replace(/\{(subreddit|postTitle|postBody|examples)\}/g, (_, name: keyof PromptVars) => vars[name]);
}

export function buildArchetypePrompt(key: string, vars: PromptVars): string {
  const archetype = getArchetype(key);
  if (!archetype) {
    throw new ValidationError(`Unknown archetype: ${key}`);
  }
  const catalogue = loadCatalogue();
  return [
    renderTemplate(catalogue.context, vars),
    archetype.prompt,
    catalogue.requirements,
    `- Keep it under ${WORD_LIMITS[archetype.lengthClass]} words`,
  ].join('\n');
}
