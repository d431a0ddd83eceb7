import { z } from 'zod';
import { assignArchetypes, selectArchetypes } from './archetype-selector.js';
import { GenerationError } from './errors.js';
import { logger } from './logger.js';
import type { CommentGenerator, GeneratedComment, GenerationSlot, PostContext } from './mixer.js';
import { buildReplyPrompt, buildTopLevelPrompt, GENERATION_SYSTEM_PROMPT } from './prompts/generation.js';
import { chat as defaultChat, type ChatFn } from './providers.js';
import { createRng } from './random.js';
import { limitLength, stripControlChars, LIMITS } from './security.js';
import { ancestorChain, findNode } from './tree.js';

const GeneratedContentSchema = z.object({
  content: z.string().trim().min(1),
});

// Models sometimes address the parent commenter despite instructions
const LEADING_ADDRESS = /^\s*u\/[A-Za-z0-9_-]+\s*[:,]?\s*/;

// Last resort for JSON with raw newlines inside the string
const CONTENT_FIELD = /"content"\s*:\s*"((?:[^"\\]|\\.)*)"/s;

function parseJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  const candidate = stripControlChars(text.slice(start, end + 1));
  try {
    return JSON.parse(candidate);
  } catch {
    const match = CONTENT_FIELD.exec(candidate);
    if (!match) return null;
    try {
      return { content: JSON.parse(`"${match[1].replace(/\r?\n/g, '\\n')}"`) };
    } catch {
      return null;
    }
  }
}

/**
 * Pull the comment text out of a model reply shaped like
 * `{"content": "..."}`, possibly wrapped in prose or code fences.
 * Returns null when there is no usable comment.
 */
export function parseGeneratedContent(text: string): string | null {
  const result = GeneratedContentSchema.safeParse(parseJsonObject(text));
  if (!result.success) return null;

  const content = result.data.content.replace(LEADING_ADDRESS, '').trim();
  if (!content) return null;
  return limitLength(content, LIMITS.GENERATED_COMMENT_MAX_LENGTH);
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GenerationError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export interface LlmGeneratorOptions {
  chat?: ChatFn;
  /** Upper bound for each slot's model call */
  timeoutMs?: number;
  maxArchetypes?: number;
}

/**
 * One model call per slot, all in flight at once. Slots whose call fails,
 * times out or returns unusable text are left out of the result.
 */
export class LlmCommentGenerator implements CommentGenerator {
  private readonly chat: ChatFn;
  private readonly timeoutMs: number;
  private readonly maxArchetypes: number;

  constructor(options: LlmGeneratorOptions = {}) {
    this.chat = options.chat ?? defaultChat;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.maxArchetypes = options.maxArchetypes ?? 6;
  }

  async generate(slots: readonly GenerationSlot[], context: PostContext): Promise<GeneratedComment[]> {
    if (slots.length === 0) return [];

    const labels = await selectArchetypes(context, this.chat, this.maxArchetypes, this.timeoutMs);
    const rng = createRng(`${context.subreddit}:${context.title}:${slots.map(s => s.slot).join(',')}`);
    const assigned = assignArchetypes(labels, slots.length, rng);

    const settled = await Promise.allSettled(
      slots.map((slot, i) => withTimeout(
        this.generateOne(slot, assigned[i], context),
        this.timeoutMs,
        `Comment for slot ${slot.slot}`
      ))
    );

    const results: GeneratedComment[] = [];
    let configError: GenerationError | undefined;

    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        if (outcome.value) results.push(outcome.value);
        else logger.warn(`Unusable model output for slot ${slots[i].slot}`);
        return;
      }
      const reason: unknown = outcome.reason;
      if (reason instanceof GenerationError && !reason.retryable) {
        configError ??= reason;
      }
      logger.warn(`Generation failed for slot ${slots[i].slot}`, { error: String(reason) });
    });

    // Nothing will work until the provider is configured
    if (results.length === 0 && configError) {
      throw configError;
    }
    return results;
  }

  private async generateOne(
    slot: GenerationSlot,
    archetype: string,
    context: PostContext
  ): Promise<GeneratedComment | null> {
    let prompt: string;
    if (slot.placement.kind === 'top-level') {
      prompt = buildTopLevelPrompt(archetype, context);
    } else {
      const parent = findNode(context.comments, slot.placement.parentId);
      if (!parent) {
        logger.warn(`Reply slot ${slot.slot} has no parent ${slot.placement.parentId} in context`);
        return null;
      }
      prompt = buildReplyPrompt(archetype, context, parent, ancestorChain(context.comments, parent));
    }

    const response = await this.chat(prompt, {
      systemPrompt: GENERATION_SYSTEM_PROMPT,
      maxTokens: 400,
      temperature: 0.9,
      timeout: this.timeoutMs,
    });

    const content = parseGeneratedContent(response.content);
    if (!content) return null;
    return { slot: slot.slot, content, archetype };
  }
}
