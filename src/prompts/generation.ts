import { buildArchetypePrompt, type Archetype, type PromptVars } from '../archetypes.js';
import { limitLength } from '../security.js';
import type { CommentNode } from '../tree.js';
import type { PostContext } from '../mixer.js';

export const GENERATION_SYSTEM_PROMPT =
  'You write single Reddit comments that read like they came from ordinary users. Output JSON only.';

export const SELECTION_SYSTEM_PROMPT =
  'You classify Reddit threads. Follow the answer format exactly.';

const EXAMPLE_COUNT = 3;
const EXCERPT_LENGTH = 300;

function excerpt(text: string): string {
  return limitLength(text.replace(/\s+/g, ' ').trim(), EXCERPT_LENGTH);
}

export function formatExamples(comments: readonly CommentNode[], count = EXAMPLE_COUNT): string {
  const picked = comments.filter(c => !c.isSynthetic).slice(0, count);
  if (picked.length === 0) return '(none yet)';
  return picked.map(c => `- "${excerpt(c.content)}"`).join('\n');
}

function promptVars(context: PostContext): PromptVars {
  return {
    subreddit: context.subreddit,
    postTitle: context.title,
    postBody: context.body.trim() ? excerpt(context.body) : '(no text, title only)',
    examples: formatExamples(context.comments),
  };
}

export function buildTopLevelPrompt(archetypeKey: string, context: PostContext): string {
  return buildArchetypePrompt(archetypeKey, promptVars(context));
}

/**
 * Reply prompt: the archetype voice plus the thread leading to the parent
 */
export function buildReplyPrompt(
  archetypeKey: string,
  context: PostContext,
  parent: CommentNode,
  thread: readonly CommentNode[]
): string {
  const threadLines = thread.map(c => `${'  '.repeat(c.depth)}- "${excerpt(c.content)}"`);

  return `${buildArchetypePrompt(archetypeKey, promptVars(context))}

You are writing a REPLY to a comment, not a top-level answer to the post.
${threadLines.length > 0 ? `\nTHREAD SO FAR:\n${threadLines.join('\n')}\n` : ''}
REPLYING TO:
"${excerpt(parent.content)}"

REPLY RULES:
- Respond to what that comment says, not to the post in general
- Agree, disagree, add on or joke, the way people do in replies
- Do not start with the other person's username`;
}

export function buildSelectionPrompt(context: PostContext, available: readonly Archetype[]): string {
  const options = available.map(a => `${a.key} - ${a.description}`).join('\n');

  return `Pick the comment personas that would most plausibly show up in this Reddit thread.

SUBREDDIT: r/${context.subreddit}
POST TITLE: ${context.title}
POST BODY: ${context.body.trim() ? excerpt(context.body) : '(no text, title only)'}

AVAILABLE PERSONAS:
${options}

Choose between 4 and 6 personas. Answer with the persona keys only, one per line, exactly as written above.`;
}
