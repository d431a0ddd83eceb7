import { limitLength } from '../security.js';

export const EVALUATION_SYSTEM_PROMPT =
  'You judge Reddit comments for a research game. Answer with one JSON object and nothing else.';

const JUDGED_LENGTH = 600;

function judged(text: string): string {
  return limitLength(text.replace(/\s+/g, ' ').trim(), JUDGED_LENGTH);
}

/** Every comment of the round in shuffled order; the judge rates each 1-10 for "human" */
export function buildMixedRealityPrompt(title: string, comments: readonly string[]): string {
  const numbered = comments.map((text, i) => `Comment ${i + 1}: ${judged(text)}`).join('\n\n');

  return `You are evaluating Reddit comments to spot the ones written by an AI.

POST: ${judged(title)}

COMMENTS:
${numbered}

For each comment, rate 1-10 how likely it is to be HUMAN-written:
- 10 = Definitely human (natural Reddit voice)
- 1 = Definitely AI (too polite, too structured, artificial)

Give exactly ${comments.length} scores, in comment order. Respond in JSON:
{"comment_scores": [8, 3, 9]}`;
}

export function buildDiversityPrompt(comments: readonly string[]): string {
  const numbered = comments.map((text, i) => `AI Comment ${i + 1}: ${judged(text)}`).join('\n\n');

  return `Evaluate these AI-generated Reddit comments for DIVERSITY.

${numbered}

Rate 1-10 how different they are from each other:
- 10 = Highly diverse (different openings, structures, voices)
- 1 = Repetitive (same phrases, same patterns, one personality)

Look for repeated openings, identical sentence structures and a shared voice.

Respond in JSON:
{"diversity_score": 6, "main_issue": "three comments open the same way"}`;
}

export function buildAppropriatenessPrompt(
  title: string,
  topLevel: readonly string[],
  replies: readonly string[]
): string {
  const bullets = (items: readonly string[]): string =>
    items.length > 0 ? items.map(text => `- ${judged(text)}`).join('\n') : '(none)';

  return `Evaluate how well these AI comments fit REDDIT and their COMMENT TYPE.

POST: ${judged(title)}

TOP-LEVEL COMMENTS:
${bullets(topLevel)}

REPLIES:
${bullets(replies)}

Rate 1-10 how appropriate they are:
- 10 = Authentic Reddit voice (casual, opinionated, natural slang)
- 1 = Wrong tone (formal, overly helpful, corporate)

Top-level comments should be opinions, takes or reactions to the post.
Replies should react to the comment above them.

Respond in JSON:
{"appropriateness_score": 7, "tone_issue": "too polite"}`;
}
