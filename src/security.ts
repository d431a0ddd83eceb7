/**
 * Remove characters that have no business in user-visible text:
 * - Null bytes
 * - Unicode control characters (RTL override, zero-width, BOM, etc.)
 * Newlines and tabs are kept; comments are multi-line.
 */
export function stripControlChars(input: string): string {
  return input
    .replace(/\x00/g, '')
    .replace(/[\u0001-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B-\u200F\u2028-\u202F\uFEFF]/g, '');
}

/**
 * Limit string length for storage/processing
 */
export function limitLength(input: string, maxLength: number): string {
  if (input.length <= maxLength) {
    return input;
  }
  return input.slice(0, maxLength) + '... [truncated]';
}

// Max sizes for various inputs
export const LIMITS = {
  URL_MAX_LENGTH: 2000,
  TITLE_MAX_LENGTH: 300,
  COMMENT_MAX_LENGTH: 10000,
  GENERATED_COMMENT_MAX_LENGTH: 2000,
  TOKEN_MAX_LENGTH: 200,
  COMMENT_ID_MAX_LENGTH: 64,
  SUBREDDIT_MAX_LENGTH: 64,
} as const;
