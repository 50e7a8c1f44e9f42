/**
 * Input and content sanitization
 *
 * - user messages headed for LLM prompts (prompt injection markers)
 * - text headed for logs (log forging)
 * - HTML from feeds and article pages (tags, scripts, entities)
 */

/**
 * Inputs longer than this skip regex evaluation entirely (ReDoS guard)
 */
const MAX_REGEX_INPUT_LENGTH = 10000;

export const MAX_MESSAGE_LENGTH = 1000;

function safeRegexTest(pattern: RegExp, input: string): boolean {
  if (input.length > MAX_REGEX_INPUT_LENGTH) {
    return true;
  }
  pattern.lastIndex = 0;
  return pattern.test(input);
}

const PROMPT_INJECTION_PATTERNS = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|rules?)/gi,
  /disregard\s+(all\s+)?(previous|above|prior)/gi,
  /forget\s+(all\s+)?(previous|above|prior)/gi,
  /you\s+are\s+now\s+/gi,
  /new\s+instructions?:/gi,
  /\[\s*INST\s*\]/gi,
  /\[\s*\/INST\s*\]/gi,
  /<\|im_start\|>/gi,
  /<\|im_end\|>/gi,
  /<<SYS>>/gi,
];

const LOG_DANGEROUS_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f]/g;

/**
 * Neutralize a user message before it is embedded in a prompt.
 * The message is kept readable; role markers and angle brackets are defused.
 */
export function sanitizeForLLM(input: string): { sanitized: string; suspicious: boolean } {
  if (!input) {
    return { sanitized: '', suspicious: false };
  }

  if (input.length > MAX_REGEX_INPUT_LENGTH) {
    return { sanitized: input.substring(0, 500), suspicious: true };
  }

  const suspicious = PROMPT_INJECTION_PATTERNS.some(pattern => safeRegexTest(pattern, input));

  const sanitized = input
    .replace(/\[\s*(system|user|assistant)\s*\]/gi, '')
    .replace(/```\s*(system|prompt|instruction)/gi, '```')
    .replace(/</g, '＜')
    .replace(/>/g, '＞')
    .replace(/\0/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return { sanitized, suspicious };
}

/**
 * Single-line, length-capped rendering of user text for logs
 */
export function sanitizeForLog(input: string): string {
  if (!input) {
    return '';
  }

  return input
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(LOG_DANGEROUS_CHARS, '')
    .substring(0, 1000);
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
};

function decodeCodePoint(code: number): string {
  // Control characters and invalid code points are dropped
  if (!Number.isFinite(code) || code < 32 || code > 0x10ffff || (code >= 127 && code < 160)) {
    return '';
  }
  return String.fromCodePoint(code);
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const isHex = body[1] === 'x' || body[1] === 'X';
      return decodeCodePoint(parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10));
    }
    const named = NAMED_ENTITIES[body.toLowerCase()];
    return named ?? match;
  });
}

/**
 * Strip markup from external HTML (feed summaries, article paragraphs) and
 * return plain text with entities decoded and whitespace collapsed.
 */
export function sanitizeHtml(html: string): string {
  if (!html) {
    return '';
  }

  const text = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<br\s*\/?>/gi, ' ')
    .replace(/<[^>]*>/g, '');

  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

export interface MessageValidation {
  valid: boolean;
  sanitized: string;
  error?: string;
}

/**
 * Validate a /chat message. Only presence and length are enforced here; the
 * raw trimmed text is what the pipeline classifies and stores.
 */
export function validateUserMessage(input: unknown): MessageValidation {
  if (typeof input !== 'string') {
    return { valid: false, sanitized: '', error: 'message is required and must be a string' };
  }

  const trimmed = input.trim();

  if (trimmed.length === 0) {
    return { valid: false, sanitized: '', error: 'message cannot be empty' };
  }

  if (trimmed.length > MAX_MESSAGE_LENGTH) {
    return { valid: false, sanitized: '', error: `message too long (max ${MAX_MESSAGE_LENGTH} characters)` };
  }

  return { valid: true, sanitized: trimmed };
}

/**
 * Escape special regex characters in a string
 */
export function escapeRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
