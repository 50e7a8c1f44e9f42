import { sanitizeHtml } from './sanitize';

/**
 * Strip HTML tags and decode entities from text
 */
export function stripHtml(html: string): string {
  return sanitizeHtml(html);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Cut text to at most maxChars, ending on the last sentence terminator inside
 * the limit. Text without any terminator is cut hard and marked with "...".
 */
export function truncateAtSentence(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  const cut = text.substring(0, maxChars);
  const boundary = Math.max(cut.lastIndexOf('. '), cut.lastIndexOf('! '), cut.lastIndexOf('? '), cut.lastIndexOf('.\n'));
  const lastChar = cut[cut.length - 1];

  if (lastChar === '.' || lastChar === '!' || lastChar === '?') {
    return cut;
  }
  if (boundary > 0) {
    return cut.substring(0, boundary + 1);
  }
  return `${cut.trimEnd()}...`;
}

/**
 * Split text on blank lines into trimmed, non-empty paragraphs
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map(p => p.trim())
    .filter(p => p.length > 0);
}
