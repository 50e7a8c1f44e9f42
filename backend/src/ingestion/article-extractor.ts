import { sanitizeHtml, escapeRegex } from '../utils/sanitize';
import { truncateAtSentence } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const MIN_PARAGRAPH_LENGTH = 40;

export interface ArticleExtractorOptions {
  timeoutMs?: number;
  maxChars?: number;
  fetchImpl?: typeof fetch;
}

function removeNonContent(html: string): string {
  return html
    .replace(/<script\b[\s\S]*?<\/script>/gi, '')
    .replace(/<style\b[\s\S]*?<\/style>/gi, '')
    .replace(/<noscript\b[\s\S]*?<\/noscript>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '');
}

function paragraphsIn(html: string): string[] {
  const out: string[] = [];
  const re = /<p\b[^>]*>([\s\S]*?)<\/p>/gi;
  let match: RegExpExecArray | null;
  while ((match = re.exec(html)) !== null) {
    const text = sanitizeHtml(match[1]);
    if (text) out.push(text);
  }
  return out;
}

export function findMetaContent(html: string, key: string): string | null {
  const tagRe = new RegExp(`<meta[^>]+(?:property|name)=["']${escapeRegex(key)}["'][^>]*>`, 'i');
  const tag = html.match(tagRe);
  if (!tag) return null;
  const content = tag[0].match(/content=["']([^"']+)["']/i);
  return content ? sanitizeHtml(content[1]) : null;
}

/**
 * Readable body text of an HTML page: paragraphs of the first <article>,
 * else every paragraph long enough to be prose, else the meta description.
 */
export function extractReadableText(html: string): string {
  const cleaned = removeNonContent(html);

  const article = cleaned.match(/<article\b[^>]*>([\s\S]*?)<\/article>/i);
  let paragraphs = article ? paragraphsIn(article[1]) : [];

  if (paragraphs.length === 0) {
    paragraphs = paragraphsIn(cleaned).filter(p => p.length > MIN_PARAGRAPH_LENGTH);
  }

  if (paragraphs.length > 0) {
    return paragraphs.join('\n\n');
  }

  return findMetaContent(cleaned, 'description') ?? findMetaContent(cleaned, 'og:description') ?? '';
}

function isTextual(contentType: string | null): boolean {
  if (!contentType) return true;
  const type = contentType.toLowerCase();
  return type.startsWith('text/') || type.includes('html') || type.includes('xml');
}

/**
 * Fetches article pages and reduces them to plain text
 */
export class ArticleExtractor {
  private readonly timeoutMs: number;
  private readonly maxChars: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ArticleExtractorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 12000;
    this.maxChars = options.maxChars ?? 15000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * @returns the article text, or null when the page could not be fetched or
   * had nothing readable
   */
  async extract(url: string, maxChars = this.maxChars): Promise<string | null> {
    if (!url) return null;

    const stepId = debugLogger.stepStart('EXTRACT', 'Extracting article text', { url });
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': BROWSER_USER_AGENT,
          Accept: 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      if (!isTextual(response.headers.get('content-type'))) {
        throw new Error(`Unsupported content type ${response.headers.get('content-type')}`);
      }

      const text = extractReadableText(await response.text());
      if (!text) {
        debugLogger.stepFinish(stepId, { chars: 0 });
        return null;
      }

      const truncated = truncateAtSentence(text, maxChars);
      debugLogger.stepFinish(stepId, { chars: truncated.length, truncated: truncated.length < text.length });
      return truncated;
    } catch (error) {
      debugLogger.stepError(stepId, 'EXTRACT', 'Extraction failed', error);
      console.error(`Article extraction failed for ${url}:`, error instanceof Error ? error.message : error);
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
