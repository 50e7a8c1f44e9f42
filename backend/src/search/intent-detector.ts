import { TextGenerator } from '../agents/text-generator';
import { buildIntentPrompt } from '../prompts/system-prompt';
import { IntentLLMOutputSchema } from '../schemas';
import { Intent, IntentContext, IntentResult, NEWS_CATEGORIES, NewsCategory } from '../types';
import { mapKeywordToCategory } from '../ingestion/sources';
import { escapeRegex, sanitizeForLLM, sanitizeForLog } from '../utils/sanitize';
import { debugLogger } from '../utils/debug-logger';

const GREETINGS_RE = /\b(hi|hello|hey|hiya|greetings|glad to meet|nice to meet|pleased to meet)\b/i;

const NEWS_KEYWORDS = [
  'news', 'latest', 'update', 'updates', 'breaking', 'headlines',
  'report', 'reports', 'announce', 'announced', 'release', 'released', 'new',
];

const FOLLOWUP_TOKENS = new Set([
  'yes', 'y', 'yeah', 'yep', 'yup', 'sure', 'absolutely', 'ok', 'okay', 'please',
  'yes please', 'more', 'tell me more', 'continue', 'go on', 'next', 'go ahead',
]);

const ITEM_REFERENCE_RE = /^(?:#|no\.?\s*|number\s+|item\s+|story\s+|article\s+|(?:tell me )?more (?:about|on)\s+(?:#|number\s+)?)?(\d{1,3})$/;

const wordsRegex = (words: string[], flags: string): RegExp =>
  new RegExp(`\\b(?:${words.map(escapeRegex).join('|')})\\b`, flags);

// Request phrasing, removed wherever it appears
const REQUEST_PHRASE_RE = wordsRegex(
  [
    'give me', 'show me', 'tell me', "what's new", 'whats new', 'what is new', 'anything new',
    "what's", 'whats', 'what is', 'is there', 'are there', 'latest', 'news', 'updates', 'update',
    'breaking', 'headlines', 'any', 'please', 'recent', 'today', 'hi', 'hello', 'hey',
  ],
  'gi'
);

// Connectives, removed only at either end so "new york" or "state of the union" survive
const EDGE_WORDS = new Set(['about', 'on', 'in', 'the', 'some', 'me', 'for', 'with', 'of']);

const MIN_GREETING_LENGTH = 60;

function containsNewsKeyword(lower: string): boolean {
  return NEWS_KEYWORDS.some(keyword => new RegExp(`\\b${escapeRegex(keyword)}\\b`).test(lower));
}

function normalizeToken(message: string): string {
  return message
    .toLowerCase()
    .replace(/[.!?,]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Topic text with request phrasing removed: "latest nasa news" → "nasa"
 */
export function extractTopic(message: string): string {
  const words = message
    .toLowerCase()
    .replace(REQUEST_PHRASE_RE, ' ')
    .replace(/[^\w\s-]/g, ' ')
    .split(/\s+/)
    .filter(word => word.length > 0);

  let start = 0;
  let end = words.length;
  while (start < end && EDGE_WORDS.has(words[start])) start++;
  while (end > start && EDGE_WORDS.has(words[end - 1])) end--;
  return words.slice(start, end).join(' ');
}

/**
 * 1-based item number when the message is a bare item reference ("2", "#2",
 * "tell me more about 2"), else null
 */
export function parseItemReference(message: string): number | null {
  const match = normalizeToken(message).match(ITEM_REFERENCE_RE);
  return match ? parseInt(match[1], 10) : null;
}

export function isFollowupToken(message: string): boolean {
  return FOLLOWUP_TOKENS.has(normalizeToken(message)) || parseItemReference(message) !== null;
}

function result(intent: Intent, confidence: number, reasoning: string, method: IntentResult['method']): IntentResult {
  return {
    intent,
    topic: intent.kind === 'news' ? intent.topic : '',
    confidence,
    reasoning,
    method,
  };
}

/**
 * Keyword-based classification. Pure; no network.
 *
 * Order: short greeting → follow-up token (needs a cached list) → news
 * keyword → category keyword → chat.
 */
export function classifyHeuristic(message: string, context: IntentContext): IntentResult {
  const trimmed = message.trim();
  const lower = trimmed.toLowerCase();
  const hasNewsKeyword = containsNewsKeyword(lower);

  if (trimmed.length < MIN_GREETING_LENGTH && GREETINGS_RE.test(trimmed) && !hasNewsKeyword) {
    return result({ kind: 'chat' }, 0.9, 'Short greeting without news keywords', 'heuristic');
  }

  if (context.hasCachedList && isFollowupToken(trimmed)) {
    const itemNumber = parseItemReference(trimmed);
    return result(
      { kind: 'followup', itemNumber },
      0.95,
      itemNumber !== null ? `Item reference ${itemNumber}` : 'Continuation token',
      'heuristic'
    );
  }

  if (hasNewsKeyword) {
    return result(
      { kind: 'news', topic: extractTopic(trimmed), category: mapKeywordToCategory(lower) },
      0.85,
      'Matched news keyword',
      'heuristic'
    );
  }

  const category = mapKeywordToCategory(lower);
  if (category) {
    return result(
      { kind: 'news', topic: extractTopic(trimmed), category },
      0.7,
      `Matched ${category} keyword`,
      'heuristic'
    );
  }

  return result({ kind: 'chat' }, 0.6, 'No news signal', 'heuristic');
}

function isNewsCategory(value: string): value is NewsCategory {
  return NEWS_CATEGORIES.some(category => category === value);
}

/**
 * Parse model output (optionally inside a ```json fence) into an IntentResult.
 * Returns null when the output does not match the expected shape.
 */
export function parseIntentOutput(raw: string, message: string): IntentResult | null {
  const cleaned = raw.replace(/```json?\n?|\n?```/g, '').trim();
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let json: unknown;
  try {
    json = JSON.parse(cleaned.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = IntentLLMOutputSchema.safeParse(json);
  if (!parsed.success) return null;

  const output = parsed.data;
  const reasoning = output.reasoning || 'LLM classification';

  switch (output.intent) {
    case 'chat':
      return result({ kind: 'chat' }, output.confidence, reasoning, 'llm');
    case 'followup':
      return result({ kind: 'followup', itemNumber: output.itemNumber ?? null }, output.confidence, reasoning, 'llm');
    case 'news': {
      const topic = extractTopic(output.topic) || extractTopic(message);
      const declared = output.category?.toLowerCase() ?? '';
      const category = isNewsCategory(declared) ? declared : mapKeywordToCategory(`${topic} ${message}`);
      return result({ kind: 'news', topic, category }, output.confidence, reasoning, 'llm');
    }
  }
}

/**
 * Classify a chat message. With a generator the model is asked first and the
 * heuristic is the fallback; a follow-up token with a cached list never
 * reaches the model. Never throws.
 */
export async function classifyIntent(
  message: string,
  context: IntentContext,
  generator?: TextGenerator | null
): Promise<IntentResult> {
  const stepId = debugLogger.stepStart('INTENT', 'Classifying message', {
    message: sanitizeForLog(message),
    hasCachedList: context.hasCachedList,
    mode: generator ? 'llm' : 'heuristic',
  });

  const heuristic = classifyHeuristic(message, context);

  if (!generator || heuristic.intent.kind === 'followup') {
    debugLogger.stepFinish(stepId, { intent: heuristic.intent.kind, method: heuristic.method });
    return heuristic;
  }

  const { sanitized, suspicious } = sanitizeForLLM(message);
  if (suspicious) {
    console.warn('[SECURITY] Suspicious input detected in intent classifier:', sanitizeForLog(message.substring(0, 100)));
  }

  try {
    const raw = await generator.generate(buildIntentPrompt(sanitized, context.hasCachedList));
    const parsed = raw ? parseIntentOutput(raw, message) : null;

    if (!parsed) {
      debugLogger.warn('INTENT', 'Unusable model output, using heuristic');
    } else if (parsed.intent.kind === 'followup' && !context.hasCachedList) {
      debugLogger.warn('INTENT', 'Model chose followup without a cached list, using heuristic');
    } else {
      debugLogger.stepFinish(stepId, { intent: parsed.intent.kind, method: 'llm', confidence: parsed.confidence });
      return parsed;
    }
  } catch (error) {
    debugLogger.stepError(stepId, 'INTENT', 'Model classification failed, using heuristic', error);
    return heuristic;
  }

  debugLogger.stepFinish(stepId, { intent: heuristic.intent.kind, method: heuristic.method });
  return heuristic;
}
