import { TextGenerator } from './text-generator';
import { buildDeepDivePrompt, buildSummaryPrompt, buildTopicPrompt } from '../prompts/user-prompt';
import { sanitizeForLLM, sanitizeForLog } from '../utils/sanitize';
import { splitParagraphs, truncateAtSentence } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';

export type SummaryDepth = 'brief' | 'deep';

export const EXTRACT_PREFIX = "⚠️ Couldn't get an AI summary, so here is an extract from the article:";
export const EMPTY_ARTICLE_TEXT = "❗️ Couldn't extract readable text from this article.";

const FALLBACK_MAX_CHARS = 800;

/**
 * Input limit for the article body inside the prompt
 */
const PROMPT_ARTICLE_MAX_CHARS = 12000;

/**
 * Deterministic summary: the first two paragraphs, capped at a sentence
 * boundary, labelled as an extract.
 */
export function extractiveSummary(articleText: string): string {
  const paragraphs = splitParagraphs(articleText);
  const lead = truncateAtSentence(paragraphs.slice(0, 2).join('\n\n'), FALLBACK_MAX_CHARS);
  return `${EXTRACT_PREFIX}\n\n${lead}`;
}

export function cannedTopicReply(topic: string): string {
  return (
    `I couldn't find direct articles about *${topic}* in my feeds right now. ` +
    'Try a broader topic, or ask again in a little while and I will check the sources once more.'
  );
}

export interface SummarizeOptions {
  depth?: SummaryDepth;
}

export class Summarizer {
  constructor(
    private readonly generator: TextGenerator | null,
    private readonly assistantName = 'Nova'
  ) {}

  /**
   * Summary of one article for the user. Falls back to an extract when no
   * generator is configured or it produced nothing.
   */
  async summarize(
    articleText: string,
    headline: string,
    userMessage: string,
    options: SummarizeOptions = {}
  ): Promise<string> {
    const text = articleText.trim();
    if (!text) {
      return EMPTY_ARTICLE_TEXT;
    }

    const depth = options.depth ?? 'brief';
    const stepId = debugLogger.stepStart('SUMMARIZE', `Summarizing (${depth})`, {
      headline: sanitizeForLog(headline),
      chars: text.length,
    });

    if (this.generator) {
      const { sanitized, suspicious } = sanitizeForLLM(userMessage);
      if (suspicious) {
        debugLogger.warn('SUMMARIZE', 'Suspicious user message, sanitized before prompting', {
          message: sanitizeForLog(userMessage),
        });
      }

      const body = truncateAtSentence(text, PROMPT_ARTICLE_MAX_CHARS);
      const prompt =
        depth === 'deep'
          ? buildDeepDivePrompt(this.assistantName, body, headline, sanitized)
          : buildSummaryPrompt(this.assistantName, body, headline, sanitized);

      try {
        const summary = await this.generator.generate(prompt);
        if (summary) {
          debugLogger.stepFinish(stepId, { method: 'llm', chars: summary.length });
          return summary;
        }
      } catch (error) {
        debugLogger.stepError(stepId, 'SUMMARIZE', 'Generator threw, using extract', error);
        console.error('Summarizer generator error:', error instanceof Error ? error.message : error);
        return extractiveSummary(text);
      }
    }

    debugLogger.stepFinish(stepId, { method: 'extract' });
    return extractiveSummary(text);
  }

  /**
   * Reply for a news request that found no articles
   */
  async summarizeTopic(topic: string, userMessage: string): Promise<string> {
    if (!this.generator) {
      return cannedTopicReply(topic);
    }

    try {
      const { sanitized } = sanitizeForLLM(userMessage);
      const summary = await this.generator.generate(buildTopicPrompt(this.assistantName, topic, sanitized));
      return summary || cannedTopicReply(topic);
    } catch (error) {
      debugLogger.stepError(null, 'SUMMARIZE', 'Topic summary failed', error);
      console.error('Topic summary error:', error instanceof Error ? error.message : error);
      return cannedTopicReply(topic);
    }
  }
}
