import { randomBytes } from 'crypto';
import { AggregateRequest, Candidate, ChatTurnInput, ChatTurnResult, IntentResult } from '../types';
import { TextGenerator } from './text-generator';
import { Summarizer } from './summarizer';
import { classifyIntent, isFollowupToken } from '../search/intent-detector';
import { topicPreferences } from '../search/preferences';
import { ConversationCache, selectForExpansion } from '../utils/conversation-cache';
import { HistoryStore } from '../utils/conversation-store';
import { mapConcurrently, resolveBefore } from '../utils/concurrency';
import { sanitizeForLog } from '../utils/sanitize';
import { utcStamp } from '../utils/time';
import { debugLogger } from '../utils/debug-logger';

export const ANONYMOUS_USER = 'anonymous';

const HELP_RE = /\b(help|suggest|what can you do|how can you)\b/i;

export interface CandidateProvider {
  aggregate(request: AggregateRequest): Promise<Candidate[]>;
}

export interface TextExtractor {
  extract(url: string): Promise<string | null>;
}

export interface NewsAssistantDeps {
  aggregator: CandidateProvider;
  extractor: TextExtractor;
  summarizer: Summarizer;
  cache: ConversationCache;
  history: HistoryStore;
  /** Model used for intent classification; heuristic only when absent */
  classifier?: TextGenerator | null;
  assistantName: string;
  maxResults: number;
  requestDeadlineMs: number;
  /** Recent user messages read for topic preferences; 0 disables */
  preferenceMessages?: number;
  concurrency?: number;
  now?: () => Date;
  randomSuffix?: () => string;
}

export type NewsAssistant = (input: ChatTurnInput) => Promise<ChatTurnResult>;

interface ProcessedCandidate {
  summary: string;
  articleText?: string;
}

export function linkOnlySummary(link: string): string {
  return `❗️ Couldn't summarize this one in time. Read it here: ${link}`;
}

export function formatCandidateBlock(index: number, headline: string, summary: string, link: string): string {
  return `${index}. ${headline}\n\n${summary}\n\nLink: ${link}`;
}

function suggestions(): string {
  return (
    'Suggestions:\n' +
    "• Reply with an article number (e.g. '1') to dive deeper.\n" +
    "• Reply 'yes' or 'more' to expand the next story.\n"
  );
}

export function chatReply(message: string, assistantName: string): string {
  if (HELP_RE.test(message)) {
    return (
      `Hey 👋 I'm ${assistantName}, your friendly news assistant. I can fetch the latest news on a topic, ` +
      "summarize articles and go deeper on any story I list. Ask 'news about <topic>' to get started."
    );
  }
  const echoed = message.length > 200 ? `${message.substring(0, 200)}...` : message;
  return `Hey 👋 I heard: "${echoed}". What would you like me to do? Ask for news on a topic, or say 'help' to see what I can do.`;
}

export function autoConversationName(intent: IntentResult, now: Date, randomSuffix: () => string): string {
  if (intent.intent.kind === 'news') {
    const label = intent.intent.topic || intent.intent.category || '';
    const base = label.replace(/[^\w\s-]/g, '').substring(0, 60).trim().replace(/\s+/g, '_');
    return `${base || 'topic'}_${utcStamp(now)}`;
  }
  return `chat_${utcStamp(now)}_${randomSuffix()}`;
}

/**
 * Build the per-turn pipeline behind POST /chat:
 * classify → (chat | follow-up expansion | news aggregation + summaries) →
 * persist both sides of the exchange.
 */
export function createNewsAssistant(deps: NewsAssistantDeps): NewsAssistant {
  const now = deps.now ?? (() => new Date());
  const randomSuffix = deps.randomSuffix ?? (() => randomBytes(3).toString('hex'));
  const concurrency = deps.concurrency ?? 3;
  const preferenceMessages = deps.preferenceMessages ?? 0;

  async function record(email: string | undefined, conversation: string, sender: string, text: string): Promise<void> {
    if (!email) return;
    try {
      await deps.history.append(email, conversation, sender, text);
    } catch (error) {
      debugLogger.stepError(null, 'HISTORY', 'Failed to save message', error);
      console.error(`❌ Could not save ${sender} message to ${conversation}:`, error instanceof Error ? error.message : error);
    }
  }

  async function resolveFollowupConversation(userKey: string, email: string | undefined): Promise<string | undefined> {
    const listed = deps.cache.lastConversation(userKey);
    if (listed) return listed;
    if (!email) return undefined;
    try {
      return (await deps.history.lastConversationName(userKey)) ?? undefined;
    } catch (error) {
      debugLogger.stepError(null, 'HISTORY', 'Failed to read history', error);
      console.error('❌ Could not read history for follow-up:', error instanceof Error ? error.message : error);
      return undefined;
    }
  }

  /**
   * Topics from the user's earlier messages, searched after the current one
   */
  async function loadPreferences(email: string, topic: string): Promise<string[]> {
    if (preferenceMessages <= 0) return [];
    try {
      const recent = await deps.history.recentMessages(email, {
        excludeSender: deps.assistantName,
        limit: preferenceMessages,
      });
      const preferences = topicPreferences(recent.map(message => message.text)).filter(p => p !== topic);
      debugLogger.info('PREFERENCES', 'Topics from recent messages', { userKey: email, preferences });
      return preferences;
    } catch (error) {
      debugLogger.stepError(null, 'PREFERENCES', 'Failed to read recent messages', error);
      console.error('❌ Could not read topic preferences:', error instanceof Error ? error.message : error);
      return [];
    }
  }

  async function processCandidate(candidate: Candidate, message: string, depth: 'brief' | 'deep'): Promise<ProcessedCandidate> {
    const extracted = candidate.articleText ? null : await deps.extractor.extract(candidate.link);
    const articleText = candidate.articleText || extracted || undefined;
    const text = articleText || candidate.snippet || '';
    if (!text) {
      return { summary: `❗️ Couldn't extract text from the link. Link: ${candidate.link}` };
    }
    const summary = await deps.summarizer.summarize(text, candidate.headline, message, { depth });
    return { summary, articleText };
  }

  async function summarizeWithDeadline(
    candidates: Candidate[],
    message: string,
    depth: 'brief' | 'deep'
  ): Promise<ProcessedCandidate[]> {
    const deadline = Date.now() + deps.requestDeadlineMs;

    const settled = await mapConcurrently(
      candidates,
      candidate => {
        const fallback: ProcessedCandidate = { summary: linkOnlySummary(candidate.link) };
        const remaining = deadline - Date.now();
        if (remaining <= 0) return Promise.resolve(fallback);
        return resolveBefore(processCandidate(candidate, message, depth), remaining, fallback);
      },
      { concurrency, label: 'Candidate summaries' }
    );

    return settled.map((outcome, i) =>
      outcome.ok ? outcome.value : { summary: linkOnlySummary(candidates[i].link) }
    );
  }

  async function newsTurn(
    userKey: string,
    conversation: string,
    message: string,
    topic: string,
    intent: IntentResult,
    search: { relatedTopics: string[]; preferRecent: boolean }
  ): Promise<{ reply: string; count: number }> {
    const category = intent.intent.kind === 'news' ? intent.intent.category : null;
    const label = topic || category || 'the news';

    const candidates = await deps.aggregator.aggregate({
      topic,
      category,
      userKey,
      maxResults: deps.maxResults,
      relatedTopics: search.relatedTopics,
      preferRecent: search.preferRecent,
    });

    if (candidates.length === 0) {
      deps.cache.put(userKey, conversation, topic, []);
      const summary = await deps.summarizer.summarizeTopic(label, message);
      return {
        reply: `Here's a quick summary about *${label}*:\n\n${summary}\n\n— ${deps.assistantName}`,
        count: 0,
      };
    }

    const processed = await summarizeWithDeadline(candidates, message, 'brief');

    deps.cache.put(
      userKey,
      conversation,
      topic,
      candidates.map((candidate, i) => ({ ...candidate, articleText: processed[i].articleText ?? candidate.articleText }))
    );

    const blocks = candidates.map((candidate, i) =>
      formatCandidateBlock(i + 1, candidate.headline, processed[i].summary, candidate.link)
    );

    return {
      reply:
        `Here's what I found about *${label}*:\n\n${blocks.join('\n\n---\n\n')}\n\n` +
        `${suggestions()}\n— ${deps.assistantName}`,
      count: candidates.length,
    };
  }

  async function followupTurn(
    userKey: string,
    conversation: string,
    message: string,
    itemNumber: number | null
  ): Promise<{ reply: string; count: number } | null> {
    const entry = deps.cache.get(userKey, conversation);
    if (!entry || entry.lastList.length === 0) {
      return null;
    }

    const index = selectForExpansion(entry, itemNumber);
    const item = entry.lastList[index];
    debugLogger.info('FOLLOWUP', 'Expanding cached item', { conversation, index, link: item.link });

    const [processed] = await summarizeWithDeadline([item], message, 'deep');
    deps.cache.markExpanded(userKey, conversation, index, {
      articleText: processed.articleText,
      listId: entry.listId,
    });

    const next = entry.lastList.findIndex((candidate, i) => i !== index && !candidate.expanded);
    const hint =
      next === -1
        ? "That's everything from this list. Ask me about another topic any time."
        : `Reply 'yes' for story ${next + 1}, or send another topic.`;

    return {
      reply:
        `Here's a deeper look at ${formatCandidateBlock(index + 1, item.headline, processed.summary, item.link)}\n\n` +
        `${hint}\n— ${deps.assistantName}`,
      count: 1,
    };
  }

  return async function handleTurn(input: ChatTurnInput): Promise<ChatTurnResult> {
    const message = input.message.trim();
    const email = input.userEmail?.trim().toLowerCase() || undefined;
    const userKey = email ?? ANONYMOUS_USER;
    const explicitName = input.conversationName?.trim() || undefined;

    const stepId = debugLogger.stepStart('CHAT', 'Handling chat turn', {
      userKey,
      conversation: explicitName,
      message: sanitizeForLog(message),
    });

    const followupName = explicitName ?? (isFollowupToken(message) ? await resolveFollowupConversation(userKey, email) : undefined);
    const hasCachedList = followupName !== undefined && deps.cache.hasList(userKey, followupName);

    const intent = await classifyIntent(message, { hasCachedList }, deps.classifier);

    const conversation =
      explicitName ??
      (intent.intent.kind === 'followup' && followupName !== undefined
        ? followupName
        : autoConversationName(intent, now(), randomSuffix));

    // Read before this message is stored, so it does not count as a preference
    const relatedTopics =
      intent.intent.kind === 'news' && email ? await loadPreferences(email, intent.intent.topic) : [];

    await record(email, conversation, email ?? userKey, message);

    let reply: string;
    let count: number | undefined;
    let kind = intent.intent.kind;

    if (intent.intent.kind === 'news') {
      ({ reply, count } = await newsTurn(userKey, conversation, message, intent.intent.topic, intent, {
        relatedTopics,
        preferRecent: input.preferRecent ?? true,
      }));
    } else if (intent.intent.kind === 'followup') {
      const expanded = await followupTurn(userKey, conversation, message, intent.intent.itemNumber);
      if (expanded) {
        ({ reply, count } = expanded);
      } else {
        reply = chatReply(message, deps.assistantName);
        kind = 'chat';
      }
    } else {
      reply = chatReply(message, deps.assistantName);
    }

    await record(email, conversation, deps.assistantName, reply);

    debugLogger.stepFinish(stepId, { intent: kind, conversation, count });
    return count === undefined ? { reply, conversation, intent: kind } : { reply, conversation, count, intent: kind };
  };
}
