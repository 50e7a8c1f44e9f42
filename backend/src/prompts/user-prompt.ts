import { buildPersona } from './system-prompt';

export function buildSummaryPrompt(
  assistantName: string,
  articleText: string,
  headline: string,
  userMessage: string
): string {
  return `${buildPersona(assistantName)}
Summarize the article below in 2-4 short paragraphs with clear facts. Then produce one short tailored follow-up question the user might want next (1 sentence).

User message: ${userMessage}

Headline: ${headline}

Article:
${articleText}

Summary:`;
}

export function buildDeepDivePrompt(
  assistantName: string,
  articleText: string,
  headline: string,
  userMessage: string
): string {
  return `${buildPersona(assistantName)}
The user asked to go deeper on this story. Give a fuller explanation in 3-5 short paragraphs: what happened, the background and context, why it matters, and how it compares with earlier related events. Stick to facts from the article. End with one short follow-up question (1 sentence).

User message: ${userMessage}

Headline: ${headline}

Article:
${articleText}

Deep dive:`;
}

export function buildTopicPrompt(assistantName: string, topic: string, userMessage: string): string {
  return `You are ${assistantName}, a friendly, concise AI news assistant.
The user asked about this topic and no direct articles were found in the feeds.
Provide a short chatty but factual summary (2-4 short paragraphs) of what is known about the topic, and one short question or suggestion the user might want next.

User message: ${userMessage}

Topic: ${topic}

Summary:`;
}
