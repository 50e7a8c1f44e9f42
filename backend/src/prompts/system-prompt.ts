export function buildPersona(assistantName: string): string {
  return `You are ${assistantName}, a friendly, concise AI news reporter.`;
}

export function buildIntentPrompt(message: string, hasCachedList: boolean): string {
  return `You route messages for a conversational news assistant.

Classify the user's message into exactly one intent:
- "news": the user wants news, updates or headlines about a topic
- "followup": the user wants more detail on an article already listed (e.g. "yes", "tell me more", "2")
- "chat": greetings, small talk, questions about the assistant, anything else

${hasCachedList ? 'A numbered article list WAS shown earlier in this conversation.' : 'NO article list has been shown yet, so "followup" is not possible.'}

For "news", set "topic" to the subject with filler words removed (e.g. "latest nasa news" -> "nasa") and
"category" to one of: space, tech, business, sports, entertainment, world, or null.
For "followup", set "itemNumber" to the 1-based item the user named, or null.

Respond with JSON only:
{"intent": "news" | "followup" | "chat", "topic": string, "category": string | null, "itemNumber": number | null, "confidence": 0.0-1.0, "reasoning": "short explanation"}

USER MESSAGE: ${message}`;
}
