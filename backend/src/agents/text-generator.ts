import { debugLogger } from '../utils/debug-logger';

/**
 * One-shot prompt → text. Implementations resolve null instead of throwing
 * when the backend fails or returns nothing usable.
 */
export interface TextGenerator {
  readonly model: string;
  generate(prompt: string): Promise<string | null>;
}

/**
 * The slice of a LangChain chat model used here (ChatOpenAI satisfies it)
 */
export interface ChatModelLike {
  invoke(input: string): Promise<{ content: unknown }>;
}

/**
 * The slice of the openai SDK client used here
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'user'; content: string }>;
        temperature?: number;
        max_tokens?: number;
      }): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/**
 * Flatten LangChain message content (a string, or an array of content parts)
 */
export function contentToText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => {
        if (typeof part === 'string') return part;
        if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
          return part.text;
        }
        return '';
      })
      .join('');
  }
  return '';
}

export class LangChainTextGenerator implements TextGenerator {
  constructor(
    private readonly llm: ChatModelLike,
    readonly model: string
  ) {}

  async generate(prompt: string): Promise<string | null> {
    const stepId = debugLogger.stepStart('LLM', 'LangChain completion', { model: this.model, promptChars: prompt.length });
    try {
      const response = await this.llm.invoke(prompt);
      const text = contentToText(response.content).trim();
      debugLogger.stepFinish(stepId, { chars: text.length });
      return text || null;
    } catch (error) {
      debugLogger.stepError(stepId, 'LLM', 'LangChain completion failed', error);
      console.error('LLM call failed:', error instanceof Error ? error.message : error);
      return null;
    }
  }
}

export interface OpenAIChatTextGeneratorOptions {
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIChatTextGenerator implements TextGenerator {
  constructor(
    private readonly client: ChatCompletionsClient,
    readonly model: string,
    private readonly options: OpenAIChatTextGeneratorOptions = {}
  ) {}

  async generate(prompt: string): Promise<string | null> {
    const stepId = debugLogger.stepStart('LLM', 'Chat completion', { model: this.model, promptChars: prompt.length });
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.options.temperature ?? 0.2,
        max_tokens: this.options.maxTokens ?? 700,
      });
      const text = response.choices[0]?.message.content?.trim() ?? '';
      debugLogger.stepFinish(stepId, { chars: text.length });
      return text || null;
    } catch (error) {
      debugLogger.stepError(stepId, 'LLM', 'Chat completion failed', error);
      console.error('LLM call failed:', error instanceof Error ? error.message : error);
      return null;
    }
  }
}
