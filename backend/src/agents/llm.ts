import { ChatOpenAI } from '@langchain/openai';
import OpenAI from 'openai';
import { LangChainTextGenerator, OpenAIChatTextGenerator, TextGenerator } from './text-generator';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_LLM_MODEL = 'google/gemini-2.5-flash';

/**
 * Default max tokens for summaries and classification
 */
export const AGENT_MAX_TOKENS = 700;

export interface LLMSettings {
  apiKey?: string;
  provider: 'langchain' | 'openai';
  baseUrl: string;
  model: string;
  appUrl: string;
  appTitle: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Create a ChatOpenAI instance pointed at an OpenRouter-compatible endpoint
 */
export function createLLM(settings: LLMSettings & { apiKey: string }): ChatOpenAI {
  return new ChatOpenAI({
    model: settings.model,
    apiKey: settings.apiKey,
    configuration: {
      baseURL: settings.baseUrl,
      defaultHeaders: {
        'HTTP-Referer': settings.appUrl,
        'X-Title': settings.appTitle,
      },
    },
    temperature: settings.temperature ?? 0.2,
    maxTokens: settings.maxTokens ?? AGENT_MAX_TOKENS,
  });
}

export function createOpenAIClient(settings: LLMSettings & { apiKey: string }): OpenAI {
  return new OpenAI({
    baseURL: settings.baseUrl,
    apiKey: settings.apiKey,
    defaultHeaders: {
      'HTTP-Referer': settings.appUrl,
      'X-Title': settings.appTitle,
    },
  });
}

/**
 * Build the configured generator, or null without an API key; callers then
 * run on their deterministic fallbacks.
 */
export function createTextGenerator(settings: LLMSettings): TextGenerator | null {
  const apiKey = settings.apiKey;
  if (!apiKey) {
    console.warn('⚠️  No OPENROUTER_API_KEY set, summaries will use extractive fallback');
    return null;
  }

  if (settings.provider === 'openai') {
    return new OpenAIChatTextGenerator(createOpenAIClient({ ...settings, apiKey }), settings.model, {
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
    });
  }

  return new LangChainTextGenerator(createLLM({ ...settings, apiKey }), settings.model);
}
