import { z } from 'zod';

/**
 * Body of POST /chat. The email and conversation fields accept the short
 * aliases older clients send.
 */
export const ChatRequestSchema = z.object({
  message: z.string().optional().describe('User message (required, checked separately for emptiness/length)'),
  user_email: z.string().optional(),
  email: z.string().optional(),
  conversation_name: z.string().optional(),
  conversation: z.string().optional(),
  prefer_recent: z.boolean().optional().describe('Restrict sheet matches to recent rows when any exist (default true)'),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

/**
 * Schema for model-based intent classification output
 */
export const IntentLLMOutputSchema = z.object({
  intent: z.enum(['news', 'followup', 'chat']).describe('What the user wants'),
  topic: z.string().optional().default('').describe('News topic with filler words removed'),
  category: z.string().nullable().optional().describe('One of the known categories, if any'),
  itemNumber: z.number().int().positive().nullable().optional().describe('1-based item a follow-up refers to'),
  confidence: z.number().min(0).max(1).describe('Confidence score (0-1)'),
  reasoning: z.string().optional().default('').describe('Short explanation'),
});

export type IntentLLMOutput = z.infer<typeof IntentLLMOutputSchema>;

export const StoredMessageSchema = z.object({
  sender: z.string(),
  text: z.string(),
  timestamp: z.string(),
});

/**
 * Persisted chat history: ordered single-key objects of conversation name → messages
 */
export const HistoryBlobSchema = z.array(z.record(z.string(), z.array(StoredMessageSchema)));

/**
 * Columns of the sheet CSV export after header normalization
 */
export const SheetRowSchema = z.object({
  headline: z.string().default(''),
  news: z.string().default(''),
  summary: z.string().default(''),
  categories: z.string().default(''),
  category: z.string().default(''),
  link: z.string().default(''),
  image_url: z.string().default(''),
  date: z.string().default(''),
});

export type SheetRow = z.infer<typeof SheetRowSchema>;
