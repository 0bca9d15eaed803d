/**
 * OpenAI-compatible wire types (the inbound surface).
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { InvalidRequest } from '../errors.js';

export const ChatRoles = ['system', 'user', 'assistant', 'tool'] as const;

export const ChatMessageSchema = z.object({
  role: z.enum(ChatRoles),
  content: z.string(),
  name: z.string().optional(),
});

/**
 * Chat completion request. Unknown fields are dropped.
 */
export const ChatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema).min(1),
  stream: z.boolean().default(false),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  seed: z.number().int().optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  user: z.string().optional(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;

export type FinishReason = 'stop' | 'length';

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletion {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string };
    finish_reason: FinishReason | null;
  }>;
  usage: ChatCompletionUsage;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: { role?: 'assistant'; content?: string };
    finish_reason: FinishReason | null;
  }>;
}

export interface ModelList {
  object: 'list';
  data: Array<{ id: string; object: 'model'; created: number; owned_by: string }>;
}

/**
 * Parse and validate a raw request body.
 *
 * @throws InvalidRequest on malformed JSON or a body that fails validation
 */
export function parseChatRequest(raw: Buffer): ChatCompletionRequest {
  let json: unknown;
  try {
    json = JSON.parse(raw.toString('utf-8'));
  } catch {
    throw new InvalidRequest('Invalid JSON in request body');
  }

  const result = ChatCompletionRequestSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidRequest(`${where}${issue?.message ?? 'Invalid request body'}`);
  }
  return result.data;
}

export function completionId(requestId: string): string {
  return `chatcmpl-${requestId}`;
}
