/**
 * Backend wire protocol (Ollama-style `/api/chat`) and translation to and from
 * the OpenAI shapes.
 *
 * Streaming responses are newline-delimited JSON. Each line is one event; the last
 * one has `done: true` and carries the token counts.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { ModelEntry, TokenUsage } from '../types.js';
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionRequest,
  FinishReason,
} from './openai.js';

export const CHAT_PATH = '/api/chat';

export interface OllamaOptions {
  temperature?: number;
  top_p?: number;
  num_predict?: number;
  stop?: string[];
  seed?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
}

export interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  stream: boolean;
  options?: OllamaOptions;
}

export const OllamaChatEventSchema = z.object({
  model: z.string().optional(),
  created_at: z.string().optional(),
  message: z
    .object({
      role: z.string(),
      content: z.string(),
    })
    .optional(),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
  total_duration: z.number().optional(),
});

export type OllamaChatEvent = z.infer<typeof OllamaChatEventSchema>;

const OllamaErrorSchema = z.object({ error: z.string() });

export type OllamaLine =
  | { kind: 'event'; event: OllamaChatEvent }
  | { kind: 'error'; message: string }
  | { kind: 'invalid' };

/**
 * Decode a single JSON document from the backend.
 */
export function parseOllamaLine(line: string): OllamaLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return { kind: 'invalid' };
  }

  const failure = OllamaErrorSchema.safeParse(json);
  if (failure.success) return { kind: 'error', message: failure.data.error };

  const event = OllamaChatEventSchema.safeParse(json);
  return event.success ? { kind: 'event', event: event.data } : { kind: 'invalid' };
}

/**
 * Build the backend request body from an OpenAI-style request.
 */
export function toOllamaRequest(request: ChatCompletionRequest, backend: ModelEntry): OllamaChatRequest {
  const options: OllamaOptions = {};
  if (request.temperature !== undefined) options.temperature = request.temperature;
  if (request.top_p !== undefined) options.top_p = request.top_p;
  if (request.max_tokens !== undefined) options.num_predict = request.max_tokens;
  if (request.stop !== undefined) options.stop = typeof request.stop === 'string' ? [request.stop] : request.stop;
  if (request.seed !== undefined) options.seed = request.seed;
  if (request.frequency_penalty !== undefined) options.frequency_penalty = request.frequency_penalty;
  if (request.presence_penalty !== undefined) options.presence_penalty = request.presence_penalty;

  const body: OllamaChatRequest = {
    model: backend.backendModel,
    messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
    stream: request.stream,
  };
  if (Object.keys(options).length > 0) body.options = options;
  return body;
}

function finishReason(event: OllamaChatEvent): FinishReason | null {
  if (!event.done) return null;
  return event.done_reason === 'length' ? 'length' : 'stop';
}

export interface CompletionContext {
  id: string;
  /** Model name as the client asked for it. */
  model: string;
  created: number;
}

/**
 * Convert a complete (non-streamed) backend response.
 */
export function toChatCompletion(event: OllamaChatEvent, ctx: CompletionContext): ChatCompletion {
  const promptTokens = event.prompt_eval_count ?? 0;
  const completionTokens = event.eval_count ?? 0;
  return {
    id: ctx.id,
    object: 'chat.completion',
    created: ctx.created,
    model: ctx.model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: event.message?.content ?? '' },
        finish_reason: finishReason(event),
      },
    ],
    usage: {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
    },
  };
}

/**
 * Converts streamed backend events one-for-one into completion chunks and keeps
 * a running token tally, so a stream cut short still reports what was produced.
 */
export class ChunkTranslator {
  private first = true;
  private promptTokens: number | null = null;
  private evalTokens: number | null = null;
  private contentEvents = 0;

  constructor(private readonly ctx: CompletionContext) {}

  translate(event: OllamaChatEvent): ChatCompletionChunk {
    if (event.prompt_eval_count !== undefined) this.promptTokens = event.prompt_eval_count;
    if (event.eval_count !== undefined) this.evalTokens = event.eval_count;

    const content = event.message?.content ?? '';
    if (content.length > 0) this.contentEvents++;

    const delta: ChatCompletionChunk['choices'][number]['delta'] = {};
    if (this.first) {
      delta.role = 'assistant';
      delta.content = content;
      this.first = false;
    } else if (content.length > 0 || !event.done) {
      delta.content = content;
    }

    return {
      id: this.ctx.id,
      object: 'chat.completion.chunk',
      created: this.ctx.created,
      model: this.ctx.model,
      choices: [{ index: 0, delta, finish_reason: finishReason(event) }],
    };
  }

  /** Counts reported by the backend, or chunks seen so far when it never got to report them. */
  get usage(): TokenUsage {
    return {
      prompt: this.promptTokens ?? 0,
      response: this.evalTokens ?? this.contentEvents,
    };
  }
}
