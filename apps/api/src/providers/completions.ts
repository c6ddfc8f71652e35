import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { Env } from '../env.js';
import { errorMessage } from '../errors.js';
import type { CompletionMessage, CompletionRequest, CompletionService, Outcome } from '../types.js';
import { fail, succeed } from '../types.js';

// The subset of a chat completion response we read. Both the OpenAI SDK
// response and hand-written stand-ins satisfy it. Some OpenAI-compatible
// gateways answer with an error body and no choices.
export interface ChatCompletionLike {
  choices?: Array<{
    message?: {
      content?: string | null;
      refusal?: string | null;
      tool_calls?: Array<{ type?: string; function?: { name?: string; arguments?: string } }>;
    };
  }>;
  error?: { message?: string };
}

export type ChatCreateFn = (params: ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletionLike>;

function toChatMessages(messages: CompletionMessage[]): ChatCompletionCreateParamsNonStreaming['messages'] {
  return messages.map((m) =>
    m.role === 'system' ? { role: 'system' as const, content: m.content } : { role: 'user' as const, content: m.content }
  );
}

function buildParams(request: CompletionRequest): ChatCompletionCreateParamsNonStreaming {
  const params: ChatCompletionCreateParamsNonStreaming = {
    model: request.model,
    temperature: request.temperature,
    messages: toChatMessages(request.messages)
  };

  if (request.responseSchema) {
    params.response_format = {
      type: 'json_schema',
      json_schema: {
        name: request.responseSchema.name,
        schema: request.responseSchema.schema,
        strict: true
      }
    };
  }

  return params;
}

function describeFailure(err: unknown): string {
  if (err instanceof OpenAI.APIConnectionTimeoutError) return 'Completion request timed out';
  if (err instanceof OpenAI.APIConnectionError) return `Completion service unreachable: ${err.message}`;
  if (err instanceof OpenAI.APIError) {
    return `Completion service error${err.status ? ` (${err.status})` : ''}: ${err.message}`;
  }
  return `Completion request failed: ${errorMessage(err)}`;
}

/**
 * Pulls the response text out of a chat completion. Structured output
 * normally arrives in the message body; some providers route it through a
 * tool call instead.
 */
export function extractCompletionText(completion: ChatCompletionLike): Outcome<string> {
  const message = completion.choices?.[0]?.message;
  if (!message) {
    const upstream = completion.error?.message;
    return fail(upstream ? `Completion service error: ${upstream}` : 'Completion returned no choices');
  }

  if (typeof message.refusal === 'string' && message.refusal.trim()) {
    return fail(`Model refused: ${message.refusal.trim()}`);
  }

  if (typeof message.content === 'string' && message.content.trim()) {
    return succeed(message.content);
  }

  for (const call of message.tool_calls ?? []) {
    const args = call.function?.arguments;
    if (typeof args === 'string' && args.trim()) return succeed(args);
  }

  return fail('Completion response contained no content');
}

export function createCompletionService(create: ChatCreateFn): CompletionService {
  return {
    async complete(request) {
      let completion: ChatCompletionLike;
      try {
        completion = await create(buildParams(request));
      } catch (err) {
        const reason = describeFailure(err);
        console.warn('[completions] request failed', { model: request.model, error: reason });
        return fail(reason);
      }
      return extractCompletionText(completion);
    }
  };
}

export function createOpenAiCompletionService(env: Env): CompletionService {
  // Retries on transient failures are left to the SDK client.
  const client = new OpenAI({
    apiKey: env.LLM_API_KEY,
    baseURL: env.LLM_BASE_URL,
    timeout: env.LLM_TIMEOUT_MS,
    maxRetries: env.LLM_MAX_RETRIES
  });

  return createCompletionService((params) => client.chat.completions.create(params));
}
