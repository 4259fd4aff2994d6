/**
 * LLM Client for loomchat
 * Streams OpenAI-compatible /chat/completions responses. Ollama, llama.cpp,
 * Groq, OpenAI and the OpenAI-compatible endpoints of Anthropic and Google
 * all serve the same route.
 */

import { BackendError, StreamStalledError } from './errors.js';
import type { ChatBackend, LlmConfig, LlmProvider, StreamChunk, StreamRequest, UsageMetadata } from './types.js';

// Default endpoints
export const DEFAULT_BASE_URLS: Record<LlmProvider, string> = {
  ollama: 'http://localhost:11434/v1',
  llamacpp: 'http://localhost:8080/v1',
  openai: 'https://api.openai.com/v1',
  groq: 'https://api.groq.com/openai/v1',
  anthropic: 'https://api.anthropic.com/v1',
  google: 'https://generativelanguage.googleapis.com/v1beta/openai',
};

export function chatCompletionsUrl(config: LlmConfig): string {
  const base = config.baseUrl || DEFAULT_BASE_URLS[config.provider];
  return `${base.replace(/\/+$/, '')}/chat/completions`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Server-sent events
// ============================================================================

/**
 * Decode an SSE byte stream into the JSON payloads of its data lines.
 * Stops at the [DONE] sentinel.
 */
export async function* parseSseStream(body: AsyncIterable<Uint8Array>): AsyncGenerator<unknown> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const bytes of body) {
    buffer += decoder.decode(bytes, { stream: true });
    let newline = buffer.indexOf('\n');
    while (newline >= 0) {
      const line = buffer.slice(0, newline).trim();
      buffer = buffer.slice(newline + 1);
      newline = buffer.indexOf('\n');

      if (!line.startsWith('data:')) continue;
      const data = line.slice('data:'.length).trim();
      if (data === '[DONE]') return;
      if (data) yield JSON.parse(data);
    }
  }

  const rest = (buffer + decoder.decode()).trim();
  if (rest.startsWith('data:')) {
    const data = rest.slice('data:'.length).trim();
    if (data && data !== '[DONE]') yield JSON.parse(data);
  }
}

function toUsage(raw: unknown): UsageMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  const input = typeof raw.prompt_tokens === 'number' ? raw.prompt_tokens : 0;
  const output = typeof raw.completion_tokens === 'number' ? raw.completion_tokens : 0;
  const total = typeof raw.total_tokens === 'number' ? raw.total_tokens : input + output;
  return { inputTokens: input, outputTokens: output, totalTokens: total };
}

/**
 * Convert one completion chunk payload to a StreamChunk.
 * Payloads with nothing to report are dropped.
 */
export function toStreamChunk(payload: unknown, status = 200): StreamChunk | undefined {
  if (!isRecord(payload)) return undefined;
  if (payload.error !== undefined && payload.error !== null) {
    throw new BackendError(status, JSON.stringify(payload));
  }

  let content = '';
  let done = false;
  const choice: unknown = Array.isArray(payload.choices) ? payload.choices[0] : undefined;
  if (isRecord(choice)) {
    if (isRecord(choice.delta) && typeof choice.delta.content === 'string') {
      content = choice.delta.content;
    }
    done = typeof choice.finish_reason === 'string' && choice.finish_reason.length > 0;
  }
  const usage = toUsage(payload.usage);

  if (!content && !done && !usage) return undefined;
  const chunk: StreamChunk = { content };
  if (done) chunk.done = true;
  if (usage) chunk.usage = usage;
  return chunk;
}

async function* readBody(body: NonNullable<Response['body']>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

// ============================================================================
// Stall deadline
// ============================================================================

/**
 * Re-yield a stream, failing with StreamStalledError when no item arrives
 * within timeoutMs. The controller (if any) is aborted with the same error so
 * the underlying request is torn down.
 */
export async function* withStallTimeout<T>(
  source: AsyncIterable<T>,
  timeoutMs: number,
  controller?: AbortController,
): AsyncGenerator<T> {
  if (timeoutMs <= 0) {
    yield* source;
    return;
  }

  const iterator = source[Symbol.asyncIterator]();
  let stalled = false;
  try {
    for (;;) {
      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          stalled = true;
          const error = new StreamStalledError(timeoutMs);
          controller?.abort(error);
          reject(error);
        }, timeoutMs);
      });

      let result: IteratorResult<T>;
      try {
        result = await Promise.race([iterator.next(), deadline]);
      } finally {
        clearTimeout(timer);
      }
      if (result.done) return;
      yield result.value;
    }
  } finally {
    // a stalled iterator is still awaiting its pending next(); the abort closes it
    if (!stalled) await iterator.return?.();
  }
}

// ============================================================================
// Backend
// ============================================================================

export interface HttpBackendOptions {
  fetch?: typeof fetch;
}

export class HttpChatBackend implements ChatBackend {
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpBackendOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Stream a completion for the given history
   */
  async *stream({ config, messages, signal }: StreamRequest): AsyncGenerator<StreamChunk> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (config.apiKey) {
      headers.Authorization = `Bearer ${config.apiKey}`;
    }

    const body: Record<string, unknown> = {
      model: config.modelName,
      messages,
      temperature: config.temperature,
      stream: true,
      stream_options: { include_usage: true },
    };
    if (config.numCtx) {
      // Ollama reads its context window from options
      body.options = { num_ctx: config.numCtx };
    }

    const response = await this.fetchImpl(chatCompletionsUrl(config), {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      throw new BackendError(response.status, await response.text());
    }
    if (!response.body) {
      throw new BackendError(response.status, 'Empty response body');
    }

    for await (const payload of parseSseStream(readBody(response.body))) {
      const chunk = toStreamChunk(payload, response.status);
      if (chunk) yield chunk;
    }
  }
}

/**
 * Run a stream to completion and return the concatenated content
 */
export async function collectContent(stream: AsyncIterable<StreamChunk>): Promise<string> {
  let content = '';
  for await (const chunk of stream) {
    content += chunk.content;
  }
  return content;
}
