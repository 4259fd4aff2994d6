/**
 * Core types for loomchat
 * Shared by the event runtime, the LLM client and the chat engine.
 */

// Message roles in conversation
export type MessageRole = 'system' | 'user' | 'assistant';

// Tool call payload attached to a message
export interface ToolCall {
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
}

// Supported LLM providers
export type LlmProvider = 'ollama' | 'openai' | 'llamacpp' | 'groq' | 'anthropic' | 'google';

export const LLM_PROVIDERS: readonly LlmProvider[] = [
  'ollama',
  'openai',
  'llamacpp',
  'groq',
  'anthropic',
  'google',
];

// LLM configuration carried by a session
export interface LlmConfig {
  provider: LlmProvider;
  modelName: string;
  temperature: number;
  numCtx?: number;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

// Content part of a multimodal history entry
export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

// One entry of the history sent to the backend
export interface HistoryMessage {
  role: MessageRole;
  content: string | ContentPart[];
}

export interface UsageMetadata {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

// Native statistics some servers report on their last chunk
export interface ResponseMetadata {
  model?: string;
  createdAt?: string;
  totalDuration?: number;
  loadDuration?: number;
  promptEvalCount?: number;
  promptEvalDuration?: number;
  evalCount?: number;
  evalDuration?: number;
}

// Incremental chunk yielded by a streaming call
export interface StreamChunk {
  content: string;
  done?: boolean;
  usage?: UsageMetadata;
  response?: ResponseMetadata;
}

export interface StreamRequest {
  config: LlmConfig;
  messages: HistoryMessage[];
  signal?: AbortSignal;
}

/**
 * Streaming backend call. The returned iterable is single-consume;
 * breaking out of iteration closes the underlying call.
 */
export interface ChatBackend {
  stream(request: StreamRequest): AsyncIterable<StreamChunk>;
}

// Statistics snapshot of the last generation
export interface TokenStats {
  model: string;
  createdAt: Date;
  totalDuration: number;
  loadDuration: number;
  promptEvalCount: number;
  promptEvalDuration: number;
  evalCount: number;
  evalDuration: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  timeTilFirstToken: number;
}
