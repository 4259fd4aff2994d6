/**
 * Persisted document schemas (TypeBox) and their derived types.
 * One document per session or prompt, stored as <id>.json.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { DocumentError } from '../core/errors.js';
import type { LlmConfig } from '../core/types.js';

// =============================================================================
// Messages
// =============================================================================

export const MessageRoleSchema = Type.Union([Type.Literal('system'), Type.Literal('user'), Type.Literal('assistant')]);

export const ToolCallSchema = Type.Object({
  id: Type.Optional(Type.String()),
  name: Type.String(),
  arguments: Type.Record(Type.String(), Type.Unknown()),
});

export const MessageDocumentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  role: MessageRoleSchema,
  content: Type.String(),
  images: Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
  tool_calls: Type.Optional(Type.Union([Type.Array(ToolCallSchema), Type.Null()])),
});
export type MessageDocument = Static<typeof MessageDocumentSchema>;

// =============================================================================
// Containers
// =============================================================================

export const LlmProviderSchema = Type.Union([
  Type.Literal('ollama'),
  Type.Literal('openai'),
  Type.Literal('llamacpp'),
  Type.Literal('groq'),
  Type.Literal('anthropic'),
  Type.Literal('google'),
]);

export const LlmConfigDocumentSchema = Type.Object({
  class_name: Type.Optional(Type.Literal('LlmConfig')),
  provider: LlmProviderSchema,
  model_name: Type.String(),
  temperature: Type.Number(),
  num_ctx: Type.Optional(Type.Union([Type.Integer({ minimum: 1 }), Type.Null()])),
  base_url: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  timeout: Type.Optional(Type.Union([Type.Integer({ minimum: 1 }), Type.Null()])),
});
export type LlmConfigDocument = Static<typeof LlmConfigDocumentSchema>;

export const ContainerDocumentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  last_updated: Type.String(),
  messages: Type.Array(MessageDocumentSchema),
});
export type ContainerDocument = Static<typeof ContainerDocumentSchema>;

export const SessionDocumentSchema = Type.Composite([
  ContainerDocumentSchema,
  Type.Object({
    name_generated: Type.Optional(Type.Boolean()),
    llm_config: LlmConfigDocumentSchema,
  }),
]);
export type SessionDocument = Static<typeof SessionDocumentSchema>;

export const PromptDocumentSchema = Type.Composite([
  ContainerDocumentSchema,
  Type.Object({
    description: Type.Optional(Type.String()),
    submit_on_load: Type.Optional(Type.Boolean()),
    source: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  }),
]);
export type PromptDocument = Static<typeof PromptDocumentSchema>;

// =============================================================================
// Normalization of older documents
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Older files name the message id "message_id"
 */
export function remapLegacyMessage(raw: unknown): unknown {
  if (!isRecord(raw) || !('message_id' in raw)) return raw;
  const { message_id: legacyId, ...rest } = raw;
  return { ...rest, id: legacyId };
}

function normalizeMessages(raw: Record<string, unknown>): Record<string, unknown> {
  const messages = raw.messages ?? [];
  return {
    ...raw,
    messages: Array.isArray(messages) ? messages.map(remapLegacyMessage) : messages,
  };
}

function normalizeProvider(config: unknown): unknown {
  if (!isRecord(config) || typeof config.provider !== 'string') return config;
  return { ...config, provider: config.provider.toLowerCase() };
}

/**
 * Accepts the current layout plus older session files that used
 * session_id/session_name and a bare llm_model_name with options.
 */
export function normalizeSessionDocument(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const doc = normalizeMessages(raw);

  const id = doc.id ?? doc.session_id;
  const name = doc.name ?? doc.session_name;
  let llmConfig = doc.llm_config;
  if (!llmConfig && typeof doc.llm_model_name === 'string') {
    const options = isRecord(doc.options) ? doc.options : {};
    llmConfig = {
      provider: 'ollama',
      model_name: doc.llm_model_name,
      temperature: typeof options.temperature === 'number' ? options.temperature : 0.5,
    };
  }

  const { session_id: _sessionId, session_name: _sessionName, llm_model_name: _model, options: _options, ...rest } = doc;
  return { ...rest, id, name, llm_config: normalizeProvider(llmConfig) };
}

export function normalizePromptDocument(raw: unknown): unknown {
  return isRecord(raw) ? normalizeMessages(raw) : raw;
}

// =============================================================================
// Parsing
// =============================================================================

function validate<T extends TSchema>(schema: T, value: unknown, what: string): Static<T> {
  if (Value.Check(schema, value)) {
    return value;
  }
  const problems = [...Value.Errors(schema, value)].slice(0, 5).map((e) => `${e.path || '/'} ${e.message}`);
  throw new DocumentError(`Invalid ${what} document`, problems);
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DocumentError(`Invalid ${what} document`, [error instanceof Error ? error.message : String(error)]);
  }
}

export function parseSessionDocument(text: string): SessionDocument {
  return validate(SessionDocumentSchema, normalizeSessionDocument(parseJson(text, 'session')), 'session');
}

export function parsePromptDocument(text: string): PromptDocument {
  return validate(PromptDocumentSchema, normalizePromptDocument(parseJson(text, 'prompt')), 'prompt');
}

export function parseMessageDocument(raw: unknown): MessageDocument {
  return validate(MessageDocumentSchema, remapLegacyMessage(raw), 'message');
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Parse a stored timestamp. Values without a zone are UTC.
 */
export function parseTimestamp(value: string): Date {
  const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(value);
  const date = new Date(hasZone ? value : `${value}Z`);
  return Number.isNaN(date.getTime()) ? new Date() : date;
}

export function llmConfigFromDocument(doc: LlmConfigDocument): LlmConfig {
  const config: LlmConfig = {
    provider: doc.provider,
    modelName: doc.model_name,
    temperature: doc.temperature,
  };
  if (doc.num_ctx) config.numCtx = doc.num_ctx;
  if (doc.base_url) config.baseUrl = doc.base_url;
  if (doc.timeout) config.timeoutMs = doc.timeout * 1000;
  return config;
}

// API keys are never written to disk
export function llmConfigToDocument(config: LlmConfig): LlmConfigDocument {
  return {
    class_name: 'LlmConfig',
    provider: config.provider,
    model_name: config.modelName,
    temperature: config.temperature,
    num_ctx: config.numCtx ?? null,
    base_url: config.baseUrl ?? null,
    timeout: config.timeoutMs ? Math.ceil(config.timeoutMs / 1000) : null,
  };
}
