import { describe, expect, it } from 'vitest';
import {
  llmConfigFromDocument,
  llmConfigToDocument,
  parseMessageDocument,
  parsePromptDocument,
  parseSessionDocument,
  parseTimestamp,
} from '../../chat/schema.js';
import { DocumentError } from '../../core/errors.js';

describe('parseSessionDocument', () => {
  it('reads the current layout', () => {
    const doc = parseSessionDocument(
      JSON.stringify({
        id: 's1',
        name: 'Trip plans',
        last_updated: '2024-03-02T10:00:00Z',
        name_generated: true,
        llm_config: { class_name: 'LlmConfig', provider: 'Ollama', model_name: 'llama3.2', temperature: 0.3 },
        messages: [{ id: 'm1', role: 'user', content: 'hi' }],
      }),
    );

    expect(doc.name).toBe('Trip plans');
    expect(doc.name_generated).toBe(true);
    expect(doc.llm_config.provider).toBe('ollama');
    expect(doc.messages).toEqual([{ id: 'm1', role: 'user', content: 'hi' }]);
  });

  it('upgrades older session files', () => {
    const doc = parseSessionDocument(
      JSON.stringify({
        session_id: 'old-1',
        session_name: 'Old chat',
        llm_model_name: 'mistral',
        options: { temperature: 0.7 },
        last_updated: '2023-11-20T08:15:00',
        messages: [{ message_id: 'm1', role: 'assistant', content: 'hello' }],
      }),
    );

    expect(doc.id).toBe('old-1');
    expect(doc.name).toBe('Old chat');
    expect(doc.llm_config).toEqual({ provider: 'ollama', model_name: 'mistral', temperature: 0.7 });
    expect(doc.messages).toEqual([{ id: 'm1', role: 'assistant', content: 'hello' }]);
  });

  it('defaults the temperature of older files without options', () => {
    const doc = parseSessionDocument(
      JSON.stringify({ session_id: 'old-2', session_name: 'x', llm_model_name: 'm', last_updated: '2023-01-01' }),
    );

    expect(doc.llm_config.temperature).toBe(0.5);
    expect(doc.messages).toEqual([]);
  });

  it('rejects malformed json and invalid documents with DocumentError', () => {
    expect(() => parseSessionDocument('{ not json')).toThrow(DocumentError);
    expect(() => parseSessionDocument(JSON.stringify({ id: 's', name: 'n', messages: [] }))).toThrow(DocumentError);
  });

  it('rejects messages with an unknown role', () => {
    const text = JSON.stringify({
      id: 's',
      name: 'n',
      last_updated: '2024-01-01T00:00:00Z',
      llm_config: { provider: 'ollama', model_name: 'm', temperature: 0.5 },
      messages: [{ id: 'm1', role: 'tool', content: '' }],
    });

    expect(() => parseSessionDocument(text)).toThrow(DocumentError);
  });
});

describe('parsePromptDocument', () => {
  it('reads optional prompt fields', () => {
    const doc = parsePromptDocument(
      JSON.stringify({
        id: 'p1',
        name: 'Reviewer',
        last_updated: '2024-01-01T00:00:00Z',
        description: 'Code review persona',
        submit_on_load: true,
        messages: [{ message_id: 'x', role: 'system', content: 'Review carefully.' }],
      }),
    );

    expect(doc.description).toBe('Code review persona');
    expect(doc.submit_on_load).toBe(true);
    expect(doc.messages[0]?.id).toBe('x');
  });
});

describe('parseMessageDocument', () => {
  it('accepts the legacy id key', () => {
    expect(parseMessageDocument({ message_id: 'm9', role: 'user', content: 'q', images: null })).toEqual({
      id: 'm9',
      role: 'user',
      content: 'q',
      images: null,
    });
  });

  it('reads legacy and current ids identically', () => {
    const legacy = parseMessageDocument({ message_id: 'm1', role: 'assistant', content: 'a', images: ['x.png'] });
    const current = parseMessageDocument({ id: 'm1', role: 'assistant', content: 'a', images: ['x.png'] });

    expect(legacy).toEqual(current);
  });

  it('rejects a missing id', () => {
    expect(() => parseMessageDocument({ role: 'user', content: 'q' })).toThrow(DocumentError);
  });
});

describe('parseTimestamp', () => {
  it('treats values without a zone as UTC', () => {
    expect(parseTimestamp('2024-05-01T10:00:00').toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('keeps explicit offsets', () => {
    expect(parseTimestamp('2024-05-01T12:00:00+02:00').toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('falls back to now for garbage', () => {
    const before = Date.now();
    const parsed = parseTimestamp('yesterday-ish');

    expect(parsed.getTime()).toBeGreaterThanOrEqual(before);
  });
});

describe('llm config documents', () => {
  it('converts timeouts between seconds and milliseconds and omits the api key', () => {
    const doc = llmConfigToDocument({
      provider: 'openai',
      modelName: 'gpt-4o',
      temperature: 1,
      timeoutMs: 1500,
      apiKey: 'test-secret',
    });

    expect(doc).toEqual({
      class_name: 'LlmConfig',
      provider: 'openai',
      model_name: 'gpt-4o',
      temperature: 1,
      num_ctx: null,
      base_url: null,
      timeout: 2,
    });
    expect(llmConfigFromDocument(doc)).toEqual({
      provider: 'openai',
      modelName: 'gpt-4o',
      temperature: 1,
      timeoutMs: 2000,
    });
  });
});
