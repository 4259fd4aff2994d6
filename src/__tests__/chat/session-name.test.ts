import { describe, expect, it } from 'vitest';
import { SESSION_NAME_MAX_LENGTH, cleanSessionName, generateSessionName } from '../../chat/session-name.js';
import { ScriptedBackend, replying, testLlmConfig } from '../helpers.js';

describe('cleanSessionName', () => {
  it('strips quotes and surrounding whitespace', () => {
    expect(cleanSessionName('  "Green Grass"\n')).toBe('Green Grass');
    expect(cleanSessionName("'Play Game'")).toBe('Play Game');
  });

  it('caps the length', () => {
    const name = cleanSessionName('x'.repeat(80));

    expect(name).toHaveLength(SESSION_NAME_MAX_LENGTH);
  });
});

describe('generateSessionName', () => {
  it('asks the model with the naming instructions first', async () => {
    const backend = replying({ content: 'Tallest ' }, { content: 'Mountain', done: true });

    const name = await generateSessionName(backend, testLlmConfig, 'What is the tallest mountain?');

    expect(name).toBe('Tallest Mountain');
    expect(backend.requests[0]?.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(backend.requests[0]?.messages[1]?.content).toBe('What is the tallest mountain?');
  });

  it('returns null for an empty answer', async () => {
    expect(await generateSessionName(replying({ content: '  ', done: true }), testLlmConfig, 'hi')).toBeNull();
  });

  it('returns null when the call fails', async () => {
    const backend = new ScriptedBackend(async function* () {
      yield { content: 'partial' };
      throw new Error('connection reset');
    });

    expect(await generateSessionName(backend, testLlmConfig, 'hi')).toBeNull();
  });
});
