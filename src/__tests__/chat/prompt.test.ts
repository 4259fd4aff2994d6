import { describe, expect, it } from 'vitest';
import { PromptDeleteRequested, PromptUpdated } from '../../chat/events.js';
import { ChatMessage } from '../../chat/message.js';
import { ChatPrompt } from '../../chat/prompt.js';
import { parsePromptDocument } from '../../chat/schema.js';
import { settled } from '../../core/node.js';
import { CountingStore, EventRecorder, storedDocument } from '../helpers.js';

function makePrompt(messages: ChatMessage[] | undefined): { prompt: ChatPrompt; store: CountingStore } {
  const store = new CountingStore();
  const prompt = new ChatPrompt({ id: 'p1', name: 'Reviewer', description: 'Reviews code', messages }, { store });
  return { prompt, store };
}

describe('ChatPrompt', () => {
  it('reports prompt fields to its parent', async () => {
    const parent = new EventRecorder();
    const { prompt } = makePrompt([]);
    parent.mount(prompt);

    await prompt.setDescription('  Strict reviewer ');
    await prompt.setSubmitOnLoad(true);
    expect(await prompt.setSubmitOnLoad(true)).toBe(false);
    await settled();

    expect(prompt.description).toBe('Strict reviewer');
    expect(parent.of(PromptUpdated).map((e) => e.changed)).toEqual([['description'], ['submit_on_load']]);
  });

  it('only writes prompts that have messages', async () => {
    const { prompt, store } = makePrompt([]);

    await prompt.setDescription('changed');
    expect(store.writes).toBe(0);

    await prompt.addMessage(new ChatMessage({ role: 'system', content: 'Review carefully.' }));
    expect(store.writes).toBe(1);
    expect(storedDocument(store, prompt)).toMatchObject({
      id: 'p1',
      name: 'Reviewer',
      description: 'changed',
      submit_on_load: false,
      source: null,
      messages: [{ role: 'system', content: 'Review carefully.' }],
    });
  });

  it('clones into a detached copy', async () => {
    const { prompt, store } = makePrompt([new ChatMessage({ id: 'm1', role: 'user', content: 'original' })]);

    const copy = prompt.clone();
    const fresh = prompt.clone(true);
    const edited = copy.getMessage('m1');
    if (edited) edited.content = 'edited';
    await copy.rename('Copy');

    expect(copy.id).toBe('p1');
    expect(fresh.id).not.toBe('p1');
    expect(prompt.getMessage('m1')?.content).toBe('original');
    expect(prompt.name).toBe('Reviewer');
    expect(copy.description).toBe('Reviews code');
    expect(store.writes).toBe(1);
  });

  it('clones an unloaded prompt without messages', () => {
    const { prompt } = makePrompt(undefined);

    const copy = prompt.clone();

    expect(copy.isLoaded).toBe(false);
    expect(copy.length).toBe(0);
  });

  it('rebuilds from its stored document', async () => {
    const { prompt, store } = makePrompt([new ChatMessage({ role: 'user', content: 'Summarize this' })]);
    await prompt.setSubmitOnLoad(true);
    const text = store.documents.get('p1') ?? '';

    const restored = ChatPrompt.fromDocument(parsePromptDocument(text), { store });
    expect(restored.isLoaded).toBe(false);
    await restored.load();

    expect(restored.name).toBe('Reviewer');
    expect(restored.description).toBe('Reviews code');
    expect(restored.submitOnLoad).toBe(true);
    expect(restored.messages.map((m) => m.content)).toEqual(['Summarize this']);
  });

  it('asks its parent to delete it', async () => {
    const parent = new EventRecorder();
    const { prompt } = makePrompt([]);
    parent.mount(prompt);

    prompt.delete();
    await settled();

    expect(parent.of(PromptDeleteRequested).map((e) => e.promptId)).toEqual(['p1']);
  });

  it('resets to an empty prompt under a new id', () => {
    const { prompt } = makePrompt([new ChatMessage({ role: 'user', content: 'x' })]);

    prompt.reset();

    expect(prompt.id).not.toBe('p1');
    expect(prompt.name).toBe('My Prompt');
    expect(prompt.description).toBe('');
    expect(prompt.length).toBe(0);
  });
});
