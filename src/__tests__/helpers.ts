import type { ChatMessageContainer } from '../chat/container.js';
import { ChatSession, type ChatSessionInit } from '../chat/session.js';
import { MemoryEntityStore } from '../chat/storage.js';
import type { SessionDeps, SessionSettings } from '../chat/types.js';
import type { EventClass, NodeEvent } from '../core/events.js';
import { EventNode } from '../core/node.js';
import type { ChatBackend, LlmConfig, StreamChunk, StreamRequest } from '../core/types.js';

export const testLlmConfig: LlmConfig = { provider: 'ollama', modelName: 'llama3.2', temperature: 0.5 };

export const testSettings: SessionSettings = {
  noSaveChat: false,
  autoNameSession: false,
  streamTimeoutMs: 1_000,
};

/**
 * Node that remembers every event delivered to it
 */
export class EventRecorder extends EventNode {
  readonly events: NodeEvent[] = [];

  of<E extends NodeEvent>(type: EventClass<E>): E[] {
    return this.events.filter((event): event is E => event instanceof type);
  }

  protected onEvent(event: NodeEvent): void {
    this.events.push(event);
  }
}

/**
 * Backend whose replies come from a script
 */
export class ScriptedBackend implements ChatBackend {
  readonly requests: StreamRequest[] = [];

  constructor(private readonly script: (request: StreamRequest) => AsyncIterable<StreamChunk>) {}

  stream(request: StreamRequest): AsyncIterable<StreamChunk> {
    this.requests.push(request);
    return this.script(request);
  }
}

export function replying(...chunks: StreamChunk[]): ScriptedBackend {
  return new ScriptedBackend(async function* () {
    for (const chunk of chunks) {
      yield chunk;
    }
  });
}

/**
 * Memory store that counts writes
 */
export class CountingStore extends MemoryEntityStore {
  writes = 0;

  async write(id: string, text: string): Promise<void> {
    this.writes++;
    await super.write(id, text);
  }
}

export interface SessionFixture {
  session: ChatSession;
  store: CountingStore;
}

export function makeSession(
  init: Partial<ChatSessionInit> = {},
  deps: Partial<Omit<SessionDeps, 'store'>> = {},
  store = new CountingStore(),
): SessionFixture {
  const session = new ChatSession(
    { name: 'Chat', messages: [], llmConfig: testLlmConfig, ...init },
    { backend: replying(), settings: testSettings, ...deps, store },
  );
  return { session, store };
}

/** Stored document of a container, parsed */
export function storedDocument(store: MemoryEntityStore, container: ChatMessageContainer): unknown {
  const text = store.documents.get(container.id);
  return text === undefined ? undefined : JSON.parse(text);
}
