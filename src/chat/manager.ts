/**
 * Chat Manager
 *
 * Registry of sessions and prompts. Both are mounted under the manager, so
 * every event they raise bubbles here; the manager handles the requests it
 * owns (delete, rename) and forwards everything to its notification emitter,
 * which is what a UI listens to.
 */

import { EventEmitter } from 'events';
import { getErrorMessage } from '../core/errors.js';
import { LogIt, type NodeEvent } from '../core/events.js';
import { EventNode, HandlerTable, nodeHandlers } from '../core/node.js';
import type { LlmConfig } from '../core/types.js';
import {
  PromptDeleteRequested,
  PromptListChanged,
  PromptListLoaded,
  PromptUpdated,
  SessionAutoNameRequested,
  SessionDeleteRequested,
  SessionListChanged,
  SessionUpdated,
} from './events.js';
import { ChatPrompt } from './prompt.js';
import { parsePromptDocument, parseSessionDocument } from './schema.js';
import { ChatSession } from './session.js';
import { generateSessionName } from './session-name.js';
import type { EntityStore } from './storage.js';
import type {
  ChatEventHandler,
  ChatEventName,
  ChatEvents,
  ChatManagerConfig,
  CreateSessionOptions,
  PromptDeps,
  SessionDeps,
  SessionToPromptOptions,
} from './types.js';

/**
 * Typed notification emitter
 */
export class ChatNotifier extends EventEmitter {
  on<T extends ChatEventName>(event: T, handler: ChatEventHandler<T>): this {
    return super.on(event, handler);
  }

  off<T extends ChatEventName>(event: T, handler: ChatEventHandler<T>): this {
    return super.off(event, handler);
  }

  emit<T extends ChatEventName>(event: T, payload: ChatEvents[T]): boolean {
    return super.emit(event, payload);
  }
}

export class ChatManager extends EventNode {
  readonly notifications = new ChatNotifier();

  private readonly idToSession = new Map<string, ChatSession>();
  private readonly idToPrompt = new Map<string, ChatPrompt>();
  private readonly sessionDeps: SessionDeps;
  private readonly promptDeps: PromptDeps;
  private readonly config: ChatManagerConfig;

  constructor(config: ChatManagerConfig) {
    super('chat_manager');
    this.config = config;
    this.sessionDeps = { store: config.sessionStore, backend: config.backend, settings: config.settings };
    this.promptDeps = { store: config.promptStore };
  }

  /**
   * Load session and prompt headers from storage
   */
  async init(): Promise<void> {
    await this.loadSessions();
    await this.loadPrompts();
  }

  // ========================================================================
  // Sessions
  // ========================================================================

  get sessions(): ChatSession[] {
    return [...this.idToSession.values()];
  }

  get validSessions(): ChatSession[] {
    return this.sessions.filter((session) => session.isValid);
  }

  /** Valid sessions, most recently updated first */
  get sortedSessions(): ChatSession[] {
    return this.validSessions.sort((a, b) => b.lastUpdated.getTime() - a.lastUpdated.getTime());
  }

  get sessionIds(): string[] {
    return [...this.idToSession.keys()];
  }

  get sessionNames(): string[] {
    return this.sessions.map((session) => session.name);
  }

  getSession(sessionId: string, subscriber?: EventNode): ChatSession | undefined {
    const session = this.idToSession.get(sessionId);
    if (session && subscriber) {
      session.addSubscriber(subscriber);
    }
    return session;
  }

  getSessionByName(name: string, subscriber?: EventNode): ChatSession | undefined {
    const session = this.sessions.find((s) => s.name === name);
    if (session && subscriber) {
      session.addSubscriber(subscriber);
    }
    return session;
  }

  /**
   * Unique session name: the base name, or the base name plus " N"
   */
  mkSessionName(baseName: string, except?: ChatSession): string {
    const taken = (name: string) => {
      const owner = this.getSessionByName(name);
      return owner !== undefined && owner !== except;
    };
    let name = baseName;
    for (let i = 1; taken(name); i++) {
      name = `${baseName} ${i}`;
    }
    return name;
  }

  newSession({ name, llmConfig, subscriber }: CreateSessionOptions): ChatSession {
    const session = new ChatSession({ name: this.mkSessionName(name), messages: [], llmConfig }, this.sessionDeps);
    this.idToSession.set(session.id, session);
    this.mount(session);
    if (subscriber) {
      session.addSubscriber(subscriber);
    }
    this.notifySessionsChanged();
    return session;
  }

  getOrCreateSession(options: {
    sessionId?: string;
    name?: string;
    llmConfig: LlmConfig;
    subscriber: EventNode;
  }): ChatSession {
    const existing = options.sessionId ? this.getSession(options.sessionId, options.subscriber) : undefined;
    if (existing) return existing;
    return this.newSession({
      name: options.name || 'New Chat',
      llmConfig: options.llmConfig,
      subscriber: options.subscriber,
    });
  }

  /**
   * Remove a session from memory and storage. Unknown ids are ignored.
   */
  async deleteSession(sessionId: string): Promise<void> {
    const session = this.idToSession.get(sessionId);
    if (!session) return;
    session.stopGeneration();
    session.markDeleted();
    this.idToSession.delete(sessionId);
    this.unmount(session);
    await this.removeDocument(this.config.sessionStore, sessionId);
    this.notifySessionsChanged();
  }

  notifySessionsChanged(): void {
    this.emit(new SessionListChanged());
  }

  /**
   * Name a session through the secondary model
   */
  async autoNameSession(sessionId: string, llmConfig: LlmConfig, context: string): Promise<void> {
    const session = this.getSession(sessionId);
    if (!session) return;
    const name = await generateSessionName(this.config.backend, llmConfig, context);
    if (!name) return;
    this.logIt(`Session ${sessionId} auto-named: ${name}`);
    await session.rename(this.mkSessionName(name, session));
  }

  private async loadSessions(): Promise<void> {
    for (const id of await this.config.sessionStore.list()) {
      try {
        const text = await this.config.sessionStore.read(id);
        if (text === undefined) continue;
        const session = ChatSession.fromDocument(parseSessionDocument(text), this.sessionDeps);
        this.idToSession.set(session.id, session);
        this.mount(session);
      } catch (error) {
        this.logIt(`Error loading session ${id}: ${getErrorMessage(error)}`, 'error', true);
      }
    }
  }

  // ========================================================================
  // Prompts
  // ========================================================================

  get prompts(): ChatPrompt[] {
    return [...this.idToPrompt.values()];
  }

  /** Prompts, most recently updated first */
  get sortedPrompts(): ChatPrompt[] {
    return this.prompts.sort((a, b) => b.lastUpdated.getTime() - a.lastUpdated.getTime());
  }

  get promptIds(): string[] {
    return [...this.idToPrompt.keys()];
  }

  get promptNames(): string[] {
    return this.prompts.map((prompt) => prompt.name);
  }

  getPrompt(promptId: string): ChatPrompt | undefined {
    return this.idToPrompt.get(promptId);
  }

  /** Case-insensitive lookup */
  getPromptByName(name: string): ChatPrompt | undefined {
    const wanted = name.trim().toLowerCase();
    return this.prompts.find((prompt) => prompt.name.toLowerCase() === wanted);
  }

  addPrompt(prompt: ChatPrompt): void {
    this.idToPrompt.set(prompt.id, prompt);
    this.mount(prompt);
    this.notifyPromptsChanged();
  }

  async deletePrompt(promptId: string): Promise<void> {
    const prompt = this.idToPrompt.get(promptId);
    if (!prompt) return;
    prompt.markDeleted();
    this.idToPrompt.delete(promptId);
    this.unmount(prompt);
    await this.removeDocument(this.config.promptStore, promptId);
    this.notifyPromptsChanged();
    this.logIt(`Prompt ${prompt.name || prompt.id} deleted`, 'information', true);
  }

  /**
   * Copy a session's messages into a new prompt
   */
  async sessionToPrompt(sessionId: string, options: SessionToPromptOptions = {}): Promise<ChatPrompt | undefined> {
    const session = this.getSession(sessionId);
    if (!session) {
      this.logIt(`Chat session ${sessionId} not found`, 'error', true);
      return undefined;
    }
    await session.load();

    const prompt = new ChatPrompt(
      {
        name: options.name || session.name,
        description: '',
        messages: session.messages.map((m) => m.clone(true)),
        submitOnLoad: options.submitOnLoad ?? false,
        source: 'session',
      },
      this.promptDeps,
    );
    this.addPrompt(prompt);
    await prompt.setDescription('-');
    this.logIt(`Session ${session.name || session.id} copied to prompt`, 'information', true);
    return prompt;
  }

  notifyPromptsChanged(): void {
    this.emit(new PromptListChanged());
  }

  private async loadPrompts(): Promise<void> {
    for (const id of await this.config.promptStore.list()) {
      try {
        const text = await this.config.promptStore.read(id);
        if (text === undefined) continue;
        const prompt = ChatPrompt.fromDocument(parsePromptDocument(text), this.promptDeps);
        this.idToPrompt.set(prompt.id, prompt);
        this.mount(prompt);
      } catch (error) {
        this.logIt(`Error loading prompt ${id}: ${getErrorMessage(error)}`, 'error', true);
      }
    }
    this.emit(new PromptListLoaded());
  }

  // ========================================================================
  // Helpers
  // ========================================================================

  private async removeDocument(store: EntityStore, id: string): Promise<void> {
    try {
      await store.remove(id);
    } catch (error) {
      this.logIt(`Error removing ${id}: ${getErrorMessage(error)}`, 'error', true);
    }
  }

  protected handlerTable(): HandlerTable<this> {
    return managerHandlers;
  }

  protected onEvent(event: NodeEvent): void {
    this.notifications.emit('event', event);
  }
}

const LIST_FIELDS = ['name', 'model', 'temperature'] as const;

export const managerHandlers = new HandlerTable<ChatManager>(nodeHandlers)
  .on(SessionUpdated, (manager, event) => {
    event.stop();
    if (LIST_FIELDS.some((field) => event.changed.includes(field))) {
      manager.notifySessionsChanged();
    }
  })
  .on(SessionAutoNameRequested, (manager, event) => {
    event.stop();
    return manager.autoNameSession(event.sessionId, event.llmConfig, event.context);
  })
  .on(SessionDeleteRequested, (manager, event) => {
    event.stop();
    return manager.deleteSession(event.sessionId);
  })
  .on(PromptUpdated, (manager, event) => {
    event.stop();
    manager.notifyPromptsChanged();
  })
  .on(PromptDeleteRequested, (manager, event) => {
    event.stop();
    return manager.deletePrompt(event.promptId);
  })
  .on(SessionListChanged, (manager) => {
    manager.notifications.emit('sessions:changed', {});
  })
  .on(PromptListChanged, (manager) => {
    manager.notifications.emit('prompts:changed', {});
  })
  .on(PromptListLoaded, (manager) => {
    manager.notifications.emit('prompts:loaded', { count: manager.promptIds.length });
  })
  .on(LogIt, (manager, event) => {
    manager.notifications.emit('log', { message: event.message, severity: event.severity, notify: event.notify });
  });
