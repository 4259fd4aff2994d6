/**
 * Chat Session - Manages a single conversation
 *
 * A session owns its messages and model settings, drives one streamed
 * generation at a time, and fans notifications out to its subscribers
 * (typically whatever view currently shows it) in addition to bubbling them
 * to the manager.
 */

import { InvariantError, extractErrorMessage } from '../core/errors.js';
import type { NodeEvent } from '../core/events.js';
import { withStallTimeout } from '../core/llm.js';
import { HandlerTable, nodeHandlers, type EventNode } from '../core/node.js';
import type { ChatBackend, HistoryMessage, LlmConfig, LlmProvider, StreamChunk, TokenStats } from '../core/types.js';
import { SESSION_CHANGE_FIELDS, type ChangeSet } from './changes.js';
import { ChatMessageContainer, type ContainerInit } from './container.js';
import {
  ChatGenerationAborted,
  ChatMessageDeleted,
  ChatMessageUpdated,
  SessionAutoNameRequested,
  SessionDeleteRequested,
  SessionUpdated,
} from './events.js';
import { ChatMessage } from './message.js';
import type { ChatPrompt } from './prompt.js';
import {
  llmConfigFromDocument,
  llmConfigToDocument,
  parseSessionDocument,
  parseTimestamp,
  type MessageDocument,
  type SessionDocument,
} from './schema.js';
import type { SessionDeps, SessionSettings } from './types.js';

// Model names a picker reports when nothing is selected
const PLACEHOLDER_MODEL_NAMES = ['None', 'Select.BLANK'];

export const ABORTED_SUFFIX = '\n\nAborted...';

export interface ChatSessionInit extends Omit<ContainerInit, 'store'> {
  name: string;
  llmConfig: LlmConfig;
}

export class ChatSession extends ChatMessageContainer {
  /** Set once the session has been (or is being) named by a model */
  nameGenerated = false;

  private readonly llm: LlmConfig;
  private readonly backend: ChatBackend;
  private readonly settings: SessionSettings;
  private readonly subscribers = new Set<EventNode>();
  private abortRequested = false;
  private generating = false;
  private streamStats: TokenStats | undefined = undefined;

  constructor(init: ChatSessionInit, deps: SessionDeps) {
    super({ ...init, store: deps.store });
    this.llm = { ...init.llmConfig };
    this.backend = deps.backend;
    this.settings = deps.settings;
  }

  // ========================================================================
  // Model settings
  // ========================================================================

  get llmConfig(): Readonly<LlmConfig> {
    return this.llm;
  }

  get provider(): LlmProvider {
    return this.llm.provider;
  }

  get modelName(): string {
    return this.llm.modelName;
  }

  get temperature(): number {
    return this.llm.temperature;
  }

  get numCtx(): number | undefined {
    return this.llm.numCtx;
  }

  setProvider(provider: LlmProvider): Promise<boolean> {
    if (this.llm.provider === provider) return Promise.resolve(false);
    this.llm.provider = provider;
    this.streamStats = undefined;
    this.changes.add('provider', 'model');
    return this.save();
  }

  setModelName(modelName: string): Promise<boolean> {
    const trimmed = modelName.trim();
    if (this.llm.modelName === trimmed) return Promise.resolve(false);
    this.llm.modelName = trimmed;
    this.streamStats = undefined;
    this.changes.add('model');
    return this.save();
  }

  setTemperature(temperature: number): Promise<boolean> {
    if (this.llm.temperature === temperature) return Promise.resolve(false);
    this.llm.temperature = temperature;
    this.changes.add('temperature');
    return this.save();
  }

  setNumCtx(numCtx: number | undefined): Promise<boolean> {
    if (this.llm.numCtx === numCtx) return Promise.resolve(false);
    this.llm.numCtx = numCtx;
    this.changes.add('num_ctx');
    return this.save();
  }

  /** Statistics of the last generation, if the backend reported any */
  get stats(): TokenStats | undefined {
    return this.streamStats;
  }

  get isGenerating(): boolean {
    return this.generating;
  }

  get abortPending(): boolean {
    return this.abortRequested;
  }

  /**
   * A session needs a name and a real model to be persisted
   */
  get isValid(): boolean {
    const model = this.llm.modelName.trim();
    return this.name.length > 0 && model.length > 0 && !PLACEHOLDER_MODEL_NAMES.includes(model);
  }

  // ========================================================================
  // Generation
  // ========================================================================

  /**
   * Append the user's text (if any) and stream the assistant reply.
   * Resolves true on completion, false when aborted or failed.
   */
  async send(text: string): Promise<boolean> {
    if (this.generating) {
      throw new InvariantError(`Session ${this.id} is already generating`);
    }
    this.generating = true;
    this.abortRequested = false;
    try {
      return await this.generate(text);
    } finally {
      this.generating = false;
      this.abortRequested = false;
    }
  }

  /**
   * Ask the running generation to stop at the next chunk
   */
  stopGeneration(): void {
    if (this.generating) {
      this.abortRequested = true;
    }
  }

  private async generate(text: string): Promise<boolean> {
    await this.load();
    let reply: ChatMessage | undefined;
    let aborted = false;

    try {
      if (text) {
        const question = new ChatMessage({ role: 'user', content: text });
        const saved = this.addMessage(question);
        this.notifyMessage(question, true);
        await saved;
      }

      const history = await Promise.all(this.messages.map((m) => m.toHistoryEntry()));

      reply = new ChatMessage({ role: 'assistant' });
      const saved = this.addMessage(reply);
      this.notifyMessage(reply);
      await saved;

      aborted = await this.streamInto(reply, history);
    } catch (error) {
      if (error instanceof InvariantError) throw error;

      const message = extractErrorMessage(error);
      this.logIt(`Error generating message: ${message}`, 'error', true);
      if (reply) {
        reply.content = `${reply.content}\n\n${message}`.trim();
        this.changes.add('messages');
        await this.save();
        this.notifyMessage(reply, true);
      }
      return false;
    }

    this.changes.add('messages');
    await this.save();

    if (!aborted) {
      this.requestAutoName();
    }
    return !aborted;
  }

  /**
   * Consume the backend stream into the reply. Returns true when aborted.
   */
  private async streamInto(reply: ChatMessage, history: HistoryMessage[]): Promise<boolean> {
    const controller = new AbortController();
    const started = Date.now();
    let firstTokenAt = 0;
    let received = 0;
    let finalSent = false;

    try {
      const stream = withStallTimeout(
        this.backend.stream({ config: { ...this.llm }, messages: history, signal: controller.signal }),
        this.llm.timeoutMs ?? this.settings.streamTimeoutMs,
        controller,
      );

      for await (const chunk of stream) {
        const elapsed = (Date.now() - started) / 1000;
        if (chunk.content) {
          if (received === 0) firstTokenAt = elapsed;
          received++;
          reply.appendContent(chunk.content);
        }

        if (this.abortRequested) {
          reply.appendContent(ABORTED_SUFFIX);
          this.notifySubscribers(new ChatGenerationAborted(this.id));
          return true;
        }

        this.recordStats(chunk, elapsed, firstTokenAt);
        finalSent = chunk.done === true || !chunk.content;
        this.notifyMessage(reply, finalSent);
      }
      if (!finalSent) {
        this.notifyMessage(reply, true);
      }
      return false;
    } finally {
      controller.abort();
    }
  }

  private recordStats(chunk: StreamChunk, elapsed: number, firstTokenAt: number): void {
    const usage = chunk.usage;
    if (usage) {
      this.streamStats = {
        model: this.llm.modelName,
        createdAt: new Date(),
        totalDuration: Math.trunc(elapsed),
        loadDuration: 0,
        promptEvalCount: usage.inputTokens,
        promptEvalDuration: 0,
        evalCount: usage.outputTokens,
        evalDuration: Math.trunc(elapsed - firstTokenAt),
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        totalTokens: usage.totalTokens,
        timeTilFirstToken: Math.trunc(firstTokenAt),
      };
    }

    const response = chunk.response;
    if (response?.model) {
      this.streamStats = {
        model: response.model,
        createdAt: response.createdAt ? new Date(response.createdAt) : new Date(),
        totalDuration: response.totalDuration ?? 0,
        loadDuration: response.loadDuration ?? 0,
        promptEvalCount: response.promptEvalCount ?? 0,
        promptEvalDuration: response.promptEvalDuration ?? 0,
        evalCount: response.evalCount ?? 0,
        // nanoseconds
        evalDuration: Math.trunc((response.evalDuration ?? 0) / 1_000_000_000),
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        timeTilFirstToken: Math.trunc(firstTokenAt),
      };
    }
  }

  private requestAutoName(): void {
    const config = this.settings.autoNameLlmConfig;
    if (!this.settings.autoNameSession || !config || this.nameGenerated) return;
    this.nameGenerated = true;

    const question = this.firstUserMessage;
    const answer = this.firstAssistantMessage;
    if (!question?.content || !answer?.content) return;

    this.logIt('Auto naming session', 'information', true);
    const context = `#USER\n${question.content}\n\n#ASSISTANT\n${answer.content}`;
    this.emit(new SessionAutoNameRequested(this.id, { ...config }, context));
  }

  // ========================================================================
  // Subscribers
  // ========================================================================

  addSubscriber(node: EventNode): void {
    this.subscribers.add(node);
  }

  /**
   * Detach a subscriber. An invalid session nobody watches deletes itself.
   */
  removeSubscriber(node: EventNode): void {
    this.subscribers.delete(node);
    if (this.subscribers.size === 0 && !this.isValid) {
      this.delete();
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  notifySubscribers(event: NodeEvent): void {
    for (const subscriber of this.subscribers) {
      subscriber.emit(event);
    }
  }

  /**
   * Ask the manager to remove this session
   */
  delete(): void {
    this.emit(new SessionDeleteRequested(this.id));
  }

  private notifyMessage(message: ChatMessage, isFinal = false): void {
    this.notifySubscribers(new ChatMessageUpdated(this.id, message.id, isFinal));
    message.notifyChanges(isFinal);
  }

  // ========================================================================
  // Persistence
  // ========================================================================

  protected notifyChanged(changed: ChangeSet): void {
    const system = this.systemPrompt;
    if (changed.has('system_prompt') && system) {
      this.notifySubscribers(new ChatMessageUpdated(this.id, system.id));
    }
    const fields = changed.toArray(SESSION_CHANGE_FIELDS);
    this.notifySubscribers(new SessionUpdated(this.id, fields));
    this.emit(new SessionUpdated(this.id, fields));
  }

  protected shouldPersist(): boolean {
    return !this.settings.noSaveChat && this.isValid && this.length > 0;
  }

  protected readMessages(text: string): MessageDocument[] {
    return parseSessionDocument(text).messages;
  }

  /**
   * Copy a prompt's messages in as one change.
   * Returns whether the prompt asks to be submitted right away.
   */
  async loadPrompt(prompt: ChatPrompt): Promise<boolean> {
    await Promise.all([this.load(), prompt.load()]);
    await this.batch(async () => {
      for (const message of prompt.messages) {
        const copy = message.clone(true);
        if (copy.role === 'system') {
          await this.setSystemPrompt(copy);
        } else {
          await this.addMessage(copy);
        }
      }
    });
    return prompt.submitOnLoad;
  }

  /**
   * Start a fresh, empty conversation under a new id
   */
  reset(name = 'My Chat'): void {
    this.resetState(name);
    this.nameGenerated = false;
    this.streamStats = undefined;
    this.abortRequested = false;
  }

  toDocument(): SessionDocument {
    return {
      ...super.toDocument(),
      name_generated: this.nameGenerated,
      llm_config: llmConfigToDocument(this.llm),
    };
  }

  /**
   * Rebuild a stored session. Messages stay on disk until load() unless asked for.
   */
  static fromDocument(doc: SessionDocument, deps: SessionDeps, loadMessages = false): ChatSession {
    const session = new ChatSession(
      {
        id: doc.id,
        name: doc.name,
        lastUpdated: parseTimestamp(doc.last_updated),
        messages: loadMessages ? doc.messages.map((m) => ChatMessage.fromDocument(m)) : undefined,
        llmConfig: llmConfigFromDocument(doc.llm_config),
      },
      deps,
    );
    // stored sessions are never auto-named again
    session.nameGenerated = true;
    return session;
  }

  protected handlerTable(): HandlerTable<this> {
    return sessionHandlers;
  }
}

export const sessionHandlers = new HandlerTable<ChatSession>(nodeHandlers).on(ChatMessageDeleted, (session, event) => {
  session.notifySubscribers(new ChatMessageDeleted(event.parentId, event.messageId));
});
