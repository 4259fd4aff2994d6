/**
 * Message Container - ordered, id-indexed messages with dirty tracking
 *
 * Base of sessions and prompts. Every tracked mutation records a change field
 * and calls save(); save() is a no-op while batching or clean, so a batch()
 * around several edits produces a single write and a single notification.
 */

import { writeFile } from 'fs/promises';
import { InvariantError, getErrorMessage } from '../core/errors.js';
import { EventNode, newNodeId } from '../core/node.js';
import { ChangeSet, type ChangeField } from './changes.js';
import { ChatMessageDeleted } from './events.js';
import { ChatMessage } from './message.js';
import type { ContainerDocument, MessageDocument } from './schema.js';
import type { EntityStore } from './storage.js';

export interface ContainerInit {
  id?: string;
  name?: string;
  /** Messages already in memory; leave undefined to hydrate later with load() */
  messages?: ChatMessage[];
  lastUpdated?: Date;
  store: EntityStore;
}

/**
 * Throw unless ids are unique and a system message, if any, comes first
 */
function checkMessageOrder(messages: readonly ChatMessage[], owner: string): void {
  const seen = new Set<string>();
  messages.forEach((message, index) => {
    if (seen.has(message.id)) {
      throw new InvariantError(`Duplicate message id ${message.id} in ${owner}`);
    }
    seen.add(message.id);
    if (message.role === 'system' && index !== 0) {
      throw new InvariantError(`A system message can only be the first message of ${owner}`);
    }
  });
}

export abstract class ChatMessageContainer extends EventNode implements Iterable<ChatMessage> {
  lastUpdated: Date;

  protected readonly store: EntityStore;
  protected readonly changes = new ChangeSet();
  protected loaded: boolean;

  private containerName: string;
  private messageList: ChatMessage[] = [];
  private readonly idToMessage = new Map<string, ChatMessage>();
  private batchDepth = 0;
  private deleted = false;
  private loading: Promise<boolean> | undefined = undefined;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(init: ContainerInit) {
    super(init.id);
    this.store = init.store;
    this.containerName = init.name ?? 'Messages';
    this.batchDepth++;
    for (const message of init.messages ?? []) {
      this.insertMessage(message, false);
    }
    this.batchDepth--;
    this.changes.clear();
    this.lastUpdated = init.lastUpdated ?? new Date();
    this.loaded = init.messages !== undefined;
  }

  // ========================================================================
  // State
  // ========================================================================

  get name(): string {
    return this.containerName;
  }

  get messages(): readonly ChatMessage[] {
    return this.messageList;
  }

  get length(): number {
    return this.messageList.length;
  }

  [Symbol.iterator](): Iterator<ChatMessage> {
    return this.messageList[Symbol.iterator]();
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get batching(): boolean {
    return this.batchDepth > 0;
  }

  get isDeleted(): boolean {
    return this.deleted;
  }

  /**
   * Stop all further writes; the owner is removing the stored document
   */
  markDeleted(): void {
    this.deleted = true;
  }

  get isDirty(): boolean {
    return !this.changes.isEmpty;
  }

  get pendingChanges(): ChangeField[] {
    return this.changes.toArray();
  }

  clearChanges(): void {
    this.changes.clear();
  }

  markDirty(field: ChangeField = 'messages'): void {
    this.changes.add(field);
  }

  abstract get isValid(): boolean;

  // ========================================================================
  // Messages
  // ========================================================================

  /**
   * Add a message at the tail (or head) and save
   */
  addMessage(message: ChatMessage, prepend = false): Promise<boolean> {
    this.insertMessage(message, prepend);
    return this.save();
  }

  getMessage(id: string): ChatMessage | undefined {
    return this.idToMessage.get(id);
  }

  hasMessage(message: ChatMessage): boolean {
    return this.idToMessage.has(message.id);
  }

  /**
   * Replace the message with the given id in place, or append when absent
   */
  setMessage(id: string, value: ChatMessage): Promise<boolean> {
    const index = this.messageList.findIndex((m) => m.id === id);
    if (index < 0) {
      return this.addMessage(value);
    }
    if (value.id !== id && this.idToMessage.has(value.id)) {
      throw new InvariantError(`Duplicate message id ${value.id} in ${this.id}`);
    }
    if (value.role === 'system' && index !== 0) {
      throw new InvariantError(`A system message can only be the first message of ${this.id}`);
    }
    const previous = this.messageList[index];
    if (previous && previous !== value) {
      this.unmount(previous);
      this.mount(value);
    }
    this.idToMessage.delete(id);
    this.idToMessage.set(value.id, value);
    this.messageList[index] = value;
    this.lastUpdated = new Date();
    this.changes.add('messages');
    if (index === 0 && (value.role === 'system' || previous?.role === 'system')) {
      this.changes.add('system_prompt');
    }
    return this.save();
  }

  /**
   * Remove a message. Unknown ids are ignored.
   */
  deleteMessage(id: string): Promise<boolean> {
    const message = this.idToMessage.get(id);
    if (!message) {
      return Promise.resolve(false);
    }
    this.emit(new ChatMessageDeleted(this.id, message.id));
    this.removeMessage(message);
    if (message.role === 'system') {
      this.changes.add('system_prompt');
    }
    return this.save();
  }

  get systemPrompt(): ChatMessage | undefined {
    const first = this.messageList[0];
    return first?.role === 'system' ? first : undefined;
  }

  /**
   * Set, update or (with null) remove the system prompt at index 0
   */
  async setSystemPrompt(value: ChatMessage | null): Promise<boolean> {
    const current = this.systemPrompt;
    if (!value) {
      if (!current) return false;
      this.removeMessage(current);
      this.changes.add('system_prompt');
      const saved = this.save();
      this.emit(new ChatMessageDeleted(this.id, current.id));
      return saved;
    }

    if (value.role !== 'system') {
      throw new InvariantError(`System prompt must have the system role, got ${value.role}`);
    }
    if (current) {
      if (current.content === value.content) return false;
      current.content = value.content;
      this.lastUpdated = new Date();
      this.changes.add('messages', 'system_prompt');
      return this.save();
    }
    return this.addMessage(value, true);
  }

  get firstUserMessage(): ChatMessage | undefined {
    return this.messageList.find((m) => m.role === 'user');
  }

  /** The last message, when it came from the user */
  get lastUserMessage(): ChatMessage | undefined {
    const last = this.messageList[this.messageList.length - 1];
    return last?.role === 'user' ? last : undefined;
  }

  get firstAssistantMessage(): ChatMessage | undefined {
    return this.messageList.find((m) => m.role === 'assistant');
  }

  /** Total characters of message content */
  get contextLength(): number {
    return this.messageList.reduce((total, m) => total + m.content.length, 0);
  }

  clearMessages(): void {
    for (const message of this.messageList) {
      this.unmount(message);
    }
    this.messageList = [];
    this.idToMessage.clear();
    this.changes.add('messages');
  }

  async rename(name: string): Promise<boolean> {
    const trimmed = name.trim();
    if (this.containerName === trimmed) return false;
    this.containerName = trimmed;
    this.changes.add('name');
    return this.save();
  }

  // ========================================================================
  // Batching & persistence
  // ========================================================================

  /**
   * Run fn with per-mutation saving suspended, then save once
   */
  async batch(fn: () => void | Promise<void>): Promise<boolean> {
    this.batchDepth++;
    try {
      await fn();
    } catch (error) {
      this.batchDepth--;
      if (this.batchDepth === 0) await this.save();
      throw error;
    }
    this.batchDepth--;
    return this.batchDepth === 0 ? this.save() : false;
  }

  /**
   * Commit pending changes: notify listeners, then write when valid
   */
  async save(): Promise<boolean> {
    if (this.batching || this.deleted) return false;
    // never overwrite a stored document that could not be read
    if (!this.loaded && !(await this.load())) return false;
    if (!this.isDirty) return false;

    this.lastUpdated = new Date();
    const changed = this.changes.clone();
    this.clearChanges();
    this.notifyChanged(changed);

    if (!this.shouldPersist()) return false;
    return this.persist();
  }

  /**
   * Hydrate messages from storage (once)
   */
  load(): Promise<boolean> {
    if (this.loaded) return Promise.resolve(true);
    this.loading ??= this.hydrate().finally(() => {
      this.loading = undefined;
    });
    return this.loading;
  }

  protected abstract notifyChanged(changed: ChangeSet): void;

  protected abstract readMessages(text: string): MessageDocument[];

  protected shouldPersist(): boolean {
    return this.isValid;
  }

  private async hydrate(): Promise<boolean> {
    this.batchDepth++;
    const pending = this.changes.clone();
    const lastUpdated = this.lastUpdated;
    try {
      const text = await this.store.read(this.id);
      if (text !== undefined) {
        const docs = this.readMessages(text);
        const next = docs.map((doc) => ChatMessage.fromDocument(doc));
        // messages added before the first load go after the stored ones
        for (const message of this.messageList) {
          if (docs.some((doc) => doc.id === message.id)) continue;
          const stored = next[0];
          if (message.role !== 'system') {
            next.push(message);
          } else if (stored?.role === 'system') {
            stored.content = message.content;
          } else {
            next.unshift(message);
          }
        }
        checkMessageOrder(next, this.id);
        this.clearMessages();
        for (const message of next) {
          this.insertMessage(message, false);
        }
      }
      this.loaded = true;
      return true;
    } catch (error) {
      this.logIt(`Error loading ${this.name}: ${getErrorMessage(error)}`, 'error', true);
      return false;
    } finally {
      this.batchDepth--;
      this.lastUpdated = lastUpdated;
      this.changes.clear();
      this.changes.merge(pending);
    }
  }

  private persist(): Promise<boolean> {
    const id = this.id;
    const text = this.toJson();
    const write = this.writeChain.then(async () => {
      if (this.deleted) return false;
      await this.store.write(id, text);
      return true;
    });
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write.catch((error: unknown) => {
      this.logIt(`Error saving ${this.name}: ${getErrorMessage(error)}`, 'error', true);
      return false;
    });
  }

  // ========================================================================
  // Serialization
  // ========================================================================

  toDocument(): ContainerDocument {
    return {
      id: this.id,
      name: this.containerName,
      last_updated: this.lastUpdated.toISOString(),
      messages: this.messageList.map((m) => m.toDocument()),
    };
  }

  toJson(): string {
    return JSON.stringify(this.toDocument(), null, 2);
  }

  toMarkdown(): string {
    return `# ${this.name}\n\n${this.messageList.map((m) => m.toString()).join('')}`;
  }

  /**
   * Write the conversation as markdown. Returns false on I/O failure.
   */
  async exportAsMarkdown(filePath: string): Promise<boolean> {
    try {
      await writeFile(filePath, this.toMarkdown(), 'utf-8');
      return true;
    } catch (error) {
      this.logIt(`Error exporting ${this.name}: ${getErrorMessage(error)}`, 'error');
      return false;
    }
  }

  // ========================================================================
  // Internals
  // ========================================================================

  /**
   * Start over as an empty, unsaved container with a fresh id
   */
  protected resetState(name: string): void {
    for (const message of this.messageList) {
      this.unmount(message);
    }
    this.messageList = [];
    this.idToMessage.clear();
    this.assignId(newNodeId());
    this.containerName = name;
    this.lastUpdated = new Date();
    this.changes.clear();
    this.loaded = false;
  }

  protected insertMessage(message: ChatMessage, prepend: boolean): void {
    if (this.idToMessage.has(message.id)) {
      throw new InvariantError(`Duplicate message id ${message.id} in ${this.id}`);
    }
    const hasSystem = this.systemPrompt !== undefined;
    if (message.role === 'system' && (hasSystem || (!prepend && this.messageList.length > 0))) {
      throw new InvariantError(`A system message can only be the first message of ${this.id}`);
    }
    if (prepend && hasSystem) {
      throw new InvariantError(`Cannot insert ahead of the system message of ${this.id}`);
    }

    this.mount(message);
    if (prepend) {
      this.messageList.unshift(message);
    } else {
      this.messageList.push(message);
    }
    this.idToMessage.set(message.id, message);
    this.lastUpdated = new Date();
    this.changes.add('messages');
    if (message.role === 'system') {
      this.changes.add('system_prompt');
    }
  }

  private removeMessage(message: ChatMessage): void {
    const index = this.messageList.indexOf(message);
    if (index >= 0) {
      this.messageList.splice(index, 1);
    }
    this.idToMessage.delete(message.id);
    this.unmount(message);
    this.lastUpdated = new Date();
    this.changes.add('messages');
  }
}
