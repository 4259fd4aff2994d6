/**
 * Chat Prompt - reusable message template
 *
 * Prompts are listed from their headers; their messages are read from
 * storage only when load() is called.
 */

import { PROMPT_CHANGE_FIELDS, type ChangeSet } from './changes.js';
import { ChatMessageContainer, type ContainerInit } from './container.js';
import { PromptDeleteRequested, PromptUpdated } from './events.js';
import { ChatMessage } from './message.js';
import { parsePromptDocument, parseTimestamp, type MessageDocument, type PromptDocument } from './schema.js';
import type { PromptDeps } from './types.js';

export interface ChatPromptInit extends Omit<ContainerInit, 'store'> {
  name: string;
  description?: string;
  submitOnLoad?: boolean;
  /** Where the prompt came from, e.g. "session" */
  source?: string | null;
}

export class ChatPrompt extends ChatMessageContainer {
  source: string | null;

  private promptDescription: string;
  private submit: boolean;

  constructor(init: ChatPromptInit, deps: PromptDeps) {
    super({ ...init, store: deps.store });
    this.promptDescription = init.description ?? '';
    this.submit = init.submitOnLoad ?? false;
    this.source = init.source ?? null;
  }

  get description(): string {
    return this.promptDescription;
  }

  setDescription(description: string): Promise<boolean> {
    const trimmed = description.trim();
    if (this.promptDescription === trimmed) return Promise.resolve(false);
    this.promptDescription = trimmed;
    this.changes.add('description');
    return this.save();
  }

  get submitOnLoad(): boolean {
    return this.submit;
  }

  setSubmitOnLoad(submitOnLoad: boolean): Promise<boolean> {
    if (this.submit === submitOnLoad) return Promise.resolve(false);
    this.submit = submitOnLoad;
    this.changes.add('submit_on_load');
    return this.save();
  }

  get isValid(): boolean {
    return this.name.length > 0;
  }

  protected shouldPersist(): boolean {
    return this.isValid && this.length > 0;
  }

  protected notifyChanged(changed: ChangeSet): void {
    this.emit(new PromptUpdated(this.id, changed.toArray(PROMPT_CHANGE_FIELDS)));
  }

  protected readMessages(text: string): MessageDocument[] {
    return parsePromptDocument(text).messages;
  }

  /**
   * Ask the manager to remove this prompt
   */
  delete(): void {
    this.emit(new PromptDeleteRequested(this.id));
  }

  /**
   * Detached deep copy, same id unless newId. Edits to the copy never touch
   * this prompt, so an editor can work on a clone and discard it on cancel.
   */
  clone(newId = false): ChatPrompt {
    return new ChatPrompt(
      {
        id: newId ? undefined : this.id,
        name: this.name,
        description: this.promptDescription,
        messages: this.loaded ? this.messages.map((m) => m.clone()) : undefined,
        submitOnLoad: this.submit,
        lastUpdated: this.lastUpdated,
        source: this.source,
      },
      { store: this.store },
    );
  }

  /**
   * Start an empty prompt under a new id
   */
  reset(name = 'My Prompt'): void {
    this.resetState(name);
    this.promptDescription = '';
    this.source = '';
  }

  toDocument(): PromptDocument {
    return {
      ...super.toDocument(),
      description: this.promptDescription,
      submit_on_load: this.submit,
      source: this.source,
    };
  }

  static fromDocument(doc: PromptDocument, deps: PromptDeps, loadMessages = false): ChatPrompt {
    return new ChatPrompt(
      {
        id: doc.id,
        name: doc.name,
        lastUpdated: parseTimestamp(doc.last_updated),
        description: doc.description ?? '',
        messages: loadMessages ? doc.messages.map((m) => ChatMessage.fromDocument(m)) : undefined,
        submitOnLoad: doc.submit_on_load ?? false,
        source: doc.source ?? null,
      },
      deps,
    );
  }
}
