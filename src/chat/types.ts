/**
 * Chat Infrastructure Types
 *
 * Collaborators injected into sessions, prompts and the manager, and the
 * typed notifications the manager hands to a UI.
 */

import type { NodeEvent, Severity } from '../core/events.js';
import type { EventNode } from '../core/node.js';
import type { ChatBackend, LlmConfig } from '../core/types.js';
import type { EntityStore } from './storage.js';

// ============================================================================
// Collaborators
// ============================================================================

export interface SessionSettings {
  /** Keep sessions in memory only */
  noSaveChat: boolean;
  autoNameSession: boolean;
  autoNameLlmConfig?: LlmConfig;
  /** Milliseconds without a chunk before a stream is torn down; 0 disables */
  streamTimeoutMs: number;
}

export interface SessionDeps {
  store: EntityStore;
  backend: ChatBackend;
  settings: SessionSettings;
}

export interface PromptDeps {
  store: EntityStore;
}

export interface ChatManagerConfig {
  sessionStore: EntityStore;
  promptStore: EntityStore;
  backend: ChatBackend;
  settings: SessionSettings;
}

export interface CreateSessionOptions {
  name: string;
  llmConfig: LlmConfig;
  subscriber?: EventNode;
}

export interface SessionToPromptOptions {
  submitOnLoad?: boolean;
  /** Defaults to the session name */
  name?: string;
}

// ============================================================================
// Notifications
// ============================================================================

export interface ChatEvents {
  // Every event that bubbles up to the manager
  event: NodeEvent;

  'sessions:changed': {};
  'prompts:changed': {};
  'prompts:loaded': { count: number };

  log: { message: string; severity: Severity; notify: boolean };
}

export type ChatEventName = keyof ChatEvents;
export type ChatEventHandler<T extends ChatEventName> = (payload: ChatEvents[T]) => void;
