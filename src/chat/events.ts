/**
 * Chat events
 *
 * Events carry identifiers only. Listeners look the entities up and decide
 * how to present them.
 */

import { defineEvent } from '../core/events.js';
import type { LlmConfig } from '../core/types.js';
import type { ChangeField } from './changes.js';

// ============================================================================
// Message events
// ============================================================================

export class ChatMessageUpdated extends defineEvent('ChatMessageUpdated') {
  constructor(
    readonly parentId: string,
    readonly messageId: string,
    readonly isFinal: boolean = false,
  ) {
    super();
  }
}

export class ChatMessageDeleted extends defineEvent('ChatMessageDeleted') {
  constructor(
    readonly parentId: string,
    readonly messageId: string,
  ) {
    super();
  }
}

// ============================================================================
// Session events
// ============================================================================

export class SessionUpdated extends defineEvent('SessionUpdated') {
  constructor(
    readonly sessionId: string,
    readonly changed: readonly ChangeField[],
  ) {
    super();
  }
}

export class SessionDeleteRequested extends defineEvent('SessionDeleteRequested') {
  constructor(readonly sessionId: string) {
    super();
  }
}

export class SessionAutoNameRequested extends defineEvent('SessionAutoNameRequested') {
  constructor(
    readonly sessionId: string,
    readonly llmConfig: LlmConfig,
    readonly context: string,
  ) {
    super();
  }
}

// Sent to subscribers only
export class ChatGenerationAborted extends defineEvent('ChatGenerationAborted', { bubble: false }) {
  constructor(readonly sessionId: string) {
    super();
  }
}

// ============================================================================
// Prompt events
// ============================================================================

export class PromptUpdated extends defineEvent('PromptUpdated') {
  constructor(
    readonly promptId: string,
    readonly changed: readonly ChangeField[],
  ) {
    super();
  }
}

export class PromptDeleteRequested extends defineEvent('PromptDeleteRequested') {
  constructor(readonly promptId: string) {
    super();
  }
}

// ============================================================================
// Manager events
// ============================================================================

export class SessionListChanged extends defineEvent('SessionListChanged') {}

export class PromptListChanged extends defineEvent('PromptListChanged') {}

export class PromptListLoaded extends defineEvent('PromptListLoaded') {}
