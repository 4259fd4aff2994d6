/**
 * Chat Infrastructure Package
 *
 * Sessions, prompts and the manager that owns them. UI implementations
 * subscribe to sessions and listen to `manager.notifications`.
 *
 * Example usage:
 * ```typescript
 * import { ChatManager, MemoryEntityStore } from './chat/index.js';
 * import { HttpChatBackend } from './core/llm.js';
 *
 * const manager = new ChatManager({
 *   sessionStore: new MemoryEntityStore(),
 *   promptStore: new MemoryEntityStore(),
 *   backend: new HttpChatBackend(),
 *   settings: { noSaveChat: false, autoNameSession: false, streamTimeoutMs: 120_000 },
 * });
 * await manager.init();
 *
 * const session = manager.newSession({
 *   name: 'My Chat',
 *   llmConfig: { provider: 'ollama', modelName: 'llama3.2', temperature: 0.5 },
 * });
 * manager.notifications.on('sessions:changed', () => console.log('sessions changed'));
 * await session.send('Hello!');
 * ```
 */

export * from './types.js';
export * from './changes.js';
export * from './events.js';
export * from './message.js';
export * from './container.js';
export * from './session.js';
export * from './prompt.js';
export * from './storage.js';
export * from './manager.js';
export * from './cli.js';
export { generateSessionName } from './session-name.js';

// Re-export core pieces for convenience
export { EventNode, HandlerTable, settled } from '../core/node.js';
export type { ChatBackend, LlmConfig, LlmProvider, StreamChunk } from '../core/types.js';
