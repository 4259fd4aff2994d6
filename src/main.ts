#!/usr/bin/env node
/**
 * loomchat - Entry point
 *
 * Starts the interactive chat CLI over the session manager.
 */

import 'dotenv/config';
import { ensureDataDirs, loadSettings } from './core/config.js';
import { getErrorMessage } from './core/errors.js';
import { HttpChatBackend } from './core/llm.js';
import { settled } from './core/node.js';
import { ChatCLI, ChatManager, FileEntityStore } from './chat/index.js';

async function main(): Promise<void> {
  const settings = loadSettings();
  await ensureDataDirs(settings);

  const manager = new ChatManager({
    sessionStore: new FileEntityStore(settings.chatDir),
    promptStore: new FileEntityStore(settings.promptDir),
    backend: new HttpChatBackend(),
    settings,
  });
  await manager.init();

  const cli = new ChatCLI({ manager, settings });
  await cli.start();

  // let pending saves and deletions finish
  await settled();
}

main().catch((error: unknown) => {
  console.error('❌ Failed to start:', getErrorMessage(error));
  console.error('\nPlease check your environment variables (see .env.example).');
  process.exit(1);
});
