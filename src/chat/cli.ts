/**
 * Interactive Chat CLI
 *
 * A terminal front end over the manager. The CLI subscribes to the current
 * session and prints assistant replies as they stream in.
 */

import * as readline from 'readline';
import { join } from 'path';
import type { ChatSettings } from '../core/config.js';
import { getErrorMessage } from '../core/errors.js';
import { EventNode, HandlerTable, nodeHandlers } from '../core/node.js';
import { ChatGenerationAborted, ChatMessageUpdated } from './events.js';
import type { ChatManager } from './manager.js';
import { ChatMessage } from './message.js';
import type { ChatSession } from './session.js';

const COMMANDS = {
  '/help': 'Show available commands',
  '/new [name]': 'Start a new session',
  '/sessions': 'List saved sessions',
  '/switch <name>': 'Switch to another session',
  '/rename <name>': 'Rename the current session',
  '/model <name>': 'Change the model',
  '/temp <value>': 'Change the temperature',
  '/system [text]': 'Set (or clear) the system prompt',
  '/history': 'Show conversation history',
  '/prompts': 'List prompts',
  '/prompt <name>': 'Load a prompt into the session',
  '/save-prompt [name]': 'Copy the session into a new prompt',
  '/export': 'Export conversation as markdown',
  '/stop': 'Stop the running generation',
  '/delete': 'Delete the current session',
  '/quit': 'Exit the chat',
};

export interface ParsedCommand {
  name: string;
  arg: string;
}

/**
 * Split "/name rest of line" into its parts; null for plain text
 */
export function parseCommand(line: string): ParsedCommand | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) return null;
  const space = trimmed.indexOf(' ');
  if (space < 0) return { name: trimmed.toLowerCase(), arg: '' };
  return { name: trimmed.slice(0, space).toLowerCase(), arg: trimmed.slice(space + 1).trim() };
}

export interface ChatCLIOptions {
  manager: ChatManager;
  settings: ChatSettings;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ChatCLI extends EventNode {
  private readonly manager: ChatManager;
  private readonly settings: ChatSettings;
  private readonly output: NodeJS.WritableStream;
  private readonly rl: readline.Interface;
  private session: ChatSession;
  private isRunning = false;

  // characters already printed per streaming message
  private readonly printed = new Map<string, number>();

  constructor(options: ChatCLIOptions) {
    super('chat_cli');
    this.manager = options.manager;
    this.settings = options.settings;
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      prompt: '👤 > ',
    });
    this.session =
      this.manager.sortedSessions[0] ??
      this.manager.newSession({ name: 'New Chat', llmConfig: this.settings.defaultLlmConfig });
    this.session.addSubscriber(this);
  }

  /**
   * Start interactive chat
   */
  async start(): Promise<void> {
    await this.session.load();
    this.print(`🚀 Chat started in "${this.session.name}" (${this.session.modelName}). Type /help for commands.\n`);

    this.isRunning = true;
    this.rl.prompt();

    this.rl.on('line', (input) => {
      this.handleLine(input).catch((error: unknown) => {
        this.print(`\n❌ Error: ${getErrorMessage(error)}\n`);
      });
    });

    this.rl.on('SIGINT', () => {
      if (this.session.isGenerating) {
        this.session.stopGeneration();
      } else {
        this.exit();
      }
    });

    return new Promise((resolve) => {
      this.rl.on('close', () => {
        this.exit();
        resolve();
      });
    });
  }

  // ========================================================================
  // Streaming output
  // ========================================================================

  /**
   * Print whatever part of an assistant message has not been printed yet
   */
  showMessageUpdate(event: ChatMessageUpdated): void {
    if (event.parentId !== this.session.id) return;
    const message = this.session.getMessage(event.messageId);
    if (!message || message.role !== 'assistant') return;

    const done = this.printed.get(message.id);
    if (done === undefined) {
      this.print('\n🤖 ');
    }
    const from = done ?? 0;
    if (message.content.length > from) {
      this.print(message.content.slice(from));
    }
    this.printed.set(message.id, message.content.length);
  }

  showAborted(): void {
    this.print('\n⏹️  Generation stopped.\n');
  }

  // ========================================================================
  // Input
  // ========================================================================

  private async handleLine(input: string): Promise<void> {
    const command = parseCommand(input);
    if (command) {
      await this.handleCommand(command);
    } else if (input.trim()) {
      await this.handleMessage(input.trim());
    }
    if (this.isRunning && !this.session.isGenerating) {
      this.rl.prompt();
    }
  }

  /**
   * Handle slash commands
   */
  private async handleCommand({ name, arg }: ParsedCommand): Promise<void> {
    switch (name) {
      case '/help':
        this.showHelp();
        break;

      case '/new':
        this.switchTo(this.manager.newSession({ name: arg || 'New Chat', llmConfig: this.settings.defaultLlmConfig }));
        this.print(`🆕 Started "${this.session.name}".\n`);
        break;

      case '/sessions':
        this.showSessions();
        break;

      case '/switch': {
        const target = this.manager.getSessionByName(arg);
        if (!target) {
          this.print(`❓ No session named "${arg}".\n`);
          break;
        }
        this.switchTo(target);
        await this.session.load();
        this.print(`🔀 Switched to "${this.session.name}" (${this.session.length} messages).\n`);
        break;
      }

      case '/rename':
        await this.session.rename(this.manager.mkSessionName(arg, this.session));
        this.print(`✏️  Renamed to "${this.session.name}".\n`);
        break;

      case '/model':
        await this.session.setModelName(arg);
        this.print(`🧠 Model: ${this.session.modelName}\n`);
        break;

      case '/temp': {
        const value = Number(arg);
        if (!arg || Number.isNaN(value)) {
          this.print('❓ Usage: /temp <value>\n');
          break;
        }
        await this.session.setTemperature(value);
        this.print(`🌡️  Temperature: ${this.session.temperature}\n`);
        break;
      }

      case '/system':
        await this.session.setSystemPrompt(arg ? new ChatMessage({ role: 'system', content: arg }) : null);
        this.print(arg ? '📝 System prompt set.\n' : '📝 System prompt cleared.\n');
        break;

      case '/history':
        this.showHistory();
        break;

      case '/prompts':
        this.showPrompts();
        break;

      case '/prompt': {
        const prompt = this.manager.getPromptByName(arg);
        if (!prompt) {
          this.print(`❓ No prompt named "${arg}".\n`);
          break;
        }
        const submit = await this.session.loadPrompt(prompt);
        this.print(`📥 Loaded prompt "${prompt.name}".\n`);
        if (submit) {
          await this.session.send('');
          this.print('\n\n');
        }
        break;
      }

      case '/save-prompt': {
        const prompt = await this.manager.sessionToPrompt(this.session.id, { name: arg || undefined });
        if (prompt) this.print(`💾 Saved prompt "${prompt.name}".\n`);
        break;
      }

      case '/export': {
        const file = join(this.settings.exportDir, `${this.session.name.replace(/[^\w\- ]+/g, '_') || this.session.id}.md`);
        const ok = await this.session.exportAsMarkdown(file);
        this.print(ok ? `📤 Exported to ${file}\n` : '❌ Export failed.\n');
        break;
      }

      case '/stop':
        this.session.stopGeneration();
        break;

      case '/delete': {
        const id = this.session.id;
        this.session.removeSubscriber(this);
        await this.manager.deleteSession(id);
        this.switchTo(this.manager.newSession({ name: 'New Chat', llmConfig: this.settings.defaultLlmConfig }));
        this.print('🗑️  Session deleted.\n');
        break;
      }

      case '/quit':
      case '/exit':
        this.exit();
        break;

      default:
        this.print(`❓ Unknown command: ${name}. Type /help for available commands.\n`);
    }
  }

  /**
   * Handle user message
   */
  private async handleMessage(text: string): Promise<void> {
    if (this.session.isGenerating) {
      this.print('⏳ Still generating, use /stop to interrupt.\n');
      return;
    }
    await this.session.send(text);
    this.print('\n\n');
  }

  private switchTo(session: ChatSession): void {
    if (session === this.session) return;
    this.session.removeSubscriber(this);
    this.session = session;
    this.session.addSubscriber(this);
  }

  // ========================================================================
  // Listings
  // ========================================================================

  private showHelp(): void {
    this.print('\n📖 Available Commands:\n');
    this.print('---------------------\n');
    for (const [cmd, desc] of Object.entries(COMMANDS)) {
      this.print(`  ${cmd.padEnd(20)} ${desc}\n`);
    }
    this.print('\n');
  }

  private showSessions(): void {
    const sessions = this.manager.sortedSessions;
    if (sessions.length === 0) {
      this.print('📭 No sessions yet.\n');
      return;
    }
    for (const session of sessions) {
      const marker = session === this.session ? '*' : ' ';
      this.print(` ${marker} ${session.name} (${session.modelName}, ${session.lastUpdated.toISOString()})\n`);
    }
  }

  private showPrompts(): void {
    const prompts = this.manager.sortedPrompts;
    if (prompts.length === 0) {
      this.print('📭 No prompts yet.\n');
      return;
    }
    for (const prompt of prompts) {
      this.print(`  ${prompt.name}${prompt.description ? ` - ${prompt.description}` : ''}\n`);
    }
  }

  private showHistory(): void {
    if (this.session.length === 0) {
      this.print('📭 No messages yet.\n');
      return;
    }
    this.print('\n📜 Conversation History:\n');
    this.session.messages.forEach((m, i) => {
      const role = m.role === 'user' ? '👤' : m.role === 'assistant' ? '🤖' : '⚙️';
      const preview = m.content.slice(0, 50).replace(/\n/g, ' ');
      this.print(`  ${i + 1}. ${role} ${preview}\n`);
    });
    this.print('\n');
  }

  private print(text: string): void {
    this.output.write(text);
  }

  /**
   * Exit chat
   */
  private exit(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    this.session.stopGeneration();
    this.session.removeSubscriber(this);
    this.print('\n👋 Goodbye!\n');
    this.rl.close();
  }

  protected handlerTable(): HandlerTable<this> {
    return cliHandlers;
  }
}

export const cliHandlers = new HandlerTable<ChatCLI>(nodeHandlers)
  .on(ChatMessageUpdated, (cli, event) => {
    cli.showMessageUpdate(event);
  })
  .on(ChatGenerationAborted, (cli) => {
    cli.showAborted();
  });
