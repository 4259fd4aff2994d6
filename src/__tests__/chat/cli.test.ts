import { PassThrough, Writable } from 'stream';
import { describe, expect, it } from 'vitest';
import { ChatCLI, parseCommand } from '../../chat/cli.js';
import { ChatManager } from '../../chat/manager.js';
import { MemoryEntityStore } from '../../chat/storage.js';
import { loadSettings } from '../../core/config.js';
import { settled } from '../../core/node.js';
import { replying } from '../helpers.js';

describe('parseCommand', () => {
  it('splits the command name from its argument', () => {
    expect(parseCommand('/rename  Trip plans ')).toEqual({ name: '/rename', arg: 'Trip plans' });
    expect(parseCommand('/HELP')).toEqual({ name: '/help', arg: '' });
  });

  it('returns null for plain text', () => {
    expect(parseCommand('hello /there')).toBeNull();
    expect(parseCommand('   ')).toBeNull();
  });
});

describe('ChatCLI', () => {
  it('prints assistant replies as they stream', async () => {
    const settings = loadSettings({});
    const manager = new ChatManager({
      sessionStore: new MemoryEntityStore(),
      promptStore: new MemoryEntityStore(),
      backend: replying({ content: 'Hi' }, { content: ' there', done: true }),
      settings,
    });
    const written: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        written.push(String(chunk));
        callback();
      },
    });
    const input = new PassThrough();
    const cli = new ChatCLI({ manager, settings, input, output });
    const session = manager.sessions[0];

    await session?.send('Hello');
    await settled();
    input.end();

    expect(manager.sessions).toHaveLength(1);
    expect(session?.name).toBe('New Chat');
    expect(written.join('')).toBe('\n🤖 Hi there');
    expect(cli.id).toBe('chat_cli');
  });
});
