import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ChatMessage, imageToDataUrl, imageTypeOf } from '../../chat/message.js';

describe('imageTypeOf', () => {
  it('reads the type from paths and data urls', () => {
    expect(imageTypeOf('/pics/cat.JPG')).toBe('jpeg');
    expect(imageTypeOf('diagram.png')).toBe('png');
    expect(imageTypeOf('data:image/gif;base64,R0lG')).toBe('gif');
  });

  it('rejects other formats', () => {
    expect(() => imageTypeOf('scan.bmp')).toThrow('Unsupported image type: bmp');
  });
});

describe('ChatMessage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loomchat-message-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('sends plain content when there are no images', async () => {
    const message = new ChatMessage({ role: 'user', content: 'hello' });

    expect(await message.toHistoryEntry()).toEqual({ role: 'user', content: 'hello' });
  });

  it('attaches a data url image as a content part', async () => {
    const message = new ChatMessage({ role: 'user', content: 'what is this?', images: ['data:image/png;base64,AQID'] });

    expect(await message.toHistoryEntry()).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: 'what is this?' },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
      ],
    });
  });

  it('encodes image files from disk', async () => {
    const file = join(dir, 'tiny.png');
    await writeFile(file, Uint8Array.from([1, 2, 3]));
    const message = new ChatMessage({ role: 'user', content: 'look', images: [file, 'ignored.png'] });

    const entry = await message.toHistoryEntry();

    expect(entry.content).toEqual([
      { type: 'text', text: 'look' },
      { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
    ]);
    expect(imageToDataUrl(Uint8Array.from([1, 2, 3]))).toBe('data:image/jpeg;base64,AQID');
  });

  it('replaces the content with the error when an image cannot be read', async () => {
    const message = new ChatMessage({ role: 'user', content: 'look', images: [join(dir, 'missing.jpg')] });

    const entry = await message.toHistoryEntry();

    expect(entry.role).toBe('user');
    expect(typeof entry.content === 'string' && entry.content.includes('ENOENT')).toBe(true);
  });

  it('renders as a markdown section', () => {
    expect(new ChatMessage({ role: 'assistant', content: 'Sure.' }).toString()).toBe('## assistant\n\nSure.\n\n');
  });

  it('clones deeply, keeping or replacing the id', () => {
    const message = new ChatMessage({
      id: 'm1',
      role: 'assistant',
      content: 'x',
      images: ['a.png'],
      toolCalls: [{ name: 'lookup', arguments: { q: 'cats' } }],
    });

    const same = message.clone();
    const fresh = message.clone(true);
    same.images?.push('b.png');
    const firstCall = same.toolCalls?.[0];
    if (firstCall) firstCall.arguments.q = 'dogs';

    expect(same.id).toBe('m1');
    expect(fresh.id).not.toBe('m1');
    expect(message.images).toEqual(['a.png']);
    expect(message.toolCalls).toEqual([{ name: 'lookup', arguments: { q: 'cats' } }]);
    expect(fresh.toDocument()).toEqual({ ...message.toDocument(), id: fresh.id });
  });

  it('serializes to a document', () => {
    const message = ChatMessage.fromDocument({ id: 'm2', role: 'user', content: 'hi', images: null });

    expect(message.toDocument()).toEqual({ id: 'm2', role: 'user', content: 'hi', images: null, tool_calls: null });
  });
});
