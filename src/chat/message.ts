/**
 * Chat Message - one entry of a conversation, mounted under its container
 */

import { readFile } from 'fs/promises';
import { getErrorMessage } from '../core/errors.js';
import { EventNode } from '../core/node.js';
import type { ContentPart, HistoryMessage, MessageRole, ToolCall } from '../core/types.js';
import { ChatMessageUpdated } from './events.js';
import type { MessageDocument } from './schema.js';

export type ImageType = 'jpeg' | 'png' | 'gif';

export interface ChatMessageInit {
  id?: string;
  role: MessageRole;
  content?: string;
  images?: string[] | null;
  toolCalls?: ToolCall[] | null;
}

/**
 * Image type from a file path or data URL
 */
export function imageTypeOf(image: string): ImageType {
  const ext = image.startsWith('data:')
    ? (image.split(';')[0] ?? '').split('/').pop()
    : image.split('.').pop();
  switch ((ext ?? '').toLowerCase()) {
    case 'jpg':
    case 'jpeg':
      return 'jpeg';
    case 'png':
      return 'png';
    case 'gif':
      return 'gif';
    default:
      throw new Error(`Unsupported image type: ${ext ?? ''}`);
  }
}

export function imageToDataUrl(bytes: Uint8Array, type: ImageType = 'jpeg'): string {
  return `data:image/${type};base64,${Buffer.from(bytes).toString('base64')}`;
}

async function resolveImage(image: string): Promise<string> {
  if (image.startsWith('data:')) return image;
  const type = imageTypeOf(image);
  return imageToDataUrl(await readFile(image), type);
}

export class ChatMessage extends EventNode {
  role: MessageRole;
  content: string;
  images: string[] | null;
  toolCalls: ToolCall[] | null;

  constructor(init: ChatMessageInit) {
    super(init.id);
    this.role = init.role;
    this.content = init.content ?? '';
    this.images = init.images ?? null;
    this.toolCalls = init.toolCalls ?? null;
  }

  static fromDocument(doc: MessageDocument): ChatMessage {
    return new ChatMessage({
      id: doc.id,
      role: doc.role,
      content: doc.content,
      images: doc.images ? [...doc.images] : null,
      toolCalls: doc.tool_calls ?? null,
    });
  }

  appendContent(delta: string): void {
    this.content += delta;
  }

  /**
   * Tell the container (and whoever listens above it) this message changed
   */
  notifyChanges(isFinal = false): void {
    const parent = this.parent;
    if (!parent) return;
    this.emit(new ChatMessageUpdated(parent.id, this.id, isFinal));
  }

  toDocument(): MessageDocument {
    return {
      id: this.id,
      role: this.role,
      content: this.content,
      images: this.images,
      tool_calls: this.toolCalls,
    };
  }

  /**
   * History entry for the backend. The first image rides along as an extra content part.
   */
  async toHistoryEntry(): Promise<HistoryMessage> {
    const image = this.images?.[0];
    if (!image) {
      return { role: this.role, content: this.content };
    }
    try {
      const parts: ContentPart[] = [
        { type: 'text', text: this.content },
        { type: 'image_url', image_url: { url: await resolveImage(image) } },
      ];
      return { role: this.role, content: parts };
    } catch (error) {
      return { role: this.role, content: getErrorMessage(error) };
    }
  }

  clone(newId = false): ChatMessage {
    return new ChatMessage({
      id: newId ? undefined : this.id,
      role: this.role,
      content: this.content,
      images: this.images ? [...this.images] : null,
      toolCalls: this.toolCalls ? this.toolCalls.map((call) => ({ ...call, arguments: { ...call.arguments } })) : null,
    });
  }

  toString(): string {
    return `## ${this.role}\n\n${this.content}\n\n`;
  }
}
