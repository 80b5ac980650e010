/**
 * Gateway Channel
 *
 * Channel for HTTP clients. Outbound messages are buffered per conversation
 * and drained by polling GET /api/conversations/:id/outbox.
 */

import * as path from 'path';
import { nanoid } from 'nanoid';
import type { Channel, ChannelTag, MediaKind, MediaPayload } from '@tunedrop/core';

export type OutboundMessage =
  | { id: string; type: 'text'; text: string; timestamp: number }
  | {
      id: string;
      type: 'media';
      kind: MediaKind;
      /** Remote URL or a /media/ path served by the gateway */
      url?: string;
      /** Base64 body for in-memory media */
      data?: string;
      mime?: string;
      card?: { type: string; id: string };
      filename?: string;
      timestamp: number;
    }
  | { id: string; type: 'retract'; target: string; timestamp: number };

/** Messages cap per conversation; the oldest are dropped first */
const MAX_PENDING = 200;

export class GatewayOutbox {
  private pending = new Map<string, OutboundMessage[]>();

  push(conversationId: string, message: OutboundMessage): void {
    const queue = this.pending.get(conversationId) ?? [];
    queue.push(message);
    if (queue.length > MAX_PENDING) {
      queue.shift();
    }
    this.pending.set(conversationId, queue);
  }

  /** Remove and return everything queued for the conversation */
  drain(conversationId: string): OutboundMessage[] {
    const queue = this.pending.get(conversationId) ?? [];
    this.pending.delete(conversationId);
    return queue;
  }

  /**
   * Drop a message that has not been drained yet; otherwise queue a
   * retract notice for the client
   */
  retract(conversationId: string, messageId: string): void {
    const queue = this.pending.get(conversationId) ?? [];
    const index = queue.findIndex(message => message.id === messageId);
    if (index !== -1) {
      queue.splice(index, 1);
      return;
    }
    this.push(conversationId, { id: nanoid(), type: 'retract', target: messageId, timestamp: Date.now() });
  }

  size(conversationId: string): number {
    return this.pending.get(conversationId)?.length ?? 0;
  }
}

export interface GatewayChannelOptions {
  conversationId: string;
  outbox: GatewayOutbox;
  tags: ReadonlySet<ChannelTag>;
  /** Directory whose files are exposed under mediaPrefix */
  mediaDir: string;
  mediaPrefix?: string;
  isPrivate?: boolean;
}

export class GatewayChannel implements Channel {
  readonly kind = 'gateway';
  readonly tags: ReadonlySet<ChannelTag>;

  constructor(private options: GatewayChannelOptions) {
    this.tags = options.tags;
  }

  isPrivate(): boolean {
    return this.options.isPrivate ?? false;
  }

  destinationId(): string {
    return this.options.conversationId;
  }

  async sendText(text: string): Promise<string> {
    const id = nanoid();
    this.options.outbox.push(this.options.conversationId, { id, type: 'text', text, timestamp: Date.now() });
    return id;
  }

  async sendMedia(kind: MediaKind, payload: MediaPayload, filename?: string): Promise<string> {
    const id = nanoid();
    const base = { id, type: 'media' as const, kind, filename, timestamp: Date.now() };

    switch (payload.type) {
      case 'url':
        this.options.outbox.push(this.options.conversationId, { ...base, url: payload.url });
        break;
      case 'file':
        this.options.outbox.push(this.options.conversationId, { ...base, url: this.mediaUrl(payload.path) });
        break;
      case 'bytes':
        this.options.outbox.push(this.options.conversationId, {
          ...base,
          data: payload.data.toString('base64'),
          mime: payload.mime
        });
        break;
      case 'card':
        this.options.outbox.push(this.options.conversationId, {
          ...base,
          card: { type: payload.cardType, id: payload.id }
        });
        break;
    }
    return id;
  }

  async retract(messageId: string): Promise<void> {
    this.options.outbox.retract(this.options.conversationId, messageId);
  }

  private mediaUrl(filePath: string): string {
    const resolved = path.resolve(filePath);
    if (path.dirname(resolved) !== path.resolve(this.options.mediaDir)) {
      throw new Error(`Cannot serve files outside the media directory: ${path.basename(filePath)}`);
    }
    return `${this.options.mediaPrefix ?? '/media'}/${encodeURIComponent(path.basename(resolved))}`;
  }
}
