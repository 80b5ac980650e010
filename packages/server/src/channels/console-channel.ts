/**
 * Console Channel - a local chat in the terminal
 */

import * as readline from 'readline';
import type { Writable } from 'stream';
import type { Channel, ChannelTag, IncomingMessage, MediaKind, MediaPayload } from '@tunedrop/core';

export interface ConsoleChannelOptions {
  input?: NodeJS.ReadableStream;
  output?: Writable;
  tags?: ReadonlySet<ChannelTag>;
  conversationId?: string;
  userId?: string;
}

export class ConsoleChannel implements Channel {
  readonly kind = 'console';
  readonly tags: ReadonlySet<ChannelTag>;
  private output: Writable;
  private nextId = 1;

  constructor(private options: ConsoleChannelOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.tags = options.tags ?? new Set<ChannelTag>();
  }

  isPrivate(): boolean {
    return true;
  }

  destinationId(): string {
    return this.options.conversationId ?? 'console';
  }

  async sendText(text: string): Promise<string> {
    this.output.write(`${text}\n`);
    return String(this.nextId++);
  }

  async sendMedia(kind: MediaKind, payload: MediaPayload, filename?: string): Promise<string> {
    this.output.write(`[${kind}] ${describePayload(payload)}${filename ? ` (${filename})` : ''}\n`);
    return String(this.nextId++);
  }

  /**
   * Read lines until the input closes, handing each to `onMessage`.
   * Lines are handled concurrently so a reply can reach an open selection.
   */
  listen(onMessage: (message: IncomingMessage) => Promise<unknown>): Promise<void> {
    const rl = readline.createInterface({ input: this.options.input ?? process.stdin, terminal: false });
    const conversationId = this.destinationId();
    const senderId = this.options.userId ?? 'console-user';

    const pending = new Set<Promise<void>>();

    return new Promise<void>((resolve) => {
      rl.on('line', (line) => {
        const text = line.trim();
        if (!text) return;
        const handling = onMessage({ conversationId, senderId, text, channel: this }).then(
          () => undefined,
          (error: unknown) => {
            this.output.write(`error: ${error instanceof Error ? error.message : String(error)}\n`);
          }
        );
        pending.add(handling);
        void handling.finally(() => pending.delete(handling));
      });
      // Resolve once the input is closed and every line has been handled
      rl.on('close', () => {
        void Promise.all([...pending]).then(() => resolve());
      });
    });
  }
}

function describePayload(payload: MediaPayload): string {
  switch (payload.type) {
    case 'url':
      return payload.url;
    case 'file':
      return payload.path;
    case 'bytes':
      return `${payload.mime}, ${payload.data.length} bytes`;
    case 'card':
      return `${payload.cardType}:${payload.id}`;
  }
}
