/**
 * Destination abstraction. Transports (gateway, console, bot adapters)
 * implement this; the pipeline never looks past it.
 */

/**
 * Capabilities a destination declares. `image` means it displays whatever
 * the configured LyricsRenderer produces; the bundled renderer emits
 * image/svg+xml, which many chat image uploads reject.
 */
export type ChannelTag = 'music-card' | 'voice' | 'binary-attachment' | 'image';

export type MediaKind = 'card' | 'voice' | 'file' | 'image';

export type MediaPayload =
  | { type: 'url'; url: string }
  | { type: 'file'; path: string }
  | { type: 'bytes'; data: Buffer; mime: string }
  | { type: 'card'; cardType: string; id: string };

export interface Channel {
  /** Transport name, for logs */
  readonly kind: string;
  readonly tags: ReadonlySet<ChannelTag>;

  isPrivate(): boolean;
  /** Stable identity used to correlate follow-up messages */
  destinationId(): string;

  /** Resolves with the transport's message id */
  sendText(text: string): Promise<string>;
  sendMedia(kind: MediaKind, payload: MediaPayload, filename?: string): Promise<string>;

  /** Optional: delete a previously sent message */
  retract?(messageId: string): Promise<void>;
}

export interface IncomingMessage {
  conversationId: string;
  senderId: string;
  senderName?: string;
  text: string;
  channel: Channel;
}
