import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConversationHub, type Channel, type ChannelTag, type IncomingMessage } from '@tunedrop/core';
import { COOKIES_MESSAGES, createCookiesCommand, looksLikeCookies } from './cookies';

const COOKIE_TEXT = '# Netscape HTTP Cookie File\n.youtube.com\tTRUE\t/\tTRUE\t0\tPREF\ttest-value\n';

class PrivateChannel implements Channel {
  readonly kind = 'test';
  readonly tags: ReadonlySet<ChannelTag> = new Set();
  readonly texts: string[] = [];

  constructor(private privateChat: boolean) {}

  isPrivate(): boolean {
    return this.privateChat;
  }

  destinationId(): string {
    return 'dm-1';
  }

  async sendText(text: string): Promise<string> {
    this.texts.push(text);
    return String(this.texts.length);
  }

  async sendMedia(): Promise<string> {
    throw new Error('not supported');
  }
}

describe('cookies command', () => {
  let dir: string;
  let hub: ConversationHub;
  let cookiesPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunedrop-cookies-'));
    cookiesPath = path.join(dir, 'data', 'cookies.txt');
    hub = new ConversationHub();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const message = (channel: Channel, text: string, senderId = 'user-1'): IncomingMessage => ({
    conversationId: 'dm-1',
    senderId,
    text,
    channel
  });

  it('only runs in private chats', async () => {
    const channel = new PrivateChannel(false);
    const command = createCookiesCommand({ hub, cookiesPath, timeoutMs: 1000 });

    await command(message(channel, 'cookies'), '');

    expect(channel.texts).toEqual([COOKIES_MESSAGES.privateOnly]);
    expect(hub.activeWaits).toBe(0);
  });

  it('saves the next cookie file from the same sender', async () => {
    const channel = new PrivateChannel(true);
    const command = createCookiesCommand({ hub, cookiesPath, timeoutMs: 1000 });

    const running = command(message(channel, 'cookies'), '');
    await vi.waitFor(() => expect(hub.activeWaits).toBe(1));
    await expect(hub.publish(message(channel, COOKIE_TEXT, 'someone-else'))).resolves.toBe(false);
    await expect(hub.publish(message(channel, 'hello'))).resolves.toBe(false);
    await expect(hub.publish(message(channel, COOKIE_TEXT))).resolves.toBe(true);
    await running;

    expect(fs.readFileSync(cookiesPath, 'utf-8')).toBe(COOKIE_TEXT);
    expect(channel.texts).toEqual([COOKIES_MESSAGES.prompt, COOKIES_MESSAGES.saved]);
  });

  it('can be cancelled', async () => {
    const channel = new PrivateChannel(true);
    const command = createCookiesCommand({ hub, cookiesPath, timeoutMs: 1000 });

    const running = command(message(channel, 'cookies'), '');
    await vi.waitFor(() => expect(hub.activeWaits).toBe(1));
    await expect(hub.publish(message(channel, ' Cancel '))).resolves.toBe(true);
    await running;

    expect(fs.existsSync(cookiesPath)).toBe(false);
    expect(channel.texts).toEqual([COOKIES_MESSAGES.prompt, COOKIES_MESSAGES.cancelled]);
  });

  it('gives up after the timeout', async () => {
    const channel = new PrivateChannel(true);
    const command = createCookiesCommand({ hub, cookiesPath, timeoutMs: 20 });

    await command(message(channel, 'cookies'), '');

    expect(channel.texts).toEqual([COOKIES_MESSAGES.prompt, COOKIES_MESSAGES.timedOut]);
  });

  it('recognizes cookie files', () => {
    expect(looksLikeCookies(COOKIE_TEXT)).toBe(true);
    expect(looksLikeCookies('.youtube.com')).toBe(false);
    expect(looksLikeCookies('x'.repeat(80))).toBe(false);
  });
});
