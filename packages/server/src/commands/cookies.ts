/**
 * "cookies" command: the next message in a private chat is stored as the
 * extractor's Netscape cookie file
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  WaitTimeoutError,
  errorMessage,
  log,
  type CommandHandler,
  type ConversationHub
} from '@tunedrop/core';

export const COOKIES_MESSAGES = {
  prompt: 'Send the contents of your cookies.txt (Netscape format) as your next message.\nSend "cancel" to abort.',
  privateOnly: 'Please send this command in a private chat.',
  cancelled: 'Cancelled.',
  saved: 'Cookies saved.',
  failed: 'Could not save cookies.',
  timedOut: 'Cookie upload timed out.'
} as const;

/** Pasted cookie text must at least mention the extractor's site */
export function looksLikeCookies(text: string): boolean {
  return text.length > 50 && text.includes('.youtube.com');
}

export interface CookiesCommandOptions {
  hub: ConversationHub;
  cookiesPath: string;
  timeoutMs: number;
}

export function createCookiesCommand(options: CookiesCommandOptions): CommandHandler {
  const { hub, cookiesPath, timeoutMs } = options;

  return async (message) => {
    const { channel, conversationId, senderId } = message;
    if (!channel.isPrivate()) {
      await channel.sendText(COOKIES_MESSAGES.privateOnly);
      return;
    }

    await channel.sendText(COOKIES_MESSAGES.prompt);

    try {
      await hub.wait(conversationId, async (reply, controller) => {
        if (reply.senderId !== senderId) return;

        if (reply.text.trim().toLowerCase() === 'cancel') {
          controller.consume();
          await reply.channel.sendText(COOKIES_MESSAGES.cancelled);
          controller.stop();
          return;
        }
        if (!looksLikeCookies(reply.text)) return;
        controller.consume();

        try {
          await fs.promises.mkdir(path.dirname(cookiesPath), { recursive: true });
          await fs.promises.writeFile(cookiesPath, reply.text, 'utf-8');
          log.info('Cookies', `Cookie file updated by ${senderId}`);
          await reply.channel.sendText(COOKIES_MESSAGES.saved);
        } catch (error) {
          log.error('Cookies', 'Failed to write cookie file', { error: errorMessage(error) });
          await reply.channel.sendText(COOKIES_MESSAGES.failed);
        }
        controller.stop();
      }, { timeoutMs });
    } catch (error) {
      if (!(error instanceof WaitTimeoutError)) throw error;
      await channel.sendText(COOKIES_MESSAGES.timedOut);
    }
  };
}
