import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConversationHub } from './conversation-hub';
import { WaitTimeoutError } from '../errors';
import { FakeChannel } from '../testing/fakes';
import type { IncomingMessage } from '../types/index';

function message(text: string, conversationId = 'conv-1'): IncomingMessage {
  return { conversationId, senderId: 'user-1', text, channel: new FakeChannel() };
}

describe('ConversationHub', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers messages of the waited conversation until stopped', async () => {
    const hub = new ConversationHub();
    const seen: string[] = [];

    const waiting = hub.wait('conv-1', (msg, controller) => {
      seen.push(msg.text);
      if (msg.text === 'done') controller.stop();
    }, { timeoutMs: 1000 });

    hub.publish(message('other', 'conv-2'));
    hub.publish(message('hello'));
    hub.publish(message('done'));
    hub.publish(message('late'));

    await waiting;
    expect(seen).toEqual(['hello', 'done']);
    expect(hub.activeWaits).toBe(0);
  });

  it('reports whether a wait consumed the message', async () => {
    const hub = new ConversationHub();
    const waiting = hub.wait('conv-1', (msg, controller) => {
      if (msg.text !== 'mine') return;
      controller.consume();
      controller.stop();
    }, { timeoutMs: 1000 });

    await expect(hub.publish(message('mine', 'conv-2'))).resolves.toBe(false);
    await expect(hub.publish(message('other'))).resolves.toBe(false);
    await expect(hub.publish(message('mine'))).resolves.toBe(true);
    await waiting;
    await expect(hub.publish(message('mine'))).resolves.toBe(false);
  });

  it('rejects with WaitTimeoutError and unsubscribes', async () => {
    vi.useFakeTimers();
    const hub = new ConversationHub();
    const waiting = hub.wait('conv-1', () => undefined, { timeoutMs: 500 });
    const outcome = waiting.catch((error: unknown) => error);

    expect(hub.activeWaits).toBe(1);
    await vi.advanceTimersByTimeAsync(500);

    const error = await outcome;
    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(hub.activeWaits).toBe(0);
  });

  it('resolves when the abort signal fires', async () => {
    const hub = new ConversationHub();
    const abort = new AbortController();
    const waiting = hub.wait('conv-1', () => undefined, { timeoutMs: 1000, signal: abort.signal });

    abort.abort();
    await expect(waiting).resolves.toBeUndefined();
    expect(hub.activeWaits).toBe(0);
  });

  it('resolves immediately for an already aborted signal', async () => {
    const hub = new ConversationHub();
    const abort = new AbortController();
    abort.abort();

    await expect(hub.wait('conv-1', () => undefined, { timeoutMs: 1000, signal: abort.signal })).resolves.toBeUndefined();
    expect(hub.activeWaits).toBe(0);
  });

  it('rejects when the handler throws', async () => {
    const hub = new ConversationHub();
    const waiting = hub.wait('conv-1', () => {
      throw new Error('handler broke');
    }, { timeoutMs: 1000 });

    hub.publish(message('x'));
    await expect(waiting).rejects.toThrow('handler broke');
    expect(hub.activeWaits).toBe(0);
  });

  it('runs async handlers one at a time in arrival order', async () => {
    const hub = new ConversationHub();
    const order: string[] = [];

    const waiting = hub.wait('conv-1', async (msg, controller) => {
      order.push(`start ${msg.text}`);
      await new Promise(resolve => setTimeout(resolve, msg.text === 'a' ? 20 : 0));
      order.push(`end ${msg.text}`);
      if (msg.text === 'b') controller.stop();
    }, { timeoutMs: 1000 });

    hub.publish(message('a'));
    hub.publish(message('b'));
    await waiting;

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });
});
