import { describe, it, expect, vi } from 'vitest';
import {
  DisambiguationManager,
  SELECTION_TIMEOUT_NOTICE,
  parseSelection,
  type DisambiguationOptions,
  type SelectionDispatcher
} from './disambiguation';
import { ConversationHub } from '../services/conversation-hub';
import { ProviderRegistry } from '../registry/provider-registry';
import { FakeChannel, FakeProvider, makeSong } from '../testing/fakes';

function setup(options: Partial<DisambiguationOptions> = {}) {
  const hub = new ConversationHub();
  const registry = new ProviderRegistry();
  const provider = new FakeProvider();
  registry.register(provider);
  registry.addKeyword('play');

  const dispatched: string[] = [];
  const dispatch = vi.fn<SelectionDispatcher>(async ({ song }) => {
    dispatched.push(song.id);
  });
  const manager = new DisambiguationManager(hub, registry, dispatch, {
    timeoutMs: 5000,
    retractList: false,
    ...options
  });
  const channel = new FakeChannel();
  const songs = ['a', 'b', 'c', 'd', 'e'].map(id => makeSong(id));

  const say = (text: string, conversationId = 'conv-1') =>
    hub.publish({ conversationId, senderId: 'user-1', text, channel });

  const open = () => manager.open({ conversationId: 'conv-1', channel, provider, songs, title: '[Fake]' });
  const opened = () => vi.waitFor(() => expect(hub.activeWaits).toBe(1));

  return { hub, manager, channel, provider, dispatch, dispatched, say, open, opened };
}

describe('parseSelection', () => {
  it('accepts an in-range leading number', () => {
    expect(parseSelection('3', 3)).toBe(3);
    expect(parseSelection(' 2 please', 3)).toBe(2);
  });

  it('rejects anything else', () => {
    expect(parseSelection('0', 3)).toBeNull();
    expect(parseSelection('4', 3)).toBeNull();
    expect(parseSelection('two', 3)).toBeNull();
    expect(parseSelection('-1', 3)).toBeNull();
    expect(parseSelection('', 3)).toBeNull();
  });
});

describe('DisambiguationManager', () => {
  it('publishes the list and dispatches the selected song', async () => {
    const { channel, dispatch, open, opened, say, manager } = setup();

    const session = open();
    await opened();
    expect(manager.isOpen('conv-1')).toBe(true);
    await expect(say('3')).resolves.toBe(true);

    await expect(session).resolves.toBe('resolved');
    expect(channel.texts()).toEqual([
      '[Fake]\n1. Song a - Artist\n2. Song b - Artist\n3. Song c - Artist\n4. Song d - Artist\n5. Song e - Artist'
    ]);
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0]?.[0].song.id).toBe('c');
    expect(manager.isOpen('conv-1')).toBe(false);
  });

  it('ignores junk, out-of-range numbers and other conversations', async () => {
    const { dispatched, open, opened, say } = setup();

    const session = open();
    await opened();
    say('hello');
    say('0');
    say('6');
    say('1', 'conv-2');
    say('2');

    await expect(session).resolves.toBe('resolved');
    expect(dispatched).toEqual(['b']);
  });

  it('cancels silently on a new trigger word', async () => {
    const { channel, dispatch, open, opened, say } = setup();

    const session = open();
    await opened();
    await expect(say('play something else')).resolves.toBe(false);

    await expect(session).resolves.toBe('cancelled');
    expect(dispatch).not.toHaveBeenCalled();
    expect(channel.texts()).toHaveLength(1);
  });

  it('supersedes an open session in the same conversation', async () => {
    const { hub, dispatched, open, opened, say } = setup();

    const first = open();
    await opened();
    const second = open();

    await expect(first).resolves.toBe('cancelled');
    await opened();
    expect(hub.activeWaits).toBe(1);
    say('1');

    await expect(second).resolves.toBe('resolved');
    expect(dispatched).toEqual(['a']);
  });

  it('sends the timeout notice when nobody answers', async () => {
    const { channel, dispatch, open } = setup({ timeoutMs: 20 });

    await expect(open()).resolves.toBe('expired');
    expect(channel.texts()[1]).toBe(SELECTION_TIMEOUT_NOTICE);
    expect(channel.retracted).toEqual([]);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('retracts the list when the session ends without a selection', async () => {
    const { channel, open } = setup({ timeoutMs: 20, retractList: true });

    await expect(open()).resolves.toBe('expired');
    expect(channel.retracted).toEqual(['m1']);
  });

  it('keeps the list after a selection', async () => {
    const { channel, open, opened, say } = setup({ retractList: true });

    const session = open();
    await opened();
    say('1');

    await expect(session).resolves.toBe('resolved');
    expect(channel.retracted).toEqual([]);
  });

  it('cancels every session on cancelAll', async () => {
    const { manager, open, opened } = setup();

    const session = open();
    await opened();
    manager.cancelAll();

    await expect(session).resolves.toBe('cancelled');
  });
});
