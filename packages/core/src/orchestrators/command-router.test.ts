import { describe, it, expect, vi } from 'vitest';
import { CommandRouter, MESSAGES } from './command-router';
import { DeliveryEngine, type DeliveryEngineOptions } from './delivery-engine';
import { ConversationHub } from '../services/conversation-hub';
import { ProviderRegistry } from '../registry/provider-registry';
import {
  FakeChannel,
  FakeFetcher,
  FakeProvider,
  FakeRenderer,
  MemoryLibrary,
  makeSong,
  type FakeProviderOptions
} from '../testing/fakes';
import type { IncomingMessage } from '../types/index';

const THREE_SONGS = [makeSong('a'), makeSong('b'), makeSong('c')];

function setup(
  options: {
    providers?: FakeProviderOptions[];
    engine?: Partial<DeliveryEngineOptions>;
  } = {}
) {
  const hub = new ConversationHub();
  const registry = new ProviderRegistry();
  const providers = (options.providers ?? [{ songs: THREE_SONGS }]).map(o => new FakeProvider(o));
  for (const provider of providers) registry.register(provider);

  const engine = new DeliveryEngine(new FakeFetcher(), new FakeRenderer(), {
    modes: ['text'],
    comments: false,
    lyrics: false,
    ...options.engine
  });
  const library = new MemoryLibrary();
  const router = new CommandRouter(registry, hub, engine, {
    defaultProvider: 'fake',
    searchLimit: 5,
    autoPlaySingle: true,
    disambiguation: { timeoutMs: 5000, retractList: false }
  }, library);
  const channel = new FakeChannel();

  const send = (text: string, senderName?: string) => {
    const message: IncomingMessage = { conversationId: 'conv-1', senderId: 'user-1', senderName, text, channel };
    return router.handle(message);
  };

  return { hub, registry, providers, router, library, channel, send };
}

describe('CommandRouter', () => {
  it('lists several results and delivers the one picked', async () => {
    const { hub, channel, send, router } = setup({
      providers: [{ songs: THREE_SONGS, lyrics: [{ time: 0, text: 'la' }] }],
      engine: { lyrics: true }
    });

    const handling = send('play love');
    await vi.waitFor(() => expect(hub.activeWaits).toBe(1));
    await expect(send('2')).resolves.toBe(false);

    await expect(handling).resolves.toBe(true);
    await router.settle();
    expect(channel.texts()).toEqual([
      '[Fake]\n1. Song a - Artist\n2. Song b - Artist\n3. Song c - Artist',
      '🎶 Song b - Artist\nListen: https://cdn.example/b.mp3'
    ]);
    expect(channel.kinds()).toEqual(['text', 'text', 'image']);
    expect(channel.texts()).not.toContain(MESSAGES.deliveryFailed);
  });

  it('plays the indexed result directly', async () => {
    const { channel, send, providers } = setup();

    await expect(send('play love 3')).resolves.toBe(true);

    expect(providers[0]?.searches).toEqual([{ keyword: 'love', limit: 5, extra: 'play' }]);
    expect(channel.texts()).toEqual(['🎶 Song c - Artist\nListen: https://cdn.example/c.mp3']);
  });

  it('plays a single result without asking', async () => {
    const { channel, send } = setup({ providers: [{ songs: [makeSong('only')] }] });

    await send('play love');

    expect(channel.texts()).toEqual(['🎶 Song only - Artist\nListen: https://cdn.example/only.mp3']);
  });

  it('reports an empty search', async () => {
    const { channel, send } = setup({ providers: [{ songs: [] }] });

    await send('play  nothing here ');

    expect(channel.texts()).toEqual(['No results for "nothing here".']);
  });

  it('treats a lone trailing number as an index without a query', async () => {
    const { channel, send, providers } = setup();

    await expect(send('play 3')).resolves.toBe(true);

    expect(channel.texts()).toEqual([MESSAGES.noSongName]);
    expect(providers[0]?.searches).toEqual([]);
  });

  it('ignores a trigger without arguments and unknown words', async () => {
    const { channel, send } = setup();

    await expect(send('play')).resolves.toBe(false);
    await expect(send('hello world')).resolves.toBe(false);
    await expect(send('   ')).resolves.toBe(false);
    expect(channel.sent).toEqual([]);
  });

  it('routes provider keywords and passes the word along', async () => {
    const { send, providers } = setup({
      providers: [
        { songs: THREE_SONGS },
        { name: 'netease', keywords: ['netease', 'ncm'], songs: THREE_SONGS }
      ]
    });

    await send('NCM love 1');

    expect(providers[0]?.searches).toEqual([]);
    expect(providers[1]?.searches).toEqual([{ keyword: 'love', limit: 5, extra: 'ncm' }]);
  });

  it('tells the user when every delivery mode failed', async () => {
    const { channel, send } = setup({ engine: { modes: ['card'] } });

    await send('play love 1');

    expect(channel.texts()).toEqual([MESSAGES.deliveryFailed]);
  });

  it('runs registered commands before keyword routing', async () => {
    const { send, router } = setup();
    const handler = vi.fn(async () => {
      throw new Error('broken command');
    });
    router.register('Fake', handler);

    await expect(send('fake love')).resolves.toBe(true);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('does not route a message taken by an open wait', async () => {
    const { hub, router, send, providers, channel } = setup({
      providers: [
        { songs: THREE_SONGS },
        { name: 'youtube', keywords: ['youtube'], songs: THREE_SONGS }
      ]
    });
    const pasted: string[] = [];
    router.register('upload', async message => {
      await hub.wait(message.conversationId, (reply, controller) => {
        if (!reply.text.startsWith('.youtube.com')) return;
        pasted.push(reply.text);
        controller.consume();
        controller.stop();
      }, { timeoutMs: 5000 });
    });
    const cookieLine = '.youtube.com\tTRUE\t/\tTRUE\t0\tSID\ttest-secret';

    const upload = send('upload');
    await vi.waitFor(() => expect(hub.activeWaits).toBe(1));
    await expect(send(cookieLine)).resolves.toBe(false);
    await upload;

    expect(pasted).toEqual([cookieLine]);
    expect(providers[1]?.searches).toEqual([]);
    expect(channel.sent).toEqual([]);
  });

  describe('lyrics', () => {
    it('sends the lyrics image of the best match', async () => {
      const { channel, send, providers } = setup({ providers: [{ songs: THREE_SONGS, lyrics: [{ time: 0, text: 'la' }] }] });

      await send('lyrics love');

      expect(providers[0]?.searches).toEqual([{ keyword: 'love', limit: 1, extra: undefined }]);
      expect(channel.kinds()).toEqual(['image']);
    });

    it('reports missing lyrics and missing songs', async () => {
      const { channel, send } = setup();
      await send('lyrics love');
      await send('lyrics');
      expect(channel.texts()).toEqual([MESSAGES.noLyrics, MESSAGES.noSongName]);

      const empty = setup({ providers: [{ songs: [] }] });
      await empty.send('lyrics love');
      expect(empty.channel.texts()).toEqual([MESSAGES.noMatch]);
    });
  });

  describe('playlist', () => {
    it('collects, lists, plays and removes songs', async () => {
      const { channel, send, library } = setup();

      await send('collect love');
      await send('collect love');
      await send('playlist', 'Ann');
      await send('playlist-play 1');
      await send('playlist-play 5');
      await send('playlist-play x');
      await send('uncollect love');
      await send('uncollect love');
      await send('playlist');

      expect(channel.texts()).toEqual([
        'Added "Song a - Artist" to your playlist.',
        '"Song a" is already in your playlist.',
        "Ann's playlist\n1. Song a - Artist",
        '🎶 Song a - Artist\nListen: https://cdn.example/a.mp3',
        'Only 1 songs in your playlist.',
        MESSAGES.invalidIndex,
        'Removed "Song a - Artist" from your playlist.',
        '"Song a" is not in your playlist.',
        MESSAGES.playlistEmpty
      ]);
      expect(library.isEmpty('user-1')).toBe(true);
    });

    it('answers an empty playlist on playlist-play', async () => {
      const { channel, send } = setup();
      await send('playlist-play 1');
      expect(channel.texts()).toEqual([MESSAGES.playlistEmpty]);
    });
  });

  describe('use', () => {
    it('switches the provider behind the play trigger', async () => {
      const { channel, send, providers, library } = setup({
        providers: [{ songs: THREE_SONGS }, { name: 'other', songs: THREE_SONGS }]
      });

      await send('use Other');
      await send('play love 1');

      expect(library.getDefaultProvider('user-1')).toBe('other');
      expect(channel.texts()[0]).toBe('Default provider set to Other.');
      expect(providers[0]?.searches).toEqual([]);
      expect(providers[1]?.searches).toHaveLength(1);
    });

    it('lists the available providers for an unknown name', async () => {
      const { channel, send } = setup({ providers: [{ songs: [] }, { name: 'other' }] });

      await send('use nope');

      expect(channel.texts()).toEqual(['Unknown provider "nope". Available: fake, other']);
    });
  });
});
