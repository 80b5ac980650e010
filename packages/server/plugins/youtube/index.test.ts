import { describe, it, expect } from 'vitest';
import { TaskPool } from '@tunedrop/core';
import { Extractor, type ProcessResult, type ProcessRunner } from '../../src/services/extractor';
import { YoutubePlugin, entryToSong, watchUrl } from './index';

class SearchRunner implements ProcessRunner {
  readonly calls: string[][] = [];

  constructor(private installed: boolean, private output: unknown = { entries: [] }) {}

  async run(_command: string, args: string[]): Promise<ProcessResult> {
    this.calls.push(args);
    if (!this.installed) throw new Error('spawn yt-dlp ENOENT');
    if (args[0] === '--version') return { code: 0, stdout: '2024.07.01', stderr: '' };
    return { code: 0, stdout: JSON.stringify(this.output), stderr: '' };
  }
}

function createPlugin(runner: SearchRunner) {
  const extractor = new Extractor({ binary: 'yt-dlp', audioFormat: 'mp3', audioQuality: '192K', pool: new TaskPool(2), runner });
  return new YoutubePlugin(extractor);
}

describe('entryToSong', () => {
  it('fills defaults from the video id', () => {
    expect(entryToSong({ id: 'abc', url: 'abc' })).toEqual({
      id: 'abc',
      name: 'Unknown Title',
      artists: 'Unknown Artist',
      durationMs: 0,
      audioUrl: 'https://www.youtube.com/watch?v=abc',
      coverUrl: 'https://i.ytimg.com/vi/abc/hqdefault.jpg'
    });
  });

  it('keeps full URLs and converts seconds', () => {
    expect(entryToSong({ id: 'x', title: 'T', uploader: 'U', duration: 12.5, url: 'https://www.youtube.com/watch?v=x' })).toMatchObject({
      name: 'T',
      artists: 'U',
      durationMs: 12500,
      audioUrl: watchUrl('x')
    });
  });
});

describe('YoutubePlugin', () => {
  it('exposes a frozen platform', () => {
    const plugin = createPlugin(new SearchRunner(true));

    expect(plugin.platform).toEqual({ name: 'youtube', displayName: 'YouTube', keywords: ['youtube', 'yt'] });
    expect(Object.isFrozen(plugin.platform.keywords)).toBe(true);
  });

  it('searches through the extractor', async () => {
    const runner = new SearchRunner(true, {
      entries: [
        { id: 'v1', title: 'First', channel: 'Channel One', duration: 200 },
        { title: 'no id' },
        { id: 'v2', title: 'Second', uploader: 'Uploader' }
      ]
    });
    const plugin = createPlugin(runner);

    const songs = await plugin.search('lofi beats', 3);

    expect(songs.map(s => [s.id, s.name, s.artists])).toEqual([
      ['v1', 'First', 'Channel One'],
      ['v2', 'Second', 'Uploader']
    ]);
    expect(runner.calls[1]?.at(-1)).toBe('ytsearch3:lofi beats');
  });

  it('finds nothing without the extractor', async () => {
    const plugin = createPlugin(new SearchRunner(false));
    await expect(plugin.search('anything', 3)).resolves.toEqual([]);
  });

  it('resolves audio to the watch URL', async () => {
    const plugin = createPlugin(new SearchRunner(true));
    const song = { id: 'v1', name: 'First', artists: 'A', durationMs: 0 };

    await plugin.resolveAudio(song);

    expect(song).toMatchObject({ audioUrl: 'https://www.youtube.com/watch?v=v1' });
  });
});
