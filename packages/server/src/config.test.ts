import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import YAML from 'yaml';
import { DEFAULT_CONFIG, generateExampleConfig, loadConfig, validateConfig } from './config';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunedrop-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const load = (env: NodeJS.ProcessEnv = {}, configPath?: string) =>
    loadConfig({ basePath: dir, configPath, env, skipDirectoryCreation: true });

  it('uses defaults and resolves storage paths against the base path', () => {
    const config = load();

    expect(config.server).toEqual({ port: 8585, host: '127.0.0.1', channelTags: ['music-card', 'voice', 'binary-attachment', 'image'] });
    expect(config.delivery.modes).toEqual(['card', 'voice', 'file', 'text']);
    expect(config.storage).toEqual({
      database: path.join(dir, 'data', 'tunedrop.db'),
      cache: path.join(dir, 'data', 'cache'),
      cookies: path.join(dir, 'data', 'cookies.txt')
    });
  });

  it('reads config.yml and drops invalid values', () => {
    fs.writeFileSync(path.join(dir, 'config.yml'), [
      'server:',
      '  port: 9000',
      'providers:',
      '  searchLimit: -3',
      '  default: youtube',
      'delivery:',
      '  modes: [text, bogus, text]',
      '  lyrics: yes please'
    ].join('\n'));

    const config = load();

    expect(config.server.port).toBe(9000);
    expect(config.providers).toEqual({ default: 'youtube', searchLimit: 5 });
    expect(config.delivery).toEqual({ modes: ['text'], comments: false, lyrics: false });
  });

  it('lets environment variables override the file', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ server: { port: 9000 }, logging: { level: 'warn' } }));

    const config = load({
      TUNEDROP_PORT: '9100',
      TUNEDROP_DELIVERY_MODES: 'voice, file',
      TUNEDROP_SEND_LYRICS: 'true',
      TUNEDROP_SELECTION_TIMEOUT: '30',
      TUNEDROP_CHANNEL_TAGS: 'voice,unknown',
      TUNEDROP_PROXY: 'http://proxy.example:3128',
      TUNEDROP_LOG_LEVEL: 'debug'
    });

    expect(config.server.port).toBe(9100);
    expect(config.server.channelTags).toEqual(['voice']);
    expect(config.delivery.modes).toEqual(['voice', 'file']);
    expect(config.delivery.lyrics).toBe(true);
    expect(config.disambiguation.timeoutSeconds).toBe(30);
    expect(config.network.proxy).toBe('http://proxy.example:3128');
    expect(config.logging.level).toBe('debug');
  });

  it('falls back to text when no delivery mode is valid', () => {
    expect(load({ TUNEDROP_DELIVERY_MODES: 'bogus' }).delivery.modes).toEqual(['text']);
  });

  it('keeps an in-memory database as is', () => {
    expect(load({ TUNEDROP_DATABASE: ':memory:' }).storage.database).toBe(':memory:');
  });

  it('fails for a missing explicit config file', () => {
    expect(() => load({}, 'missing.yml')).toThrow('Config file not found: missing.yml');
  });

  it('fails for an unparsable config file', () => {
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ "server": ');
    expect(() => load({}, 'broken.json')).toThrow(`Invalid config file ${path.join(dir, 'broken.json')}`);
  });

  it('creates the storage directories', () => {
    const config = loadConfig({ basePath: dir, env: {} });

    expect(fs.existsSync(config.storage.cache)).toBe(true);
    expect(fs.existsSync(path.dirname(config.storage.database))).toBe(true);
  });

  it('accepts known audio formats and caps timeouts', () => {
    const overrides = validateConfig({
      disambiguation: { timeoutSeconds: 2147483 },
      extractor: { audioFormat: 'Vorbis', timeoutSeconds: 3000000 }
    }, 'test');

    expect(overrides.disambiguation).toEqual({ timeoutSeconds: 2147483 });
    expect(overrides.extractor).toEqual({ audioFormat: 'vorbis' });
    expect(validateConfig({ extractor: { audioFormat: 'best' } }, 'test').extractor).toEqual({});
  });

  it('ignores sections that are not objects', () => {
    expect(validateConfig({ server: 'everything' }, 'test').server).toEqual({});
    expect(validateConfig(['x'], 'test')).toEqual({});
  });

  it('generates an example config holding the defaults', () => {
    expect(YAML.parse(generateExampleConfig())).toEqual(DEFAULT_CONFIG);
  });
});
