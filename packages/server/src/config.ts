/**
 * Configuration loader for the Tunedrop server
 *
 * Supports (in order of precedence):
 * 1. Environment variables (TUNEDROP_*)
 * 2. Config file (config.yml, config.yaml or config.json)
 * 3. Default values
 */

import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import {
  DELIVERY_MODES,
  isDeliveryMode,
  isLogLevel,
  log,
  type ChannelTag,
  type DeliveryMode,
  type LogLevel
} from '@tunedrop/core';
import { isRecord } from './utils/json';
import { isAudioFormat, type AudioFormat } from './services/extractor';

export const CHANNEL_TAGS: readonly ChannelTag[] = ['music-card', 'voice', 'binary-attachment', 'image'];

export interface TunedropConfig {
  server: {
    port: number;
    host: string;
    /** Capabilities the HTTP gateway channel declares */
    channelTags: ChannelTag[];
  };
  storage: {
    database: string;
    cache: string;
    /** Cookie file handed to the extractor when present */
    cookies: string;
  };
  network: {
    proxy?: string;
  };
  providers: {
    default: string;
    searchLimit: number;
  };
  delivery: {
    modes: DeliveryMode[];
    comments: boolean;
    lyrics: boolean;
  };
  disambiguation: {
    timeoutSeconds: number;
    retractList: boolean;
    autoPlaySingle: boolean;
  };
  extractor: {
    binary: string;
    concurrency: number;
    timeoutSeconds: number;
    audioFormat: AudioFormat;
    audioQuality: string;
  };
  cache: {
    clearOnStartup: boolean;
  };
  logging: {
    level: LogLevel;
  };
}

type ConfigOverrides = { [K in keyof TunedropConfig]?: Partial<TunedropConfig[K]> };

export const DEFAULT_CONFIG: TunedropConfig = {
  server: {
    port: 8585,
    host: '127.0.0.1',
    channelTags: [...CHANNEL_TAGS]
  },
  storage: {
    database: './data/tunedrop.db',
    cache: './data/cache',
    cookies: './data/cookies.txt'
  },
  network: {},
  providers: {
    default: 'netease',
    searchLimit: 5
  },
  delivery: {
    modes: [...DELIVERY_MODES],
    comments: false,
    lyrics: false
  },
  disambiguation: {
    timeoutSeconds: 60,
    retractList: false,
    autoPlaySingle: true
  },
  extractor: {
    binary: 'yt-dlp',
    concurrency: 2,
    timeoutSeconds: 600,
    audioFormat: 'mp3',
    audioQuality: '192K'
  },
  cache: {
    clearOnStartup: false
  },
  logging: {
    level: 'info'
  }
};

// ========================================
// Value readers
// ========================================

type Reader<T> = (value: unknown) => T | undefined;

const asString: Reader<string> = value =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined;

const asNumber: Reader<number> = value => {
  const n = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
};

const asPositiveInt: Reader<number> = value => {
  const n = asNumber(value);
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
};

/** Longest delay setTimeout honours, in whole seconds */
export const MAX_TIMEOUT_SECONDS = Math.floor(2_147_483_647 / 1000);

const asTimeout: Reader<number> = value => {
  const n = asPositiveInt(value);
  return n !== undefined && n <= MAX_TIMEOUT_SECONDS ? n : undefined;
};

const asAudioFormat: Reader<AudioFormat> = value => {
  const format = asString(value)?.toLowerCase();
  return isAudioFormat(format) ? format : undefined;
};

const asPort: Reader<number> = value => {
  const n = asPositiveInt(value);
  return n !== undefined && n <= 65535 ? n : undefined;
};

const asBoolean: Reader<boolean> = value => {
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return undefined;
};

function asList(value: unknown): string[] | undefined {
  if (typeof value === 'string') {
    return value.split(',').map(s => s.trim()).filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string').map(s => s.trim());
  }
  return undefined;
}

const asModes: Reader<DeliveryMode[]> = value => {
  const list = asList(value);
  if (!list) return undefined;

  const modes: DeliveryMode[] = [];
  for (const item of list) {
    if (!isDeliveryMode(item)) {
      log.warn('Config', `Ignoring unknown delivery mode "${item}"`);
    } else if (!modes.includes(item)) {
      modes.push(item);
    }
  }
  return modes;
};

const asChannelTags: Reader<ChannelTag[]> = value => {
  const list = asList(value);
  if (!list) return undefined;
  return CHANNEL_TAGS.filter(tag => list.includes(tag));
};

const asLevel: Reader<LogLevel> = value => (isLogLevel(value) ? value : undefined);

type SectionReaders<T> = { [F in keyof T]-?: Reader<T[F]> };

const READERS: { [K in keyof TunedropConfig]: SectionReaders<TunedropConfig[K]> } = {
  server: { port: asPort, host: asString, channelTags: asChannelTags },
  storage: { database: asString, cache: asString, cookies: asString },
  network: { proxy: asString },
  providers: { default: asString, searchLimit: asPositiveInt },
  delivery: { modes: asModes, comments: asBoolean, lyrics: asBoolean },
  disambiguation: { timeoutSeconds: asTimeout, retractList: asBoolean, autoPlaySingle: asBoolean },
  extractor: {
    binary: asString,
    concurrency: asPositiveInt,
    timeoutSeconds: asTimeout,
    audioFormat: asAudioFormat,
    audioQuality: asString
  },
  cache: { clearOnStartup: asBoolean },
  logging: { level: asLevel }
};

function readSection<T extends object>(
  raw: unknown,
  readers: SectionReaders<T>,
  section: string,
  source: string
): Partial<T> {
  const result: Partial<T> = {};
  if (raw === undefined) return result;
  if (!isRecord(raw)) {
    log.warn('Config', `Ignoring section "${section}" from ${source}: not an object`);
    return result;
  }

  for (const key of Object.keys(readers) as (keyof T)[]) {
    const value = raw[String(key)];
    if (value === undefined || value === null) continue;

    const parsed = readers[key](value);
    if (parsed === undefined) {
      log.warn('Config', `Ignoring invalid value for ${section}.${String(key)} from ${source}`);
      continue;
    }
    result[key] = parsed;
  }
  return result;
}

/**
 * Validate untrusted config data; wrong-typed values are dropped with a warning
 */
export function validateConfig(raw: unknown, source: string): ConfigOverrides {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    log.warn('Config', `Ignoring ${source}: not an object`);
    return {};
  }

  return {
    server: readSection<TunedropConfig['server']>(raw.server, READERS.server, 'server', source),
    storage: readSection<TunedropConfig['storage']>(raw.storage, READERS.storage, 'storage', source),
    network: readSection<TunedropConfig['network']>(raw.network, READERS.network, 'network', source),
    providers: readSection<TunedropConfig['providers']>(raw.providers, READERS.providers, 'providers', source),
    delivery: readSection<TunedropConfig['delivery']>(raw.delivery, READERS.delivery, 'delivery', source),
    disambiguation: readSection<TunedropConfig['disambiguation']>(raw.disambiguation, READERS.disambiguation, 'disambiguation', source),
    extractor: readSection<TunedropConfig['extractor']>(raw.extractor, READERS.extractor, 'extractor', source),
    cache: readSection<TunedropConfig['cache']>(raw.cache, READERS.cache, 'cache', source),
    logging: readSection<TunedropConfig['logging']>(raw.logging, READERS.logging, 'logging', source)
  };
}

// ========================================
// Sources
// ========================================

/** TUNEDROP_* variable -> [section, field] */
const ENV_VARS: Record<string, [keyof TunedropConfig, string]> = {
  TUNEDROP_PORT: ['server', 'port'],
  TUNEDROP_HOST: ['server', 'host'],
  TUNEDROP_CHANNEL_TAGS: ['server', 'channelTags'],
  TUNEDROP_DATABASE: ['storage', 'database'],
  TUNEDROP_CACHE_DIR: ['storage', 'cache'],
  TUNEDROP_COOKIES: ['storage', 'cookies'],
  TUNEDROP_PROXY: ['network', 'proxy'],
  TUNEDROP_DEFAULT_PROVIDER: ['providers', 'default'],
  TUNEDROP_SEARCH_LIMIT: ['providers', 'searchLimit'],
  TUNEDROP_DELIVERY_MODES: ['delivery', 'modes'],
  TUNEDROP_SEND_COMMENTS: ['delivery', 'comments'],
  TUNEDROP_SEND_LYRICS: ['delivery', 'lyrics'],
  TUNEDROP_SELECTION_TIMEOUT: ['disambiguation', 'timeoutSeconds'],
  TUNEDROP_RETRACT_LIST: ['disambiguation', 'retractList'],
  TUNEDROP_EXTRACTOR: ['extractor', 'binary'],
  TUNEDROP_EXTRACTOR_CONCURRENCY: ['extractor', 'concurrency'],
  TUNEDROP_EXTRACTOR_TIMEOUT: ['extractor', 'timeoutSeconds'],
  TUNEDROP_CLEAR_CACHE: ['cache', 'clearOnStartup'],
  TUNEDROP_LOG_LEVEL: ['logging', 'level']
};

/**
 * Load configuration from environment variables
 */
function loadFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const raw: Record<string, Record<string, unknown>> = {};

  for (const [name, [section, field]] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    const target = raw[section] ?? {};
    target[field] = value;
    raw[section] = target;
  }

  return validateConfig(raw, 'environment');
}

/**
 * Load configuration from file
 */
function loadFromFile(configPath: string | undefined, basePath: string): ConfigOverrides {
  // Try to find config file
  const searchPaths = configPath
    ? [path.resolve(basePath, configPath)]
    : ['config.yml', 'config.yaml', 'config.json'].map(name => path.join(basePath, name));

  for (const filePath of searchPaths) {
    if (!fs.existsSync(filePath)) continue;

    log.info('Config', `Loading from: ${filePath}`);
    const content = fs.readFileSync(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
    } catch (error) {
      throw new Error(`Invalid config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return validateConfig(parsed, filePath);
  }

  if (configPath) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  return {};
}

function mergeConfig(base: TunedropConfig, ...layers: ConfigOverrides[]): TunedropConfig {
  return layers.reduce<TunedropConfig>((config, layer) => ({
    server: { ...config.server, ...layer.server },
    storage: { ...config.storage, ...layer.storage },
    network: { ...config.network, ...layer.network },
    providers: { ...config.providers, ...layer.providers },
    delivery: { ...config.delivery, ...layer.delivery },
    disambiguation: { ...config.disambiguation, ...layer.disambiguation },
    extractor: { ...config.extractor, ...layer.extractor },
    cache: { ...config.cache, ...layer.cache },
    logging: { ...config.logging, ...layer.logging }
  }), base);
}

/**
 * Resolve relative paths to absolute paths
 */
function resolvePaths(config: TunedropConfig, basePath: string): TunedropConfig {
  const resolve = (p: string) => path.isAbsolute(p) ? p : path.resolve(basePath, p);

  return {
    ...config,
    storage: {
      database: config.storage.database === ':memory:' ? ':memory:' : resolve(config.storage.database),
      cache: resolve(config.storage.cache),
      cookies: resolve(config.storage.cookies)
    }
  };
}

/**
 * Ensure required directories exist
 */
function ensureDirectories(config: TunedropConfig): void {
  const dirs = [config.storage.cache];
  if (config.storage.database !== ':memory:') {
    dirs.push(path.dirname(config.storage.database));
  }

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      log.info('Config', `Creating directory: ${dir}`);
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  basePath?: string;
  skipDirectoryCreation?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): TunedropConfig {
  const basePath = options.basePath || process.cwd();

  const fileConfig = loadFromFile(options.configPath, basePath);
  const envConfig = loadFromEnv(options.env ?? process.env);

  // Merge: defaults <- file <- env
  let config = mergeConfig(DEFAULT_CONFIG, fileConfig, envConfig);
  if (config.delivery.modes.length === 0) {
    log.warn('Config', 'No valid delivery modes configured, falling back to text');
    config = mergeConfig(config, { delivery: { modes: ['text'] } });
  }

  config = resolvePaths(config, basePath);

  if (!options.skipDirectoryCreation) {
    ensureDirectories(config);
  }

  return config;
}

/**
 * Generate example config file
 */
export function generateExampleConfig(): string {
  return YAML.stringify(DEFAULT_CONFIG);
}
