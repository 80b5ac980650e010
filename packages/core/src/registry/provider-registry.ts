/**
 * Registry for catalog providers
 */

import type { CatalogProvider } from '../types/index';
import { log } from '../services/log-service';
import { errorMessage } from '../errors';

interface RegisteredProvider {
  provider: CatalogProvider;
  enabled: boolean;
}

export class ProviderRegistry {
  private providers = new Map<string, RegisteredProvider>();
  /** Trigger words that are not tied to one provider (e.g. the generic "play") */
  private extraKeywords = new Set<string>();

  /**
   * Register a provider under its platform name
   */
  register(provider: CatalogProvider): void {
    const { name, keywords } = provider.platform;
    const key = name.toLowerCase();

    if (this.providers.has(key)) {
      throw new Error(`Provider "${name}" is already registered`);
    }

    this.providers.set(key, { provider, enabled: true });
    log.debug('Registry', `Registered provider: ${name}`, { keywords: [...keywords] });
  }

  unregister(name: string): void {
    this.providers.delete(name.toLowerCase());
  }

  setEnabled(name: string, enabled: boolean): void {
    const registered = this.providers.get(name.toLowerCase());
    if (registered) {
      registered.enabled = enabled;
    }
  }

  isEnabled(name: string): boolean {
    return this.providers.get(name.toLowerCase())?.enabled ?? false;
  }

  has(name: string): boolean {
    return this.providers.has(name.toLowerCase());
  }

  addKeyword(keyword: string): void {
    this.extraKeywords.add(keyword.toLowerCase());
  }

  /**
   * Get an enabled provider by canonical or display name
   */
  get(name: string): CatalogProvider | null {
    const wanted = name.trim().toLowerCase();
    if (!wanted) return null;

    for (const { provider, enabled } of this.providers.values()) {
      if (!enabled) continue;
      const { platform } = provider;
      if (platform.name.toLowerCase() === wanted || platform.displayName.toLowerCase() === wanted) {
        return provider;
      }
    }
    return null;
  }

  /**
   * First enabled provider one of whose keywords occurs in the word
   */
  findByKeyword(word: string): CatalogProvider | null {
    const needle = word.trim().toLowerCase();
    if (!needle) return null;

    for (const { provider, enabled } of this.providers.values()) {
      if (!enabled) continue;
      if (provider.platform.keywords.some(keyword => needle.includes(keyword.toLowerCase()))) {
        return provider;
      }
    }
    return null;
  }

  /**
   * Every trigger keyword, provider-bound or not
   */
  keywords(): string[] {
    const all = new Set(this.extraKeywords);
    for (const { provider, enabled } of this.providers.values()) {
      if (!enabled) continue;
      for (const keyword of provider.platform.keywords) {
        all.add(keyword.toLowerCase());
      }
    }
    return Array.from(all);
  }

  /**
   * True when the token contains any registered trigger keyword
   */
  isTrigger(token: string): boolean {
    const needle = token.trim().toLowerCase();
    if (!needle) return false;
    return this.keywords().some(keyword => needle.includes(keyword));
  }

  getAll(): CatalogProvider[] {
    return Array.from(this.providers.values())
      .filter(r => r.enabled)
      .map(r => r.provider);
  }

  async initializeAll(): Promise<void> {
    for (const { provider } of this.providers.values()) {
      await provider.initialize();
    }
  }

  async disposeAll(): Promise<void> {
    for (const { provider } of this.providers.values()) {
      try {
        await provider.dispose();
      } catch (error) {
        log.warn('Registry', `Failed to dispose ${provider.platform.name}`, { error: errorMessage(error) });
      }
    }
  }
}
