/**
 * Matchflow — Providers
 *
 * Builds the provider set from configuration. Factories are injectable so
 * callers can register their own sources by name.
 */

import type { MatchflowConfig, ProviderSettings } from '../config';
import { logger } from '../lib/logger';
import type { Provider } from './base';
import { HackerNewsProvider } from './hacker-news';

export type ProviderFactory = (settings: ProviderSettings) => Provider;

export const DEFAULT_PROVIDER_FACTORIES: Record<string, ProviderFactory> = {
  hacker_news: (settings) =>
    new HackerNewsProvider({
      enabled: settings.enabled,
      priority: settings.priority,
      maxResults: settings.max_results,
    }),
};

/**
 * Instantiate every enabled provider named in `config.providers`.
 * Names without a factory are logged and skipped.
 */
export function createProviders(
  config: Pick<MatchflowConfig, 'providers'>,
  factories: Record<string, ProviderFactory> = DEFAULT_PROVIDER_FACTORIES
): Provider[] {
  const providers: Provider[] = [];

  for (const [name, settings] of Object.entries(config.providers)) {
    if (!settings.enabled) {
      logger.debug('Provider disabled in config', { provider: name });
      continue;
    }

    const factory = factories[name];
    if (!factory) {
      logger.warn('No factory registered for provider, skipping', { provider: name });
      continue;
    }

    providers.push(factory(settings));
  }

  return providers;
}

export { BaseProvider, DEFAULT_CACHE_TTL_MS } from './base';
export type { Provider, BaseProviderOptions, SearchOptions } from './base';
export { StaticProvider } from './static';
export { HackerNewsProvider } from './hacker-news';
export type { HackerNewsProviderOptions } from './hacker-news';
