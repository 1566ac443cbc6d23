/**
 * Subtitle Provider Registry
 *
 * Holds the providers available to a run, in registration order, and
 * resolves a language's provider restriction against them.
 */

import type { Logger } from 'winston';
import { SubtitleProvider } from './SubtitleProvider.js';
import { ValidationError } from '../../errors/index.js';

export class SubtitleProviderRegistry {
  private readonly providers: Map<string, SubtitleProvider> = new Map();

  constructor(private readonly logger: Logger) {}

  register(provider: SubtitleProvider): void {
    if (this.providers.has(provider.id)) {
      throw new ValidationError(`Provider already registered: ${provider.id}`);
    }
    this.providers.set(provider.id, provider);
    this.logger.debug(`Registered subtitle provider: ${provider.id}`);
  }

  getProvider(providerId: string): SubtitleProvider | null {
    return this.providers.get(providerId) ?? null;
  }

  getRegisteredProviderIds(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Providers to query for a restriction.
   * null = every registered provider; otherwise the named ones, in the
   * order given. Unknown names are logged and skipped.
   */
  resolve(subset: string[] | null): SubtitleProvider[] {
    if (subset === null) {
      return Array.from(this.providers.values());
    }

    const resolved: SubtitleProvider[] = [];
    for (const providerId of subset) {
      const provider = this.providers.get(providerId);
      if (provider) {
        resolved.push(provider);
      } else {
        this.logger.warn(`Unknown or disabled subtitle provider: ${providerId}`, {
          registered: this.getRegisteredProviderIds(),
        });
      }
    }
    return resolved;
  }
}
