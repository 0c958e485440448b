/**
 * Vision Provider Registry
 *
 * Central hub for provider registration and selection.
 * 'auto' mode tries providers in registration order and uses the first available one.
 */

import { ConfigurationError } from '../errors/docfusion-error.js';
import type {
  VisionProvider,
  VisionProviderChoice,
  VisionProviderName,
  VisionRequest,
  VisionResult,
} from './provider.js';

export class VisionProviderRegistry {
  private providers: Map<VisionProviderName, VisionProvider> = new Map();

  /** Register (or overwrite) a provider. */
  register(provider: VisionProvider): void {
    this.providers.set(provider.name, provider);
  }

  /**
   * Resolve the provider a request would go to, or undefined when none fits.
   */
  select(preferred: VisionProviderChoice = 'auto'): VisionProvider | undefined {
    if (preferred === 'auto') {
      for (const provider of this.providers.values()) {
        if (provider.isAvailable()) return provider;
      }
      return undefined;
    }
    const provider = this.providers.get(preferred);
    return provider?.isAvailable() ? provider : undefined;
  }

  /**
   * Run a transcription, routing to the chosen provider.
   *
   * - `preferred = 'auto'` (or undefined): first available provider.
   * - Specific provider name: use that provider or throw if missing/unavailable.
   */
  async transcribe(request: VisionRequest, preferred: VisionProviderChoice = 'auto'): Promise<VisionResult> {
    if (preferred === 'auto') {
      const provider = this.select('auto');
      if (!provider) {
        throw new ConfigurationError(
          'No available vision provider found. Register at least one provider with a valid API key.'
        );
      }
      return provider.transcribe(request);
    }

    const provider = this.providers.get(preferred);
    if (!provider) {
      throw new ConfigurationError(`Vision provider '${preferred}' is not registered. Call register() first.`);
    }
    if (!provider.isAvailable()) {
      throw new ConfigurationError(
        `Vision provider '${preferred}' is registered but not available (check API key).`
      );
    }
    return provider.transcribe(request);
  }

  /** Names of all currently available (key-configured) providers. */
  getAvailableProviders(): VisionProviderName[] {
    return Array.from(this.providers.values())
      .filter((p) => p.isAvailable())
      .map((p) => p.name);
  }
}
