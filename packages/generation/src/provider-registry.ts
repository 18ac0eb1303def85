/**
 * @toolgate/generation: Provider Registry
 *
 * Maps provider setting types (e.g. 'openai') to Provider implementations.
 */

import type { ModelInfo, Provider, ProviderSetting } from '@toolgate/core';
import { ProviderNotFoundError } from '@toolgate/core';

export interface ResolvedProvider {
  setting: ProviderSetting;
  provider: Provider;
}

export class ProviderRegistry {
  private providers = new Map<string, Provider>();

  constructor(entries: Record<string, Provider> = {}) {
    for (const [type, provider] of Object.entries(entries)) {
      this.register(type, provider);
    }
  }

  register(type: string, provider: Provider): void {
    this.providers.set(type, provider);
  }

  get(type: string): Provider | undefined {
    return this.providers.get(type);
  }

  /**
   * Find the model's provider setting and the implementation for its type.
   */
  resolve(model: ModelInfo, settings: ProviderSetting[]): ResolvedProvider {
    const setting = settings.find((s) => s.id === model.providerId);
    if (!setting) throw new ProviderNotFoundError(model.providerId);

    const provider = this.providers.get(setting.type);
    if (!provider) throw new ProviderNotFoundError(`${setting.id} (type ${setting.type})`);

    return { setting, provider };
  }
}
