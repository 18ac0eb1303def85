/**
 * @toolgate/engine-adapter
 */

export type { AiSdkProviderConfig, LanguageModelResolver } from './ai-sdk-provider.js';
export { AiSdkProvider, toModelMessages, toProviderOptions, toToolSet } from './ai-sdk-provider.js';
