/**
 * @toolgate/generation: Translation helpers
 *
 * Prompt template and model detection used by GenerationHandler.translateText.
 */

import type { JsonValue } from '@toolgate/core';

export const DEFAULT_TRANSLATION_PROMPT = `You are a translation expert. Translate the text below into {target_lang}.
Keep the original formatting, and reply with the translation only.

<source_text>
{source_text}
</source_text>`;

const PLACEHOLDER = /\{([a-z_]+)\}/g;

/** Replace `{name}` placeholders; unknown names are left as they are. */
export function applyPlaceholders(template: string, values: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) => values[name] ?? match);
}

/** Qwen-MT models take a translation request body instead of a prompt. */
export function isQwenMtModel(modelId: string): boolean {
  return /qwen-mt/i.test(modelId);
}

/**
 * English name of a language tag ('de' → 'German'). Anything that is not a
 * valid tag is returned unchanged.
 */
export function languageDisplayName(language: string): string {
  try {
    return new Intl.DisplayNames(['en'], { type: 'language' }).of(language) ?? language;
  } catch (err) {
    if (err instanceof RangeError) return language;
    throw err;
  }
}

export function qwenTranslationOptions(targetLanguage: string): Record<string, JsonValue> {
  return {
    translation_options: {
      source_lang: 'auto',
      target_lang: languageDisplayName(targetLanguage),
    },
  };
}
