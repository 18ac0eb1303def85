/**
 * @toolgate/core: Assistant configuration
 *
 * Assistants are user-authored configuration, so they are validated with zod
 * and defaulted at the boundary.
 */

import { z } from 'zod';
import type { JsonValue } from './json.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.string(),
    z.number(),
    z.boolean(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema.optional()),
  ]),
);

// ---------------------------------------------------------------------------
// Assistant
// ---------------------------------------------------------------------------

export const assistantSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  systemPrompt: z.string().default(''),
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  /** Reasoning token budget; 0 turns reasoning off where the provider allows it */
  thinkingBudget: z.number().int().min(0).optional(),
  /** Number of most recent messages sent to the model. 0 disables the limit. */
  contextMessageSize: z.number().int().min(0).default(64),
  streamOutput: z.boolean().default(true),
  enableMemory: z.boolean().default(false),
  /** Share one memory scope across all assistants */
  useGlobalMemory: z.boolean().default(false),
  enableRecentChatsReference: z.boolean().default(false),
  customHeaders: z.record(z.string(), z.string()).default({}),
  customBody: z.record(z.string(), jsonValueSchema).default({}),
  skillIds: z.array(z.string()).default([]),
});

export type Assistant = z.output<typeof assistantSchema>;
export type AssistantInput = z.input<typeof assistantSchema>;

export function parseAssistant(input: unknown): Assistant {
  return assistantSchema.parse(input);
}

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export interface ModelInfo {
  /** Local identifier of the model entry */
  id: string;
  /** Identifier the provider expects, e.g. 'gpt-4o-mini' */
  modelId: string;
  /** ProviderSetting.id this model belongs to */
  providerId: string;
  displayName?: string;
  customHeaders?: Record<string, string>;
  customBody?: Record<string, JsonValue>;
}
