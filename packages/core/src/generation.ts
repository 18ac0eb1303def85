/**
 * @toolgate/core: Generation output
 */

import type { Message } from './messages.js';

/**
 * A snapshot of the whole conversation, emitted once per observable
 * milestone of a generation call. Immutable once emitted; the last chunk of
 * a call is the terminal conversation state for that invocation.
 */
export type GenerationChunk = {
  type: 'messages';
  messages: Message[];
};

export function messagesChunk(messages: Message[]): GenerationChunk {
  return { type: 'messages', messages };
}
