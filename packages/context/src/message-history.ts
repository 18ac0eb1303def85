/**
 * @toolgate/context: Message History
 *
 * Shapes the conversation history sent to the model.
 */

import type { Message } from '@toolgate/core';

// ---------------------------------------------------------------------------
// History shaping
// ---------------------------------------------------------------------------

/**
 * Drop every message before `index`. Out-of-range indexes (including the
 * default -1) keep the whole history.
 */
export function truncate(messages: Message[], index: number): Message[] {
  if (index < 0 || index >= messages.length) return messages;
  return messages.slice(index);
}

/**
 * Keep the last `size` messages (0 keeps everything). The window then starts
 * at its first user message, when it has one, so the model never sees a
 * reply without the turn that prompted it.
 */
export function limitContext(messages: Message[], size: number): Message[] {
  if (size <= 0 || messages.length <= size) return messages;

  const window = messages.slice(-size);
  const firstUser = window.findIndex((message) => message.role === 'user');
  return firstUser > 0 ? window.slice(firstUser) : window;
}
