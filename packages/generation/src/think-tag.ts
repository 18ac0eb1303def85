/**
 * @toolgate/generation: Think tag transformer
 *
 * Reasoning models stream their thinking inline as <think>…</think>. The
 * transformer removes those blocks from assistant text, including a block
 * still open at the end of a partial stream.
 */

import type {
  Message,
  MessagePart,
  OutputTransformer,
  TransformerContext,
} from '@toolgate/core';

const OPEN_TAG = '<think>';
const CLOSE_TAG = '</think>';

type ThinkState = 'normal' | 'inside-think';

/** Incremental stripper: feed raw text, get the visible part back. */
export class ThinkStripper {
  private state: ThinkState = 'normal';
  private buf = '';

  feed(text: string): string {
    let out = '';
    this.buf += text;

    while (this.buf.length > 0) {
      if (this.state === 'normal') {
        const openIdx = this.buf.indexOf(OPEN_TAG);
        if (openIdx === -1) {
          const safeEnd = this.findSafeFlush(this.buf, OPEN_TAG);
          out += this.buf.slice(0, safeEnd);
          this.buf = this.buf.slice(safeEnd);
          break;
        }
        out += this.buf.slice(0, openIdx);
        this.buf = this.buf.slice(openIdx + OPEN_TAG.length);
        this.state = 'inside-think';
      } else {
        const closeIdx = this.buf.indexOf(CLOSE_TAG);
        if (closeIdx === -1) {
          // Keep just enough to recognise a split closing tag
          if (this.buf.length > CLOSE_TAG.length) {
            this.buf = this.buf.slice(-(CLOSE_TAG.length - 1));
          }
          break;
        }
        this.buf = this.buf.slice(closeIdx + CLOSE_TAG.length);
        this.state = 'normal';
      }
    }

    return out;
  }

  /** Flush any remaining buffer at end of stream. */
  flush(): string {
    const rest = this.state === 'normal' ? this.buf : '';
    this.buf = '';
    return rest;
  }

  private findSafeFlush(buf: string, tag: string): number {
    for (let overlap = Math.min(tag.length - 1, buf.length); overlap > 0; overlap--) {
      if (tag.startsWith(buf.slice(-overlap))) {
        return buf.length - overlap;
      }
    }
    return buf.length;
  }
}

export function stripThinkTags(text: string): string {
  const stripper = new ThinkStripper();
  const visible = stripper.feed(text) + stripper.flush();
  return visible === text ? text : visible.trimStart();
}

function stripParts(parts: MessagePart[]): MessagePart[] {
  let changed = false;
  const next: MessagePart[] = [];
  for (const part of parts) {
    if (part.type !== 'text') {
      next.push(part);
      continue;
    }
    const text = stripThinkTags(part.text);
    if (text === part.text) {
      next.push(part);
      continue;
    }
    changed = true;
    if (text !== '') next.push({ type: 'text', text });
  }
  return changed ? next : parts;
}

export class ThinkTagTransformer implements OutputTransformer {
  async visualTransform(
    _ctx: TransformerContext,
    messages: Message[],
  ): Promise<Message[]> {
    return messages.map((message) => {
      if (message.role !== 'assistant') return message;
      const parts = stripParts(message.parts);
      return parts === message.parts ? message : { ...message, parts };
    });
  }
}
