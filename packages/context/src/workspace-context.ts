/**
 * @toolgate/context: Workspace context transformer
 *
 * Injects the conversation workspace's CONTEXT.md after the system prompt,
 * so persistent project notes survive history truncation.
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  InputTransformer,
  Logger,
  Message,
  TransformerContext,
} from '@toolgate/core';
import { logger as rootLogger, messageText, systemMessage } from '@toolgate/core';

export const CONTEXT_FILE_NAME = 'CONTEXT.md';
export const CONTEXT_HEADER = `--- Workspace Context (${CONTEXT_FILE_NAME}) ---`;

const DEFAULT_MAX_CHARS = 50 * 1024;
const DEFAULT_CACHE_SIZE = 50;

export interface WorkspaceContextOptions {
  /** Workspace directory of a conversation */
  workspaceDir: (conversationId: string) => string;
  maxChars?: number;
  cacheSize?: number;
  logger?: Logger;
}

interface CachedContent {
  content: string;
  mtimeMs: number;
}

export class WorkspaceContextTransformer implements InputTransformer {
  /** Insertion order doubles as recency order */
  private readonly cache = new Map<string, CachedContent>();
  private readonly maxChars: number;
  private readonly cacheSize: number;
  private readonly log: Logger;

  constructor(private readonly options: WorkspaceContextOptions) {
    this.maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
    this.log = (options.logger ?? rootLogger).child({
      component: 'workspace-context',
    });
  }

  async transform(ctx: TransformerContext, messages: Message[]): Promise<Message[]> {
    if (ctx.conversationId === '') return messages;

    const content = await this.readContextFile(ctx.conversationId);
    if (content === undefined || content.trim() === '') return messages;

    return injectAfterSystemPrompt(messages, content);
  }

  clearCache(conversationId?: string): void {
    if (conversationId === undefined) this.cache.clear();
    else this.cache.delete(conversationId);
  }

  private async readContextFile(conversationId: string): Promise<string | undefined> {
    const path = join(this.options.workspaceDir(conversationId), CONTEXT_FILE_NAME);

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(path)).mtimeMs;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      this.log.warn({ err, path }, 'Cannot stat context file');
      return undefined;
    }

    const cached = this.cache.get(conversationId);
    if (cached && cached.mtimeMs === mtimeMs) {
      this.touch(conversationId, cached);
      return cached.content;
    }

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      this.log.warn({ err, path }, 'Cannot read context file');
      return undefined;
    }

    let content = raw;
    if (raw.length > this.maxChars) {
      const limitKb = Math.floor(this.maxChars / 1024);
      this.log.warn({ path, limitKb }, 'Context file too large, truncating');
      content = `${raw.slice(0, this.maxChars)}\n\n[Context file truncated: exceeded ${limitKb}KB limit]`;
    }

    this.touch(conversationId, { content, mtimeMs });
    return content;
  }

  private touch(conversationId: string, entry: CachedContent): void {
    this.cache.delete(conversationId);
    this.cache.set(conversationId, entry);
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Append `content` to the first system message, or insert a system message
 * at the front when there is none.
 */
export function injectAfterSystemPrompt(messages: Message[], content: string): Message[] {
  const block = `${CONTEXT_HEADER}\n${content}`;
  const systemIndex = messages.findIndex((m) => m.role === 'system');

  if (systemIndex === -1) {
    return [systemMessage(block), ...messages];
  }

  return messages.map((message, i): Message =>
    i === systemIndex
      ? {
          ...message,
          parts: [{ type: 'text', text: `${messageText(message)}\n\n${block}` }],
        }
      : message,
  );
}
