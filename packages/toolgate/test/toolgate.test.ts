/**
 * toolgate: Tests
 */

import { describe, expect, it } from 'vitest';
import {
  Context,
  EngineAdapter,
  Generation,
  Memory,
  messagesChunk,
  Observability,
  Skills,
  ToolKernel,
  userMessage,
} from '../src/index.js';

describe('toolgate meta-package', () => {
  it('re-exports core at the top level', () => {
    const messages = [userMessage('hi')];
    expect(messagesChunk(messages).messages).toBe(messages);
  });

  it('exposes each package as a namespace', () => {
    expect(typeof Generation.GenerationHandler).toBe('function');
    expect(typeof ToolKernel.ToolKernel).toBe('function');
    expect(typeof EngineAdapter.AiSdkProvider).toBe('function');
    expect(typeof Memory.InMemoryMemoryStore).toBe('function');
    expect(typeof Observability.GenerationTracer).toBe('function');
    expect(typeof Context.ContextAssembler).toBe('function');
    expect(typeof Skills.SkillRegistry).toBe('function');
  });
});
