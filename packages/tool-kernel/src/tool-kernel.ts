/**
 * @toolgate/tool-kernel: Tool Kernel
 *
 * Tool set assembly, lookup, phase enforcement and execution with failure
 * containment. A tool call never throws out of the kernel: every failure is
 * folded into the call's output as `{"error": "[<name>] <message>"}`.
 */

import type {
  Logger,
  TextPart,
  ToolCallPart,
  ToolContext,
  ToolDefinition,
} from '@toolgate/core';
import {
  errorOutput,
  logger as rootLogger,
  PolicyViolationError,
  ToolInputError,
  ToolNotFoundError,
} from '@toolgate/core';
import { extractOperation, PhaseGuard } from './phase-guard.js';

export interface ToolKernelOptions {
  phaseGuard?: PhaseGuard;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Tool Kernel
// ---------------------------------------------------------------------------

export class ToolKernel {
  private tools = new Map<string, ToolDefinition>();
  readonly phaseGuard: PhaseGuard;
  private readonly log: Logger;

  constructor(tools: ToolDefinition[] = [], options: ToolKernelOptions = {}) {
    this.phaseGuard = options.phaseGuard ?? new PhaseGuard();
    this.log = (options.logger ?? rootLogger).child({ component: 'tool-kernel' });
    for (const tool of tools) this.register(tool);
  }

  // -------------------------------------------------------------------------
  // Tool registration
  // -------------------------------------------------------------------------

  /**
   * Register a tool. The first tool registered under a name wins; later
   * duplicates are ignored and reported with `false`.
   */
  register(tool: ToolDefinition): boolean {
    if (this.tools.has(tool.name)) {
      this.log.debug({ tool: tool.name }, 'Duplicate tool name ignored');
      return false;
    }
    this.tools.set(tool.name, tool);
    return true;
  }

  getTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * All registered tools, in registration order.
   */
  getTools(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  needsApproval(toolName: string): boolean {
    return this.tools.get(toolName)?.needsApproval ?? false;
  }

  // -------------------------------------------------------------------------
  // Tool execution
  // -------------------------------------------------------------------------

  /**
   * Run one tool call: lookup, JSON parse (blank input is `{}`), phase check,
   * schema validation, execute.
   */
  async execute(call: ToolCallPart, ctx: ToolContext): Promise<TextPart[]> {
    try {
      return await this.run(call, ctx);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.warn(
        { err: error, tool: call.toolName, toolCallId: call.toolCallId },
        'Tool execution failed',
      );
      return errorOutput(`[${error.name}] ${error.message}`);
    }
  }

  private async run(call: ToolCallPart, ctx: ToolContext): Promise<TextPart[]> {
    const tool = this.tools.get(call.toolName);
    if (!tool) throw new ToolNotFoundError(call.toolName);

    let args: unknown;
    try {
      args = JSON.parse(call.input.trim() === '' ? '{}' : call.input);
    } catch (err) {
      throw new ToolInputError(call.toolName, err, 'json');
    }

    if (ctx.phase !== null) {
      const operation = extractOperation(call.input);
      if (!this.phaseGuard.isAllowed(ctx.phase, call.toolName, operation)) {
        throw new PolicyViolationError(
          this.phaseGuard.getBlockedReason(ctx.phase, call.toolName, operation),
          ctx.phase,
          call.toolName,
          operation,
        );
      }
    }

    const parsed = tool.inputSchema.safeParse(args);
    if (!parsed.success) {
      throw new ToolInputError(call.toolName, parsed.error, 'schema');
    }

    this.log.info(
      { tool: call.toolName, toolCallId: call.toolCallId },
      'Executing tool',
    );
    return tool.execute(parsed.data, ctx);
  }
}
