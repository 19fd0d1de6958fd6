/**
 * Tool Registry
 *
 * Thin registry that maps tool names to descriptors for the tool server.
 * Domain-specific tools are defined in their own modules.
 */

import type { ToolCallResult, ToolInputSchema } from '../types/agent-types.js';

/**
 * Tool definition as advertised through `tools/list`
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolDescriptor<Ctx> {
  definition: ToolDefinition;
  execute: (params: Record<string, unknown>, ctx: Ctx) => Promise<ToolCallResult>;
}

interface RegisteredTool {
  definition: ToolDefinition;
  execute: (params: Record<string, unknown>) => Promise<ToolCallResult>;
}

export function textResult(text: string): ToolCallResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): ToolCallResult {
  return { content: [{ type: 'text', text: JSON.stringify({ error: message }) }], isError: true };
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  registerAll<Ctx>(descriptors: ToolDescriptor<Ctx>[], ctx: Ctx): void {
    for (const desc of descriptors) {
      this.tools.set(desc.definition.name, {
        definition: desc.definition,
        execute: (params) => desc.execute(params, ctx),
      });
    }
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  async execute(name: string, params: Record<string, unknown>): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return errorResult(`Unknown tool: ${name}`);
    }
    try {
      return await tool.execute(params);
    } catch (error) {
      return errorResult(error instanceof Error ? error.message : String(error));
    }
  }
}
