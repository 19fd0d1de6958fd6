/**
 * Tool Catalog Adapter
 *
 * Fetches the session's current tools and converts them to ToolSpecs, and
 * ToolSpecs to the Bedrock Converse tool configuration.
 */

import type { ToolSession } from '../mcp/tool-session.js';
import { RawToolDefinitionSchema } from '../mcp/json-rpc.js';
import type { ToolSpec } from '../types/agent-types.js';
import { ToolListingError, ToolSessionClosedError, errorMessage } from './errors.js';

export interface ConverseToolSpec {
  toolSpec: {
    name: string;
    description: string;
    inputSchema: { json: { type: 'object'; properties: Record<string, unknown>; required: string[] } };
  };
}

/**
 * List the tools currently offered by the session.
 * Tool lists are not assumed stable, so callers fetch once per query.
 */
export async function listToolSpecs(session: ToolSession): Promise<ToolSpec[]> {
  let tools: unknown[];
  try {
    tools = await session.listTools();
  } catch (err) {
    if (err instanceof ToolSessionClosedError) throw err;
    throw new ToolListingError(`Failed to list tools: ${errorMessage(err)}`, err);
  }

  return tools.map((tool, index) => {
    const parsed = RawToolDefinitionSchema.safeParse(tool);
    if (!parsed.success) {
      throw new ToolListingError(
        `Malformed tool definition at index ${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        parsed.error,
      );
    }
    const def = parsed.data;
    return {
      name: def.name,
      description: def.description ?? '',
      inputSchema: {
        type: 'object',
        properties: def.inputSchema.properties ?? {},
        required: def.inputSchema.required ?? [],
      },
    };
  });
}

export function toConverseTools(specs: readonly ToolSpec[]): ConverseToolSpec[] {
  return specs.map((spec) => ({
    toolSpec: {
      name: spec.name,
      description: spec.description,
      inputSchema: {
        json: {
          type: 'object',
          properties: spec.inputSchema.properties,
          required: spec.inputSchema.required,
        },
      },
    },
  }));
}
