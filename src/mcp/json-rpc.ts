/**
 * JSON-RPC 2.0 message schemas for the stdio tool protocol.
 */

import { z } from 'zod';

export const MCP_PROTOCOL_VERSION = '2024-11-05';

/** Standard JSON-RPC error codes */
export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;

const IdSchema = z.union([z.string(), z.number()]);
export type JsonRpcId = z.infer<typeof IdSchema>;

export const JsonRpcErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

// Error first: `result: unknown` would also match a response that only carries `error`
export const JsonRpcResponseSchema = z.union([
  z.object({ jsonrpc: z.literal('2.0'), id: IdSchema.nullable(), error: JsonRpcErrorObjectSchema }),
  z.object({ jsonrpc: z.literal('2.0'), id: IdSchema, result: z.unknown() }),
]);
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

/** A request carries an id; a notification does not. */
export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: IdSchema.optional(),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

// ============================================================================
// Tool protocol payloads
// ============================================================================

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  serverInfo: z.object({ name: z.string(), version: z.string() }),
  capabilities: z.record(z.unknown()).default({}),
});

export const RawToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z
    .object({
      type: z.literal('object').optional(),
      properties: z.record(z.unknown()).optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough(),
});
export type RawToolDefinition = z.infer<typeof RawToolDefinitionSchema>;

export const ToolListResultSchema = z.object({
  tools: z.array(RawToolDefinitionSchema),
});

export const ToolCallContentSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const ToolCallResultSchema = z.object({
  content: z.array(ToolCallContentSchema).default([]),
  isError: z.boolean().optional(),
});

export const ToolCallParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).default({}),
});
