import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';
export const PROTOCOL_ENDPOINT = '/mcp/v1';
export const EVENT_STREAM_ENDPOINT = '/mcp/sse';

export interface ProtocolRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: number;
  method: string;
  params?: unknown;
}

export const RpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type RpcError = z.infer<typeof RpcErrorSchema>;

export const ProtocolResponseSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: RpcErrorSchema.nullable().optional(),
});

export type ProtocolResponse = z.infer<typeof ProtocolResponseSchema>;

export interface StreamEvent {
  event: string;
  data: string;
  raw: string;
}
