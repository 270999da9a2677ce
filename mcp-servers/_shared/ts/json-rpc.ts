/**
 * JSON-RPC 2.0 Transport Utilities — TypeScript
 *
 * Low-level JSON-RPC message handling for MCP server communication.
 * Used by mcp-base.ts; typically not imported directly by tool implementations.
 */

// ─── JSON-RPC Types ─────────────────────────────────────────────────────────

export interface JsonRpcMessage {
  jsonrpc: '2.0';
}

export interface JsonRpcRequest extends JsonRpcMessage {
  id: string | number;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse extends JsonRpcMessage {
  id: string | number;
  result: unknown;
}

export interface JsonRpcErrorResponse extends JsonRpcMessage {
  id: string | number;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Create a success response */
export function successResponse(id: string | number, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

/** Create an error response */
export function errorResponse(
  id: string | number,
  code: number,
  message: string,
  data?: unknown,
): JsonRpcErrorResponse {
  const error: JsonRpcErrorResponse['error'] = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: '2.0', id, error };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate that a parsed message is a valid JSON-RPC request */
export function isValidRequest(msg: unknown): msg is JsonRpcRequest {
  if (!isRecord(msg)) return false;
  return (
    msg.jsonrpc === '2.0' &&
    typeof msg.method === 'string' &&
    (typeof msg.id === 'string' || typeof msg.id === 'number') &&
    (msg.params === undefined || isRecord(msg.params))
  );
}

/** A notification carries a method but no id, and never gets a response */
export function isNotification(msg: unknown): boolean {
  return isRecord(msg) && msg.jsonrpc === '2.0' && typeof msg.method === 'string' && !('id' in msg);
}
