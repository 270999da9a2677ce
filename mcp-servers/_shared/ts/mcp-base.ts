/**
 * MCP Server Base Classes — TypeScript
 *
 * Shared foundation for the TypeScript MCP servers in this repository.
 * Implements JSON-RPC 2.0 over stdio transport and tool registration.
 *
 * Usage:
 *   import { MCPServer, MCPTool, MCPResult, MCPError } from '../../_shared/ts/mcp-base';
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { errorResponse, isNotification, isValidRequest, successResponse } from './json-rpc';
import type { JsonRpcRequest, JsonRpcResponse } from './json-rpc';
import { createLogger } from './logger';

const log = createLogger('mcp');

// ─── Types ──────────────────────────────────────────────────────────────────

/** Result returned by a tool execution */
export interface MCPResult<T = unknown> {
  success: boolean;
  data: T;
}

/** Structured error for MCP tool failures */
export class MCPError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
    this.name = 'MCPError';
  }
}

/** Standard MCP error codes */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // Custom codes
  CONFIRMATION_REQUIRED: -32002,
  CAPABILITY_UNAVAILABLE: -32005,
} as const;

/** Tool definition interface — every tool implements this */
export interface MCPTool<TParams = unknown, TData = unknown> {
  /** Fully qualified tool name: server.tool_name */
  name: string;

  /** Human-readable description for the LLM */
  description: string;

  /** Zod schema for parameter validation */
  paramsSchema: ZodType<TParams, ZodTypeDef, unknown>;

  /** Whether the caller must get user confirmation before executing */
  confirmationRequired: boolean;

  /** Whether this action can be undone via the undo stack */
  undoSupported: boolean;

  /** Execute the tool with validated params */
  execute(params: TParams): Promise<MCPResult<TData>>;
}

/** Rethrow MCPErrors untouched; wrap anything else as INTERNAL_ERROR. */
export function toMCPError(err: unknown, context: string): MCPError {
  if (err instanceof MCPError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new MCPError(ErrorCodes.INTERNAL_ERROR, `${context}: ${msg}`);
}

// ─── MCPServer ──────────────────────────────────────────────────────────────

export interface MCPServerConfig {
  name: string;
  version: string;
  tools: MCPTool[];
}

/**
 * Base MCP Server class.
 *
 * Registers tools, handles JSON-RPC over stdio, validates params,
 * and dispatches tool calls.
 *
 * Usage:
 *   const server = new MCPServer({ name: 'clipboard', version: '1.0.0', tools: [...] });
 *   server.start();
 */
export class MCPServer {
  private name: string;
  private version: string;
  private tools: Map<string, MCPTool>;

  constructor(config: MCPServerConfig) {
    this.name = config.name;
    this.version = config.version;
    this.tools = new Map();

    for (const tool of config.tools) {
      this.tools.set(tool.name, tool);
    }
  }

  /** Start the JSON-RPC listener on stdio */
  start(): void {
    process.stdin.setEncoding('utf-8');

    let buffer = '';

    process.stdin.on('data', (chunk: string) => {
      buffer += chunk;

      // Newline-delimited messages; keep the trailing partial line
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        this.handleLine(line)
          .then((response) => {
            if (response) {
              process.stdout.write(JSON.stringify(response) + '\n');
            }
          })
          .catch((err: unknown) => {
            log.error('Failed to handle request', err);
          });
      }
    });

    process.stdin.on('end', () => {
      process.exit(0);
    });

    log.info(`${this.name} v${this.version} listening on stdio (${this.tools.size} tools)`);
  }

  /**
   * Handle one raw line from the transport.
   * Blank lines and notifications produce no response; malformed JSON
   * produces PARSE_ERROR.
   */
  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    const trimmed = line.trim();
    if (trimmed.length === 0) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      return errorResponse(0, ErrorCodes.PARSE_ERROR, 'Invalid JSON');
    }

    if (isNotification(parsed)) return null;

    if (!isValidRequest(parsed)) {
      return errorResponse(0, ErrorCodes.INVALID_REQUEST, 'Invalid JSON-RPC request');
    }

    return this.handleRequest(parsed);
  }

  /**
   * Build the tool definitions array for the initialize/tools-list responses.
   *
   * Converts each registered tool's zod schema to JSON Schema so callers
   * see full property/required/description metadata.
   */
  buildToolDefinitions(): Record<string, unknown>[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToJsonSchema(tool.paramsSchema, {
        target: 'openApi3',
        $refStrategy: 'none',
      }),
      metadata: {
        confirmationRequired: tool.confirmationRequired,
        undoSupported: tool.undoSupported,
      },
    }));
  }

  /** Handle an incoming JSON-RPC request */
  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    if (request.method === 'initialize') {
      return successResponse(request.id, {
        serverInfo: { name: this.name, version: this.version },
        tools: this.buildToolDefinitions(),
      });
    }

    if (request.method === 'tools/call') {
      return this.handleToolCall(request);
    }

    if (request.method === 'tools/list') {
      return successResponse(request.id, { tools: this.buildToolDefinitions() });
    }

    if (request.method === 'ping') {
      return successResponse(request.id, { status: 'ok' });
    }

    return errorResponse(
      request.id,
      ErrorCodes.METHOD_NOT_FOUND,
      `Unknown method: ${request.method}`,
    );
  }

  /** Handle a tools/call request */
  private async handleToolCall(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const name = request.params?.name;
    const args = request.params?.arguments ?? {};

    const tool = typeof name === 'string' ? this.tools.get(name) : undefined;
    if (!tool) {
      return errorResponse(
        request.id,
        ErrorCodes.METHOD_NOT_FOUND,
        `Unknown tool: ${String(name)}`,
      );
    }

    // Validate params
    const parseResult = tool.paramsSchema.safeParse(args);
    if (!parseResult.success) {
      return errorResponse(
        request.id,
        ErrorCodes.INVALID_PARAMS,
        `Invalid parameters: ${parseResult.error.message}`,
      );
    }

    // Execute tool
    try {
      const result = await tool.execute(parseResult.data);
      return successResponse(request.id, {
        content: [{ type: 'text', text: JSON.stringify(result.data) }],
      });
    } catch (err) {
      if (err instanceof MCPError) {
        return errorResponse(request.id, err.code, err.message);
      }
      log.error(`Tool ${tool.name} failed`, err);
      return errorResponse(
        request.id,
        ErrorCodes.INTERNAL_ERROR,
        `Internal error: ${err instanceof Error ? err.message : 'Unknown'}`,
      );
    }
  }
}
