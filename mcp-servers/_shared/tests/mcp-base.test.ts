import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ErrorCodes, MCPError, MCPServer, toMCPError, type MCPTool } from '../ts/mcp-base';

const echoSchema = z.object({ value: z.string().min(1) });

const echo: MCPTool<z.infer<typeof echoSchema>, { value: string }> = {
  name: 'test.echo',
  description: 'Echo a value',
  paramsSchema: echoSchema,
  confirmationRequired: false,
  undoSupported: false,
  async execute(params) {
    if (params.value === 'fail') throw new MCPError(ErrorCodes.INVALID_PARAMS, 'refused');
    if (params.value === 'crash') throw new Error('kaboom');
    return { success: true, data: { value: params.value } };
  },
};

const server = new MCPServer({ name: 'test', version: '0.0.1', tools: [echo] });

describe('MCPServer', () => {
  it('answers initialize with server info and tool schemas', async () => {
    const response = await server.handleRequest({ jsonrpc: '2.0', id: 1, method: 'initialize' });
    expect(response).toMatchObject({
      id: 1,
      result: {
        serverInfo: { name: 'test', version: '0.0.1' },
        tools: [
          {
            name: 'test.echo',
            inputSchema: { type: 'object', required: ['value'] },
            metadata: { confirmationRequired: false, undoSupported: false },
          },
        ],
      },
    });
  });

  it('answers ping', async () => {
    expect(await server.handleRequest({ jsonrpc: '2.0', id: 2, method: 'ping' })).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { status: 'ok' },
    });
  });

  it('returns tool output as text content', async () => {
    const response = await server.handleRequest({
      jsonrpc: '2.0',
      id: 3,
      method: 'tools/call',
      params: { name: 'test.echo', arguments: { value: 'hi' } },
    });
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { content: [{ type: 'text', text: '{"value":"hi"}' }] },
    });
  });

  it('reports unknown methods and tools', async () => {
    expect(await server.handleRequest({ jsonrpc: '2.0', id: 4, method: 'nope' })).toMatchObject({
      error: { code: ErrorCodes.METHOD_NOT_FOUND, message: 'Unknown method: nope' },
    });
    expect(
      await server.handleRequest({ jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'x.y' } }),
    ).toMatchObject({ error: { code: ErrorCodes.METHOD_NOT_FOUND, message: 'Unknown tool: x.y' } });
  });

  it('rejects invalid params', async () => {
    const response = await server.handleRequest({
      jsonrpc: '2.0',
      id: 6,
      method: 'tools/call',
      params: { name: 'test.echo', arguments: { value: '' } },
    });
    expect(response).toMatchObject({ error: { code: ErrorCodes.INVALID_PARAMS } });
  });

  it('passes MCPErrors through and wraps anything else', async () => {
    const call = (value: string) =>
      server.handleRequest({
        jsonrpc: '2.0',
        id: 7,
        method: 'tools/call',
        params: { name: 'test.echo', arguments: { value } },
      });

    expect(await call('fail')).toMatchObject({ error: { code: ErrorCodes.INVALID_PARAMS, message: 'refused' } });
    expect(await call('crash')).toMatchObject({
      error: { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal error: kaboom' },
    });
  });

  describe('handleLine', () => {
    it('ignores blank lines', async () => {
      expect(await server.handleLine('   ')).toBeNull();
    });

    it('reports malformed JSON', async () => {
      expect(await server.handleLine('{oops')).toEqual({
        jsonrpc: '2.0',
        id: 0,
        error: { code: ErrorCodes.PARSE_ERROR, message: 'Invalid JSON' },
      });
    });

    it('does not answer notifications', async () => {
      expect(
        await server.handleLine('{"jsonrpc":"2.0","method":"notifications/initialized"}'),
      ).toBeNull();
    });

    it('reports JSON that is not a request', async () => {
      expect(await server.handleLine('{"hello":"world"}')).toMatchObject({
        error: { code: ErrorCodes.INVALID_REQUEST },
      });
    });
  });
});

describe('toMCPError', () => {
  it('keeps MCPErrors and wraps other failures', () => {
    const existing = new MCPError(ErrorCodes.INVALID_PARAMS, 'bad');
    expect(toMCPError(existing, 'ctx')).toBe(existing);

    const wrapped = toMCPError(new Error('disk full'), 'Failed to save');
    expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Failed to save: disk full');
    expect(toMCPError('plain', 'ctx').message).toBe('ctx: plain');
  });
});
