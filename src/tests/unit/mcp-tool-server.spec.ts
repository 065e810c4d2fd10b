import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it } from 'vitest';

import type { ToolDescriptor, ToolServerConfig } from '../../types.js';

import { parseToolCatalog } from '../../tools/descriptor-parser.js';
import { McpToolServer, extractRawPayload } from '../../tools/mcp-tool-server.js';
import { ToolExecutionError } from '../../tools/tool-errors.js';

const CONFIG: ToolServerConfig = {
  type: 'http',
  url: 'http://127.0.0.1:8001/mcp',
  args: [],
  headers: {},
  timeoutMs: 2000,
  connectRetries: 1,
  sessionReferences: {},
};

interface Harness {
  client: McpToolServer;
  server: Server;
  handled: string[];
}

let active: Harness | undefined;

async function startHarness(): Promise<Harness> {
  const handled: string[] = [];
  const server = new Server({ name: 'test-tools', version: '0.0.1' }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async (request) => {
    if (request.params?.cursor === 'page-2') {
      return {
        tools: [{
          name: 'get_order_status',
          inputSchema: {
            type: 'object',
            properties: {
              order_id: { type: 'string' },
              order_session_id: { type: 'string', 'x-session-reference': true },
            },
            required: ['order_id', 'order_session_id'],
          },
        }],
      };
    }
    return {
      tools: [
        {
          name: 'get_weather',
          description: 'Current weather for a city',
          inputSchema: { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] },
        },
        { name: 'structured', inputSchema: { type: 'object', properties: {} } },
        { name: 'broken', inputSchema: { type: 'object', properties: {} } },
        { name: 'crash', inputSchema: { type: 'object', properties: {} } },
        { name: 'slow', inputSchema: { type: 'object', properties: {} } },
      ],
      nextCursor: 'page-2',
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};
    handled.push(name);
    switch (name) {
      case 'get_weather':
        return { content: [{ type: 'text', text: JSON.stringify({ city: args.city, temperature: 21 }) }] };
      case 'get_order_status':
        return { content: [{ type: 'text', text: `order ${String(args.order_id)} for ${String(args.order_session_id)}` }] };
      case 'structured':
        return { content: [{ type: 'text', text: 'ignored' }], structuredContent: { ok: true } };
      case 'broken':
        return { content: [{ type: 'text', text: 'backend exploded' }], isError: true };
      case 'crash':
        throw new McpError(ErrorCode.InternalError, 'boom');
      case 'slow':
        await new Promise((resolve) => { setTimeout(resolve, 300); });
        return { content: [{ type: 'text', text: 'late' }] };
      default:
        throw new McpError(ErrorCode.InvalidParams, `Unknown tool ${name}`);
    }
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new McpToolServer(CONFIG, { transportFactory: () => clientTransport });
  active = { client, server, handled };
  return active;
}

async function loadDescriptors(client: McpToolServer): Promise<Map<string, ToolDescriptor>> {
  const { descriptors } = parseToolCatalog(await client.listTools());
  return new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));
}

function pick(descriptors: Map<string, ToolDescriptor>, name: string): ToolDescriptor {
  const descriptor = descriptors.get(name);
  if (descriptor === undefined) throw new Error(`tool ${name} not listed`);
  return descriptor;
}

afterEach(async () => {
  if (active === undefined) return;
  await active.client.close();
  await active.server.close();
  active = undefined;
});

describe('McpToolServer', () => {
  it('names itself after the configured endpoint', () => {
    expect(new McpToolServer(CONFIG).remoteIdentifier).toBe('mcp:http:http://127.0.0.1:8001/mcp');
    expect(new McpToolServer({ ...CONFIG, type: 'stdio', url: undefined, command: 'tools-server' }).remoteIdentifier)
      .toBe('mcp:stdio:tools-server');
  });

  it('follows list cursors across pages', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);
    expect([...descriptors.keys()]).toEqual(['get_weather', 'structured', 'broken', 'crash', 'slow', 'get_order_status']);
    expect(pick(descriptors, 'get_order_status').parameters[1].isSessionReference).toBe(true);
  });

  it('returns the text content of a successful call', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);

    const payload = await client.callTool(pick(descriptors, 'get_weather'), { city: 'Seoul' });

    expect(payload).toBe('{"city":"Seoul","temperature":21}');
  });

  it('sends the arguments it is given', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);

    const payload = await client.callTool(pick(descriptors, 'get_order_status'), { order_id: 'X1', order_session_id: 'S2' });

    expect(payload).toBe('order X1 for S2');
  });

  it('prefers structured content', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);
    await expect(client.callTool(pick(descriptors, 'structured'), {})).resolves.toEqual({ ok: true });
  });

  it('turns an error result into a status error', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);

    const failure = client.callTool(pick(descriptors, 'broken'), {});

    await expect(failure).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(failure).rejects.toMatchObject({ failure: 'status_error', message: "Tool 'broken' failed: backend exploded" });
  });

  it('turns a protocol error into a status error', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);

    await expect(client.callTool(pick(descriptors, 'crash'), {})).rejects.toMatchObject({
      kind: 'tool_execution_error',
      failure: 'status_error',
      details: { code: ErrorCode.InternalError, toolName: 'crash', failure: 'status_error' },
    });
  });

  it('validates arguments before sending them', async () => {
    const { client, handled } = await startHarness();
    const descriptors = await loadDescriptors(client);

    await expect(client.callTool(pick(descriptors, 'get_weather'), { city: 5 })).rejects.toMatchObject({
      failure: 'invalid_parameters',
      message: "Arguments for 'get_weather' do not match its schema: /city must be string",
    });
    await expect(client.callTool(pick(descriptors, 'get_weather'), {})).rejects.toMatchObject({
      failure: 'invalid_parameters',
      message: "Arguments for 'get_weather' do not match its schema: (root) must have required property 'city'",
    });
    expect(handled).toEqual([]);
  });

  it('times out a slow call', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);

    await expect(client.callTool(pick(descriptors, 'slow'), {}, { timeoutMs: 50 })).rejects.toMatchObject({
      failure: 'timeout',
      message: "Tool 'slow' timed out after 50ms",
    });
  });

  it('does not send a call that is already canceled', async () => {
    const { client, handled } = await startHarness();
    const descriptors = await loadDescriptors(client);
    const controller = new AbortController();
    controller.abort();

    await expect(client.callTool(pick(descriptors, 'get_weather'), { city: 'Seoul' }, { signal: controller.signal }))
      .rejects.toMatchObject({ failure: 'canceled' });
    expect(handled).toEqual([]);
  });

  it('refuses calls after close', async () => {
    const { client } = await startHarness();
    const descriptors = await loadDescriptors(client);
    await client.close();

    await expect(client.callTool(pick(descriptors, 'get_weather'), { city: 'Seoul' })).rejects.toMatchObject({
      failure: 'transport_error',
      message: 'Tool server unreachable: tool server client is closed',
    });
  });
});

describe('extractRawPayload', () => {
  it('joins text parts', () => {
    expect(extractRawPayload({ content: [{ type: 'text', text: 'a' }, { type: 'image', data: 'x' }, { type: 'text', text: 'b' }] }))
      .toBe('a\nb');
  });

  it('keeps non-text content lists as they are', () => {
    const content = [{ type: 'image', data: 'x', mimeType: 'image/png' }];
    expect(extractRawPayload({ content })).toBe(content);
  });

  it('reads legacy toolResult answers', () => {
    expect(extractRawPayload({ toolResult: { temp: 3 } })).toEqual({ temp: 3 });
  });

  it('reports empty content as null', () => {
    expect(extractRawPayload({ content: [] })).toBeNull();
  });
});
