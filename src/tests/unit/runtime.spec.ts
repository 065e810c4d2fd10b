import { describe, expect, it } from 'vitest';

import { parseConfiguration } from '../../config.js';
import { createRuntime } from '../../runtime.js';
import { FakeToolServer, ORDER_TOOL, SESSION_S2, ScriptedModel, WEATHER_TOOL } from '../test-doubles.js';

const config = parseConfiguration({
  model: { baseUrl: 'http://127.0.0.1:11434', model: 'llama3.1' },
  toolServer: { url: 'http://127.0.0.1:8001/mcp' },
  logging: { format: 'json' },
});

describe('createRuntime', () => {
  it('wires a dispatch end to end and flushes traces on close', async () => {
    const lines: string[] = [];
    const toolServer = new FakeToolServer([WEATHER_TOOL, ORDER_TOOL], {
      get_order_status: (args) => ({ order_id: args.order_id, status: 'shipped' }),
    });
    const model = new ScriptedModel([
      { text: '', toolCall: { name: 'get_order_status', arguments: { order_id: 'X1', order_session_id: 'made-up' } } },
      { text: 'Order X1 has shipped.' },
    ]);
    const runtime = await createRuntime(config, { mode: 'server', writer: (line) => { lines.push(line); }, toolServer, model });

    await runtime.registry.load();
    const outcome = await runtime.service.dispatch({ systemPrompt: '', userQuery: 'Where is X1?', sessionId: SESSION_S2 });
    await runtime.close();

    expect(outcome).toMatchObject({ status: 'completed', answer: 'Order X1 has shipped.', usedTool: 'get_order_status' });
    expect(toolServer.calls).toEqual([{ name: 'get_order_status', args: { order_id: 'X1', order_session_id: SESSION_S2 } }]);
    expect(toolServer.closed).toBe(true);

    const records = lines.map((line): unknown => JSON.parse(line));
    expect(records).toContainEqual(expect.objectContaining({ message: 'DispatchCompleted', session_id: SESSION_S2, severity: 'FIN' }));
  });
});
