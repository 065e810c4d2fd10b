import { describe, expect, it } from 'vitest';

import { RegistryUnavailableError } from '../../dispatch-errors.js';
import { parseToolCatalog } from '../../tools/descriptor-parser.js';
import { ToolCatalog, stripSessionParameters } from '../../tools/tool-catalog.js';
import { ORDER_TOOL, WEATHER_TOOL, buildCatalog } from '../test-doubles.js';

describe('parseToolCatalog', () => {
  it('reads parameters in schema order with their types and flags', () => {
    const { descriptors, warnings } = parseToolCatalog([ORDER_TOOL]);
    expect(warnings).toEqual([]);
    expect(descriptors).toHaveLength(1);
    expect(descriptors[0].name).toBe('get_order_status');
    expect(descriptors[0].description).toBe('Status of an order');
    expect(descriptors[0].parameters).toEqual([
      { name: 'order_id', type: 'string', required: true, isSessionReference: false },
      { name: 'order_session_id', type: 'string', required: true, isSessionReference: true },
    ]);
  });

  it('builds a schema from the flat parameter list form', () => {
    const { descriptors } = parseToolCatalog([{
      name: 'get_order_status',
      parameters: [
        { name: 'order_id', type: 'string', required: true },
        { name: 'order_session_id', required: true, is_session_reference: true },
      ],
    }]);
    expect(descriptors[0].inputSchema).toEqual({
      type: 'object',
      properties: {
        order_id: { type: 'string' },
        order_session_id: { type: 'string', 'x-session-reference': true },
      },
      required: ['order_id', 'order_session_id'],
    });
    expect(descriptors[0].parameters.map((param) => param.isSessionReference)).toEqual([false, true]);
  });

  it('takes session references from _meta and from configuration', () => {
    const { descriptors, warnings } = parseToolCatalog([
      {
        name: 'cart',
        inputSchema: { type: 'object', properties: { sid: { type: 'string' }, item: { type: 'string' } } },
        _meta: { sessionReferenceParameters: ['sid'] },
      },
      {
        name: 'profile',
        inputSchema: { type: 'object', properties: { owner: { type: 'string' } } },
      },
    ], { sessionReferences: { profile: ['owner', 'ghost'] } });

    expect(descriptors[0].parameters.map((param) => [param.name, param.isSessionReference])).toEqual([['sid', true], ['item', false]]);
    expect(descriptors[1].parameters[0].isSessionReference).toBe(true);
    expect(warnings).toEqual(["tool 'profile' declares session reference 'ghost' that is not in its schema"]);
  });

  it('never guesses session references from parameter names', () => {
    const { descriptors } = parseToolCatalog([{
      name: 'lookup',
      inputSchema: { type: 'object', properties: { session_id: { type: 'string' } } },
    }]);
    expect(descriptors[0].parameters[0].isSessionReference).toBe(false);
  });

  it('describes enum, union and open types', () => {
    const { descriptors } = parseToolCatalog([{
      name: 'mixed',
      inputSchema: {
        type: 'object',
        properties: {
          unit: { enum: ['c', 'f'] },
          note: { type: ['string', 'null'], description: 'free text' },
          extra: true,
        },
      },
    }]);
    expect(descriptors[0].parameters).toEqual([
      { name: 'unit', type: 'enum', required: false, isSessionReference: false },
      { name: 'note', type: 'string|null', required: false, isSessionReference: false, description: 'free text' },
      { name: 'extra', type: 'any', required: false, isSessionReference: false },
    ]);
  });

  it('gives a tool without a schema no parameters', () => {
    const { descriptors } = parseToolCatalog([{ name: 'ping' }]);
    expect(descriptors[0].parameters).toEqual([]);
    expect(descriptors[0].inputSchema).toEqual({ type: 'object', properties: {} });
  });

  it('rejects a catalog that is not a list', () => {
    expect(() => parseToolCatalog({ tools: [] })).toThrow(new RegistryUnavailableError('Tool catalog is not a list'));
  });

  it('rejects malformed entries', () => {
    expect(() => parseToolCatalog([WEATHER_TOOL, { description: 'nameless' }]))
      .toThrow('Tool catalog entry 1 is malformed: name: Required');
    expect(() => parseToolCatalog([{ name: 'list', inputSchema: { type: 'array' } }]))
      .toThrow("Tool 'list' input schema must be an object schema");
  });

  it('rejects duplicate tool names', () => {
    expect(() => parseToolCatalog([WEATHER_TOOL, WEATHER_TOOL]))
      .toThrow("Tool catalog lists 'get_weather' more than once");
  });
});

describe('ToolCatalog', () => {
  const catalog = buildCatalog();

  it('looks tools up by exact name', () => {
    expect(catalog.get('get_weather')?.name).toBe('get_weather');
    expect(catalog.get('Get_Weather')).toBeUndefined();
    expect(catalog.has('get_weather ')).toBe(false);
    expect(catalog.names()).toEqual(['get_weather', 'get_order_status']);
    expect(catalog.size).toBe(2);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.list())).toBe(true);
    expect(Object.isFrozen(catalog.get('get_weather'))).toBe(true);
  });

  it('starts empty at version 0', () => {
    const empty = ToolCatalog.empty();
    expect(empty.version).toBe(0);
    expect(empty.size).toBe(0);
    expect(empty.summary()).toBe('No tools are available.');
  });

  it('summarizes tools without their session parameters', () => {
    expect(catalog.summary()).toBe([
      '- get_weather(city: string) - Current weather for a city',
      '- get_order_status(order_id: string) - Status of an order',
    ].join('\n'));
  });

  it('drops required when only session parameters were required', () => {
    const [descriptor] = parseToolCatalog([{
      name: 'whoami',
      inputSchema: {
        type: 'object',
        properties: { sid: { type: 'string', 'x-session-reference': true } },
        required: ['sid'],
      },
    }]).descriptors;
    expect(stripSessionParameters(descriptor)).toEqual({ type: 'object', properties: {} });
  });

  it('leaves schemas without session parameters as they are', () => {
    const descriptor = catalog.get('get_weather');
    if (descriptor === undefined) throw new Error('fixture missing');
    expect(stripSessionParameters(descriptor)).toEqual(WEATHER_TOOL.inputSchema);
  });
});
