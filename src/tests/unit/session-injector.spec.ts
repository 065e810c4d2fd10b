import { describe, expect, it } from 'vitest';

import { MissingArgumentError } from '../../dispatch-errors.js';
import { inject } from '../../session-injector.js';
import { ORDER_TOOL, SESSION_S1, SESSION_S2, WEATHER_TOOL, buildCatalog } from '../test-doubles.js';

const catalog = buildCatalog([
  WEATHER_TOOL,
  ORDER_TOOL,
  {
    name: 'search_orders',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string' },
        limit: { type: 'integer' },
        session: { type: 'string', 'x-session-reference': true },
      },
      required: ['query'],
    },
  },
]);

const descriptorOf = (name: string) => {
  const descriptor = catalog.get(name);
  if (descriptor === undefined) throw new Error(`missing fixture ${name}`);
  return descriptor;
};

describe('inject', () => {
  it('passes arguments through when no parameter is a session reference', () => {
    const args = inject(descriptorOf('get_weather'), { toolName: 'get_weather', arguments: { city: 'Seoul' } }, SESSION_S1);
    expect(args).toEqual({ city: 'Seoul' });
  });

  it('overwrites a session reference the model filled in', () => {
    const args = inject(
      descriptorOf('get_order_status'),
      { toolName: 'get_order_status', arguments: { order_id: 'X1', order_session_id: SESSION_S1 } },
      SESSION_S2
    );
    expect(args).toEqual({ order_id: 'X1', order_session_id: SESSION_S2 });
  });

  it('adds a session reference the model left out', () => {
    const args = inject(descriptorOf('get_order_status'), { toolName: 'get_order_status', arguments: { order_id: 'X1' } }, SESSION_S2);
    expect(args).toEqual({ order_id: 'X1', order_session_id: SESSION_S2 });
  });

  it('throws for a missing required parameter', () => {
    expect(() => inject(descriptorOf('get_order_status'), { toolName: 'get_order_status', arguments: {} }, SESSION_S1))
      .toThrow(MissingArgumentError);
    expect(() => inject(descriptorOf('get_order_status'), { toolName: 'get_order_status', arguments: {} }, SESSION_S1))
      .toThrow("Tool 'get_order_status' requires parameter 'order_id'");
  });

  it('treats an explicit undefined like an absent argument', () => {
    expect(() => inject(descriptorOf('get_weather'), { toolName: 'get_weather', arguments: { city: undefined } }, SESSION_S1))
      .toThrow(MissingArgumentError);
  });

  it('keeps falsy values the model supplied', () => {
    const args = inject(
      descriptorOf('search_orders'),
      { toolName: 'search_orders', arguments: { query: '', limit: 0 } },
      SESSION_S1
    );
    expect(args).toEqual({ query: '', limit: 0, session: SESSION_S1 });
  });

  it('omits optional parameters that were not proposed', () => {
    const args = inject(descriptorOf('search_orders'), { toolName: 'search_orders', arguments: { query: 'late' } }, SESSION_S1);
    expect(Object.keys(args)).toEqual(['query', 'session']);
  });

  it('keeps undeclared keys after the declared ones', () => {
    const args = inject(
      descriptorOf('get_weather'),
      { toolName: 'get_weather', arguments: { units: 'metric', city: 'Seoul' } },
      SESSION_S1
    );
    expect(Object.keys(args)).toEqual(['city', 'units']);
    expect(args.units).toBe('metric');
  });

  it('keeps a "__proto__" key as an own property', () => {
    const proposed: Record<string, unknown> = JSON.parse('{"city":"Seoul","__proto__":{"polluted":true}}');
    const args = inject(descriptorOf('get_weather'), { toolName: 'get_weather', arguments: proposed }, SESSION_S1);
    expect(Object.prototype.hasOwnProperty.call(args, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(args)).toBe(Object.prototype);
  });

  it('does not mutate the proposal', () => {
    const proposed = { order_id: 'X1', order_session_id: 'from-model' };
    inject(descriptorOf('get_order_status'), { toolName: 'get_order_status', arguments: proposed }, SESSION_S2);
    expect(proposed).toEqual({ order_id: 'X1', order_session_id: 'from-model' });
  });

  it('returns equal, separate outputs for repeated calls with the same inputs', () => {
    const descriptor = descriptorOf('get_order_status');
    const proposal = { toolName: 'get_order_status', arguments: { order_id: 'X1', order_session_id: 'from-model', note: 'rush' } };

    const first = inject(descriptor, proposal, SESSION_S2);
    const second = inject(descriptor, proposal, SESSION_S2);

    expect(second).toEqual(first);
    expect(Object.keys(second)).toEqual(['order_id', 'order_session_id', 'note']);
    expect(second).not.toBe(first);
  });
});
