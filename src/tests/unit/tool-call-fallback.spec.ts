import { describe, expect, it } from 'vitest';

import { tryExtractLeakedToolCalls } from '../../tool-call-fallback.js';

const KNOWN = new Set(['get_weather', 'get_order_status']);

describe('tryExtractLeakedToolCalls', () => {
  describe('no patterns found', () => {
    it('returns input unchanged when no tool markup is present', () => {
      const input = 'Just some regular text content';
      expect(tryExtractLeakedToolCalls(input)).toEqual({ content: input, toolCalls: [], patternsMatched: [] });
    });

    it('returns input unchanged for empty string', () => {
      expect(tryExtractLeakedToolCalls('').content).toBe('');
    });

    it('ignores unrelated markup', () => {
      const input = '<div>Hello</div><span>World</span>';
      expect(tryExtractLeakedToolCalls(input, { knownToolNames: KNOWN }).toolCalls).toEqual([]);
    });
  });

  describe('tag patterns', () => {
    it('extracts a <tool_call> block', () => {
      const result = tryExtractLeakedToolCalls('<tool_call>\n{"name": "get_weather", "arguments": {"city": "Seoul"}}\n</tool_call>');
      expect(result.content).toBeNull();
      expect(result.toolCalls).toEqual([{ name: 'get_weather', arguments: { city: 'Seoul' } }]);
      expect(result.patternsMatched).toEqual(['tool_call']);
    });

    it('keeps surrounding text', () => {
      const result = tryExtractLeakedToolCalls('Before text\n<tool_call>{"name": "test", "arguments": {}}</tool_call>\nAfter text');
      expect(result.content).toBe('Before text\n\nAfter text');
      expect(result.toolCalls).toEqual([{ name: 'test', arguments: {} }]);
    });

    it('extracts a list inside <tool_calls>', () => {
      const result = tryExtractLeakedToolCalls('<tool_calls>[{"name": "a", "arguments": {}}, {"name": "b", "arguments": {"x": 1}}]</tool_calls>');
      expect(result.toolCalls).toEqual([{ name: 'a', arguments: {} }, { name: 'b', arguments: { x: 1 } }]);
    });

    it('reads OpenAI-style function objects with string arguments', () => {
      const result = tryExtractLeakedToolCalls('<function_call>{"function": {"name": "get_weather", "arguments": "{\\"city\\":\\"Busan\\"}"}}</function_call>');
      expect(result.toolCalls).toEqual([{ name: 'get_weather', arguments: { city: 'Busan' } }]);
    });

    it('accepts parameters and args as argument keys', () => {
      expect(tryExtractLeakedToolCalls('<tools>{"name": "x", "parameters": {"a": 1}}</tools>').toolCalls[0].arguments).toEqual({ a: 1 });
      expect(tryExtractLeakedToolCalls('<function>{"tool": "y", "args": {"b": 2}}</function>').toolCalls[0]).toEqual({ name: 'y', arguments: { b: 2 } });
    });

    it('is case-insensitive on tag names', () => {
      expect(tryExtractLeakedToolCalls('<TOOL_CALL>{"name": "t", "arguments": {}}</TOOL_CALL>').toolCalls).toHaveLength(1);
    });

    it('repairs slightly broken JSON', () => {
      const result = tryExtractLeakedToolCalls("<tool_call>{name: 'get_weather', arguments: {city: 'Seoul',}}</tool_call>");
      expect(result.toolCalls).toEqual([{ name: 'get_weather', arguments: { city: 'Seoul' } }]);
    });

    it('drops entries without a name', () => {
      expect(tryExtractLeakedToolCalls('<tool_call>{"arguments": {}}</tool_call>').toolCalls).toEqual([]);
    });

    it('keeps names exactly as written', () => {
      expect(tryExtractLeakedToolCalls('<tool_call>{"name": " Get_Weather ", "arguments": {}}</tool_call>').toolCalls[0].name).toBe(' Get_Weather ');
    });

    it('drops entries whose name is only whitespace', () => {
      expect(tryExtractLeakedToolCalls('<tool_call>{"name": "   ", "arguments": {}}</tool_call>').toolCalls).toEqual([]);
    });
  });

  describe('known tool name tags', () => {
    it('reads <parameter> children', () => {
      const input = '<get_weather><parameter name="city">Seoul</parameter><parameter name="detailed">true</parameter></get_weather>';
      const result = tryExtractLeakedToolCalls(input, { knownToolNames: KNOWN });
      expect(result.toolCalls).toEqual([{ name: 'get_weather', arguments: { city: 'Seoul', detailed: true } }]);
      expect(result.patternsMatched).toEqual(['get_weather']);
      expect(result.content).toBeNull();
    });

    it('ignores tags for tools it does not know', () => {
      const input = '<drop_tables><parameter name="all">true</parameter></drop_tables>';
      expect(tryExtractLeakedToolCalls(input, { knownToolNames: KNOWN }).toolCalls).toEqual([]);
    });
  });

  describe('bare JSON replies', () => {
    it('reads a reply that is only a call to a known tool', () => {
      const result = tryExtractLeakedToolCalls('{"name": "get_order_status", "arguments": {"order_id": "X1"}}', { knownToolNames: KNOWN });
      expect(result).toEqual({
        content: null,
        toolCalls: [{ name: 'get_order_status', arguments: { order_id: 'X1' } }],
        patternsMatched: ['json'],
      });
    });

    it('reads a fenced call', () => {
      const result = tryExtractLeakedToolCalls('```json\n{"name": "get_weather", "parameters": {"city": "Seoul"}}\n```', { knownToolNames: KNOWN });
      expect(result.toolCalls).toEqual([{ name: 'get_weather', arguments: { city: 'Seoul' } }]);
    });

    it('leaves JSON naming an unknown tool as text', () => {
      const input = '{"name": "Alice", "arguments": {"age": 3}}';
      expect(tryExtractLeakedToolCalls(input, { knownToolNames: KNOWN })).toEqual({ content: input, toolCalls: [], patternsMatched: [] });
    });

    it('leaves JSON mixed with prose as text', () => {
      const input = 'Sure: {"name": "get_weather", "arguments": {"city": "Seoul"}}';
      expect(tryExtractLeakedToolCalls(input, { knownToolNames: KNOWN }).toolCalls).toEqual([]);
    });
  });
});
