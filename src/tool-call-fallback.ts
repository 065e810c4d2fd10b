/**
 * Recovery of tool calls that a model wrote into its text instead of using
 * native tool calling.
 *
 * Recognized forms:
 * - <tool_calls>, <tool_call>, <tools>, <function_call> and <function> tags wrapping JSON
 * - <tool_name><parameter name="x">value</parameter></tool_name> for a known tool name
 * - a reply that is nothing but a `{"name": ..., "arguments": {...}}` object
 *   (optionally fenced) naming a known tool
 *
 * Names are kept exactly as written; matching against the catalog happens later.
 */

import { isPlainObject, parseJsonValueDetailed, stripSurroundingCodeFence } from './utils.js';

export interface LeakedToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface LeakedToolExtractionResult {
  /** Text left after removing the tool-call markup, or null if nothing remains */
  content: string | null;
  toolCalls: LeakedToolCall[];
  patternsMatched: string[];
}

const TAG_PATTERNS: readonly { name: string; open: RegExp; close: string }[] = [
  { name: 'tool_calls', open: /<tool_calls>/gi, close: '</tool_calls>' },
  { name: 'tool_call', open: /<tool_call>/gi, close: '</tool_call>' },
  { name: 'tools', open: /<tools>/gi, close: '</tools>' },
  { name: 'function_call', open: /<function_call>/gi, close: '</function_call>' },
  { name: 'function', open: /<function>/gi, close: '</function>' },
];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const normalizeXmlValue = (raw: string): string | boolean | undefined => {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return undefined;
  const lower = trimmed.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return trimmed;
};

const parseXmlParameters = (content: string): Record<string, unknown> => {
  const parameters: Record<string, unknown> = {};
  const paramPattern = /<parameter\s+name\s*=\s*"([^"]+)"\s*>([\s\S]*?)<\/parameter\s*>/gi;
  for (const match of content.matchAll(paramPattern)) {
    const name = match[1].trim();
    const value = normalizeXmlValue(match[2]);
    if (name.length === 0 || value === undefined) continue;
    parameters[name] = value;
  }
  return parameters;
};

/**
 * Pull every `open ... close` block out of `content`.
 */
const extractBlocks = (
  content: string,
  open: RegExp,
  close: RegExp
): { extracted: string[]; remaining: string } => {
  const extracted: string[] = [];
  let remaining = content;
  open.lastIndex = 0;
  for (;;) {
    const openMatch = open.exec(remaining);
    if (openMatch === null) break;
    const openEnd = openMatch.index + openMatch[0].length;
    const closeMatch = close.exec(remaining.slice(openEnd));
    if (closeMatch === null) break;
    const closeIndex = openEnd + closeMatch.index;
    const inner = remaining.slice(openEnd, closeIndex).trim();
    if (inner.length > 0) extracted.push(inner);
    remaining = remaining.slice(0, openMatch.index) + remaining.slice(closeIndex + closeMatch[0].length);
    open.lastIndex = 0;
  }
  return { extracted, remaining };
};

/**
 * Handles the field name variations models use: function/tool for name,
 * parameters/args for arguments.
 */
const normalizeToolCall = (obj: Record<string, unknown>): LeakedToolCall | undefined => {
  const fn = isPlainObject(obj.function) ? obj.function : undefined;
  const nameCandidate = obj.name ?? fn?.name ?? obj.function ?? obj.tool;
  if (typeof nameCandidate !== 'string' || nameCandidate.trim().length === 0) return undefined;

  const argsCandidate: unknown = obj.arguments ?? obj.parameters ?? obj.args ?? fn?.arguments ?? {};
  // OpenAI-style calls carry arguments as a JSON string
  const decoded = typeof argsCandidate === 'string' ? parseJsonValueDetailed(argsCandidate).value : argsCandidate;
  return { name: nameCandidate, arguments: isPlainObject(decoded) ? decoded : {} };
};

const parseToolCalls = (jsonContent: string): LeakedToolCall[] => {
  const { value } = parseJsonValueDetailed(jsonContent);
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items
    .map((item) => (isPlainObject(item) ? normalizeToolCall(item) : undefined))
    .filter((call): call is LeakedToolCall => call !== undefined);
};

const looksLikeToolCall = (obj: Record<string, unknown>): boolean =>
  typeof obj.name === 'string' && (isPlainObject(obj.arguments) || isPlainObject(obj.parameters));

const extractBareJsonCall = (input: string, knownToolNames: ReadonlySet<string>): LeakedToolCall | undefined => {
  const trimmed = input.trim();
  const body = stripSurroundingCodeFence(trimmed) ?? trimmed;
  if (!body.startsWith('{') || !body.endsWith('}')) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isPlainObject(value) || !looksLikeToolCall(value)) return undefined;
  const call = normalizeToolCall(value);
  return call !== undefined && knownToolNames.has(call.name) ? call : undefined;
};

export const tryExtractLeakedToolCalls = (
  input: string,
  options: { knownToolNames?: ReadonlySet<string> } = {}
): LeakedToolExtractionResult => {
  const toolCalls: LeakedToolCall[] = [];
  const patternsMatched: string[] = [];
  let workingContent = input;

  TAG_PATTERNS.forEach((pattern) => {
    const { extracted, remaining } = extractBlocks(workingContent, pattern.open, new RegExp(escapeRegExp(pattern.close), 'i'));
    if (extracted.length === 0) return;
    patternsMatched.push(pattern.name);
    workingContent = remaining;
    extracted.forEach((block) => { toolCalls.push(...parseToolCalls(block)); });
  });

  const knownToolNames = options.knownToolNames ?? new Set<string>();
  knownToolNames.forEach((toolName) => {
    const escaped = escapeRegExp(toolName);
    const { extracted, remaining } = extractBlocks(
      workingContent,
      new RegExp(`<${escaped}\\s*>`, 'g'),
      new RegExp(`</${escaped}\\s*>`)
    );
    if (extracted.length === 0) return;
    patternsMatched.push(toolName);
    workingContent = remaining;
    extracted.forEach((block) => { toolCalls.push({ name: toolName, arguments: parseXmlParameters(block) }); });
  });

  if (patternsMatched.length === 0) {
    const bare = extractBareJsonCall(input, knownToolNames);
    if (bare !== undefined) return { content: null, toolCalls: [bare], patternsMatched: ['json'] };
    return { content: input, toolCalls: [], patternsMatched: [] };
  }

  const cleaned = workingContent.trim();
  return { content: cleaned.length > 0 ? cleaned : null, toolCalls, patternsMatched };
};
