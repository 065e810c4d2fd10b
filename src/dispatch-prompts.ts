import type { ToolCatalog } from './tools/tool-catalog.js';
import type { ToolInvocationResult } from './types.js';

export const DECISION_INSTRUCTIONS = [
  'You can call at most one of the tools listed below.',
  'Call a tool only when the request cannot be answered without it; otherwise answer directly.',
  'Never invent tool names or session identifiers.',
].join('\n');

export const DEGRADED_RESULT_NOTE = 'The tool result could not be parsed and is shown as returned by the tool.';

export function buildDecisionPrompt(systemPrompt: string, catalog: ToolCatalog): string {
  const base = systemPrompt.trim();
  const toolSection = `## Available tools\n${catalog.summary()}\n\n${DECISION_INSTRUCTIONS}`;
  return base.length > 0 ? `${base}\n\n${toolSection}` : toolSection;
}

export function buildToolAnswerMessage(userQuery: string, toolName: string, invocation: ToolInvocationResult): string {
  const lines = [
    userQuery,
    '',
    `Result of tool \`${toolName}\`:`,
    invocation.normalizedSummary,
  ];
  if (invocation.degraded) lines.push('', DEGRADED_RESULT_NOTE);
  if (invocation.truncated) lines.push('', 'The result was shortened to fit.');
  lines.push('', 'Answer the request above using this result. Do not call any tools.');
  return lines.join('\n');
}
