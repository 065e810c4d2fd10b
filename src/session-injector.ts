import type { ToolDescriptor, ToolInvocationProposal } from './types.js';

import { MissingArgumentError } from './dispatch-errors.js';

// defineProperty keeps a proposed "__proto__" key an ordinary own property
const setArgument = (target: Record<string, unknown>, key: string, value: unknown): void => {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
};

/**
 * Build the arguments that are actually sent to the tool.
 *
 * Session-reference parameters always carry `sessionId`, whatever the model
 * proposed. Every other declared parameter is taken from the proposal as is,
 * and keys the schema does not declare follow in proposal order; schema
 * validation at invoke time decides whether those are allowed.
 *
 * Pure: no I/O, no clock, inputs are not mutated.
 *
 * @throws MissingArgumentError when a required non-session parameter is absent
 */
export function inject(
  descriptor: ToolDescriptor,
  proposal: ToolInvocationProposal,
  sessionId: string
): Record<string, unknown> {
  const proposed = proposal.arguments;
  const declared = new Set<string>();
  const output: Record<string, unknown> = {};

  descriptor.parameters.forEach((param) => {
    declared.add(param.name);
    if (param.isSessionReference) {
      setArgument(output, param.name, sessionId);
      return;
    }
    const supplied = Object.prototype.hasOwnProperty.call(proposed, param.name) ? proposed[param.name] : undefined;
    if (supplied === undefined) {
      if (param.required) throw new MissingArgumentError(descriptor.name, param.name);
      return;
    }
    setArgument(output, param.name, supplied);
  });

  Object.keys(proposed).forEach((key) => {
    if (declared.has(key)) return;
    const value = proposed[key];
    if (value !== undefined) setArgument(output, key, value);
  });

  return output;
}
