import type { StructuredLogEvent } from './structured-log-event.js';

import { colorize } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const shortTime = (iso: string): string => iso.slice(11, 23);

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const arrow = event.direction === 'request' ? '→' : '←';
  const scope = [event.type, event.remoteIdentifier].filter((part) => part !== undefined && part.length > 0).join(' ');
  const context = options.verbose === true && event.dispatchId !== undefined
    ? ` [${event.dispatchId.slice(0, 8)}${event.state !== undefined ? ` ${event.state}` : ''}]`
    : '';
  const head = `${shortTime(event.isoTimestamp)} ${event.severity} ${arrow} ${scope}${context}: ${event.message}`;
  let output = options.color === true ? colorize(head, event.severity) : head;

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
