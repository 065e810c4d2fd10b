import type { ToolDescriptor } from '../types.js';
import type { JSONSchema7, JSONSchema7Definition } from 'json-schema';

export interface ModelToolSpec {
  name: string;
  description: string;
  inputSchema: JSONSchema7;
}

/**
 * Immutable snapshot of the tool server's catalog.
 *
 * Lookups are byte-exact. A reload produces a new snapshot; an existing one
 * never changes, so a dispatch keeps the catalog it started with.
 */
export class ToolCatalog {
  readonly version: number;
  readonly loadedAt: number;
  private readonly byName: ReadonlyMap<string, ToolDescriptor>;
  private readonly ordered: readonly ToolDescriptor[];

  constructor(descriptors: readonly ToolDescriptor[], opts: { version: number; loadedAt?: number }) {
    this.version = opts.version;
    this.loadedAt = opts.loadedAt ?? Date.now();
    this.ordered = Object.freeze([...descriptors]);
    this.byName = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));
    Object.freeze(this);
  }

  static empty(): ToolCatalog {
    return new ToolCatalog([], { version: 0, loadedAt: 0 });
  }

  get size(): number {
    return this.ordered.length;
  }

  get(name: string): ToolDescriptor | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  list(): readonly ToolDescriptor[] {
    return this.ordered;
  }

  names(): string[] {
    return this.ordered.map((descriptor) => descriptor.name);
  }

  /** One line per tool, for the decision prompt. Session parameters are left out. */
  summary(): string {
    if (this.ordered.length === 0) return 'No tools are available.';
    return this.ordered.map((descriptor) => {
      const params = descriptor.parameters
        .filter((param) => !param.isSessionReference)
        .map((param) => `${param.name}${param.required ? '' : '?'}: ${param.type}`)
        .join(', ');
      const description = descriptor.description.length > 0 ? ` - ${descriptor.description}` : '';
      return `- ${descriptor.name}(${params})${description}`;
    }).join('\n');
  }

  /** Tool declarations for the model; session parameters are hidden from it. */
  modelTools(): ModelToolSpec[] {
    return this.ordered.map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      inputSchema: stripSessionParameters(descriptor),
    }));
  }
}

export function stripSessionParameters(descriptor: ToolDescriptor): JSONSchema7 {
  const hidden = new Set(descriptor.parameters.filter((param) => param.isSessionReference).map((param) => param.name));
  const { properties, required, ...rest } = descriptor.inputSchema;
  if (hidden.size === 0) return { ...rest, ...(properties !== undefined ? { properties } : {}), ...(required !== undefined ? { required } : {}) };
  const visible = Object.entries(properties ?? {}).reduce<Record<string, JSONSchema7Definition>>((acc, [name, schema]) => {
    if (!hidden.has(name)) acc[name] = schema;
    return acc;
  }, {});
  const stillRequired = (required ?? []).filter((name) => !hidden.has(name));
  return {
    ...rest,
    properties: visible,
    ...(stillRequired.length > 0 ? { required: stillRequired } : {}),
  };
}
