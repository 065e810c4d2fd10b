import { z } from 'zod/v3';

import type { ParameterSpec, ToolDescriptor } from '../types.js';
import type { JSONSchema7, JSONSchema7Definition, JSONSchema7TypeName } from 'json-schema';

import { RegistryUnavailableError } from '../dispatch-errors.js';
import { isPlainObject } from '../utils.js';

export const SESSION_REFERENCE_KEYWORD = 'x-session-reference';

const ParameterEntrySchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default('string'),
  required: z.boolean().default(false),
  is_session_reference: z.boolean().default(false),
  description: z.string().optional(),
});

const RawToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.object({
    type: z.string().optional(),
    properties: z.record(z.string(), z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  }).passthrough().optional(),
  // flat catalog form: [{ name, type, required, is_session_reference }]
  parameters: z.array(ParameterEntrySchema).optional(),
  _meta: z.object({
    sessionReferenceParameters: z.array(z.string()).optional(),
  }).passthrough().optional(),
}).passthrough();

type RawTool = z.infer<typeof RawToolSchema>;

export interface ParseCatalogOptions {
  // tool name -> parameter names declared as session references by configuration
  sessionReferences?: Readonly<Record<string, readonly string[]>>;
}

export interface ParsedCatalog {
  descriptors: ToolDescriptor[];
  warnings: string[];
}

const isJsonSchema = (value: unknown): value is JSONSchema7 =>
  isPlainObject(value)
  && (value.type === undefined || typeof value.type === 'string' || Array.isArray(value.type));

const isSchemaDefinition = (value: unknown): value is JSONSchema7Definition =>
  typeof value === 'boolean' || isJsonSchema(value);

const describeType = (schema: JSONSchema7Definition): string => {
  if (typeof schema === 'boolean') return 'any';
  if (typeof schema.type === 'string') return schema.type;
  if (Array.isArray(schema.type)) return schema.type.join('|');
  if (Array.isArray(schema.enum)) return 'enum';
  return 'any';
};

const schemaFromParameterList = (entries: z.infer<typeof ParameterEntrySchema>[]): JSONSchema7 => {
  const properties: Record<string, JSONSchema7Definition> = {};
  entries.forEach((entry) => {
    const prop: JSONSchema7 & Record<string, unknown> = {};
    if (isJsonSchemaTypeName(entry.type)) prop.type = entry.type;
    if (entry.description !== undefined) prop.description = entry.description;
    if (entry.is_session_reference) prop[SESSION_REFERENCE_KEYWORD] = true;
    properties[entry.name] = prop;
  });
  const required = entries.filter((entry) => entry.required).map((entry) => entry.name);
  return { type: 'object', properties, ...(required.length > 0 ? { required } : {}) };
};

const JSON_SCHEMA_TYPE_NAMES = new Set(['string', 'number', 'integer', 'boolean', 'object', 'array', 'null']);

const isJsonSchemaTypeName = (value: string): value is JSONSchema7TypeName =>
  JSON_SCHEMA_TYPE_NAMES.has(value);

const resolveInputSchema = (tool: RawTool): JSONSchema7 => {
  const hasProperties = tool.inputSchema?.properties !== undefined && Object.keys(tool.inputSchema.properties).length > 0;
  if (!hasProperties && tool.parameters !== undefined && tool.parameters.length > 0) {
    return schemaFromParameterList(tool.parameters);
  }
  const declared: unknown = tool.inputSchema;
  if (declared === undefined) return { type: 'object', properties: {} };
  if (!isJsonSchema(declared)) {
    throw new RegistryUnavailableError(`Tool '${tool.name}' has a malformed input schema`);
  }
  if (declared.type !== undefined && declared.type !== 'object') {
    throw new RegistryUnavailableError(`Tool '${tool.name}' input schema must be an object schema`);
  }
  return { ...declared, type: 'object' };
};

function toDescriptor(tool: RawTool, options: ParseCatalogOptions, warnings: string[]): ToolDescriptor {
  const inputSchema = resolveInputSchema(tool);
  const properties = inputSchema.properties ?? {};
  const required = new Set(inputSchema.required ?? []);
  const metaRefs = new Set(tool._meta?.sessionReferenceParameters ?? []);
  const configRefs = new Set(options.sessionReferences?.[tool.name] ?? []);

  [...metaRefs, ...configRefs].forEach((name) => {
    if (!Object.prototype.hasOwnProperty.call(properties, name)) {
      warnings.push(`tool '${tool.name}' declares session reference '${name}' that is not in its schema`);
    }
  });

  const parameters = Object.entries(properties).map(([name, schema]): ParameterSpec => {
    if (!isSchemaDefinition(schema)) {
      throw new RegistryUnavailableError(`Tool '${tool.name}' parameter '${name}' has a malformed schema`);
    }
    const flagged = isPlainObject(schema) && schema[SESSION_REFERENCE_KEYWORD] === true;
    const description = typeof schema === 'object' ? schema.description : undefined;
    return Object.freeze({
      name,
      type: describeType(schema),
      required: required.has(name),
      isSessionReference: flagged || metaRefs.has(name) || configRefs.has(name),
      ...(description !== undefined ? { description } : {}),
    });
  });

  return Object.freeze({
    name: tool.name,
    description: tool.description ?? '',
    parameters: Object.freeze(parameters),
    inputSchema: Object.freeze(inputSchema),
  });
}

/**
 * Turn a `tools/list` result into descriptors.
 *
 * Session references are taken only from explicit declarations: the
 * `x-session-reference` schema keyword, the tool's
 * `_meta.sessionReferenceParameters`, or configuration. Parameter names are
 * never guessed at.
 */
export function parseToolCatalog(rawTools: unknown, options: ParseCatalogOptions = {}): ParsedCatalog {
  if (!Array.isArray(rawTools)) {
    throw new RegistryUnavailableError('Tool catalog is not a list');
  }
  const warnings: string[] = [];
  const seen = new Set<string>();
  const descriptors = rawTools.map((raw, index) => {
    const parsed = RawToolSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.map((p) => String(p)).join('.');
      throw new RegistryUnavailableError(`Tool catalog entry ${String(index)} is malformed: ${where.length > 0 ? `${where}: ` : ''}${issue.message}`);
    }
    if (seen.has(parsed.data.name)) {
      throw new RegistryUnavailableError(`Tool catalog lists '${parsed.data.name}' more than once`);
    }
    seen.add(parsed.data.name);
    return toDescriptor(parsed.data, options, warnings);
  });
  return { descriptors, warnings };
}
