/**
 * Attribute schemas and per-process attribute sets.
 *
 * A schema groups attribute definitions by name (for instance an
 * "acquisition" group with subject and session). ProcessAttributes declares
 * the groups a process needs and remembers which attributes each parameter
 * depends on.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { Process } from '../process/process.js';
import {
  AttributeDefinitionSchema,
  AttributeSet,
  type AttributeDefinition,
  type AttributeValue,
} from './attribute-set.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const AttributesSchemaFileSchema = z.object({
  name: z.string().min(1),
  groups: z.record(z.array(AttributeDefinitionSchema)),
});

export class AttributesSchema {
  readonly name: string;
  private groups: Map<string, AttributeDefinition[]>;

  constructor(name: string, groups: Record<string, AttributeDefinition[]>) {
    this.name = name;
    this.groups = new Map(Object.entries(groups).map(([group, defs]) => [group, defs.map(d => ({ ...d }))]));
  }

  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  /**
   * @throws ConfigurationError when the schema has no such group
   */
  group(name: string): AttributeDefinition[] {
    const defs = this.groups.get(name);
    if (!defs) {
      throw new ConfigurationError(`Attributes schema '${this.name}' has no group '${name}'`, {
        schema: this.name,
        group: name,
      });
    }
    return defs.map(d => ({ ...d }));
  }
}

/**
 * Build a schema from plain JSON data.
 *
 * @throws ConfigurationError listing the validation issues
 */
export function parseAttributesSchema(data: unknown): AttributesSchema {
  const result = AttributesSchemaFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigurationError(`Invalid attributes schema: ${issues.join('; ')}`, { issues });
  }
  return new AttributesSchema(result.data.name, result.data.groups);
}

// ---------------------------------------------------------------------------
// Process attributes
// ---------------------------------------------------------------------------

export class ProcessAttributes extends AttributeSet {
  readonly process: Process;
  readonly schemas: Record<string, AttributesSchema>;
  private parameterAttributes: Map<string, string[]> = new Map();

  constructor(process: Process, schemas: Record<string, AttributesSchema>) {
    super();
    this.process = process;
    this.schemas = schemas;
  }

  /**
   * Declare the attributes of a schema group and bind them to a parameter.
   * `defaults` overrides the group's default values.
   *
   * @throws ConfigurationError when the schema directory or group is unknown
   */
  setParameterAttributes(
    parameter: string,
    schemaDir: string,
    group: string,
    defaults: Record<string, AttributeValue> = {},
  ): void {
    const schema = this.schemas[schemaDir];
    if (!schema) {
      throw new ConfigurationError(`No attributes schema configured for '${schemaDir}'`, {
        process: this.process.name,
        parameter,
      });
    }

    const names = this.parameterAttributes.get(parameter) ?? [];
    for (const definition of schema.group(group)) {
      this.declare(definition, defaults[definition.name]);
      if (!names.includes(definition.name)) names.push(definition.name);
    }
    this.parameterAttributes.set(parameter, names);
  }

  /** Attribute names a parameter depends on; empty when unbound. */
  getParameterAttributes(parameter: string): string[] {
    return [...(this.parameterAttributes.get(parameter) ?? [])];
  }

  parametersWithAttributes(): string[] {
    return [...this.parameterAttributes.keys()];
  }
}

export type ProcessAttributesClass = new (
  process: Process,
  schemas: Record<string, AttributesSchema>,
) => ProcessAttributes;

/**
 * Create a ProcessAttributes subclass whose constructor runs `build`.
 * The result is what gets registered under "process_attributes".
 */
export function defineProcessAttributes(build: (attributes: ProcessAttributes) => void): ProcessAttributesClass {
  return class extends ProcessAttributes {
    constructor(process: Process, schemas: Record<string, AttributesSchema>) {
      super(process, schemas);
      build(this);
    }
  };
}
