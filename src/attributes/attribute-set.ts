/**
 * AttributeSet: an ordered, growable mapping from attribute name to typed value.
 *
 * Attributes are declared explicitly; values are validated against the
 * declared type on every assignment. Listeners are told about new
 * declarations and about value changes.
 */

import { z } from 'zod';
import {
  AttributeTypeConflictError,
  InvalidAttributeValueError,
  UnknownAttributeError,
} from '../errors.js';

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export type AttributeType = 'string' | 'enum' | 'number' | 'boolean' | 'list';

export type AttributeValue = string | number | boolean | string[];

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
]);

export const AttributeDefinitionSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(['string', 'enum', 'number', 'boolean', 'list']),
    values: z.array(z.string()).min(1).optional(),
    default: AttributeValueSchema.optional(),
    description: z.string().optional(),
  })
  .refine(def => def.type !== 'enum' || def.values !== undefined, {
    message: 'enum attributes need a non-empty "values" list',
  });

export type AttributeDefinition = z.infer<typeof AttributeDefinitionSchema>;

export function valueSchema(definition: AttributeDefinition): z.ZodType<AttributeValue> {
  switch (definition.type) {
    case 'string':
      return z.string();
    case 'enum': {
      const allowed = definition.values ?? [];
      return z.string().refine(v => allowed.includes(v), {
        message: `expected one of: ${allowed.join(', ')}`,
      });
    }
    case 'number':
      return z.number().finite();
    case 'boolean':
      return z.boolean();
    case 'list':
      return z.array(z.string());
  }
}

export function defaultValue(definition: AttributeDefinition): AttributeValue {
  if (definition.default !== undefined) return definition.default;
  switch (definition.type) {
    case 'string': return '';
    case 'enum': return definition.values?.[0] ?? '';
    case 'number': return 0;
    case 'boolean': return false;
    case 'list': return [];
  }
}

function copyValue(value: AttributeValue): AttributeValue {
  return Array.isArray(value) ? [...value] : value;
}

function sameValue(a: AttributeValue | undefined, b: AttributeValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

// ---------------------------------------------------------------------------
// Change notifications
// ---------------------------------------------------------------------------

export type AttributeChangeKind = 'value' | 'attribute_added';

export interface AttributeChange {
  kind: AttributeChangeKind;
  set: AttributeSet;
  name: string;
  old_value: AttributeValue | undefined;
  new_value: AttributeValue;
}

export type AttributeListener = (change: AttributeChange) => void;

// ---------------------------------------------------------------------------
// AttributeSet
// ---------------------------------------------------------------------------

export class AttributeSet {
  private definitions: Map<string, AttributeDefinition> = new Map();
  private validators: Map<string, z.ZodType<AttributeValue>> = new Map();
  private values: Map<string, AttributeValue> = new Map();
  private listeners: AttributeListener[] = [];

  /**
   * Declare an attribute. Returns false when the name already exists with
   * the same type, in which case the current value is kept.
   *
   * @throws AttributeTypeConflictError when the name exists with another type
   */
  declare(definition: AttributeDefinition, value?: AttributeValue): boolean {
    const parsed = AttributeDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new InvalidAttributeValueError(definition.name, parsed.error.issues.map(i => i.message).join('; '));
    }

    const existing = this.definitions.get(definition.name);
    if (existing) {
      if (existing.type !== definition.type) {
        throw new AttributeTypeConflictError(definition.name, existing.type, definition.type);
      }
      return false;
    }

    const validator = valueSchema(parsed.data);
    const initial = this.validate(definition.name, validator, value ?? defaultValue(parsed.data));

    this.definitions.set(definition.name, parsed.data);
    this.validators.set(definition.name, validator);
    this.values.set(definition.name, initial);

    this.notify({
      kind: 'attribute_added',
      set: this,
      name: definition.name,
      old_value: undefined,
      new_value: copyValue(initial),
    });
    return true;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /** Attribute names in declaration order. */
  names(): string[] {
    return [...this.definitions.keys()];
  }

  definition(name: string): AttributeDefinition {
    const def = this.definitions.get(name);
    if (!def) throw new UnknownAttributeError(name);
    return def;
  }

  get(name: string): AttributeValue {
    const value = this.values.get(name);
    if (value === undefined) throw new UnknownAttributeError(name);
    return copyValue(value);
  }

  /**
   * String form of a value; lists are joined with "_" and booleans and
   * numbers use their JavaScript string form.
   */
  getString(name: string): string {
    const value = this.get(name);
    return Array.isArray(value) ? value.join('_') : String(value);
  }

  set(name: string, value: unknown): void {
    const validator = this.validators.get(name);
    if (!validator) throw new UnknownAttributeError(name);

    const next = this.validate(name, validator, value);
    const previous = this.values.get(name);
    if (sameValue(previous, next)) return;

    this.values.set(name, next);
    this.notify({
      kind: 'value',
      set: this,
      name,
      old_value: previous,
      new_value: copyValue(next),
    });
  }

  /** Plain copy of all values, in declaration order. */
  exportToDict(): Record<string, AttributeValue> {
    const result: Record<string, AttributeValue> = {};
    for (const [name, value] of this.values) {
      result[name] = copyValue(value);
    }
    return result;
  }

  /**
   * Assign every entry of `values`, in order.
   *
   * @throws UnknownAttributeError for an undeclared name
   */
  importFromDict(values: Record<string, unknown>): void {
    for (const [name, value] of Object.entries(values)) {
      this.set(name, value);
    }
  }

  on(listener: AttributeListener): void {
    this.listeners.push(listener);
  }

  off(listener: AttributeListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  private validate(name: string, validator: z.ZodType<AttributeValue>, value: unknown): AttributeValue {
    const result = validator.safeParse(value);
    if (!result.success) {
      throw new InvalidAttributeValueError(name, result.error.issues.map(i => i.message).join('; '));
    }
    return copyValue(result.data);
  }

  /** Every listener is called; the first error is rethrown afterwards. */
  private notify(change: AttributeChange): void {
    const errors: unknown[] = [];
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (e) {
        errors.push(e);
      }
    }
    if (errors.length > 0) throw errors[0];
  }
}
