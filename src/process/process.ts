/**
 * Process: an executable unit with named, typed parameters.
 *
 * Only the parameter interface lives here; running a process is left to the
 * execution layer.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { InvalidParameterValueError, UnknownParameterError } from '../errors.js';
import { StudyConfig } from '../study/config.js';
import type {
  ParameterChange,
  ParameterListener,
  ParameterSpec,
  ParameterType,
  ParameterValue,
} from './types.js';
import { PATH_PARAMETER_TYPES } from './types.js';

const PARAMETER_SCHEMAS: Record<ParameterType, z.ZodType<Exclude<ParameterValue, undefined>>> = {
  file: z.string(),
  directory: z.string(),
  string: z.string(),
  number: z.number(),
  boolean: z.boolean(),
  list: z.array(z.string()),
};

function sameValue(a: ParameterValue, b: ParameterValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

function copyValue(value: ParameterValue): ParameterValue {
  return Array.isArray(value) ? [...value] : value;
}

export interface ProcessInit {
  name: string;
  id?: string;
  parameters?: Record<string, ParameterSpec>;
  studyConfig?: StudyConfig;
}

export class Process {
  readonly id: string;
  readonly name: string;
  private specs: Map<string, ParameterSpec> = new Map();
  private values: Map<string, ParameterValue> = new Map();
  private listeners: ParameterListener[] = [];
  private studyConfig: StudyConfig | null;

  constructor(init: ProcessInit) {
    this.name = init.name;
    this.id = init.id ?? `${init.name}-${randomUUID()}`;
    this.studyConfig = init.studyConfig ?? null;
    for (const [name, spec] of Object.entries(init.parameters ?? {})) {
      this.addParameter(name, spec);
    }
  }

  // -----------------------------------------------------------------------
  // Parameter declarations
  // -----------------------------------------------------------------------

  addParameter(name: string, spec: ParameterSpec): void {
    this.specs.set(name, { ...spec });
    this.values.set(name, spec.default === undefined ? undefined : this.validate(name, spec, spec.default));
  }

  hasParameter(name: string): boolean {
    return this.specs.has(name);
  }

  /** Parameter names in declaration order. */
  parameterNames(): string[] {
    return [...this.specs.keys()];
  }

  parameterSpec(name: string): ParameterSpec {
    const spec = this.specs.get(name);
    if (!spec) throw new UnknownParameterError(this.name, name);
    return spec;
  }

  isPathParameter(name: string): boolean {
    return PATH_PARAMETER_TYPES.has(this.parameterSpec(name).type);
  }

  // -----------------------------------------------------------------------
  // Values
  // -----------------------------------------------------------------------

  /**
   * Set a parameter value. `null` and `undefined` leave the parameter
   * undefined. Listeners are called only when the value changes.
   */
  setParameter(name: string, value: unknown): void {
    const spec = this.parameterSpec(name);
    const next = value === null || value === undefined ? undefined : this.validate(name, spec, value);
    const previous = this.values.get(name);
    if (sameValue(previous, next)) return;

    this.values.set(name, next);
    this.notify({ process: this, name, old_value: copyValue(previous), new_value: copyValue(next) });
  }

  getParameter(name: string): ParameterValue {
    this.parameterSpec(name);
    return copyValue(this.values.get(name));
  }

  /** Values of all input parameters. */
  getInputs(): Record<string, ParameterValue> {
    return this.collect(spec => !spec.output);
  }

  /** Values of all output parameters. */
  getOutputs(): Record<string, ParameterValue> {
    return this.collect(spec => spec.output === true);
  }

  importFromDict(values: Record<string, unknown>): void {
    for (const [name, value] of Object.entries(values)) {
      this.setParameter(name, value);
    }
  }

  exportToDict(): Record<string, ParameterValue> {
    return this.collect(() => true);
  }

  onParameterChange(listener: ParameterListener): void {
    this.listeners.push(listener);
  }

  offParameterChange(listener: ParameterListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  // -----------------------------------------------------------------------
  // Study configuration
  // -----------------------------------------------------------------------

  /** The configuration this process completes against; created on first use. */
  getStudyConfig(): StudyConfig {
    if (!this.studyConfig) {
      this.studyConfig = new StudyConfig();
    }
    return this.studyConfig;
  }

  setStudyConfig(config: StudyConfig): void {
    this.studyConfig = config;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private validate(name: string, spec: ParameterSpec, value: unknown): ParameterValue {
    const result = PARAMETER_SCHEMAS[spec.type].safeParse(value);
    if (!result.success) {
      throw new InvalidParameterValueError(
        this.name,
        name,
        result.error.issues.map(i => i.message).join('; '),
      );
    }
    return copyValue(result.data);
  }

  private collect(filter: (spec: ParameterSpec) => boolean): Record<string, ParameterValue> {
    const result: Record<string, ParameterValue> = {};
    for (const [name, spec] of this.specs) {
      if (filter(spec)) result[name] = copyValue(this.values.get(name));
    }
    return result;
  }

  private notify(change: ParameterChange): void {
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }
}
