/**
 * Error hierarchy for attribute completion.
 *
 * Recoverable kinds (registry misses, child construction failures, parameter
 * resolution failures) are caught by the completion engine and turned into
 * report entries. Structural misuse always reaches the caller.
 */

// --- Base --------------------------------------------------------------------

export class AttrflowError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, init: { code?: string; context?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, init.cause ? { cause: init.cause } : undefined);
    this.name = 'AttrflowError';
    this.code = init.code ?? 'attrflow_error';
    this.context = init.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// --- Registry ----------------------------------------------------------------

export class NotFoundError extends AttrflowError {
  readonly category: string;
  readonly key: string;

  constructor(category: string, key: string) {
    super(`No '${category}' implementation registered under '${key}'`, {
      code: 'not_found',
      context: { category, key },
    });
    this.name = 'NotFoundError';
    this.category = category;
    this.key = key;
  }
}

// --- Completion ----------------------------------------------------------------

export class ChildConstructionError extends AttrflowError {
  readonly node: string;

  constructor(node: string, cause: Error) {
    super(`Completion of child '${node}' failed: ${cause.message}`, {
      code: 'child_construction',
      context: { node },
      cause,
    });
    this.name = 'ChildConstructionError';
    this.node = node;
  }
}

export class ParameterResolutionError extends AttrflowError {
  readonly parameter: string;

  constructor(parameter: string, message: string, context: Record<string, unknown> = {}) {
    super(message, { code: 'parameter_resolution', context: { parameter, ...context } });
    this.name = 'ParameterResolutionError';
    this.parameter = parameter;
  }
}

/**
 * Programming or configuration error. Never swallowed by a completion pass.
 */
export class StructuralMisuseError extends AttrflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'structural_misuse', context });
    this.name = 'StructuralMisuseError';
  }
}

export class CyclicGraphError extends StructuralMisuseError {
  readonly nodes: string[];

  constructor(pipeline: string, nodes: string[]) {
    super(`Pipeline '${pipeline}' has a dependency cycle between nodes: ${nodes.join(', ')}`, {
      pipeline,
      nodes,
    });
    this.name = 'CyclicGraphError';
    this.nodes = nodes;
  }
}

// --- Attributes ----------------------------------------------------------------

export class UnknownAttributeError extends AttrflowError {
  constructor(name: string) {
    super(`Unknown attribute '${name}'`, { code: 'unknown_attribute', context: { name } });
    this.name = 'UnknownAttributeError';
  }
}

export class InvalidAttributeValueError extends AttrflowError {
  constructor(name: string, detail: string) {
    super(`Invalid value for attribute '${name}': ${detail}`, {
      code: 'invalid_attribute_value',
      context: { name },
    });
    this.name = 'InvalidAttributeValueError';
  }
}

export class AttributeTypeConflictError extends AttrflowError {
  constructor(name: string, existing: string, requested: string) {
    super(`Attribute '${name}' is declared as '${existing}', cannot redeclare as '${requested}'`, {
      code: 'attribute_type_conflict',
      context: { name, existing, requested },
    });
    this.name = 'AttributeTypeConflictError';
  }
}

// --- Parameters ----------------------------------------------------------------

export class UnknownParameterError extends AttrflowError {
  constructor(process: string, name: string) {
    super(`Process '${process}' has no parameter '${name}'`, {
      code: 'unknown_parameter',
      context: { process, name },
    });
    this.name = 'UnknownParameterError';
  }
}

export class InvalidParameterValueError extends AttrflowError {
  constructor(process: string, name: string, detail: string) {
    super(`Invalid value for parameter '${process}.${name}': ${detail}`, {
      code: 'invalid_parameter_value',
      context: { process, name },
    });
    this.name = 'InvalidParameterValueError';
  }
}

// --- Configuration ---------------------------------------------------------------

/**
 * Invalid study configuration. Treated as structural misuse: a completion
 * pass never continues past it.
 */
export class ConfigurationError extends StructuralMisuseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigurationError';
  }
}

/** Normalize anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
