/**
 * Process completion engine: fills process parameters from attributes.
 *
 * One engine serves one process under one contextual name ("main.smooth").
 * For a pipeline the engine merges its children's attributes when nothing
 * more specific is registered, pushes its attribute values down to every
 * child in dependency order, then completes its own parameters.
 *
 * Usage:
 *
 * ```typescript
 * const engine = getCompletionEngine(pipeline);
 * const attributes = engine.getAttributeValues();
 * attributes.set('subject', 's01');
 * const report = engine.completeParameters();
 * ```
 */

import {
  ChildConstructionError,
  ConfigurationError,
  NotFoundError,
  StructuralMisuseError,
  toError,
} from '../errors.js';
import type { AttributeChange, AttributeSet } from '../attributes/attribute-set.js';
import { ProcessAttributes, type AttributesSchema, type ProcessAttributesClass } from '../attributes/schema.js';
import { Pipeline } from '../process/pipeline.js';
import type { Process } from '../process/process.js';
import { nodeProcess } from '../process/types.js';
import { createLogger } from '../utils/logger.js';
import * as events from './events.js';
import {
  NullPathCompletionEngineFactory,
  type PathCompletionEngine,
  type PathCompletionEngineFactory,
} from './path-completion.js';

const logger = createLogger('completion');

/** Key of the attribute sub-mapping inside process inputs. */
export const ATTRIBUTES_KEY = 'completion_attributes';

export type ProcessInputs = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Completion report
// ---------------------------------------------------------------------------

export interface ChildConstructionFailure {
  kind: 'child_construction';
  node: string;
  error: ChildConstructionError;
  /** True when a fallback engine completed the child after the first failure. */
  recovered: boolean;
}

export interface ParameterResolutionFailure {
  kind: 'parameter_resolution';
  engine: string;
  parameter: string;
  error: Error;
}

export type CompletionFailure = ChildConstructionFailure | ParameterResolutionFailure;

export interface CompletionReport {
  engine: string;
  /** "<contextual name>.<parameter>" -> assigned value, this node and below. */
  assigned_parameters: Record<string, string>;
  failures: CompletionFailure[];
}

function emptyReport(engine: string): CompletionReport {
  return { engine, assigned_parameters: {}, failures: [] };
}

function mergeReport(target: CompletionReport, source: CompletionReport): void {
  Object.assign(target.assigned_parameters, source.assigned_parameters);
  target.failures.push(...source.failures);
}

function rethrowStructural(error: unknown): Error {
  if (error instanceof StructuralMisuseError) throw error;
  return toError(error);
}

// ---------------------------------------------------------------------------
// Engine attachment
// ---------------------------------------------------------------------------

const attachedEngines = new WeakMap<Process, ProcessCompletionEngine>();

/** The engine currently attached to a process, if any. */
export function getAttachedCompletionEngine(process: Process): ProcessCompletionEngine | undefined {
  return attachedEngines.get(process);
}

export interface ProcessCompletionEngineFactory {
  readonly factoryId: string;
  getCompletionEngine(process: Process, name?: string): ProcessCompletionEngine;
}

// ---------------------------------------------------------------------------
// ProcessCompletionEngine
// ---------------------------------------------------------------------------

export class ProcessCompletionEngine {
  readonly process: Process;
  readonly name: string | undefined;
  /** Set while a notification-triggered completion pass runs. */
  completionOngoing = false;
  private attributes: ProcessAttributes | null = null;
  private readonly changeListener = (change: AttributeChange): void => this.attributesChanged(change);

  constructor(process: Process, name?: string) {
    this.process = process;
    this.name = name;
  }

  /** Dotted name reflecting the position in the pipeline tree. */
  get contextName(): string {
    return this.name ?? this.process.name;
  }

  // -----------------------------------------------------------------------
  // Attributes
  // -----------------------------------------------------------------------

  /**
   * The attribute set of this process, built on first call.
   *
   * A registered "process_attributes" implementation is looked up under the
   * contextual name, then the process name. Pipelines without one merge
   * their children's attributes; the first child declaring a name wins.
   */
  getAttributeValues(): ProcessAttributes {
    if (this.attributes) return this.attributes;

    const schemas = this.getSchemas();
    const AttributesClass = this.selectAttributesClass();
    const attributes = new AttributesClass(this.process, schemas);
    this.attributes = attributes;

    if (AttributesClass === ProcessAttributes && this.process instanceof Pipeline) {
      try {
        this.mergeChildAttributes(this.process, attributes);
      } catch (e) {
        this.attributes = null;
        throw e;
      }
    }
    return attributes;
  }

  /** Trigger completion whenever an attribute value changes. */
  connectAttributes(): void {
    const attributes = this.getAttributeValues();
    attributes.off(this.changeListener);
    attributes.on(this.changeListener);
  }

  disconnectAttributes(): void {
    this.getAttributeValues().off(this.changeListener);
  }

  // -----------------------------------------------------------------------
  // Completion
  // -----------------------------------------------------------------------

  /**
   * Complete parameters from `processInputs`, which may hold plain parameter
   * values and, under ATTRIBUTES_KEY, attribute values.
   *
   * Children are completed before this node, so a pipeline can override
   * the file names its children chose. Failures of one child or one
   * parameter are recorded in the report; structural misuse is thrown.
   */
  completeParameters(processInputs: ProcessInputs = {}): CompletionReport {
    const report = emptyReport(this.contextName);
    const emitter = this.process.getStudyConfig().events;
    emitter.emit(events.completionStarted(this.contextName, this.process.name));

    this.setParameters(processInputs);

    if (this.process instanceof Pipeline) {
      this.completeChildren(this.process, report);
    }
    this.completeOwnParameters(report);

    emitter.emit(events.completionFinished(
      this.contextName,
      Object.keys(report.assigned_parameters).length,
      report.failures.length,
    ));
    return report;
  }

  attributesToPath(parameter: string, attributes: AttributeSet): string | null {
    return this.getPathCompletionEngine().attributesToPath(this.process, parameter, attributes);
  }

  /**
   * Apply inputs to the process. Only attributes already declared on the
   * attribute set are imported; other attribute names are dropped.
   */
  setParameters(processInputs: ProcessInputs): void {
    const attributes = this.getAttributeValues();
    const { [ATTRIBUTES_KEY]: attributeInputs, ...parameters } = processInputs;

    if (isRecord(attributeInputs)) {
      const known: Record<string, unknown> = {};
      for (const [name, value] of Object.entries(attributeInputs)) {
        if (attributes.has(name)) known[name] = value;
      }
      attributes.importFromDict(known);
    }

    this.process.importFromDict(parameters);
  }

  /**
   * Attribute change listener. Runs one completion pass for the changed
   * attribute; changes made during that pass are ignored.
   */
  attributesChanged(change: AttributeChange): void {
    if (change.kind !== 'value' || this.completionOngoing) return;

    this.completionOngoing = true;
    try {
      this.completeParameters({ [ATTRIBUTES_KEY]: { [change.name]: change.new_value } });
    } finally {
      this.completionOngoing = false;
    }
  }

  // -----------------------------------------------------------------------
  // Factories
  // -----------------------------------------------------------------------

  /**
   * The path completion engine configured for this process. Falls back to
   * the null factory, which throws StructuralMisuseError.
   */
  getPathCompletionEngine(): PathCompletionEngine {
    const config = this.process.getStudyConfig();
    let factory: PathCompletionEngineFactory | null = null;
    if (config.attributesEnabled) {
      try {
        factory = config.factory.get('path_completion', config.pathCompletion);
      } catch (e) {
        if (!(e instanceof NotFoundError)) throw e;
      }
    }
    return (factory ?? new NullPathCompletionEngineFactory()).getPathCompletionEngine(this.process);
  }

  static getCompletionEngine(process: Process, name?: string): ProcessCompletionEngine {
    return getCompletionEngine(process, name);
  }

  /** Engine used for a child whose regular engine failed. */
  protected createFallbackEngine(process: Process, name: string): ProcessCompletionEngine {
    return new ProcessCompletionEngine(process, name);
  }

  /** Configured schemas, by schema directory name. */
  protected getSchemas(): Record<string, AttributesSchema> {
    const config = this.process.getStudyConfig();
    const schemas: Record<string, AttributesSchema> = {};
    if (!config.attributesEnabled) return schemas;

    for (const [dir, schemaName] of Object.entries(config.attributesSchemas)) {
      try {
        schemas[dir] = config.factory.get('schema', schemaName);
      } catch (e) {
        if (e instanceof NotFoundError) {
          throw new ConfigurationError(`Attributes schema '${schemaName}' for '${dir}' is not registered`, {
            dir,
            schema: schemaName,
          });
        }
        throw e;
      }
    }
    return schemas;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private selectAttributesClass(): ProcessAttributesClass {
    const config = this.process.getStudyConfig();
    if (!config.attributesEnabled) return ProcessAttributes;

    const names = this.name !== undefined ? [this.name, this.process.name] : [this.process.name];
    for (const name of names) {
      try {
        return config.factory.get('process_attributes', name);
      } catch (e) {
        if (!(e instanceof NotFoundError)) throw e;
      }
    }
    return ProcessAttributes;
  }

  private mergeChildAttributes(pipeline: Pipeline, attributes: ProcessAttributes): void {
    const emitter = pipeline.getStudyConfig().events;

    for (const [nodeName, node] of pipeline.nodes) {
      const child = nodeProcess(node);
      const childName = `${this.contextName}.${nodeName}`;

      let childAttributes: ProcessAttributes;
      try {
        childAttributes = getCompletionEngine(child, childName).getAttributeValues();
      } catch (first) {
        const firstError = rethrowStructural(first);
        try {
          childAttributes = this.createFallbackEngine(child, childName).getAttributeValues();
        } catch (second) {
          const error = rethrowStructural(second);
          logger.debug({ engine: this.contextName, child: childName, err: error, first: firstError.message }, 'child attributes skipped');
          emitter.emit(events.childSkipped(this.contextName, childName, error.message));
          continue;
        }
      }

      const added: string[] = [];
      for (const name of childAttributes.names()) {
        if (attributes.has(name)) continue;
        attributes.declare(childAttributes.definition(name), childAttributes.get(name));
        added.push(name);
      }
      emitter.emit(events.attributesMerged(this.contextName, childName, added));
    }
  }

  private completeChildren(pipeline: Pipeline, report: CompletionReport): void {
    const inputs: ProcessInputs = { [ATTRIBUTES_KEY]: this.getAttributeValues().exportToDict() };
    const graph = pipeline.workflowGraph();

    for (const node of graph.topologicalSort()) {
      const child = nodeProcess(node);
      this.completeChild(child, `${this.contextName}.${node.name}`, inputs, report);
    }
  }

  private completeChild(child: Process, childName: string, inputs: ProcessInputs, report: CompletionReport): void {
    let firstError: Error;
    try {
      mergeReport(report, getCompletionEngine(child, childName).completeParameters(inputs));
      return;
    } catch (e) {
      firstError = rethrowStructural(e);
    }

    const failure = new ChildConstructionError(childName, firstError);
    try {
      mergeReport(report, this.createFallbackEngine(child, childName).completeParameters(inputs));
      report.failures.push({ kind: 'child_construction', node: childName, error: failure, recovered: true });
    } catch (e) {
      const error = rethrowStructural(e);
      report.failures.push({ kind: 'child_construction', node: childName, error: failure, recovered: false });
      logger.debug({ engine: this.contextName, child: childName, err: error }, 'child completion skipped');
      this.process.getStudyConfig().events.emit(events.childSkipped(this.contextName, childName, error.message));
    }
  }

  private completeOwnParameters(report: CompletionReport): void {
    const attributes = this.getAttributeValues();
    const emitter = this.process.getStudyConfig().events;

    for (const parameter of this.process.parameterNames()) {
      try {
        const value = this.attributesToPath(parameter, attributes);
        if (value === null) continue;
        this.process.setParameter(parameter, value);
        report.assigned_parameters[`${this.contextName}.${parameter}`] = value;
        emitter.emit(events.parameterCompleted(this.contextName, parameter, value));
      } catch (e) {
        const error = rethrowStructural(e);
        report.failures.push({ kind: 'parameter_resolution', engine: this.contextName, parameter, error });
        logger.debug({ engine: this.contextName, parameter, err: error }, 'parameter left unset');
        emitter.emit(events.parameterUnresolved(this.contextName, parameter, error.message));
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Default process completion factory: the engine already attached to the
 * process, or a new base engine.
 */
export class BasicProcessCompletionEngineFactory implements ProcessCompletionEngineFactory {
  readonly factoryId = 'basic';

  getCompletionEngine(process: Process, name?: string): ProcessCompletionEngine {
    return attachedEngines.get(process) ?? new ProcessCompletionEngine(process, name);
  }
}

/**
 * Get the completion engine for a process, using the factory selected by
 * its study configuration. The engine stays attached to the process, so
 * later calls return the same object.
 */
export function getCompletionEngine(process: Process, name?: string): ProcessCompletionEngine {
  const config = process.getStudyConfig();
  let factory: ProcessCompletionEngineFactory | null = null;
  if (config.attributesEnabled) {
    try {
      factory = config.factory.get('process_completion', config.processCompletion);
    } catch (e) {
      if (!(e instanceof NotFoundError)) throw e;
    }
  }

  const engine = (factory ?? new BasicProcessCompletionEngineFactory()).getCompletionEngine(process, name);
  attachedEngines.set(process, engine);
  return engine;
}
