/**
 * Pipeline: a process made of named child nodes connected by parameter links.
 *
 * Values flow along links as soon as a source parameter changes. Links that
 * join two child nodes are the data dependencies of the workflow graph.
 */

import { StructuralMisuseError, UnknownParameterError } from '../errors.js';
import type { StudyConfig } from '../study/config.js';
import { buildPipelineGraph, type PipelineGraph } from './graph.js';
import { Process, type ProcessInit } from './process.js';
import type { Link, ParameterChange, PipelineNode, PlugRef } from './types.js';
import { nodeProcess } from './types.js';

/** Node name used in links for the pipeline's own parameters. */
export const PIPELINE_SELF = '';

/**
 * Parse a plug reference: "node.parameter", or "parameter" for the
 * pipeline itself.
 */
export function parsePlug(text: string): PlugRef {
  const trimmed = text.trim();
  const dot = trimmed.indexOf('.');
  if (dot === -1) return { node: PIPELINE_SELF, parameter: trimmed };
  return { node: trimmed.slice(0, dot), parameter: trimmed.slice(dot + 1) };
}

/**
 * Parse a link expression such as "smooth.output->threshold.input".
 */
export function parseLink(text: string): Link {
  const parts = text.split('->');
  if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) {
    throw new StructuralMisuseError(`Malformed link '${text}', expected 'source->destination'`);
  }
  return { source: parsePlug(parts[0]), destination: parsePlug(parts[1]) };
}

function formatPlug(plug: PlugRef): string {
  return plug.node === PIPELINE_SELF ? plug.parameter : `${plug.node}.${plug.parameter}`;
}

export class Pipeline extends Process {
  private children: Map<string, PipelineNode> = new Map();
  private linkList: Link[] = [];

  constructor(init: ProcessInit) {
    super(init);
    this.onParameterChange(change => this.propagate(PIPELINE_SELF, change));
  }

  // -----------------------------------------------------------------------
  // Nodes
  // -----------------------------------------------------------------------

  /**
   * Add a child node. Nested pipelines become sub-pipeline nodes. The child
   * shares this pipeline's study configuration.
   */
  addProcess(name: string, process: Process): PipelineNode {
    if (name === PIPELINE_SELF || name.includes('.')) {
      throw new StructuralMisuseError(`Invalid node name '${name}'`);
    }
    if (this.children.has(name)) {
      throw new StructuralMisuseError(`Pipeline '${this.name}' already has a node named '${name}'`);
    }
    if (process === this) {
      throw new StructuralMisuseError(`Pipeline '${this.name}' cannot contain itself`);
    }

    const node: PipelineNode = process instanceof Pipeline
      ? { kind: 'pipeline', name, pipeline: process }
      : { kind: 'process', name, process };

    this.children.set(name, node);
    process.setStudyConfig(this.getStudyConfig());
    process.onParameterChange(change => this.propagate(name, change));
    return node;
  }

  /** Child nodes in insertion order. */
  get nodes(): ReadonlyMap<string, PipelineNode> {
    return this.children;
  }

  node(name: string): PipelineNode {
    const node = this.children.get(name);
    if (!node) {
      throw new StructuralMisuseError(`Pipeline '${this.name}' has no node named '${name}'`);
    }
    return node;
  }

  // -----------------------------------------------------------------------
  // Links
  // -----------------------------------------------------------------------

  /**
   * Connect two parameters. A defined source value is pushed to the
   * destination right away.
   */
  addLink(link: string | Link): Link {
    const parsed = typeof link === 'string' ? parseLink(link) : link;
    const source = this.plugProcess(parsed.source);
    this.plugProcess(parsed.destination);
    this.linkList.push(parsed);

    const value = source.getParameter(parsed.source.parameter);
    if (value !== undefined) {
      this.plugProcess(parsed.destination).setParameter(parsed.destination.parameter, value);
    }
    return parsed;
  }

  links(): Link[] {
    return this.linkList.map(l => ({ source: { ...l.source }, destination: { ...l.destination } }));
  }

  /**
   * Export a child parameter as a pipeline parameter of the same type.
   * Inputs are linked pipeline -> node, outputs node -> pipeline.
   */
  exportParameter(nodeName: string, parameter: string, pipelineParameter: string = parameter): void {
    const child = nodeProcess(this.node(nodeName));
    const spec = child.parameterSpec(parameter);
    if (this.hasParameter(pipelineParameter)) {
      throw new StructuralMisuseError(
        `Pipeline '${this.name}' already has a parameter named '${pipelineParameter}'`,
      );
    }
    this.addParameter(pipelineParameter, { ...spec, default: undefined });

    const inner: PlugRef = { node: nodeName, parameter };
    const outer: PlugRef = { node: PIPELINE_SELF, parameter: pipelineParameter };
    if (spec.output) {
      this.addLink({ source: inner, destination: outer });
    } else {
      this.addLink({ source: outer, destination: inner });
    }
  }

  /** Dependency graph between child nodes. */
  workflowGraph(): PipelineGraph {
    return buildPipelineGraph(this);
  }

  override setStudyConfig(config: StudyConfig): void {
    super.setStudyConfig(config);
    for (const node of this.children.values()) {
      nodeProcess(node).setStudyConfig(config);
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private plugProcess(plug: PlugRef): Process {
    const process = plug.node === PIPELINE_SELF ? this : nodeProcess(this.node(plug.node));
    if (!process.hasParameter(plug.parameter)) {
      throw new UnknownParameterError(process.name, formatPlug(plug));
    }
    return process;
  }

  private propagate(nodeName: string, change: ParameterChange): void {
    for (const link of this.linkList) {
      if (link.source.node !== nodeName || link.source.parameter !== change.name) continue;
      this.plugProcess(link.destination).setParameter(link.destination.parameter, change.new_value);
    }
  }
}
