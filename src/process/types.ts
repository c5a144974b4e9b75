/**
 * Core types for processes, pipelines and their parameters.
 */

import type { Process } from './process.js';
import type { Pipeline } from './pipeline.js';

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export type ParameterType = 'file' | 'directory' | 'string' | 'number' | 'boolean' | 'list';

/** Parameter types whose values are filesystem paths. */
export const PATH_PARAMETER_TYPES: ReadonlySet<ParameterType> = new Set(['file', 'directory']);

export type ParameterValue = string | number | boolean | string[] | undefined;

export interface ParameterSpec {
  type: ParameterType;
  output?: boolean;
  optional?: boolean;
  description?: string;
  default?: ParameterValue;
}

export interface ParameterChange {
  process: Process;
  name: string;
  old_value: ParameterValue;
  new_value: ParameterValue;
}

export type ParameterListener = (change: ParameterChange) => void;

// ---------------------------------------------------------------------------
// Pipeline nodes and links
// ---------------------------------------------------------------------------

export interface ProcessNode {
  kind: 'process';
  name: string;
  process: Process;
}

export interface SubPipelineNode {
  kind: 'pipeline';
  name: string;
  pipeline: Pipeline;
}

export type PipelineNode = ProcessNode | SubPipelineNode;

/** The process a node stands for; sub-pipelines unwrap to their pipeline. */
export function nodeProcess(node: PipelineNode): Process {
  return node.kind === 'pipeline' ? node.pipeline : node.process;
}

/**
 * One end of a link. An empty node name refers to the pipeline itself.
 */
export interface PlugRef {
  node: string;
  parameter: string;
}

export interface Link {
  source: PlugRef;
  destination: PlugRef;
}
