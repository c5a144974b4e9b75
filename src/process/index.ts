/**
 * Processes and pipelines - barrel exports.
 */

export { Process } from './process.js';
export type { ProcessInit } from './process.js';

export { Pipeline, PIPELINE_SELF, parseLink, parsePlug } from './pipeline.js';

export { PipelineGraph, buildPipelineGraph } from './graph.js';
export type { GraphEdge } from './graph.js';

export { formatParameterSpecs, formatProcessHelp, inputHelp, outputHelp } from './help.js';

export { PATH_PARAMETER_TYPES, nodeProcess } from './types.js';
export type {
  Link,
  ParameterChange,
  ParameterListener,
  ParameterSpec,
  ParameterType,
  ParameterValue,
  PipelineNode,
  PlugRef,
  ProcessNode,
  SubPipelineNode,
} from './types.js';
