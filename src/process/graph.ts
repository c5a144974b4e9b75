/**
 * Workflow graph of a single pipeline: child nodes joined by data
 * dependencies, traversed producer-before-consumer.
 *
 * Sub-pipelines stay single nodes here; their own graphs are built when
 * completion descends into them.
 */

import { CyclicGraphError } from '../errors.js';
import type { Pipeline } from './pipeline.js';
import type { PipelineNode } from './types.js';

export interface GraphEdge {
  from: string;
  to: string;
}

export class PipelineGraph {
  readonly name: string;
  private nodeMap: Map<string, PipelineNode>;
  private edgeList: GraphEdge[];

  constructor(name: string, nodes: Iterable<PipelineNode>, edges: GraphEdge[]) {
    this.name = name;
    this.nodeMap = new Map();
    for (const node of nodes) {
      this.nodeMap.set(node.name, node);
    }
    this.edgeList = [];
    for (const edge of edges) {
      const duplicate = this.edgeList.some(e => e.from === edge.from && e.to === edge.to);
      if (!duplicate) this.edgeList.push({ ...edge });
    }
  }

  nodes(): PipelineNode[] {
    return [...this.nodeMap.values()];
  }

  edges(): GraphEdge[] {
    return this.edgeList.map(e => ({ ...e }));
  }

  successors(name: string): string[] {
    return this.edgeList.filter(e => e.from === name).map(e => e.to);
  }

  predecessors(name: string): string[] {
    return this.edgeList.filter(e => e.to === name).map(e => e.from);
  }

  /**
   * Nodes in dependency order. Among nodes that are ready at the same time,
   * insertion order wins, so the result is stable for a given pipeline.
   *
   * @throws CyclicGraphError when the dependencies contain a cycle
   */
  topologicalSort(): PipelineNode[] {
    const inDegree = new Map<string, number>();
    for (const name of this.nodeMap.keys()) {
      inDegree.set(name, 0);
    }
    for (const edge of this.edgeList) {
      inDegree.set(edge.to, (inDegree.get(edge.to) ?? 0) + 1);
    }

    const ordered: PipelineNode[] = [];
    const remaining = new Map(this.nodeMap);

    while (remaining.size > 0) {
      let next: PipelineNode | undefined;
      for (const [name, node] of remaining) {
        if (inDegree.get(name) === 0) {
          next = node;
          break;
        }
      }

      if (!next) {
        throw new CyclicGraphError(this.name, [...remaining.keys()]);
      }

      remaining.delete(next.name);
      ordered.push(next);
      for (const successor of this.successors(next.name)) {
        inDegree.set(successor, (inDegree.get(successor) ?? 0) - 1);
      }
    }

    return ordered;
  }
}

/**
 * Build the dependency graph of a pipeline from links between two child
 * nodes. Links to or from the pipeline's own parameters add no edge.
 */
export function buildPipelineGraph(pipeline: Pipeline): PipelineGraph {
  const edges: GraphEdge[] = [];
  for (const link of pipeline.links()) {
    const from = link.source.node;
    const to = link.destination.node;
    if (from === '' || to === '') continue;
    edges.push({ from, to });
  }
  return new PipelineGraph(pipeline.name, pipeline.nodes.values(), edges);
}
