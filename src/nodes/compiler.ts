/**
 * Pipeline Compiler
 *
 * Turns a PipelineDef into a CompiledPipeline:
 * 1. node names are unique
 * 2. every edge endpoint is a declared node
 * 3. the graph is acyclic (Kahn's algorithm)
 * 4. a declared `last` node is an exit node, and is moved to the end
 * 5. every node's `(type, version)` resolves and its config parses
 *
 * Among nodes that become ready at the same time, the one declared first runs
 * first, so identical declarations always compile to the same order.
 */

import type { CompiledNode, CompiledPipeline, NodeDef, PipelineDef } from './types.js';
import type { NodeTypeRegistry } from './registry.js';
import {
  CyclicPipelineError,
  DanglingEdgeError,
  DuplicateNodeNameError,
  EmptyPipelineError,
  InvalidLastNodeError,
} from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'pipeline-compiler' });

interface GraphIndex {
  /** Declaration index per node name */
  position: Map<string, number>;
  successors: Map<string, string[]>;
  predecessors: Map<string, string[]>;
}

function indexGraph(def: PipelineDef): GraphIndex {
  const position = new Map<string, number>();
  def.nodes.forEach((node, index) => {
    if (position.has(node.name)) {
      throw new DuplicateNodeNameError(def.name, node.name);
    }
    position.set(node.name, index);
  });

  const successors = new Map<string, string[]>();
  const predecessors = new Map<string, string[]>();
  for (const node of def.nodes) {
    successors.set(node.name, []);
    predecessors.set(node.name, []);
  }

  const seen = new Set<string>();
  for (const edge of def.edges) {
    const [source, target] = edge;
    for (const endpoint of edge) {
      if (!position.has(endpoint)) {
        throw new DanglingEdgeError(def.name, edge, endpoint);
      }
    }

    // Repeated edges add no ordering constraint
    const key = `${source}\u0000${target}`;
    if (seen.has(key)) continue;
    seen.add(key);

    successors.get(source)?.push(target);
    predecessors.get(target)?.push(source);
  }

  const byDeclaration = (a: string, b: string): number =>
    (position.get(a) ?? 0) - (position.get(b) ?? 0);
  for (const list of predecessors.values()) list.sort(byDeclaration);

  return { position, successors, predecessors };
}

/**
 * Kahn's algorithm over declaration indices; the ready list stays sorted so the
 * earliest-declared eligible node is always taken next.
 * @throws CyclicPipelineError if some node is never released
 */
function sortNodes(def: PipelineDef, graph: GraphIndex): NodeDef[] {
  const { position, successors, predecessors } = graph;

  const inDegree = def.nodes.map((node) => predecessors.get(node.name)?.length ?? 0);
  const ready: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) ready.push(index);
  });

  const order: NodeDef[] = [];
  while (ready.length > 0) {
    const index = ready.shift();
    if (index === undefined) break;
    const node = def.nodes[index];
    order.push(node);

    for (const next of successors.get(node.name) ?? []) {
      const nextIndex = position.get(next);
      if (nextIndex === undefined) continue;
      inDegree[nextIndex] -= 1;
      if (inDegree[nextIndex] === 0) {
        insertSorted(ready, nextIndex);
      }
    }
  }

  if (order.length < def.nodes.length) {
    const visited = new Set(order);
    const unresolved = def.nodes.filter((node) => !visited.has(node)).map((node) => node.name);
    throw new CyclicPipelineError(def.name, unresolved);
  }

  return order;
}

/**
 * Move the pipeline's declared `last` node to the end of the order.
 * Only a node without successors can go there without breaking an edge.
 * @throws InvalidLastNodeError
 */
function placeLast(def: PipelineDef, graph: GraphIndex, order: NodeDef[]): NodeDef[] {
  const { last } = def;
  if (last === undefined) return order;

  const node = order.find((candidate) => candidate.name === last);
  if (!node) {
    throw new InvalidLastNodeError(def.name, last, 'no such node');
  }
  if ((graph.successors.get(last) ?? []).length > 0) {
    throw new InvalidLastNodeError(def.name, last, 'it has outgoing edges');
  }

  return [...order.filter((candidate) => candidate !== node), node];
}

function insertSorted(ready: number[], value: number): void {
  let i = ready.length;
  while (i > 0 && ready[i - 1] > value) {
    i--;
  }
  ready.splice(i, 0, value);
}

/**
 * Node names in execution order
 * @throws EmptyPipelineError | DuplicateNodeNameError | DanglingEdgeError | CyclicPipelineError | InvalidLastNodeError
 */
export function topologicalOrder(def: PipelineDef): string[] {
  if (def.nodes.length === 0) {
    throw new EmptyPipelineError(def.name);
  }
  const graph = indexGraph(def);
  return placeLast(def, graph, sortNodes(def, graph)).map((node) => node.name);
}

/**
 * Compile a pipeline against a registry.
 * Freezes the registry: once compilation begins no node type can be added.
 */
export function compilePipeline(def: PipelineDef, registry: NodeTypeRegistry): CompiledPipeline {
  registry.freeze();

  if (def.nodes.length === 0) {
    throw new EmptyPipelineError(def.name);
  }

  const graph = indexGraph(def);
  const sorted = placeLast(def, graph, sortNodes(def, graph));

  const nodes: CompiledNode[] = sorted.map((node) => {
    const resolved = registry.resolve(node.type, node.version, node.name);
    return Object.freeze({
      name: node.name,
      type: resolved.type,
      version: resolved.version,
      predecessors: Object.freeze([...(graph.predecessors.get(node.name) ?? [])]),
      execute: resolved.bind(node.name, node.config),
    });
  });

  const isEntry = (node: NodeDef): boolean => (graph.predecessors.get(node.name) ?? []).length === 0;
  const isExit = (node: NodeDef): boolean => (graph.successors.get(node.name) ?? []).length === 0;

  const compiled: CompiledPipeline = Object.freeze({
    name: def.name,
    nodes: Object.freeze(nodes),
    entryNodes: Object.freeze(sorted.filter(isEntry).map((node) => node.name)),
    exitNodes: Object.freeze(sorted.filter(isExit).map((node) => node.name)),
  });

  logger.info(
    {
      pipeline: def.name,
      order: nodes.map((node) => node.name),
      edgeCount: def.edges.length,
    },
    'Pipeline compiled'
  );

  return compiled;
}
