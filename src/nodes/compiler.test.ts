/**
 * Pipeline Compiler Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { compilePipeline, topologicalOrder } from './compiler.js';
import { NodeTypeRegistry } from './registry.js';
import type { Edge, NodeDef, PipelineDef } from './types.js';
import {
  CyclicPipelineError,
  DanglingEdgeError,
  DuplicateNodeNameError,
  EmptyPipelineError,
  InvalidLastNodeError,
  InvalidNodeConfigError,
  UnknownNodeTypeError,
} from '../utils/errors.js';

function node(name: string, type = 'pass', config: Record<string, unknown> = {}): NodeDef {
  return { name, type, version: '1.0', config };
}

function pipeline(names: string[], edges: Edge[] = []): PipelineDef {
  return { name: 'test', nodes: names.map((name) => node(name)), edges };
}

describe('topologicalOrder', () => {
  it('should order a linear chain', () => {
    expect(topologicalOrder(pipeline(['A', 'B', 'C'], [['A', 'B'], ['B', 'C']]))).toEqual(['A', 'B', 'C']);
  });

  it('should follow edges over declaration order', () => {
    expect(topologicalOrder(pipeline(['O', 'T', 'I'], [['I', 'T'], ['T', 'O']]))).toEqual(['I', 'T', 'O']);
  });

  it('should break ties by declaration order', () => {
    const def = pipeline(['A', 'C', 'B', 'D'], [['A', 'B'], ['A', 'C'], ['B', 'D'], ['C', 'D']]);
    expect(topologicalOrder(def)).toEqual(['A', 'C', 'B', 'D']);
  });

  it('should keep unconnected nodes in declaration order', () => {
    expect(topologicalOrder(pipeline(['X', 'Y', 'Z']))).toEqual(['X', 'Y', 'Z']);
  });

  it('should release a later-declared node as soon as it becomes ready', () => {
    // B waits for Z; A and Z are both roots
    const def = pipeline(['B', 'A', 'Z'], [['Z', 'B']]);
    expect(topologicalOrder(def)).toEqual(['A', 'Z', 'B']);
  });

  it('should be deterministic', () => {
    const def = pipeline(['E', 'D', 'C', 'B', 'A'], [['A', 'C'], ['B', 'C'], ['C', 'D'], ['C', 'E']]);
    const first = topologicalOrder(def);

    for (let i = 0; i < 5; i++) {
      expect(topologicalOrder(def)).toEqual(first);
    }
    expect(first).toEqual(['B', 'A', 'C', 'E', 'D']);
  });

  it('should reject duplicate node names', () => {
    expect(() => topologicalOrder(pipeline(['A', 'B', 'A']))).toThrow(DuplicateNodeNameError);
  });

  it('should reject edges to undeclared nodes', () => {
    expect(() => topologicalOrder(pipeline(['A'], [['A', 'Z']]))).toThrow(
      "Pipeline 'test' edge 'A -> Z' references undeclared node 'Z'"
    );
    expect(() => topologicalOrder(pipeline(['A'], [['Q', 'A']]))).toThrow(DanglingEdgeError);
  });

  it('should reject cycles and name the nodes on them', () => {
    const def = pipeline(['A', 'B', 'C'], [['A', 'B'], ['B', 'A']]);

    expect(() => topologicalOrder(def)).toThrow(CyclicPipelineError);
    expect(() => topologicalOrder(def)).toThrow("Pipeline 'test' contains a cycle through [A, B]");
  });

  it('should reject self-loops', () => {
    expect(() => topologicalOrder(pipeline(['A'], [['A', 'A']]))).toThrow(CyclicPipelineError);
  });

  it('should reject empty pipelines', () => {
    expect(() => topologicalOrder(pipeline([]))).toThrow(EmptyPipelineError);
  });

  describe('last node', () => {
    it('should move the declared last node to the end', () => {
      const def = { ...pipeline(['A', 'B', 'C'], [['A', 'B']]), last: 'B' };
      expect(topologicalOrder(def)).toEqual(['A', 'C', 'B']);
    });

    it('should leave the order alone when the last node already ends it', () => {
      const def = { ...pipeline(['A', 'B'], [['A', 'B']]), last: 'B' };
      expect(topologicalOrder(def)).toEqual(['A', 'B']);
    });

    it('should reject a last node with outgoing edges', () => {
      const def = { ...pipeline(['A', 'B'], [['A', 'B']]), last: 'A' };

      expect(() => topologicalOrder(def)).toThrow(InvalidLastNodeError);
      expect(() => topologicalOrder(def)).toThrow("Pipeline 'test' cannot end at node 'A': it has outgoing edges");
    });

    it('should reject an undeclared last node', () => {
      const def = { ...pipeline(['A']), last: 'Q' };
      expect(() => topologicalOrder(def)).toThrow("Pipeline 'test' cannot end at node 'Q': no such node");
    });
  });
});

describe('compilePipeline', () => {
  let registry: NodeTypeRegistry;

  beforeEach(() => {
    registry = new NodeTypeRegistry();
    registry.register({
      type: 'pass',
      version: '1.0',
      displayName: 'Pass',
      parseConfig: (config) => config,
      execute: (data, state) => ({ data, state }),
    });
  });

  it('should compile nodes in execution order', () => {
    const compiled = compilePipeline(pipeline(['O', 'I'], [['I', 'O']]), registry);

    expect(compiled.name).toBe('test');
    expect(compiled.nodes.map((n) => n.name)).toEqual(['I', 'O']);
    expect(compiled.nodes[0].type).toBe('pass');
    expect(compiled.nodes[0].version).toBe('1.0');
  });

  it('should compile the declared last node last', () => {
    const compiled = compilePipeline({ ...pipeline(['A', 'B', 'C'], [['A', 'B']]), last: 'B' }, registry);
    expect(compiled.nodes.map((n) => n.name)).toEqual(['A', 'C', 'B']);
  });

  it('should record entry and exit nodes', () => {
    const compiled = compilePipeline(pipeline(['A', 'B', 'C', 'D'], [['A', 'B'], ['A', 'C']]), registry);

    expect(compiled.entryNodes).toEqual(['A', 'D']);
    expect(compiled.exitNodes).toEqual(['B', 'C', 'D']);
  });

  it('should list predecessors once each, in declaration order', () => {
    const compiled = compilePipeline(
      pipeline(['A', 'B', 'C'], [['B', 'C'], ['A', 'C'], ['A', 'C']]),
      registry
    );

    const last = compiled.nodes[2];
    expect(last.name).toBe('C');
    expect(last.predecessors).toEqual(['A', 'B']);
  });

  it('should freeze the result and the registry', () => {
    const compiled = compilePipeline(pipeline(['A']), registry);

    expect(Object.isFrozen(compiled)).toBe(true);
    expect(Object.isFrozen(compiled.nodes)).toBe(true);
    expect(Object.isFrozen(compiled.nodes[0])).toBe(true);
    expect(registry.isFrozen).toBe(true);
  });

  it('should fail on an unknown node type', () => {
    const def: PipelineDef = { name: 'test', nodes: [node('A', 'mystery')], edges: [] };
    expect(() => compilePipeline(def, registry)).toThrow(UnknownNodeTypeError);
  });

  it('should fail on an unknown version of a known type', () => {
    const def: PipelineDef = {
      name: 'test',
      nodes: [{ name: 'A', type: 'pass', version: '2.0', config: {} }],
      edges: [],
    };
    expect(() => compilePipeline(def, registry)).toThrow("Unknown node type 'pass@2.0' (node 'A')");
  });

  it('should fail when a node config does not parse', () => {
    const strict = new NodeTypeRegistry();
    strict.register({
      type: 'needs-key',
      version: '1.0',
      displayName: 'Needs key',
      parseConfig: (config) => {
        if (typeof config.key !== 'string') throw new Error('key is required');
        return config;
      },
      execute: (data, state) => ({ data, state }),
    });

    const def: PipelineDef = { name: 'test', nodes: [node('A', 'needs-key')], edges: [] };
    expect(() => compilePipeline(def, strict)).toThrow(InvalidNodeConfigError);
  });

  it('should check the graph before resolving node types', () => {
    const def: PipelineDef = {
      name: 'test',
      nodes: [node('A', 'mystery'), node('B', 'mystery')],
      edges: [['A', 'B'], ['B', 'A']],
    };
    expect(() => compilePipeline(def, registry)).toThrow(CyclicPipelineError);
  });
});
