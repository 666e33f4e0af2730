/**
 * PipelineRunner Tests
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

import { PipelineRunner, createReply } from './runner.js';
import { compilePipeline } from './compiler.js';
import { NodeTypeRegistry } from './registry.js';
import type { CompiledPipeline, Edge, NodeCapability, NodeResult } from './types.js';
import { OperatorError, PipelineTimeoutError } from '../utils/errors.js';

describe('PipelineRunner', () => {
  let registry: NodeTypeRegistry;
  let executed: string[];
  let runner: PipelineRunner;

  // Appends the node name to data.trail and counts calls in state.calls
  const recorder: NodeCapability = {
    type: 'record',
    version: '1.0',
    displayName: 'Record',
    parseConfig: (config) => config,
    execute: (data, state, _config, runtime) => {
      executed.push(runtime.nodeName);
      const trail = Array.isArray(data.trail) ? data.trail : [];
      const calls = typeof state.calls === 'number' ? state.calls : 0;
      return { data: { ...data, trail: [...trail, runtime.nodeName] }, state: { ...state, calls: calls + 1 } };
    },
  };

  function build(nodes: Array<[name: string, type: string]>, edges: Edge[] = []): CompiledPipeline {
    return compilePipeline(
      {
        name: 'main',
        nodes: nodes.map(([name, type]) => ({ name, type, version: '1.0', config: {} })),
        edges,
      },
      registry
    );
  }

  beforeEach(() => {
    executed = [];
    runner = new PipelineRunner();
    registry = new NodeTypeRegistry();
    registry.register(recorder);
  });

  it('should run nodes in compiled order with cumulative data and state', async () => {
    const pipeline = build(
      [
        ['C', 'record'],
        ['A', 'record'],
        ['B', 'record'],
      ],
      [
        ['A', 'B'],
        ['B', 'C'],
      ]
    );

    const context = await runner.execute(pipeline, { data: { input: 1 }, state: {} });

    expect(executed).toEqual(['A', 'B', 'C']);
    expect(context.data).toEqual({ input: 1, trail: ['A', 'B', 'C'] });
    expect(context.state).toEqual({ calls: 3 });
  });

  it('should return the context it was given', async () => {
    const pipeline = build([['A', 'record']]);
    const context = { data: {}, state: {} };

    await expect(runner.execute(pipeline, context)).resolves.toBe(context);
  });

  it('should stop at a failing node and report it', async () => {
    const cause = new Error('division by zero');
    registry.register({
      type: 'fail',
      version: '1.0',
      displayName: 'Fail',
      parseConfig: (config) => config,
      execute: () => {
        throw cause;
      },
    });
    const pipeline = build(
      [
        ['A', 'record'],
        ['B', 'fail'],
        ['C', 'record'],
      ],
      [
        ['A', 'B'],
        ['B', 'C'],
      ]
    );

    const error = await runner.execute(pipeline, { data: {}, state: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OperatorError);
    if (error instanceof OperatorError) {
      expect(error.pipeline).toBe('main');
      expect(error.nodeName).toBe('B');
      expect(error.nodeType).toBe('fail@1.0');
      expect(error.originalError).toBe(cause);
      expect(error.errorId).toMatch(/^[0-9a-f-]{36}$/);
      expect(error.message).toBe("Node 'B' (fail@1.0) in pipeline 'main' failed: division by zero");
    }
    expect(executed).toEqual(['A']);
  });

  it('should give every failure its own error id', async () => {
    registry.register({
      type: 'fail',
      version: '1.0',
      displayName: 'Fail',
      parseConfig: (config) => config,
      execute: () => {
        throw new Error('nope');
      },
    });
    const pipeline = build([['X', 'fail']]);

    const first = await runner.execute(pipeline, { data: {}, state: {} }).catch((e: unknown) => e);
    const second = await runner.execute(pipeline, { data: {}, state: {} }).catch((e: unknown) => e);

    expect(first).toBeInstanceOf(OperatorError);
    expect(second).toBeInstanceOf(OperatorError);
    if (first instanceof OperatorError && second instanceof OperatorError) {
      expect(first.errorId).not.toBe(second.errorId);
    }
  });

  it('should fail a node that returns something other than objects', async () => {
    registry.register({
      type: 'broken',
      version: '1.0',
      displayName: 'Broken',
      parseConfig: (config) => config,
      execute: (data): NodeResult => ({ data, state: JSON.parse('[1, 2]') }),
    });
    const pipeline = build([['X', 'broken']]);

    await expect(runner.execute(pipeline, { data: {}, state: {} })).rejects.toThrow(
      "Node 'X' (broken@1.0) in pipeline 'main' failed: node must return plain data and state objects"
    );
  });

  it('should not start when the signal has already fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = build([['A', 'record']]);

    await expect(
      runner.execute(pipeline, { data: {}, state: {} }, { signal: controller.signal })
    ).rejects.toThrow("Pipeline 'main' abandoned at node 'A': request deadline exceeded");
    expect(executed).toEqual([]);
  });

  it('should abandon the walk at the next node boundary', async () => {
    const controller = new AbortController();
    registry.register({
      type: 'expire',
      version: '1.0',
      displayName: 'Expire',
      parseConfig: (config) => config,
      execute: (data, state) => {
        controller.abort();
        return { data, state };
      },
    });
    const pipeline = build(
      [
        ['A', 'record'],
        ['B', 'expire'],
        ['C', 'record'],
      ],
      [
        ['A', 'B'],
        ['B', 'C'],
      ]
    );

    const error = await runner
      .execute(pipeline, { data: {}, state: {} }, { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineTimeoutError);
    if (error instanceof PipelineTimeoutError) {
      expect(error.nodeName).toBe('C');
    }
    expect(executed).toEqual(['A']);
  });

  it('should report a node rejected by the deadline as a timeout', async () => {
    const controller = new AbortController();
    registry.register({
      type: 'cancelled',
      version: '1.0',
      displayName: 'Cancelled',
      parseConfig: (config) => config,
      execute: () => {
        controller.abort();
        throw new Error('The operation was aborted');
      },
    });
    const pipeline = build([['W', 'cancelled']]);

    await expect(
      runner.execute(pipeline, { data: {}, state: {} }, { signal: controller.signal })
    ).rejects.toBeInstanceOf(PipelineTimeoutError);
  });

  it('should hand nodes the request reply directives', async () => {
    registry.register({
      type: 'created',
      version: '1.0',
      displayName: 'Created',
      parseConfig: (config) => config,
      execute: (data, state, _config, runtime) => {
        runtime.reply.status = 201;
        runtime.reply.headers['x-node'] = runtime.nodeName;
        return { data, state };
      },
    });
    const pipeline = build([['R', 'created']]);
    const reply = createReply();

    await runner.execute(pipeline, { data: {}, state: {} }, { reply });

    expect(reply).toEqual({ status: 201, headers: { 'x-node': 'R' } });
  });
});
