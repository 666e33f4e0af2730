/**
 * Pipeline Runner
 *
 * Walks a compiled pipeline against one request's ExecutionContext. Nodes run
 * strictly in the compiled order; each receives the cumulative data/state of
 * everything before it. A failing node aborts the walk and nothing after it
 * runs. The deadline signal is checked at every node boundary.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type {
  CompiledNode,
  CompiledPipeline,
  ExecutionContext,
  NodeResult,
  ReplyDirectives,
} from './types.js';
import { OperatorError, PipelineTimeoutError, errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { isPlainObject } from '../utils/object.js';
import { PipelineTimer } from '../utils/timer.js';

const logger = createChildLogger({ service: 'pipeline-runner' });

export interface RunOptions {
  /** Request deadline; checked between nodes and handed to every node */
  signal?: AbortSignal;
  /** Request-scoped logger */
  logger?: Logger;
  /** Response directives collected for this request */
  reply?: ReplyDirectives;
}

/**
 * Create an empty set of response directives
 */
export function createReply(): ReplyDirectives {
  return { headers: {} };
}

/**
 * PipelineRunner - executes compiled pipelines
 *
 * Holds no per-request state, so one instance serves all concurrent requests.
 */
export class PipelineRunner {
  /**
   * Execute a pipeline
   * @param pipeline - Compiled pipeline (shared, read-only)
   * @param context - This request's context; mutated in place and returned
   * @throws OperatorError when a node fails
   * @throws PipelineTimeoutError when the signal fires before the walk finishes
   */
  async execute(
    pipeline: CompiledPipeline,
    context: ExecutionContext,
    options: RunOptions = {}
  ): Promise<ExecutionContext> {
    const log = options.logger ?? logger;
    const signal = options.signal ?? new AbortController().signal;
    const reply = options.reply ?? createReply();
    const timer = new PipelineTimer(pipeline.name, log);

    for (const node of pipeline.nodes) {
      if (signal.aborted) {
        throw this.abandon(pipeline, node, log);
      }

      timer.startStep(node.name);

      let result: NodeResult;
      try {
        result = await node.execute(context.data, context.state, {
          pipeline: pipeline.name,
          nodeName: node.name,
          signal,
          logger: log,
          reply,
        });
      } catch (error) {
        if (signal.aborted) {
          throw this.abandon(pipeline, node, log);
        }
        throw this.fail(pipeline, node, errorMessage(error), log, error instanceof Error ? error : undefined);
      }

      timer.endStep();

      if (!isPlainObject(result.data) || !isPlainObject(result.state)) {
        throw this.fail(pipeline, node, 'node must return plain data and state objects', log);
      }

      context.data = result.data;
      context.state = result.state;
    }

    const summary = timer.getSummary();
    log.debug(
      {
        pipeline: pipeline.name,
        totalDurationMs: summary.totalDurationMs,
        steps: summary.steps.map((s) => `${s.step}: ${s.durationFormatted}`),
      },
      'Pipeline execution completed'
    );

    return context;
  }

  private fail(
    pipeline: CompiledPipeline,
    node: CompiledNode,
    reason: string,
    log: Logger,
    originalError?: Error
  ): OperatorError {
    const error = new OperatorError({
      errorId: randomUUID(),
      pipeline: pipeline.name,
      nodeName: node.name,
      nodeType: `${node.type}@${node.version}`,
      reason,
      originalError,
    });

    log.error(
      {
        errorId: error.errorId,
        pipeline: pipeline.name,
        node: node.name,
        type: node.type,
        version: node.version,
        err: originalError ?? error,
      },
      'Node execution failed'
    );

    return error;
  }

  private abandon(pipeline: CompiledPipeline, node: CompiledNode, log: Logger): PipelineTimeoutError {
    log.warn({ pipeline: pipeline.name, node: node.name }, 'Pipeline walk abandoned: deadline exceeded');
    return new PipelineTimeoutError(pipeline.name, node.name);
  }
}

/**
 * Global pipeline runner instance
 */
export const pipelineRunner = new PipelineRunner();
