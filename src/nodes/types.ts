/**
 * Node Types
 *
 * Core type definitions for declarative pipelines.
 *
 * - Declarations (NodeDef, PipelineDef) come from the configuration document.
 * - Capabilities (NodeCapability) are the executable behaviors registered under
 *   a `(type, version)` pair.
 * - CompiledPipeline is the immutable, topologically ordered form shared by every
 *   request for a route.
 * - ExecutionContext is the per-request mutable pair of `data` and `state`.
 */

import type { Logger } from 'pino';

/** Evolving request/response payload */
export type DataMap = Record<string, unknown>;

/** Evolving per-request accumulator */
export type StateMap = Record<string, unknown>;

/** Operator-specific parameters as declared in configuration */
export type NodeConfig = Readonly<Record<string, unknown>>;

/** Directed dependency link, source -> target */
export type Edge = readonly [source: string, target: string];

/**
 * A node as declared inside a pipeline
 */
export interface NodeDef {
  name: string;
  type: string;
  /** Canonical `major.minor` */
  version: string;
  config: NodeConfig;
}

/**
 * A pipeline as declared in configuration
 */
export interface PipelineDef {
  name: string;
  nodes: readonly NodeDef[];
  edges: readonly Edge[];
  /** Exit node that must run after every other node */
  last?: string;
}

/**
 * Output of a single node
 */
export interface NodeResult {
  data: DataMap;
  state: StateMap;
}

/**
 * Response directives a node may set for the current request
 */
export interface ReplyDirectives {
  status?: number;
  headers: Record<string, string>;
  /** Top-level key of `data` to send instead of the whole map */
  bodyKey?: string;
}

/**
 * Per-invocation facilities handed to a node capability
 */
export interface NodeRuntime {
  readonly pipeline: string;
  readonly nodeName: string;
  /** Fires when the request deadline passes */
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly reply: ReplyDirectives;
}

/**
 * Executable behavior registered under `(type, version)`.
 *
 * `parseConfig` runs once per node at compile time; whatever it returns is
 * handed to every `execute` call for that node and must be treated as read-only.
 */
export interface NodeCapability<TConfig = NodeConfig> {
  readonly type: string;
  readonly version: string;
  readonly displayName: string;
  parseConfig(config: NodeConfig): TConfig;
  execute(
    data: DataMap,
    state: StateMap,
    config: TConfig,
    runtime: NodeRuntime
  ): Promise<NodeResult> | NodeResult;
}

/**
 * A capability bound to one node's parsed config
 */
export type NodeExecutor = (data: DataMap, state: StateMap, runtime: NodeRuntime) => Promise<NodeResult>;

/**
 * Registry entry returned by `resolve`
 */
export interface ResolvedNodeType {
  readonly type: string;
  readonly version: string;
  readonly displayName: string;
  /**
   * Parse the node's config and close over it.
   * @throws InvalidNodeConfigError
   */
  bind(nodeName: string, config: NodeConfig): NodeExecutor;
}

/**
 * Immutable node record inside a compiled pipeline
 */
export interface CompiledNode {
  readonly name: string;
  readonly type: string;
  readonly version: string;
  /** Nodes whose outputs feed this one, in declaration order */
  readonly predecessors: readonly string[];
  readonly execute: NodeExecutor;
}

/**
 * Topologically ordered, type-resolved pipeline
 */
export interface CompiledPipeline {
  readonly name: string;
  readonly nodes: readonly CompiledNode[];
  /** Nodes without incoming edges */
  readonly entryNodes: readonly string[];
  /** Nodes without outgoing edges */
  readonly exitNodes: readonly string[];
}

/**
 * Per-request mutable state, owned by exactly one request
 */
export interface ExecutionContext {
  data: DataMap;
  state: StateMap;
}
