/**
 * Built-in node types
 */

import type { NodeCapability } from '../types.js';
import { dataTransformerNode } from './data-transformer.js';
import { sleepNode } from './sleep.js';
import { httpReplyNode } from './http-reply.js';
import { debugLogNode } from './debug-log.js';

export { dataTransformerNode, sleepNode, httpReplyNode, debugLogNode };
export { compileScript, type CompiledScript } from './script-sandbox.js';

/**
 * Every built-in capability, registered before any extension
 */
export const builtinNodeTypes: ReadonlyArray<NodeCapability<unknown>> = [
  dataTransformerNode,
  sleepNode,
  httpReplyNode,
  debugLogNode,
];
