/**
 * Data Transformer Node
 *
 * Runs a config-supplied script against the request's data and state.
 *
 * ```yaml
 * - name: count
 *   type: data-transformer
 *   version: "1.0"
 *   config:
 *     transformer: |
 *       state.A = state.A + 1
 *       data.count = state.A
 * ```
 */

import { z } from 'zod';
import type { NodeCapability } from '../types.js';
import { isPlainObject } from '../../utils/object.js';
import { compileScript, type CompiledScript } from './script-sandbox.js';

const configSchema = z.object({
  transformer: z.string().min(1),
});

interface DataTransformerConfig {
  script: CompiledScript;
}

export const dataTransformerNode: NodeCapability<DataTransformerConfig> = {
  type: 'data-transformer',
  version: '1.0',
  displayName: 'Data Transformer',

  parseConfig(config) {
    const { transformer } = configSchema.parse(config);
    return { script: compileScript(transformer) };
  },

  execute(data, state, config) {
    // Scripts may rebind either name, so read both back from the scope
    const scope: Record<string, unknown> = { data, state };
    config.script.evaluate(scope);

    const nextData = scope.data;
    const nextState = scope.state;
    if (!isPlainObject(nextData) || !isPlainObject(nextState)) {
      throw new Error('transformer must leave data and state as objects');
    }

    return { data: nextData, state: nextState };
  },
};
