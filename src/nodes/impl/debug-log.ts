import { z } from 'zod';
import type { NodeCapability } from '../types.js';

const configSchema = z.object({
  message: z.string().min(1).default('Pipeline checkpoint'),
  level: z.enum(['debug', 'info']).default('debug'),
});

type DebugLogConfig = z.infer<typeof configSchema>;

/**
 * Logs the data keys and the state at this point of the walk
 */
export const debugLogNode: NodeCapability<DebugLogConfig> = {
  type: 'debug-log',
  version: '1.0',
  displayName: 'Debug Log',

  parseConfig(config) {
    return configSchema.parse(config);
  },

  execute(data, state, config, runtime) {
    runtime.logger[config.level](
      {
        pipeline: runtime.pipeline,
        node: runtime.nodeName,
        dataKeys: Object.keys(data),
        state,
      },
      config.message
    );
    return { data, state };
  },
};
