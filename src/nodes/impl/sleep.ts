import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import type { NodeCapability } from '../types.js';

const configSchema = z.object({
  ms: z.number().int().nonnegative().default(0),
});

type SleepConfig = z.infer<typeof configSchema>;

/**
 * Suspends the current request only; rejects early when the request's
 * deadline fires.
 */
export const sleepNode: NodeCapability<SleepConfig> = {
  type: 'sleep',
  version: '1.0',
  displayName: 'Sleep',

  parseConfig(config) {
    return configSchema.parse(config);
  },

  async execute(data, state, config, runtime) {
    await delay(config.ms, undefined, { signal: runtime.signal });
    return { data, state };
  },
};
