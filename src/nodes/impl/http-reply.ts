/**
 * HTTP Reply Node
 *
 * Declares the response status, extra headers and, optionally, which top-level
 * key of `data` becomes the response body. Data and state pass through.
 */

import { z } from 'zod';
import type { NodeCapability } from '../types.js';

const configSchema = z.object({
  status: z.number().int().min(100).max(599).optional(),
  headers: z.record(z.string()).default({}),
  body: z.string().min(1).optional(),
});

type HttpReplyConfig = z.infer<typeof configSchema>;

export const httpReplyNode: NodeCapability<HttpReplyConfig> = {
  type: 'http-reply',
  version: '1.0',
  displayName: 'HTTP Reply',

  parseConfig(config) {
    return configSchema.parse(config);
  },

  execute(data, state, config, runtime) {
    if (config.status !== undefined) {
      runtime.reply.status = config.status;
    }
    for (const [name, value] of Object.entries(config.headers)) {
      runtime.reply.headers[name.toLowerCase()] = value;
    }
    if (config.body !== undefined) {
      runtime.reply.bodyKey = config.body;
    }
    return { data, state };
  },
};
