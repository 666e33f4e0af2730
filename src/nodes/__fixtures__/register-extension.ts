import type { NodeTypeRegistry } from '../registry.js';

export async function register(registry: NodeTypeRegistry): Promise<void> {
  registry.register({
    type: 'shout',
    version: '2',
    displayName: 'Shout',
    parseConfig: (config) => config,
    execute: (data, state) => ({
      data: { ...data, message: String(data.message ?? '').toUpperCase() },
      state,
    }),
  });
}
