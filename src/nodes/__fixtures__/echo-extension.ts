import type { NodeCapability } from '../types.js';

const echoNode: NodeCapability = {
  type: 'echo',
  version: '1.0',
  displayName: 'Echo',
  parseConfig: (config) => config,
  execute: (data, state, config) => ({ data: { ...data, echo: config.value ?? null }, state }),
};

export const nodeTypes = [echoNode];
