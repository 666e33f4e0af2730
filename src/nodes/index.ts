export * from './types.js';
export { NodeTypeRegistry } from './registry.js';
export { compilePipeline, topologicalOrder } from './compiler.js';
export { PipelineRunner, pipelineRunner, createReply, type RunOptions } from './runner.js';
export { createRegistry, loadExtensions, type ExtensionModule } from './setup.js';
export { builtinNodeTypes } from './impl/index.js';
