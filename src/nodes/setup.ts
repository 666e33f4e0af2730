/**
 * Node Type Setup
 *
 * Builds the registry at startup: built-in node types first, then every
 * extension module the document lists, in order. The registry is frozen later,
 * by the first pipeline compilation.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { NodeTypeRegistry } from './registry.js';
import { builtinNodeTypes } from './impl/index.js';
import type { NodeCapability } from './types.js';
import { AppError, InvalidExtensionError, errorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'node-setup' });

/**
 * Shape of an extension module. At least one export must be present.
 */
export interface ExtensionModule {
  register?: (registry: NodeTypeRegistry) => void | Promise<void>;
  nodeTypes?: ReadonlyArray<NodeCapability<unknown>>;
}

/**
 * Create a registry holding the built-in node types
 */
export function createRegistry(): NodeTypeRegistry {
  const registry = new NodeTypeRegistry();
  registry.registerAll(builtinNodeTypes);
  logger.info({ nodeTypeCount: builtinNodeTypes.length }, 'Built-in node types registered');
  return registry;
}

function isNodeCapability(value: unknown): value is NodeCapability<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'type' in value &&
    typeof value.type === 'string' &&
    'version' in value &&
    typeof value.version === 'string' &&
    'displayName' in value &&
    typeof value.displayName === 'string' &&
    'parseConfig' in value &&
    typeof value.parseConfig === 'function' &&
    'execute' in value &&
    typeof value.execute === 'function'
  );
}

/**
 * Check a loaded module against ExtensionModule
 */
export function toExtensionModule(specifier: string, loaded: unknown): ExtensionModule {
  if (typeof loaded !== 'object' || loaded === null) {
    throw new InvalidExtensionError(specifier, 'module did not load as an object');
  }

  const extension: ExtensionModule = {};

  if ('register' in loaded && loaded.register !== undefined) {
    const register = loaded.register;
    if (typeof register !== 'function') {
      throw new InvalidExtensionError(specifier, "'register' export is not a function");
    }
    extension.register = async (registry) => {
      await register(registry);
    };
  }

  if ('nodeTypes' in loaded && loaded.nodeTypes !== undefined) {
    const nodeTypes: unknown = loaded.nodeTypes;
    if (!Array.isArray(nodeTypes)) {
      throw new InvalidExtensionError(specifier, "'nodeTypes' export is not an array");
    }
    const capabilities: NodeCapability<unknown>[] = [];
    nodeTypes.forEach((candidate: unknown, index) => {
      if (!isNodeCapability(candidate)) {
        throw new InvalidExtensionError(specifier, `nodeTypes[${index}] is not a node capability`);
      }
      capabilities.push(candidate);
    });
    extension.nodeTypes = capabilities;
  }

  if (!extension.register && !extension.nodeTypes) {
    throw new InvalidExtensionError(specifier, "module exports neither 'register' nor 'nodeTypes'");
  }

  return extension;
}

/**
 * Relative and absolute paths resolve against baseDir; anything else is
 * imported as a package name.
 */
export function resolveExtensionSpecifier(specifier: string, baseDir: string): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(baseDir, specifier)).href;
  }
  return specifier;
}

/**
 * Import extension modules and let each add its node types
 * @throws InvalidExtensionError when a module cannot be loaded or has the wrong shape
 */
export async function loadExtensions(
  registry: NodeTypeRegistry,
  specifiers: readonly string[],
  baseDir: string
): Promise<void> {
  for (const specifier of specifiers) {
    let loaded: unknown;
    try {
      loaded = await import(resolveExtensionSpecifier(specifier, baseDir));
    } catch (error) {
      throw new InvalidExtensionError(specifier, errorMessage(error));
    }

    const extension = toExtensionModule(specifier, loaded);
    const before = registry.size;

    try {
      if (extension.nodeTypes) {
        registry.registerAll(extension.nodeTypes);
      }
      if (extension.register) {
        await extension.register(registry);
      }
    } catch (error) {
      // Registry errors (duplicate, frozen) keep their own type
      if (error instanceof AppError) throw error;
      throw new InvalidExtensionError(specifier, errorMessage(error));
    }

    logger.info({ extension: specifier, added: registry.size - before }, 'Extension loaded');
  }
}
