/**
 * Node Type Registry
 *
 * Maps `(type, version)` to an executable capability. Populated at startup from
 * the built-in set and declared extensions, then frozen before the first
 * pipeline is compiled.
 */

import { ZodError } from 'zod';
import type { NodeCapability, NodeConfig, NodeExecutor, ResolvedNodeType } from './types.js';
import {
  DuplicateNodeTypeError,
  InvalidNodeConfigError,
  RegistryFrozenError,
  UnknownNodeTypeError,
  errorMessage,
} from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { formatVersion, parseVersion } from '../utils/version.js';

const logger = createChildLogger({ service: 'node-registry' });

function registryKey(type: string, version: string): string {
  return `${type}@${version}`;
}

// "1" and "1.0" name the same version
function canonicalVersion(version: string): string {
  const parsed = parseVersion(version);
  return parsed ? formatVersion(parsed) : version;
}

/**
 * NodeTypeRegistry - resolves node declarations to capabilities
 */
export class NodeTypeRegistry {
  private types = new Map<string, ResolvedNodeType>();
  private frozen = false;

  /**
   * Register a capability under its `(type, version)`
   * @throws DuplicateNodeTypeError if the pair is taken
   * @throws RegistryFrozenError after freeze()
   */
  register<TConfig>(capability: NodeCapability<TConfig>): void {
    const type = capability.type;
    const version = canonicalVersion(capability.version);
    if (this.frozen) {
      throw new RegistryFrozenError(type, version);
    }

    const key = registryKey(type, version);
    if (this.types.has(key)) {
      throw new DuplicateNodeTypeError(type, version);
    }

    this.types.set(key, {
      type,
      version,
      displayName: capability.displayName,
      bind: (nodeName: string, config: NodeConfig): NodeExecutor => {
        const parsed = parseNodeConfig(capability, nodeName, config);
        return async (data, state, runtime) => capability.execute(data, state, parsed, runtime);
      },
    });
    logger.debug({ type, version }, 'Node type registered');
  }

  /**
   * Register multiple capabilities
   */
  registerAll(capabilities: ReadonlyArray<NodeCapability<unknown>>): void {
    for (const capability of capabilities) {
      this.register(capability);
    }
  }

  /**
   * Resolve a node type
   * @throws UnknownNodeTypeError if absent
   */
  resolve(type: string, version: string, nodeName?: string): ResolvedNodeType {
    const entry = this.types.get(registryKey(type, canonicalVersion(version)));
    if (!entry) {
      throw new UnknownNodeTypeError(type, version, nodeName);
    }
    return entry;
  }

  has(type: string, version: string): boolean {
    return this.types.has(registryKey(type, canonicalVersion(version)));
  }

  /**
   * Refuse further registration. Idempotent.
   */
  freeze(): void {
    if (this.frozen) return;
    this.frozen = true;
    logger.info({ nodeTypeCount: this.types.size }, 'Node type registry frozen');
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.types.size;
  }

  /**
   * Get a summary of registered node types
   */
  summary(): Array<{ type: string; version: string; displayName: string }> {
    return Array.from(this.types.values()).map((t) => ({
      type: t.type,
      version: t.version,
      displayName: t.displayName,
    }));
  }
}

function parseNodeConfig<TConfig>(
  capability: NodeCapability<TConfig>,
  nodeName: string,
  config: NodeConfig
): TConfig {
  try {
    return capability.parseConfig(config);
  } catch (error) {
    if (error instanceof ZodError) {
      const reason = error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new InvalidNodeConfigError(nodeName, reason, error.format());
    }
    if (error instanceof InvalidNodeConfigError) {
      throw error;
    }
    throw new InvalidNodeConfigError(nodeName, errorMessage(error));
  }
}
