import type {
  ToolDefinition,
  ToolHandler,
  ToolHandlerMap,
  ToolRegistryEntry,
  ToolSource,
} from '@parley/core';
import { ToolConflictError } from './errors.js';

/**
 * In-memory tool registry. One is assembled per turn from the local tools
 * and whatever the remote server exposes for the caller.
 */
export class ToolRegistry {
  private readonly entries = new Map<string, ToolRegistryEntry>();

  /** Register a tool. Throws ToolConflictError on duplicate name. */
  register(
    definition: ToolDefinition,
    handler: ToolHandler,
    source: ToolSource,
    remoteServer?: string,
  ): void {
    if (this.entries.has(definition.name)) {
      throw new ToolConflictError(definition.name);
    }
    this.entries.set(
      definition.name,
      remoteServer === undefined ? { definition, handler, source } : { definition, handler, source, remoteServer },
    );
  }

  get(name: string): ToolRegistryEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  getAll(): ToolRegistryEntry[] {
    return [...this.entries.values()];
  }

  /** Build a ToolHandlerMap compatible with executeToolCall(). */
  buildHandlerMap(): ToolHandlerMap {
    const map: ToolHandlerMap = new Map();
    for (const [name, entry] of this.entries) {
      map.set(name, entry.handler);
    }
    return map;
  }

  /** Get ToolDefinition[] for LLM context. */
  getDefinitions(): ToolDefinition[] {
    return this.getAll().map((e) => e.definition);
  }

  get size(): number {
    return this.entries.size;
  }
}
