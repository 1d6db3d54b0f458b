import type { ToolDescriptor, ToolListing } from "./ToolDescriptor";

/**
 * Fixed lookup table from tool name to descriptor. Descriptors are frozen on
 * the way in; the set of tools cannot change after construction.
 */
export class ToolRegistry {
  private readonly toolsByName: ReadonlyMap<string, ToolDescriptor>;

  constructor(descriptors: readonly ToolDescriptor[]) {
    const byName = new Map<string, ToolDescriptor>();
    for (const descriptor of descriptors) {
      if (byName.has(descriptor.name)) {
        throw new Error(`Tool "${descriptor.name}" is registered twice.`);
      }
      byName.set(descriptor.name, deepFreeze(descriptor));
    }
    this.toolsByName = byName;
  }

  list(): ToolListing[] {
    return Array.from(this.toolsByName.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  get(name: string): ToolDescriptor | undefined {
    return this.toolsByName.get(name);
  }

  names(): string[] {
    return Array.from(this.toolsByName.keys());
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || value instanceof RegExp) {
    return value;
  }
  for (const inner of Object.values(value)) {
    deepFreeze(inner);
  }
  Object.freeze(value);
  return value;
}
