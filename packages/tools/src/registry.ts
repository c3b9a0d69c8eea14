import type { ToolDefinition } from './types.js';

/**
 * The tools one agent is allowed to call, by name. The searcher's registry holds
 * only search_products_visual and the executor's holds the two shopping tools, so
 * neither model can reach the other's tools. The agent loop turns this registry
 * into OpenAI function definitions and looks each tool call up here by name.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) this.register(tool);
  }

  /** Two tools with one name would make a model's tool call ambiguous. */
  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(
        `ToolRegistry: tool "${tool.name}" is already registered. ` +
          `Call unregister("${tool.name}") first if you intend to replace it.`,
      );
    }
    this.tools.set(tool.name, tool);
  }

  /**
   * @returns true if the tool was found and removed
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Array<{ name: string; description: string }> {
    return Array.from(this.tools.values()).map((t) => ({
      name: t.name,
      description: t.description,
    }));
  }

  count(): number {
    return this.tools.size;
  }
}
