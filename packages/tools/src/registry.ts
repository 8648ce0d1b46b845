import type { ToolDefinition, ToolContext, ToolGroup, ToolResult } from './types.js';
import { articleTools } from './articles/index.js';
import { dataTools } from './data/index.js';
import { standardsTools } from './standards/index.js';

export const TOOL_GROUPS: ToolGroup[] = [
  {
    name: 'articles',
    description: 'Latest articles, keyword search and section listings',
    tools: articleTools,
  },
  {
    name: 'data',
    description: 'Agent economy statistics and the wire feed',
    tools: dataTools,
  },
  {
    name: 'standards',
    description: 'Editorial standards and signing methodology',
    tools: standardsTools,
  },
];

// Mapping from config group names to individual tool definitions
const TOOL_GROUP_MAP = new Map<string, ToolDefinition[]>(
  TOOL_GROUPS.map(group => [group.name, group.tools]),
);

export const TOOL_GROUP_NAMES = TOOL_GROUPS.map(group => group.name);

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  /**
   * @param groupNames Groups (or individual tool names) to expose.
   * Defaults to every built-in group.
   */
  constructor(groupNames: string[] = TOOL_GROUP_NAMES) {
    for (const tool of ToolRegistry.resolveToolGroups(groupNames)) {
      this.tools.set(tool.name, tool);
    }
  }

  register(tool: ToolDefinition): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Check if a name (group or individual tool) is known.
   * Used by config validation before the registry is built.
   */
  static isAvailable(name: string): boolean {
    if (TOOL_GROUP_MAP.has(name)) return true;
    return TOOL_GROUPS.some(group => group.tools.some(tool => tool.name === name));
  }

  /**
   * Resolve group names from config (e.g., 'articles', 'data') into
   * individual ToolDefinitions. Individual tool names are accepted too.
   * Order follows the input; duplicates are dropped.
   */
  static resolveToolGroups(groupNames: string[]): ToolDefinition[] {
    const resolved: ToolDefinition[] = [];
    const seen = new Set<string>();

    const add = (tool: ToolDefinition): void => {
      if (!seen.has(tool.name)) {
        resolved.push(tool);
        seen.add(tool.name);
      }
    };

    for (const groupName of groupNames) {
      const group = TOOL_GROUP_MAP.get(groupName);
      if (group) {
        group.forEach(add);
        continue;
      }

      for (const candidate of TOOL_GROUPS) {
        const individual = candidate.tools.find(tool => tool.name === groupName);
        if (individual) add(individual);
      }
    }

    return resolved;
  }

  /**
   * Execute a tool by name with given parameters.
   */
  async executeTool(
    name: string,
    params: unknown,
    context: ToolContext,
  ): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return {
        success: false,
        data: null,
        error: `Unknown tool: ${name}`,
        code: 'INVALID_ARGUMENT',
      };
    }

    return tool.execute(params, context);
  }
}

/** Singleton for convenience */
let defaultRegistry: ToolRegistry | null = null;

export function getToolRegistry(): ToolRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ToolRegistry();
  }
  return defaultRegistry;
}

export function resetToolRegistry(): void {
  defaultRegistry = null;
}
