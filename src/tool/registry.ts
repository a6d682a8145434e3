// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration by capability area, lookup, and the JSON-Schema listing served to MCP clients.
 */

import type {
  ModelTool,
  Tool,
  ToolDefinition,
  ToolGroup,
  ToolParameter,
  ToolRegistry,
} from './types.ts';

export type GroupFailure = {
  readonly area: string;
  readonly error: string;
};

export class ToolRegistrationError extends Error {
  constructor(public readonly failures: ReadonlyArray<GroupFailure>) {
    super(
      `failed to register tool groups: ${failures.map((f) => `${f.area}: ${f.error}`).join('; ')}`,
    );
    this.name = 'ToolRegistrationError';
  }
}

function checkDefinition(definition: ToolDefinition): void {
  const seen = new Set<string>();

  for (const param of definition.parameters) {
    if (seen.has(param.name)) {
      throw new Error(`duplicate parameter ${param.name} in tool ${definition.name}`);
    }
    seen.add(param.name);

    if (param.default !== undefined && typeof param.default !== param.type) {
      throw new Error(
        `default for parameter ${param.name} in tool ${definition.name} is not a ${param.type}`,
      );
    }
  }
}

function toPropertySchema(param: ToolParameter): Record<string, unknown> {
  return {
    type: param.type,
    description: param.description,
    ...(param.default !== undefined && { default: param.default }),
    ...(param.positive && { exclusiveMinimum: 0 }),
    ...(param.enum_values && { enum: param.enum_values }),
  };
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();
  let sealed = false;

  return {
    get sealed(): boolean {
      return sealed;
    },

    register(tool: Tool): void {
      if (sealed) {
        throw new Error(`tool registry is sealed: cannot register ${tool.definition.name}`);
      }
      if (tools.has(tool.definition.name)) {
        throw new Error(`tool already registered: ${tool.definition.name}`);
      }
      checkDefinition(tool.definition);
      tools.set(tool.definition.name, tool);
    },

    lookup(name: string): Tool | undefined {
      return tools.get(name);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    toModelTools(): Array<ModelTool> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, Record<string, unknown>> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = toPropertySchema(param);
          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          inputSchema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },

    seal(): void {
      sealed = true;
    },
  };
}

/**
 * Register every capability area, then seal the registry.
 * Each group is attempted even when an earlier one failed; all failures are reported together.
 */
export function registerToolGroups(
  registry: ToolRegistry,
  groups: ReadonlyArray<ToolGroup>,
): void {
  const failures: Array<GroupFailure> = [];

  for (const group of groups) {
    try {
      for (const tool of group.create()) {
        registry.register(tool);
      }
    } catch (error) {
      failures.push({
        area: group.area,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (failures.length > 0) {
    throw new ToolRegistrationError(failures);
  }

  registry.seal();
}
