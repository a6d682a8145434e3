// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createToolRegistry, registerToolGroups, ToolRegistrationError } from './registry.ts';
import { textResult } from './result.ts';
import type { Tool, ToolParameter } from './types.ts';

function makeTool(name: string, parameters: ReadonlyArray<ToolParameter> = []): Tool {
  return {
    definition: { name, description: `${name} description`, parameters },
    handler: async () => textResult('ok'),
  };
}

describe('ToolRegistry', () => {
  describe('registration', () => {
    it('should register a tool and include it in getDefinitions', () => {
      const registry = createToolRegistry();

      registry.register(
        makeTool('test_tool', [
          { name: 'query', type: 'string', description: 'A query string', required: true },
        ]),
      );

      const definitions = registry.getDefinitions();
      expect(definitions.length).toBe(1);
      expect(definitions[0]?.name).toBe('test_tool');
    });

    it('should return the exact registered tool from lookup', () => {
      const registry = createToolRegistry();
      const tool = makeTool('test_tool');

      registry.register(tool);

      expect(registry.lookup('test_tool')).toBe(tool);
      expect(registry.lookup('other_tool')).toBeUndefined();
    });

    it('should throw when registering duplicate tool name', () => {
      const registry = createToolRegistry();

      registry.register(makeTool('test_tool'));

      expect(() => {
        registry.register(makeTool('test_tool'));
      }).toThrow('tool already registered: test_tool');
    });

    it('should reject repeated parameter names', () => {
      const registry = createToolRegistry();
      const param: ToolParameter = { name: 'query', type: 'string', description: 'q', required: true };

      expect(() => registry.register(makeTool('test_tool', [param, param]))).toThrow(
        'duplicate parameter query in tool test_tool',
      );
    });

    it('should reject a default that does not match the declared type', () => {
      const registry = createToolRegistry();

      expect(() =>
        registry.register(
          makeTool('test_tool', [
            { name: 'limit', type: 'number', description: 'Limit', required: false, default: '5' },
          ]),
        ),
      ).toThrow('default for parameter limit in tool test_tool is not a number');
    });

    it('should keep registration order in getDefinitions', () => {
      const registry = createToolRegistry();

      registry.register(makeTool('b_tool'));
      registry.register(makeTool('a_tool'));

      expect(registry.getDefinitions().map((d) => d.name)).toEqual(['b_tool', 'a_tool']);
    });

    it('should refuse registrations after seal', () => {
      const registry = createToolRegistry();
      registry.seal();

      expect(registry.sealed).toBe(true);
      expect(() => registry.register(makeTool('late_tool'))).toThrow(
        'tool registry is sealed: cannot register late_tool',
      );
    });
  });

  describe('toModelTools', () => {
    it('should convert tools to MCP listings with JSON Schema', () => {
      const registry = createToolRegistry();

      registry.register({
        definition: {
          name: 'test_tool',
          description: 'Test tool description',
          parameters: [
            { name: 'project_id', type: 'string', description: 'Project', required: true },
            {
              name: 'max_results',
              type: 'number',
              description: 'Limit',
              required: false,
              default: 10,
              positive: true,
            },
            {
              name: 'order',
              type: 'string',
              description: 'Order',
              required: false,
              enum_values: ['asc', 'desc'],
            },
          ],
        },
        handler: async () => textResult('ok'),
      });

      expect(registry.toModelTools()).toEqual([
        {
          name: 'test_tool',
          description: 'Test tool description',
          inputSchema: {
            type: 'object',
            properties: {
              project_id: { type: 'string', description: 'Project' },
              max_results: { type: 'number', description: 'Limit', default: 10, exclusiveMinimum: 0 },
              order: { type: 'string', description: 'Order', enum: ['asc', 'desc'] },
            },
            required: ['project_id'],
          },
        },
      ]);
    });
  });
});

describe('registerToolGroups', () => {
  it('should register every group and seal the registry', () => {
    const registry = createToolRegistry();

    registerToolGroups(registry, [
      { area: 'one', create: () => [makeTool('first')] },
      { area: 'two', create: () => [makeTool('second'), makeTool('third')] },
    ]);

    expect(registry.getDefinitions().map((d) => d.name)).toEqual(['first', 'second', 'third']);
    expect(registry.sealed).toBe(true);
  });

  it('should attempt every group and report each failed area', () => {
    const registry = createToolRegistry();
    let lastGroupAttempted = false;

    let caught: unknown;
    try {
      registerToolGroups(registry, [
        {
          area: 'logs',
          create: () => {
            throw new Error('catalogue missing');
          },
        },
        { area: 'issues', create: () => [makeTool('shared')] },
        {
          area: 'docs',
          create: () => {
            lastGroupAttempted = true;
            return [makeTool('shared')];
          },
        },
      ]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ToolRegistrationError);
    if (caught instanceof ToolRegistrationError) {
      expect(caught.message).toBe(
        'failed to register tool groups: logs: catalogue missing; docs: tool already registered: shared',
      );
      expect(caught.failures.map((f) => f.area)).toEqual(['logs', 'docs']);
    }
    expect(lastGroupAttempted).toBe(true);
    expect(registry.sealed).toBe(false);
  });
});
