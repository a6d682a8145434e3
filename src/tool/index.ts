// pattern: Functional Core (barrel export)

export type {
  ToolParameterType,
  ToolValue,
  ToolParameter,
  ToolDefinition,
  ToolContent,
  ToolResult,
  ToolContext,
  ToolArgs,
  ToolHandler,
  Tool,
  ToolGroup,
  ModelTool,
  ValidationResult,
  ToolRegistry,
  Dispatcher,
} from './types.ts';

export { createToolRegistry, registerToolGroups, ToolRegistrationError } from './registry.ts';
export type { GroupFailure } from './registry.ts';
export { validateParameters, createToolArgs } from './validate.ts';
export { createDispatcher } from './dispatch.ts';
export type { DispatcherOptions } from './dispatch.ts';
export { textResult, errorResult, resultText } from './result.ts';
export { createToolGroups } from './builtin/index.ts';
export type { ToolGroupOptions } from './builtin/index.ts';
