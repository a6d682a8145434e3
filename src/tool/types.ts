// pattern: Functional Core

/**
 * Tool system types for registration, validation and dispatch.
 * These types define the port interface for the tool registry, the dispatcher and tool handlers.
 */

export type ToolParameterType = 'string' | 'number' | 'boolean';

export type ToolValue = string | number | boolean;

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  /** Substituted when an optional parameter is absent. Must match `type`. */
  default?: ToolValue;
  /** Numbers only: reject zero and negative values. */
  positive?: boolean;
  enum_values?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolContent = {
  readonly type: 'text';
  readonly text: string;
};

/**
 * Uniform envelope returned from every invocation.
 * Errors are carried as plain text content with isError set, never thrown.
 */
export type ToolResult = {
  readonly content: ReadonlyArray<ToolContent>;
  readonly isError: boolean;
};

export type ToolContext = {
  readonly signal: AbortSignal;
};

/**
 * Arguments that passed validation. The accessors throw when a handler asks
 * for a name or kind its own definition does not declare.
 */
export type ToolArgs = {
  readonly values: Readonly<Record<string, ToolValue>>;
  string(name: string): string;
  optionalString(name: string): string | undefined;
  number(name: string): number;
  boolean(name: string): boolean;
};

export type ToolHandler = (args: ToolArgs, context: ToolContext) => Promise<ToolResult>;

export type Tool = {
  readonly definition: ToolDefinition;
  readonly handler: ToolHandler;
};

/**
 * A capability area (issues, logs, cluster info, ...) registered as a unit.
 */
export type ToolGroup = {
  readonly area: string;
  create(): Array<Tool>;
};

export type ModelTool = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, Record<string, unknown>>;
    required: Array<string>;
  };
};

export type ValidationResult =
  | { readonly ok: true; readonly args: ToolArgs }
  | { readonly ok: false; readonly field: string; readonly message: string };

export interface ToolRegistry {
  register(tool: Tool): void;
  lookup(name: string): Tool | undefined;
  getDefinitions(): Array<ToolDefinition>;
  toModelTools(): Array<ModelTool>;
  seal(): void;
  readonly sealed: boolean;
}

export type Dispatcher = {
  invoke(name: string, args: Readonly<Record<string, unknown>>, signal?: AbortSignal): Promise<ToolResult>;
};
