// pattern: Functional Core

/**
 * Parameter validation for tool invocations.
 * Checks an untyped argument map against a tool's declared parameters and produces typed values.
 */

import type {
  ToolArgs,
  ToolParameter,
  ToolParameterType,
  ToolValue,
  ValidationResult,
} from './types.ts';

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function isAbsent(value: unknown, type: ToolParameterType): boolean {
  return value === undefined || value === null || (type === 'string' && value === '');
}

function asToolValue(value: unknown, expectedType: ToolParameterType): ToolValue | undefined {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string' ? value : undefined;
    case 'number':
      return typeof value === 'number' ? value : undefined;
    case 'boolean':
      return typeof value === 'boolean' ? value : undefined;
    default:
      return undefined;
  }
}

function failure(field: string, message: string): ValidationResult {
  return { ok: false, field, message };
}

export function createToolArgs(values: Record<string, ToolValue>): ToolArgs {
  const frozen = Object.freeze({ ...values });

  function read(name: string, expected: ToolParameterType): ToolValue {
    const value = frozen[name];
    if (value === undefined || typeof value !== expected) {
      throw new Error(`parameter ${name} is not a validated ${expected}`);
    }
    return value;
  }

  return {
    values: frozen,

    string(name: string): string {
      return String(read(name, 'string'));
    },

    optionalString(name: string): string | undefined {
      return frozen[name] === undefined ? undefined : String(read(name, 'string'));
    },

    number(name: string): number {
      return Number(read(name, 'number'));
    },

    boolean(name: string): boolean {
      return read(name, 'boolean') === true;
    },
  };
}

/**
 * Validate `args` against `parameters` in declaration order.
 * Absent optional parameters take their declared default; only the first violation is reported.
 */
export function validateParameters(
  parameters: ReadonlyArray<ToolParameter>,
  args: Readonly<Record<string, unknown>>,
): ValidationResult {
  const values: Record<string, ToolValue> = {};

  for (const param of parameters) {
    const raw = Object.hasOwn(args, param.name) ? args[param.name] : undefined;

    if (isAbsent(raw, param.type)) {
      if (param.required) {
        return failure(param.name, `missing required parameter: ${param.name}`);
      }
      if (param.default !== undefined) {
        values[param.name] = param.default;
      }
      continue;
    }

    const value = asToolValue(raw, param.type);
    if (value === undefined) {
      return failure(
        param.name,
        `invalid type for parameter ${param.name}: expected ${param.type}, got ${describeType(raw)}`,
      );
    }

    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        return failure(param.name, `parameter ${param.name} must be a finite number`);
      }
      if (param.positive && value <= 0) {
        return failure(param.name, `parameter ${param.name} must be greater than 0`);
      }
    }

    if (typeof value === 'string' && param.enum_values && !param.enum_values.includes(value)) {
      return failure(
        param.name,
        `parameter ${param.name} must be one of: ${param.enum_values.join(', ')}`,
      );
    }

    values[param.name] = value;
  }

  return { ok: true, args: createToolArgs(values) };
}
