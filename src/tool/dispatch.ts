// pattern: Imperative Shell

/**
 * Dispatcher: looks up a tool, validates its arguments, runs the handler and normalises the outcome.
 * Every call-time failure becomes an error ToolResult; invoke never rejects.
 */

import { errorResult, resultText } from './result.ts';
import { validateParameters } from './validate.ts';
import type { Dispatcher, ToolRegistry, ToolResult } from './types.ts';

export type DispatcherOptions = {
  readonly timeoutMs?: number;
  readonly onError?: (toolName: string, message: string) => void;
};

class CallAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CallAbortedError';
  }
}

function describeAbort(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof CallAbortedError) {
    return reason.message;
  }
  if (reason instanceof Error) {
    return `request cancelled: ${reason.message}`;
  }
  return `request cancelled: ${reason === undefined ? 'aborted' : String(reason)}`;
}

/**
 * Resolves with the handler's outcome, or rejects as soon as `signal` aborts.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new CallAbortedError(describeAbort(signal)));
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CallAbortedError(describeAbort(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([work, aborted]).finally(() => {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  });
}

export function createDispatcher(
  registry: ToolRegistry,
  options: DispatcherOptions = {},
): Dispatcher {
  const { timeoutMs, onError } = options;

  function fail(name: string, message: string): ToolResult {
    onError?.(name, message);
    return errorResult(message);
  }

  return {
    async invoke(
      name: string,
      args: Readonly<Record<string, unknown>>,
      signal?: AbortSignal,
    ): Promise<ToolResult> {
      const tool = registry.lookup(name);
      if (!tool) {
        return fail(name, `unknown tool: ${name}`);
      }

      const validation = validateParameters(tool.definition.parameters, args);
      if (!validation.ok) {
        return fail(name, validation.message);
      }
      const toolArgs = validation.args;

      // the handler must not start once the caller has gone
      if (signal?.aborted) {
        return fail(name, describeAbort(signal));
      }

      const controller = new AbortController();
      const forwardAbort = (): void => controller.abort(signal?.reason);
      signal?.addEventListener('abort', forwardAbort, { once: true });

      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(
              () => controller.abort(new CallAbortedError(`request timed out after ${timeoutMs}ms`)),
              timeoutMs,
            );

      try {
        const result = await raceAbort(
          Promise.resolve().then(() => tool.handler(toolArgs, { signal: controller.signal })),
          controller.signal,
        );
        if (result.isError) {
          onError?.(name, resultText(result));
        }
        return result;
      } catch (error) {
        return fail(name, error instanceof Error ? error.message : String(error));
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forwardAbort);
      }
    },
  };
}
