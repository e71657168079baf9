import { describeError, type GatewayError, type Result } from '../../core/errors.ts';
import type { ToolOutputObject } from '../../schemas/outputs.ts';
import type { ToolContext, ToolResult } from './types.ts';

export function ok(action: string, data?: unknown, msg?: string): ToolResult {
  const structured: ToolOutputObject = { ok: true, action, _msg: msg, data };
  return {
    content: [{ type: 'text', text: msg ?? `${action}: ok` }],
    structuredContent: structured,
  };
}

export function fail(action: string, error: GatewayError, context: ToolContext): ToolResult {
  const message = describeError(error, context.services.loginUrl);
  const structured: ToolOutputObject = { ok: false, action, error: message, code: error.kind };
  return {
    isError: true,
    content: [{ type: 'text', text: message }],
    structuredContent: structured,
  };
}

/** Render a gateway result; `describe` builds the text shown to the model on success. */
export function fromResult<T>(
  action: string,
  result: Result<T>,
  context: ToolContext,
  describe: (value: T) => string,
): ToolResult {
  return result.ok ? ok(action, result.value, describe(result.value)) : fail(action, result.error, context);
}

export function invalid(action: string, message: string, context: ToolContext): ToolResult {
  return fail(action, { kind: 'validation_error', message }, context);
}
