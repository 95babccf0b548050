import { ZodError } from 'zod';
import { invalidParams, McpError } from '../shared/index.js';
import type { ToolExposureMode } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';

function parseToolArgs<T>(toolName: string, schema: { parse: (input: unknown) => T }, args: unknown): T {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatToolError(err: unknown): { content: { type: 'text'; text: string }[]; isError: true } {
  const payload = (() => {
    if (err instanceof McpError) {
      // The searched output can be megabytes long; report only its size
      const sanitized = isRecord(err.data) ? { ...err.data } : undefined;
      if (sanitized && typeof sanitized.text === 'string') {
        sanitized.text_length = sanitized.text.length;
        delete sanitized.text;
      }
      return {
        error: {
          code: err.code,
          message: err.message,
          ...(sanitized && Object.keys(sanitized).length > 0 ? { data: sanitized } : {}),
        },
      };
    }

    const message = err instanceof Error ? err.message : String(err);
    return {
      error: {
        code: 'INTERNAL_ERROR',
        message,
      },
    };
  })();

  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
): Promise<{ content: { type: 'text'; text: string }[]; isError?: boolean }> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const parsedArgs = parseToolArgs(name, spec.zodSchema, args);
    const result = await spec.handler(parsedArgs);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}
