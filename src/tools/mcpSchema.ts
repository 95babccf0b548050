import { z, toJSONSchema } from 'zod';

export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema = toJSONSchema(schema, {
    target: 'draft-07',
    reused: 'inline',
    unrepresentable: 'any',
  });

  const { $schema: _schema, $defs: _defs, ...rest } = jsonSchema;
  const normalized: Record<string, unknown> = { ...rest };

  const type = normalized.type;
  if (type === undefined) {
    normalized.type = 'object';
    return normalized;
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }

  return normalized;
}
