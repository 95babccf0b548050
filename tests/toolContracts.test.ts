import { describe, it, expect } from 'vitest';
import { TOOL_SPECS, getTools } from '../src/tools/registry.js';

describe('TeraChem MCP tool contracts', () => {
  it('all tools have valid names', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.name).toMatch(/^tc_/);
    }
  });

  it('all tools have descriptions', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it('getTools returns valid MCP tool definitions', () => {
    const tools = getTools('full');
    expect(tools.length).toBe(TOOL_SPECS.length);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.inputSchema.$schema).toBeUndefined();
    }
  });

  it('all tool names are unique', () => {
    const names = TOOL_SPECS.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('source tools accept path or text', () => {
    const parseOutput = getTools('standard').find(t => t.name === 'tc_parse_output');
    expect(parseOutput?.inputSchema.properties).toHaveProperty('path');
    expect(parseOutput?.inputSchema.properties).toHaveProperty('text');
  });

  it('expected tool count', () => {
    expect(TOOL_SPECS.length).toBe(7);
  });

  it('expected standard-mode tool count', () => {
    expect(getTools('standard').map(t => t.name)).not.toContain('tc_parse_field');
    expect(getTools('standard').length).toBe(6);
  });
});
