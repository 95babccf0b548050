export type ToolExposureMode = 'standard' | 'full';

export const TOOL_MODE_ENV = 'TC_TOOL_MODE';
export const MAX_OUTPUT_BYTES_ENV = 'TC_MAX_OUTPUT_BYTES';

const DEFAULT_MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

function parsePositiveIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || raw.trim().length === 0) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || !Number.isInteger(n) || n <= 0) return fallback;
  return n;
}

export function getToolModeFromEnv(): ToolExposureMode {
  return process.env[TOOL_MODE_ENV] === 'full' ? 'full' : 'standard';
}

export function getMaxOutputBytes(): number {
  return parsePositiveIntEnv(MAX_OUTPUT_BYTES_ENV, DEFAULT_MAX_OUTPUT_BYTES);
}
