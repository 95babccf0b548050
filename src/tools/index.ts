export { getTools, getToolSpec, getToolSpecs, TOOL_SPECS, type ToolExposureMode } from './registry.js';
export { handleToolCall } from './dispatcher.js';
