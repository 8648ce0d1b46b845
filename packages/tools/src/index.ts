export {
  type ToolDefinition,
  type ToolContext,
  type ToolResult,
  type ToolBody,
  type ToolErrorCode,
  type ToolGroup,
} from './types.js';

export {
  ToolRegistry,
  TOOL_GROUPS,
  TOOL_GROUP_NAMES,
  getToolRegistry,
  resetToolRegistry,
} from './registry.js';

export { defineQueryTool, toFailure } from './run.js';

export * from './articles/index.js';
export * from './data/index.js';
export * from './standards/index.js';
