/**
 * Tools - Registry, sandboxed file tools, and utilities
 */

export { ToolRegistry, type ToolRegistryOptions } from './tool-registry.js';

export {
  defineTool,
  formatInputError,
  type ToolDefinition,
  type ToolHandler,
  type ToolInputSchema,
  type JSONSchemaProperty,
  type RegistrableTool,
  type TypedToolSpec,
} from './tool-definition.js';

export {
  createCoreTools,
  isBuiltinToolName,
  BUILTIN_TOOL_NAMES,
  type BuiltinToolName,
} from './core-tools.js';

export { createFileTools } from './file-tools.js';
export { createDirectoryTools } from './directory-tools.js';
export { createUtilityTools, sortData, formatLocalTime } from './utility-tools.js';
export type { ToolContext } from './fs-helpers.js';
