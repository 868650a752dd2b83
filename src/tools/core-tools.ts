import { createFileTools } from './file-tools.js';
import { createDirectoryTools } from './directory-tools.js';
import { createUtilityTools } from './utility-tools.js';
import type { RegistrableTool } from './tool-definition.js';
import type { ToolContext } from './fs-helpers.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Names of every built-in tool, in registration order
 */
export const BUILTIN_TOOL_NAMES = [
  'read_file',
  'write_file',
  'edit_file',
  'delete_file',
  'rename_file',
  'move_file',
  'list_files',
  'create_directory',
  'delete_directory',
  'rename_directory',
  'sort_data',
  'get_current_time',
] as const;

export type BuiltinToolName = (typeof BUILTIN_TOOL_NAMES)[number];

export function isBuiltinToolName(name: string): name is BuiltinToolName {
  return BUILTIN_TOOL_NAMES.some((builtin) => builtin === name);
}

/**
 * Builds the built-in catalog bound to a sandbox.
 *
 * @param enabled - Optional subset of names; unknown names throw ConfigError
 */
export function createCoreTools(context: ToolContext, enabled?: readonly string[]): RegistrableTool[] {
  const catalog = [
    ...createFileTools(context),
    ...createDirectoryTools(context),
    ...createUtilityTools(context),
  ];

  if (!enabled) {
    return catalog;
  }

  const unknown = enabled.filter((name) => !isBuiltinToolName(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown tool(s) in tools.enabled: ${unknown.join(', ')}`);
  }

  return catalog.filter((tool) => enabled.includes(tool.name));
}
