import { mkdir, readdir, rename, rm, rmdir } from 'node:fs/promises';
import { dirname, sep } from 'node:path';
import { z } from 'zod';
import { defineTool, type RegistrableTool } from './tool-definition.js';
import { describeFsError, pathKind, resolveInSandbox, type ToolContext } from './fs-helpers.js';

const CreateDirectoryInput = z.object({
  directory_path: z.string(),
});

export function createCreateDirectoryTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'create_directory',
    description: 'Create a new directory (and any missing parents) within the sandbox',
    inputSchema: {
      type: 'object',
      properties: {
        directory_path: {
          type: 'string',
          description: `Path of the directory to create (must be within ${sandbox.root})`,
        },
      },
      required: ['directory_path'],
    },
    input: CreateDirectoryInput,
    async run({ directory_path }) {
      const target = resolveInSandbox(sandbox, directory_path, 'create directories');
      if (typeof target === 'string') return target;

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === 'directory') return `Error: Directory already exists - ${directory_path}`;
        if (kind !== null) return `Error: Path exists but is not a directory - ${directory_path}`;

        await mkdir(target.absolutePath, { recursive: true });
        return `Success: Created directory '${target.relativePath}'`;
      } catch (error) {
        return describeFsError(
          error,
          { permission: 'creating directory', failure: 'create directory' },
          directory_path,
        );
      }
    },
  });
}

const DeleteDirectoryInput = z.object({
  directory_path: z.string(),
  force: z.boolean().default(false),
});

export function createDeleteDirectoryTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'delete_directory',
    description: 'Delete a directory within the sandbox. Non-empty directories require force=true',
    inputSchema: {
      type: 'object',
      properties: {
        directory_path: {
          type: 'string',
          description: `Path of the directory to delete (must be within ${sandbox.root})`,
        },
        force: {
          type: 'boolean',
          description: 'Delete the directory even if it is not empty (default: false)',
        },
      },
      required: ['directory_path'],
    },
    input: DeleteDirectoryInput,
    async run({ directory_path, force }) {
      const target = resolveInSandbox(sandbox, directory_path, 'delete directories');
      if (typeof target === 'string') return target;
      if (sandbox.isRoot(target.absolutePath)) {
        return 'Error: Cannot delete the sandbox root directory';
      }

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === null) return `Error: Directory not found - ${directory_path}`;
        if (kind !== 'directory') return `Error: Path is not a directory - ${directory_path}`;

        const entries = await readdir(target.absolutePath);
        if (entries.length > 0 && !force) {
          return `Error: Directory is not empty - ${directory_path}. Use force=true to delete non-empty directories`;
        }

        if (force) {
          await rm(target.absolutePath, { recursive: true });
        } else {
          await rmdir(target.absolutePath);
        }
        return `Success: Deleted directory '${target.relativePath}'`;
      } catch (error) {
        return describeFsError(
          error,
          { permission: 'deleting directory', failure: 'delete directory' },
          directory_path,
        );
      }
    },
  });
}

const RenameDirectoryInput = z.object({
  old_path: z.string(),
  new_path: z.string(),
});

export function createRenameDirectoryTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'rename_directory',
    description: 'Rename or move a directory within the sandbox',
    inputSchema: {
      type: 'object',
      properties: {
        old_path: {
          type: 'string',
          description: `Current path of the directory (must be within ${sandbox.root})`,
        },
        new_path: {
          type: 'string',
          description: `New path for the directory (must be within ${sandbox.root})`,
        },
      },
      required: ['old_path', 'new_path'],
    },
    input: RenameDirectoryInput,
    async run({ old_path, new_path }) {
      const source = resolveInSandbox(sandbox, old_path, 'rename directories');
      if (typeof source === 'string') return source;
      const destination = resolveInSandbox(sandbox, new_path, 'rename directories');
      if (typeof destination === 'string') return destination;

      if (sandbox.isRoot(source.absolutePath)) {
        return 'Error: Cannot rename the sandbox root directory';
      }
      if (destination.absolutePath.startsWith(source.absolutePath + sep)) {
        return 'Error: Cannot move a directory into itself';
      }

      try {
        const kind = await pathKind(source.absolutePath);
        if (kind === null) return `Error: Directory not found - ${old_path}`;
        if (kind !== 'directory') return `Error: Path is not a directory - ${old_path}`;
        if ((await pathKind(destination.absolutePath)) !== null) {
          return `Error: Destination already exists - ${new_path}`;
        }

        await mkdir(dirname(destination.absolutePath), { recursive: true });
        await rename(source.absolutePath, destination.absolutePath);

        return `Success: Renamed directory '${source.relativePath}' to '${destination.relativePath}'`;
      } catch (error) {
        return describeFsError(
          error,
          { permission: 'renaming directory', failure: 'rename directory' },
          old_path,
        );
      }
    },
  });
}

/**
 * Directory-level tools bound to one sandbox
 */
export function createDirectoryTools(context: ToolContext): RegistrableTool[] {
  return [
    createCreateDirectoryTool(context),
    createDeleteDirectoryTool(context),
    createRenameDirectoryTool(context),
  ];
}
