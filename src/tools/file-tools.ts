import { readFile, writeFile, appendFile, unlink, rename, mkdir, readdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { z } from 'zod';
import { defineTool, type RegistrableTool } from './tool-definition.js';
import {
  decodeUtf8,
  describeFsError,
  pathKind,
  resolveInSandbox,
  type ToolContext,
} from './fs-helpers.js';

const ReadFileInput = z.object({
  file_path: z.string(),
});

export function createReadFileTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'read_file',
    description: 'Read the full contents of a file from the sandbox directory',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: {
          type: 'string',
          description: `Path to the file to read (must be within ${sandbox.root})`,
        },
      },
      required: ['file_path'],
    },
    input: ReadFileInput,
    async run({ file_path }) {
      const target = resolveInSandbox(sandbox, file_path, 'read files');
      if (typeof target === 'string') return target;

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === null) return `Error: File not found - ${file_path}`;
        if (kind !== 'file') return `Error: Path is not a file - ${file_path}`;

        const content = decodeUtf8(await readFile(target.absolutePath));
        if (content === null) return `Error: Cannot decode file as UTF-8 - ${file_path}`;
        return content;
      } catch (error) {
        return describeFsError(error, { permission: 'reading file', failure: 'read file' }, file_path);
      }
    },
  });
}

const WriteFileInput = z.object({
  file_path: z.string(),
  content: z.string(),
  mode: z.enum(['w', 'a']).default('w'),
});

export function createWriteFileTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'write_file',
    description: 'Write content to a file in the sandbox directory',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: {
          type: 'string',
          description: `Path to the file to write (must be within ${sandbox.root})`,
        },
        content: {
          type: 'string',
          description: 'Content to write to the file',
        },
        mode: {
          type: 'string',
          description: "Write mode: 'w' to overwrite (default) or 'a' to append",
          enum: ['w', 'a'],
        },
      },
      required: ['file_path', 'content'],
    },
    input: WriteFileInput,
    async run({ file_path, content, mode }) {
      const target = resolveInSandbox(sandbox, file_path, 'write files');
      if (typeof target === 'string') return target;

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === 'directory') return `Error: Path is a directory - ${file_path}`;

        await mkdir(dirname(target.absolutePath), { recursive: true });
        if (mode === 'a') {
          await appendFile(target.absolutePath, content, 'utf-8');
        } else {
          await writeFile(target.absolutePath, content, 'utf-8');
        }

        const action = mode === 'a' ? 'appended to' : 'written to';
        return `Success: Content ${action} ${file_path} (${Buffer.byteLength(content, 'utf-8')} bytes)`;
      } catch (error) {
        return describeFsError(error, { permission: 'writing to file', failure: 'write file' }, file_path);
      }
    },
  });
}

const EditFileInput = z.object({
  file_path: z.string(),
  old_string: z.string(),
  new_string: z.string(),
  replace_all: z.boolean().default(false),
});

export function createEditFileTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'edit_file',
    description: 'Edit a file by replacing text strings in the sandbox directory',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: {
          type: 'string',
          description: `Path to the file to edit (must be within ${sandbox.root})`,
        },
        old_string: {
          type: 'string',
          description: 'Text to search for and replace',
        },
        new_string: {
          type: 'string',
          description: 'Text to replace with',
        },
        replace_all: {
          type: 'boolean',
          description: 'Replace all occurrences (default: false, replaces only the first)',
        },
      },
      required: ['file_path', 'old_string', 'new_string'],
    },
    input: EditFileInput,
    async run({ file_path, old_string, new_string, replace_all }) {
      if (old_string.length === 0) return 'Error: old_string must not be empty';

      const target = resolveInSandbox(sandbox, file_path, 'edit files');
      if (typeof target === 'string') return target;

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === null) return `Error: File not found - ${file_path}`;
        if (kind !== 'file') return `Error: Path is not a file - ${file_path}`;

        const content = decodeUtf8(await readFile(target.absolutePath));
        if (content === null) return `Error: Cannot decode file as UTF-8 - ${file_path}`;

        const parts = content.split(old_string);
        const count = parts.length - 1;
        if (count === 0) return `Error: String '${old_string}' not found in ${file_path}`;

        // Function replacer: `$&` and friends in new_string stay literal
        const updated = replace_all ? parts.join(new_string) : content.replace(old_string, () => new_string);
        await writeFile(target.absolutePath, updated, 'utf-8');

        return `Success: Replaced ${replace_all ? count : 1} occurrence(s) in ${file_path}`;
      } catch (error) {
        return describeFsError(error, { permission: 'editing file', failure: 'edit file' }, file_path);
      }
    },
  });
}

const DeleteFileInput = z.object({
  file_path: z.string(),
});

export function createDeleteFileTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'delete_file',
    description: 'Delete a file within the sandbox directory',
    inputSchema: {
      type: 'object',
      properties: {
        file_path: {
          type: 'string',
          description: `Path to the file to delete (must be within ${sandbox.root})`,
        },
      },
      required: ['file_path'],
    },
    input: DeleteFileInput,
    async run({ file_path }) {
      const target = resolveInSandbox(sandbox, file_path, 'delete files');
      if (typeof target === 'string') return target;

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === null) return `Error: File not found - ${file_path}`;
        if (kind !== 'file') return `Error: Path is not a file - ${file_path}`;

        await unlink(target.absolutePath);
        return `Success: Deleted file '${target.relativePath}'`;
      } catch (error) {
        return describeFsError(error, { permission: 'deleting file', failure: 'delete file' }, file_path);
      }
    },
  });
}

const RenameFileInput = z.object({
  old_path: z.string(),
  new_path: z.string(),
});

export function createRenameFileTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'rename_file',
    description: 'Rename or move a file within the sandbox directory',
    inputSchema: {
      type: 'object',
      properties: {
        old_path: {
          type: 'string',
          description: `Current path of the file (must be within ${sandbox.root})`,
        },
        new_path: {
          type: 'string',
          description: `New path for the file (must be within ${sandbox.root})`,
        },
      },
      required: ['old_path', 'new_path'],
    },
    input: RenameFileInput,
    async run({ old_path, new_path }) {
      const source = resolveInSandbox(sandbox, old_path, 'rename files');
      if (typeof source === 'string') return source;
      const destination = resolveInSandbox(sandbox, new_path, 'rename files');
      if (typeof destination === 'string') return destination;

      try {
        const kind = await pathKind(source.absolutePath);
        if (kind === null) return `Error: Source file not found - ${old_path}`;
        if (kind !== 'file') return `Error: Source path is not a file - ${old_path}`;
        if ((await pathKind(destination.absolutePath)) !== null) {
          return `Error: Destination already exists - ${new_path}`;
        }

        await mkdir(dirname(destination.absolutePath), { recursive: true });
        await rename(source.absolutePath, destination.absolutePath);

        return `Success: Renamed '${source.relativePath}' to '${destination.relativePath}'`;
      } catch (error) {
        return describeFsError(error, { permission: 'renaming file', failure: 'rename file' }, old_path);
      }
    },
  });
}

const MoveFileInput = z.object({
  source_path: z.string(),
  destination_dir: z.string(),
  new_name: z.string().nullish(),
});

export function createMoveFileTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'move_file',
    description: 'Move a file from one directory to another within the sandbox',
    inputSchema: {
      type: 'object',
      properties: {
        source_path: {
          type: 'string',
          description: `Current path of the file (must be within ${sandbox.root})`,
        },
        destination_dir: {
          type: 'string',
          description: `Directory to move the file to (must be within ${sandbox.root})`,
        },
        new_name: {
          type: 'string',
          description: 'Optional new name for the file. Keeps the original name if omitted',
        },
      },
      required: ['source_path', 'destination_dir'],
    },
    input: MoveFileInput,
    async run({ source_path, destination_dir, new_name }) {
      if (new_name && (basename(new_name) !== new_name || new_name === '.' || new_name === '..')) {
        return 'Error: new_name must be a file name, not a path';
      }

      const source = resolveInSandbox(sandbox, source_path, 'move files');
      if (typeof source === 'string') return source;
      const destinationDir = resolveInSandbox(sandbox, destination_dir, 'move files');
      if (typeof destinationDir === 'string') return destinationDir;

      const fileName = new_name || basename(source.absolutePath);
      const destination = resolveInSandbox(sandbox, join(destinationDir.absolutePath, fileName), 'move files');
      if (typeof destination === 'string') return destination;

      try {
        const kind = await pathKind(source.absolutePath);
        if (kind === null) return `Error: File not found - ${source_path}`;
        if (kind !== 'file') return `Error: Path is not a file - ${source_path}`;

        if ((await pathKind(destination.absolutePath)) !== null) {
          return `Error: Destination file already exists - ${destination.relativePath}`;
        }

        const dirKind = await pathKind(destinationDir.absolutePath);
        if (dirKind === null) {
          await mkdir(destinationDir.absolutePath, { recursive: true });
        } else if (dirKind !== 'directory') {
          return `Error: Destination path exists but is not a directory - ${destination_dir}`;
        }

        await rename(source.absolutePath, destination.absolutePath);
        return `Success: Moved file '${source.relativePath}' to '${destination.relativePath}'`;
      } catch (error) {
        return describeFsError(error, { permission: 'moving file', failure: 'move file' }, source_path);
      }
    },
  });
}

const ListFilesInput = z.object({
  directory_path: z.string().optional(),
  show_hidden: z.boolean().default(false),
});

/**
 * Recursively collects absolute file paths below a directory
 */
async function collectFiles(dirPath: string, showHidden: boolean): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    if (!showHidden && entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(fullPath, showHidden)));
    } else {
      files.push(fullPath);
    }
  }

  return files;
}

export function createListFilesTool({ sandbox }: ToolContext): RegistrableTool {
  return defineTool({
    name: 'list_files',
    description: 'Recursively list all files in a directory within the sandbox',
    inputSchema: {
      type: 'object',
      properties: {
        directory_path: {
          type: 'string',
          description: `Directory to list (must be within ${sandbox.root}, defaults to the sandbox root)`,
        },
        show_hidden: {
          type: 'boolean',
          description: 'Whether to include hidden files and directories (default: false)',
        },
      },
      required: [],
    },
    input: ListFilesInput,
    async run({ directory_path, show_hidden }) {
      const displayPath = directory_path ?? sandbox.root;
      const target = resolveInSandbox(sandbox, displayPath, 'list files');
      if (typeof target === 'string') return target;

      try {
        const kind = await pathKind(target.absolutePath);
        if (kind === null) return `Error: Directory not found - ${displayPath}`;
        if (kind !== 'directory') return `Error: Path is not a directory - ${displayPath}`;

        const files = (await collectFiles(target.absolutePath, show_hidden)).sort();
        if (files.length === 0) return `No files found in ${displayPath}`;

        const noun = files.length === 1 ? 'file' : 'files';
        return `Found ${files.length} ${noun} in ${displayPath}:\n\n${files.join('\n')}`;
      } catch (error) {
        return describeFsError(error, { permission: 'accessing directory', failure: 'list files' }, displayPath);
      }
    },
  });
}

/**
 * All file-level tools bound to one sandbox
 */
export function createFileTools(context: ToolContext): RegistrableTool[] {
  return [
    createReadFileTool(context),
    createWriteFileTool(context),
    createEditFileTool(context),
    createDeleteFileTool(context),
    createRenameFileTool(context),
    createMoveFileTool(context),
    createListFilesTool(context),
  ];
}
