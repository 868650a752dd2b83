import { stat } from 'node:fs/promises';
import type { SandboxPolicy, PathResolution } from '../security/sandbox-policy.js';
import { errorMessage, isErrnoException } from '../utils/errors.js';

export type PathKind = 'file' | 'directory' | 'other';

/**
 * Context handed to every built-in tool factory
 */
export interface ToolContext {
  sandbox: SandboxPolicy;
  now?: () => Date;
}

/**
 * Wording used when a file system call fails, e.g.
 * `{ permission: 'reading file', failure: 'read file' }`
 */
export interface FsOperation {
  permission: string;
  failure: string;
}

/**
 * What the path points at, or null when nothing is there
 */
export async function pathKind(absolutePath: string): Promise<PathKind | null> {
  try {
    const stats = await stat(absolutePath);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/**
 * Resolves a path for a tool, or returns the access-denied result string
 * @param action - verb phrase such as "read files"
 */
export function resolveInSandbox(
  sandbox: SandboxPolicy,
  path: string,
  action: string,
): Extract<PathResolution, { ok: true }> | string {
  const resolution = sandbox.resolve(path);
  if (!resolution.ok) {
    return `Error: Access denied. Can only ${action} within ${sandbox.root}`;
  }
  return resolution;
}

/**
 * Converts an unexpected file system failure into a tool result string
 */
export function describeFsError(error: unknown, operation: FsOperation, path: string): string {
  if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
    return `Error: Permission denied ${operation.permission} - ${path}`;
  }
  return `Error: Failed to ${operation.failure} - ${errorMessage(error)}`;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Strict UTF-8 decode; returns null on invalid byte sequences
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}
