import { isAbsolute, relative, resolve, sep } from 'node:path';

/**
 * Outcome of resolving a caller-supplied path against the sandbox
 */
export type PathResolution =
  | { ok: true; absolutePath: string; relativePath: string }
  | { ok: false; reason: string };

/**
 * SandboxPolicy - Confines file-affecting tools to a single root directory
 *
 * Relative paths resolve against the root; absolute paths are normalized
 * as-is. A path is inside the sandbox when it is the root itself or the root
 * followed by a separator, so `/app/sandbox2` is never inside `/app/sandbox`.
 */
export class SandboxPolicy {
  private readonly rootPath: string;

  /**
   * @param root - Sandbox directory; relative values resolve against the working directory
   */
  constructor(root: string) {
    this.rootPath = resolve(root);
  }

  get root(): string {
    return this.rootPath;
  }

  /**
   * Resolves a path and checks containment
   */
  resolve(path: string): PathResolution {
    const absolutePath = isAbsolute(path) ? resolve(path) : resolve(this.rootPath, path);

    if (!this.contains(absolutePath)) {
      return { ok: false, reason: `Path "${path}" resolves outside sandbox boundary ${this.rootPath}` };
    }

    return {
      ok: true,
      absolutePath,
      relativePath: this.relative(absolutePath),
    };
  }

  /**
   * Checks whether an absolute path lies under the root
   */
  contains(absolutePath: string): boolean {
    const normalized = resolve(absolutePath);
    if (normalized === this.rootPath) {
      return true;
    }

    // The root may itself end in a separator (e.g. "/")
    const prefix = this.rootPath.endsWith(sep) ? this.rootPath : this.rootPath + sep;
    return normalized.startsWith(prefix);
  }

  /**
   * Whether the path is the sandbox root itself
   */
  isRoot(absolutePath: string): boolean {
    return resolve(absolutePath) === this.rootPath;
  }

  /**
   * Path relative to the root, `.` for the root itself
   */
  relative(absolutePath: string): string {
    return relative(this.rootPath, absolutePath) || '.';
  }
}
