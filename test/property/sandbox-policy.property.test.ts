import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { access, mkdir, rm } from 'node:fs/promises';
import { join, sep } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { SandboxPolicy } from '../../src/security/sandbox-policy.js';
import { ToolRegistry } from '../../src/tools/tool-registry.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Property-based tests for sandbox containment
 */
describe('SandboxPolicy Property Tests', () => {
  let root: string;
  let policy: SandboxPolicy;

  // Lowercase letters only, so a segment can never spell the root's own name
  const segment = fc.stringMatching(/^[a-z]{1,8}$/);
  const relativePath = fc.array(segment, { minLength: 1, maxLength: 5 }).map((parts) => parts.join('/'));
  const escapingPath = fc
    .tuple(fc.integer({ min: 1, max: 6 }), fc.array(segment, { maxLength: 3 }))
    .map(([ups, parts]) => [...Array<string>(ups).fill('..'), ...parts].join('/'));

  beforeEach(async () => {
    root = join(tmpdir(), `sandbox-pbt-${randomUUID()}`);
    await mkdir(root, { recursive: true });
    policy = new SandboxPolicy(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('relative paths without traversal stay inside the root', () => {
    fc.assert(
      fc.property(relativePath, (path) => {
        const resolution = policy.resolve(path);
        return resolution.ok && resolution.absolutePath === join(root, path) && resolution.relativePath === path;
      }),
      { numRuns: 100 },
    );
  });

  it('paths that climb above the root are rejected', () => {
    fc.assert(
      fc.property(escapingPath, (path) => !policy.resolve(path).ok),
      { numRuns: 100 },
    );
  });

  it('traversal that comes back inside is accepted', () => {
    fc.assert(
      fc.property(segment, segment, (a, b) => {
        const resolution = policy.resolve(`${a}/../${b}`);
        return resolution.ok && resolution.relativePath === b;
      }),
      { numRuns: 100 },
    );
  });

  it('siblings sharing the root as a string prefix are outside', () => {
    fc.assert(
      fc.property(segment, segment, (suffix, child) => {
        return !policy.contains(`${root}${suffix}`) && !policy.contains(`${root}${suffix}${sep}${child}`);
      }),
      { numRuns: 100 },
    );
  });

  it('file tools refuse to write outside the sandbox', async () => {
    const registry = new ToolRegistry({ autoLoad: true, sandbox: policy, enabled: ['write_file'] });

    await fc.assert(
      fc.asyncProperty(segment, async (name) => {
        const fileName = `pbt-escape-${randomUUID()}-${name}.txt`;
        const result = await registry.execute('write_file', { file_path: `../${fileName}`, content: 'x' });

        expect(result).toBe(`Error: Access denied. Can only write files within ${root}`);
        expect(await exists(join(root, '..', fileName))).toBe(false);
      }),
      { numRuns: 25 },
    );
  });
});
