import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import { ScanError } from '../../core/errors.js';
import { BUILTIN_EXCLUDE } from '../../config/loader.js';
import { cleanupWorkspace, createWorkspaceWithFiles } from '../../__tests__/helpers/workspace.js';
import { discoverFiles, pathsToIncludes, SourceScanner, toPosixPath } from '../source_scanner.js';

describe('SourceScanner.parse', () => {
  it('parses valid TypeScript without errors', () => {
    const scanned = new SourceScanner().parse('src/a.ts', 'export const a = 1;\n');

    expect(scanned.relPath).toBe('src/a.ts');
    expect(scanned.parseErrors).toEqual([]);
    expect(scanned.sourceFile.getVariableDeclaration('a')).toBeDefined();
  });

  it('reports syntax errors with 1-based positions', () => {
    const scanned = new SourceScanner().parse('src/a.ts', 'const x = ;');

    expect(scanned.parseErrors).toEqual([{ line: 1, column: 11, message: 'Expression expected.' }]);
  });

  it('parses JSX in .tsx files', () => {
    const scanned = new SourceScanner().parse('src/b.tsx', 'export const B = () => <div />;\n');

    expect(scanned.parseErrors).toEqual([]);
  });

  it('replaces an earlier file with the same path', () => {
    const scanner = new SourceScanner();
    scanner.parse('src/a.ts', 'const x = ;');

    expect(scanner.parse('src/a.ts', 'const x = 1;').parseErrors).toEqual([]);
  });
});

describe('workspace scanning', () => {
  let workspace = '';

  afterEach(async () => {
    if (workspace) await cleanupWorkspace(workspace);
    workspace = '';
  });

  async function createFixture(): Promise<string> {
    return createWorkspaceWithFiles({
      'src/app/a.ts': 'const a = 1;\n',
      'src/app/b.tsx': 'export const B = () => <div />;\n',
      'src/app/c.d.ts': 'declare const c: number;\n',
      'src/app/big.ts': `// ${'x'.repeat(100)}\n`,
      'src/node_modules/pkg/index.ts': 'export {};\n',
      'README.md': '# readme\n',
    });
  }

  it('discovers included files minus excludes, sorted', async () => {
    workspace = await createFixture();

    const files = await discoverFiles(workspace, { include: ['src/**/*.ts', 'src/**/*.tsx'], exclude: BUILTIN_EXCLUDE });

    expect(files).toEqual(['src/app/a.ts', 'src/app/b.tsx', 'src/app/big.ts']);
  });

  it('skips files over the size limit', async () => {
    workspace = await createFixture();

    const result = await new SourceScanner().scanWorkspace(workspace, {
      include: ['src/**/*.ts', 'src/**/*.tsx'],
      exclude: BUILTIN_EXCLUDE,
      maxFileBytes: 50,
    });

    expect(result.files.map((file) => file.relPath)).toEqual(['src/app/a.ts', 'src/app/b.tsx']);
    expect(result.skipped).toEqual([{ file: 'src/app/big.ts', reason: 'too-large', sizeBytes: 104 }]);
  });

  it('turns path arguments into include globs', async () => {
    workspace = await createFixture();

    const includes = await pathsToIncludes(workspace, ['src/app', 'src/app/a.ts', 'src/**/*.tsx', '.']);

    expect(includes).toEqual(['src/app/**/*.{ts,tsx}', 'src/app/a.ts', 'src/**/*.tsx', '**/*.{ts,tsx}']);
  });

  it('rejects a path that does not exist', async () => {
    workspace = await createFixture();

    const attempt = pathsToIncludes(workspace, ['nope.ts']);

    await expect(attempt).rejects.toBeInstanceOf(ScanError);
    await expect(attempt).rejects.toThrow(/^Failed to scan nope\.ts: path does not exist/);
  });
});

describe('toPosixPath', () => {
  it('joins segments with forward slashes', () => {
    expect(toPosixPath(['src', 'app', 'a.ts'].join(path.sep))).toBe('src/app/a.ts');
  });
});
