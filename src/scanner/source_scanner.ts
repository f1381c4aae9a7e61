/**
 * @fileoverview Source Scanner
 *
 * Walks a workspace for the configured globs and parses each file into a
 * ts-morph syntax tree. Parsing happens in an in-memory project: no tsconfig
 * is read and no imports are resolved, since every rule is syntactic.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { Project, ts, type SourceFile } from 'ts-morph';
import { ScanError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ParseErrorLocation {
  line: number;
  column: number;
  message: string;
}

export interface ScannedFile {
  /** Workspace-relative POSIX path */
  relPath: string;
  sourceFile: SourceFile;
  parseErrors: ParseErrorLocation[];
}

export interface SkippedFile {
  file: string;
  reason: 'too-large';
  sizeBytes: number;
}

export interface ScanOptions {
  include: string[];
  exclude: string[];
  maxFileBytes: number;
}

export interface ScanResult {
  files: ScannedFile[];
  skipped: SkippedFile[];
}

const GLOB_MAGIC = /[*?[\]{}!]/;

export function toPosixPath(value: string): string {
  return value.split(path.sep).join('/');
}

// ============================================================================
// Discovery
// ============================================================================

export async function discoverFiles(workspace: string, options: Pick<ScanOptions, 'include' | 'exclude'>): Promise<string[]> {
  const matches = await glob(options.include, {
    cwd: workspace,
    ignore: options.exclude,
    nodir: true,
    posix: true,
  });
  return Array.from(new Set(matches.map(toPosixPath))).sort();
}

/**
 * Turns CLI path arguments into include globs: a directory covers its
 * TypeScript files, a file covers itself, a glob passes through.
 */
export async function pathsToIncludes(workspace: string, paths: readonly string[]): Promise<string[]> {
  const includes: string[] = [];
  for (const input of paths) {
    const absolute = path.resolve(workspace, input);
    const relative = toPosixPath(path.relative(workspace, absolute));
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(absolute)).isDirectory();
    } catch (error) {
      if (GLOB_MAGIC.test(input)) {
        includes.push(toPosixPath(input));
        continue;
      }
      throw new ScanError(input, `path does not exist (${getErrorMessage(error)})`);
    }
    if (isDirectory) {
      includes.push(relative === '' ? '**/*.{ts,tsx}' : `${relative}/**/*.{ts,tsx}`);
    } else {
      includes.push(relative);
    }
  }
  return includes;
}

// ============================================================================
// Parsing
// ============================================================================

export class SourceScanner {
  private readonly project = new Project({
    useInMemoryFileSystem: true,
    skipAddingFilesFromTsConfig: true,
    skipFileDependencyResolution: true,
    compilerOptions: {
      allowJs: true,
      noEmit: true,
      skipLibCheck: true,
      jsx: ts.JsxEmit.Preserve,
      experimentalDecorators: true,
    },
  });

  /**
   * Parses one file. The syntax tree stays owned by this scanner.
   */
  parse(relPath: string, text: string): ScannedFile {
    const sourceFile = this.project.createSourceFile(relPath, text, { overwrite: true });
    return { relPath, sourceFile, parseErrors: this.collectParseErrors(sourceFile) };
  }

  /**
   * Parses a batch; every file is added before diagnostics are collected so a
   * single program serves the whole batch.
   */
  parseAll(entries: ReadonlyArray<{ relPath: string; text: string }>): ScannedFile[] {
    const sourceFiles = entries.map((entry) => ({
      relPath: entry.relPath,
      sourceFile: this.project.createSourceFile(entry.relPath, entry.text, { overwrite: true }),
    }));
    return sourceFiles.map(({ relPath, sourceFile }) => ({
      relPath,
      sourceFile,
      parseErrors: this.collectParseErrors(sourceFile),
    }));
  }

  async scanWorkspace(workspace: string, options: ScanOptions): Promise<ScanResult> {
    const relPaths = await discoverFiles(workspace, options);
    logDebug('Discovered source files', { workspace, count: relPaths.length });

    const entries: Array<{ relPath: string; text: string }> = [];
    const skipped: SkippedFile[] = [];
    for (const relPath of relPaths) {
      const absolute = path.join(workspace, relPath);
      try {
        const stat = await fs.stat(absolute);
        if (stat.size > options.maxFileBytes) {
          skipped.push({ file: relPath, reason: 'too-large', sizeBytes: stat.size });
          continue;
        }
        entries.push({ relPath, text: await fs.readFile(absolute, 'utf8') });
      } catch (error) {
        throw new ScanError(relPath, getErrorMessage(error));
      }
    }

    return { files: this.parseAll(entries), skipped };
  }

  private collectParseErrors(sourceFile: SourceFile): ParseErrorLocation[] {
    const diagnostics = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
    return diagnostics.map((diagnostic) => {
      const { line, column } = sourceFile.getLineAndColumnAtPos(diagnostic.getStart() ?? 0);
      return {
        line,
        column,
        message: ts.flattenDiagnosticMessageText(diagnostic.compilerObject.messageText, '\n'),
      };
    });
  }
}
