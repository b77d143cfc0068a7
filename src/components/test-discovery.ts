/**
 * Test discovery and planning
 *
 * Walks the root for files whose basename matches the configured glob,
 * loads each into a throwaway script context to learn which procedures it
 * declares, and orders the resulting test cases by file discovery order and
 * then by declaration order within a file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { types } from 'util';
import type { Directive, DiscoveryOptions, ExecutionPlan, LoadFailure, TestCase, TestFile } from '../types';
import { DiscoveryError, ValidationError } from '../errors';
import { ScriptContext, describeError } from './script-context';
import { matchesGlob } from '../utils/glob';
import { logger } from '../utils/logger';

const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set(['node_modules', '.git']);

const IDENTIFIER_START = /^[A-Za-z_$][\w$]*$/;

const DIRECTIVE_COMMENT = /^\s*\/\/\s*@(SKIP|TODO)(?:\s+(.*?))?\s*$/;

export interface TestDiscoveryOptions extends DiscoveryOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * @throws {ValidationError} When the glob or prefix cannot be used
 */
export function validateDiscoveryOptions(options: DiscoveryOptions): void {
  const errors: string[] = [];

  if (options.filePattern.trim() === '') {
    errors.push('file pattern must not be empty');
  } else if (/[\\/]/.test(options.filePattern)) {
    errors.push(`file pattern must match a file name, not a path: ${options.filePattern}`);
  }

  if (!IDENTIFIER_START.test(options.procedurePrefix)) {
    errors.push(`procedure prefix must start like an identifier: '${options.procedurePrefix}'`);
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid discovery options', errors);
  }
}

/**
 * Recursively lists files whose basename matches the glob, in sorted walk order
 */
export function findTestFiles(rootDir: string, pattern: string): TestFile[] {
  const root = path.resolve(rootDir);
  const found: TestFile[] = [];

  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => compareNames(a.name, b.name));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          walk(fullPath);
        }
        continue;
      }

      if (!matchesGlob(entry.name, pattern)) {
        continue;
      }

      if (entry.isFile() || (entry.isSymbolicLink() && isFileTarget(fullPath))) {
        found.push({ path: fullPath, relativePath: path.relative(root, fullPath), pattern });
      }
    }
  };

  walk(root);
  return found;
}

function isFileTarget(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isFile();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Reads the `// @SKIP` or `// @TODO` comment directly above a procedure declaration
 */
export function extractDirective(source: string, procedure: string): Directive {
  const declaration = new RegExp(`^\\s*(?:async\\s+)?function\\s*\\*?\\s*${escapeRegExp(procedure)}\\s*\\(`);
  const lines = source.split(/\r?\n/);

  for (let i = 1; i < lines.length; i++) {
    if (!declaration.test(lines[i])) {
      continue;
    }
    const match = DIRECTIVE_COMMENT.exec(lines[i - 1]);
    if (match) {
      return { kind: match[1] === 'SKIP' ? 'skip' : 'todo', reason: (match[2] ?? '').trim() };
    }
    return { kind: 'none' };
  }

  return { kind: 'none' };
}

/**
 * Offset of a procedure's declaration in the source, or Infinity when none is visible
 */
export function declarationOffset(source: string, procedure: string): number {
  const name = escapeRegExp(procedure);
  const pattern = new RegExp(`\\bfunction\\s*\\*?\\s+${name}\\s*\\(|(?:^|[^\\w$.])${name}\\s*=(?![=>])`, 'm');
  const match = pattern.exec(source);
  return match ? match.index : Number.POSITIVE_INFINITY;
}

/**
 * Orders procedures by declaration offset; undeclared names keep their order after the rest
 */
export function orderByDeclaration(source: string, procedures: readonly string[]): string[] {
  return procedures
    .map((name) => ({ name, offset: declarationOffset(source, name) }))
    .sort((a, b) => (a.offset === b.offset ? 0 : a.offset < b.offset ? -1 : 1))
    .map((entry) => entry.name);
}

export class TestDiscovery {
  constructor(private readonly options: TestDiscoveryOptions) {}

  discover(): ExecutionPlan {
    validateDiscoveryOptions(this.options);

    const files = findTestFiles(this.options.rootDir, this.options.filePattern);
    logger.info('Discovered test files', { count: files.length, rootDir: this.options.rootDir });

    const cases: TestCase[] = [];
    const loadFailures: LoadFailure[] = [];

    for (const file of files) {
      try {
        cases.push(...this.planFile(file));
      } catch (error) {
        const failure = new DiscoveryError(
          `Could not load ${file.relativePath}: ${describeError(error)}`,
          file.path,
          types.isNativeError(error) ? error : undefined
        );
        logger.warn('Skipping test file that failed to load', { file: file.path, error: failure.message });
        loadFailures.push({ file, message: failure.message, error: failure });
      }
    }

    return {
      cases: Object.freeze(cases),
      total: cases.length,
      loadFailures: Object.freeze(loadFailures)
    };
  }

  /**
   * Test cases in one file, without running any of them
   */
  planFile(file: TestFile): TestCase[] {
    const source = fs.readFileSync(file.path, 'utf8');
    const context = new ScriptContext({
      cwd: this.options.rootDir,
      env: this.options.env,
      name: `discover:${file.relativePath}`,
      discardOutput: true
    });

    let procedures: string[];
    try {
      context.source(file.path);
      procedures = context.listProcedures(this.options.procedurePrefix);
    } finally {
      context.dispose();
    }

    return orderByDeclaration(source, procedures).map((name) =>
      Object.freeze({ file, name, directive: extractDirective(source, name) })
    );
  }
}
