/**
 * Discovery and planning types
 */

import type { DiscoveryError } from '../errors';

export type DirectiveKind = 'skip' | 'todo';

export type Directive =
  | { readonly kind: 'none' }
  | { readonly kind: DirectiveKind; readonly reason: string };

export interface TestFile {
  readonly path: string;
  readonly relativePath: string;
  readonly pattern: string;
}

export interface TestCase {
  readonly file: TestFile;
  readonly name: string;
  readonly directive: Directive;
}

export interface LoadFailure {
  readonly file: TestFile;
  readonly message: string;
  readonly error: DiscoveryError;
}

export interface ExecutionPlan {
  readonly cases: readonly TestCase[];
  readonly total: number;
  readonly loadFailures: readonly LoadFailure[];
}

export interface DiscoveryOptions {
  readonly rootDir: string;
  readonly filePattern: string;
  readonly procedurePrefix: string;
}
