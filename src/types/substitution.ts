/**
 * Mocking and stubbing types
 */

export type SubstitutionKind = 'command' | 'procedure';

export type ScriptCallable = (...args: unknown[]) => unknown;

/**
 * A replacement body: a function, or script source compiled as a function body
 */
export type Implementation = ScriptCallable | string;

export interface SubstitutionEntry {
  readonly name: string;
  readonly kind: SubstitutionKind;
  readonly implementation: ScriptCallable;
  readonly hadOriginal: boolean;
  readonly original?: ScriptCallable;
}

export interface SubstitutionListing {
  readonly commands: readonly string[];
  readonly procedures: readonly string[];
}

export interface CommandResult {
  readonly status: number;
  readonly stdout: string;
  readonly stderr: string;
}
