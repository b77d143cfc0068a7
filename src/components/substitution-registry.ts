/**
 * Substitution registry
 *
 * Tracks command mocks and procedure stubs for one execution context.
 * Commands are resolved through the registry by the context's `run`; stubs
 * replace the procedure binding itself and remember what they displaced so
 * that unstubbing restores it.
 */

import { types } from 'util';
import { SubstitutionError } from '../errors';
import type {
  Implementation,
  ScriptCallable,
  SubstitutionEntry,
  SubstitutionKind,
  SubstitutionListing
} from '../types';

/**
 * Names the runtime owns; they cannot be mocked as commands
 */
export const BUILTIN_COMMANDS: ReadonlySet<string> = new Set([
  'cd', 'export', 'source', '.', 'exit', 'eval', 'exec', 'return', 'set', 'unset',
  'readonly', 'declare', 'local', 'trap', 'builtin', 'command', 'type', 'hash',
  'read', 'echo', 'printf', 'test', '[', ']', 'pwd', 'run'
]);

/**
 * The procedure table a registry rewrites when stubbing
 */
export interface ProcedureScope {
  lookup(name: string): ScriptCallable | undefined;
  define(name: string, procedure: ScriptCallable): void;
  remove(name: string): void;
  compile(body: string): ScriptCallable;
}

interface Operation {
  readonly name: string;
  readonly kind: SubstitutionKind;
  readonly noun: string;
}

const MOCK: Operation = { name: 'mock_command', kind: 'command', noun: 'command' };
const UNMOCK: Operation = { name: 'unmock_command', kind: 'command', noun: 'command' };
const STUB: Operation = { name: 'stub_function', kind: 'procedure', noun: 'function' };
const UNSTUB: Operation = { name: 'unstub_function', kind: 'procedure', noun: 'function' };

export class SubstitutionRegistry {
  private readonly commands = new Map<string, SubstitutionEntry>();
  private readonly procedures = new Map<string, SubstitutionEntry>();

  constructor(private readonly scope: ProcedureScope) {}

  mockCommand(name: string, implementation: Implementation | undefined): SubstitutionEntry {
    this.requireName(MOCK, name);
    const body = this.requireImplementation(MOCK, name, implementation);

    if (BUILTIN_COMMANDS.has(name)) {
      throw new SubstitutionError(`${MOCK.name}: cannot mock builtin '${name}'`, 'builtin', MOCK.kind, name);
    }
    if (this.commands.has(name)) {
      throw new SubstitutionError(
        `${MOCK.name}: '${name}' is already mocked (call unmock_command first)`,
        'already-registered',
        MOCK.kind,
        name
      );
    }

    const entry: SubstitutionEntry = Object.freeze({
      name,
      kind: MOCK.kind,
      implementation: this.compile(MOCK, name, body),
      hadOriginal: false
    });
    this.commands.set(name, entry);
    return entry;
  }

  stubFunction(name: string, implementation: Implementation | undefined): SubstitutionEntry {
    this.requireName(STUB, name);
    const body = this.requireImplementation(STUB, name, implementation);

    if (this.procedures.has(name)) {
      throw new SubstitutionError(
        `${STUB.name}: '${name}' is already stubbed (call unstub_function first)`,
        'already-registered',
        STUB.kind,
        name
      );
    }

    const replacement = this.compile(STUB, name, body);
    const original = this.scope.lookup(name);
    const entry: SubstitutionEntry = Object.freeze({
      name,
      kind: STUB.kind,
      implementation: replacement,
      hadOriginal: original !== undefined,
      original
    });

    this.scope.define(name, replacement);
    this.procedures.set(name, entry);
    return entry;
  }

  unmockCommand(name: string): void {
    this.requireName(UNMOCK, name);
    if (!this.commands.delete(name)) {
      throw new SubstitutionError(`${UNMOCK.name}: '${name}' is not mocked`, 'not-registered', UNMOCK.kind, name);
    }
  }

  unstubFunction(name: string): void {
    this.requireName(UNSTUB, name);
    const entry = this.procedures.get(name);
    if (!entry) {
      throw new SubstitutionError(`${UNSTUB.name}: '${name}' is not stubbed`, 'not-registered', UNSTUB.kind, name);
    }
    this.restore(entry);
    this.procedures.delete(name);
  }

  /**
   * Removes every mock and restores every stub, newest stub first
   */
  unmockAll(): void {
    this.commands.clear();

    for (const entry of [...this.procedures.values()].reverse()) {
      this.restore(entry);
    }
    this.procedures.clear();
  }

  resolveCommand(name: string): ScriptCallable | undefined {
    return this.commands.get(name)?.implementation;
  }

  isMocked(name: string): boolean {
    return this.commands.has(name);
  }

  isStubbed(name: string): boolean {
    return this.procedures.has(name);
  }

  isSubstituted(name: string): boolean {
    return this.isMocked(name) || this.isStubbed(name);
  }

  list(): SubstitutionListing {
    return {
      commands: [...this.commands.keys()],
      procedures: [...this.procedures.keys()]
    };
  }

  formatList(): string {
    const { commands, procedures } = this.list();
    const names = (items: readonly string[]): string => (items.length === 0 ? 'none' : items.join(' '));
    return `Mocked commands: ${names(commands)}\nStubbed functions: ${names(procedures)}`;
  }

  get size(): number {
    return this.commands.size + this.procedures.size;
  }

  private restore(entry: SubstitutionEntry): void {
    if (entry.original) {
      this.scope.define(entry.name, entry.original);
    } else {
      this.scope.remove(entry.name);
    }
  }

  private requireName(operation: Operation, name: string): void {
    if (name === '') {
      throw new SubstitutionError(
        `${operation.name}: ${operation.noun} name required`,
        'missing-name',
        operation.kind,
        name
      );
    }
  }

  private requireImplementation(
    operation: Operation,
    name: string,
    implementation: Implementation | undefined
  ): Implementation {
    if (implementation === undefined || implementation === '') {
      throw new SubstitutionError(
        `${operation.name}: implementation required`,
        'missing-implementation',
        operation.kind,
        name
      );
    }
    return implementation;
  }

  private compile(operation: Operation, name: string, implementation: Implementation): ScriptCallable {
    if (typeof implementation !== 'string') {
      return implementation;
    }
    try {
      return this.scope.compile(implementation);
    } catch (error) {
      // compiled in the script realm, so instanceof Error does not hold
      const reason = types.isNativeError(error) ? error.message : String(error);
      throw new SubstitutionError(
        `${operation.name}: invalid implementation for '${name}': ${reason}`,
        'invalid-implementation',
        operation.kind,
        name
      );
    }
  }
}
