/**
 * Script context
 *
 * One disposable realm per test. A context owns its global scope, a private
 * copy of the environment and working directory, a substitution registry and
 * (when coverage is on) a trace sink. Scripts see the runtime builtins as
 * non-enumerable globals; everything a script declares itself is enumerable,
 * which is how procedures are told apart from the runtime.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as vm from 'vm';
import { spawnSync } from 'child_process';
import { format, types } from 'util';
import { setImmediate as nextTurn, setTimeout as delay } from 'timers/promises';
import type { CommandResult, Implementation, ScriptCallable } from '../types';
import { ScriptExit, SubstitutionError } from '../errors';
import { SubstitutionRegistry, type ProcedureScope } from './substitution-registry';
import { createAssertionBindings, formatValue, type AssertionHost } from './assertions';
import { TRACE_HOOK } from './instrumenter';
import type { TraceCollector, TraceSink } from './trace-collector';
import { logger } from '../utils/logger';

export const COMMAND_NOT_FOUND_STATUS = 127;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Longest wait for timers a procedure left pending */
export const SETTLE_LIMIT_MS = 2000;
const SETTLE_POLL_MS = 5;

export interface ScriptTracing {
  readonly collector: TraceCollector;
  readonly sink: TraceSink;
}

export interface ScriptContextOptions {
  readonly cwd: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly name?: string;
  readonly tracing?: ScriptTracing;
  // drop everything written outside a run() capture
  readonly discardOutput?: boolean;
}

export function isCallable(value: unknown): value is ScriptCallable {
  return typeof value === 'function';
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return false;
  }
  return typeof Reflect.get(value, 'then') === 'function';
}

/**
 * Completion status of a procedure's return value
 */
export function completionStatus(value: unknown): number {
  if (value === false) {
    return 1;
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : 1;
  }
  return 0;
}

/**
 * `Name: message` for an error from either realm
 */
export function describeError(error: unknown): string {
  if (types.isNativeError(error)) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === 'object' && error !== null) {
    const message: unknown = Reflect.get(error, 'message');
    if (typeof message === 'string') {
      const name: unknown = Reflect.get(error, 'name');
      return `${typeof name === 'string' ? name : 'Error'}: ${message}`;
    }
  }
  return `Error: ${formatValue(error)}`;
}

function formatValues(values: readonly unknown[]): string {
  if (values.length === 0) {
    return '';
  }
  const [template, ...rest] = values;
  return format(template, ...rest);
}

function toExitCode(value: unknown): number {
  const code = Number(value ?? 0);
  return Number.isInteger(code) ? code : 1;
}

function copyEnvironment(source: Readonly<Record<string, string | undefined>>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

interface OutputFrame {
  stdout: string;
  stderr: string;
}

/**
 * Output capture with nested frames
 *
 * Writes go to the innermost open frame (a run() capture), or to the
 * combined test output when no frame is open.
 */
export class OutputCapture {
  private combined = '';
  private readonly frames: OutputFrame[] = [];

  constructor(private readonly discard: boolean = false) {}

  stdout(text: string): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) {
      frame.stdout += text;
    } else if (!this.discard) {
      this.combined += text;
    }
  }

  stderr(text: string): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) {
      frame.stderr += text;
    } else if (!this.discard) {
      this.combined += text;
    }
  }

  push(): void {
    this.frames.push({ stdout: '', stderr: '' });
  }

  pop(): OutputFrame {
    return this.frames.pop() ?? { stdout: '', stderr: '' };
  }

  text(): string {
    return this.combined;
  }
}

export class ScriptContext {
  readonly output: OutputCapture;
  readonly substitutions: SubstitutionRegistry;
  readonly env: Record<string, string>;

  private readonly context: vm.Context;
  private readonly global: object;
  private readonly runtimeNames: ReadonlySet<string>;
  private readonly loadStack: string[] = [];
  private readonly tracing?: ScriptTracing;
  private readonly timeouts = new Set<NodeJS.Timeout>();
  private readonly immediates = new Set<NodeJS.Immediate>();
  private readonly promisePrototype: unknown;
  private asyncStatus = 0;
  private cwd: string;
  private entryDir?: string;
  private disposed = false;

  constructor(options: ScriptContextOptions) {
    this.cwd = path.resolve(options.cwd);
    this.env = copyEnvironment(options.env ?? process.env);
    this.env.PWD = this.cwd;
    this.output = new OutputCapture(options.discardOutput ?? false);
    this.tracing = options.tracing;
    this.substitutions = new SubstitutionRegistry(this.procedureScope());

    const bindings = this.createBindings();
    this.runtimeNames = new Set(Object.keys(bindings));

    const sandbox: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(bindings)) {
      Object.defineProperty(sandbox, name, { value, writable: true, configurable: true, enumerable: false });
    }

    this.context = vm.createContext(sandbox, {
      name: options.name ?? 'trialrun',
      codeGeneration: { strings: true, wasm: false }
    });

    const globalObject: unknown = vm.runInContext('globalThis', this.context);
    if (typeof globalObject !== 'object' || globalObject === null) {
      throw new Error('Script context has no global object');
    }
    this.global = globalObject;
    this.promisePrototype = vm.runInContext('Promise.prototype', this.context);
  }

  get workingDirectory(): string {
    return this.cwd;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Loads a script file into the context, instrumented when tracing is on
   */
  source(filePath: string): void {
    const absolute = path.resolve(this.baseDirectory(), filePath);
    const text = fs.readFileSync(absolute, 'utf8');
    const instrumented = this.tracing?.collector.instrument(absolute, text);
    const script = compileScript(instrumented ?? text, text, absolute);

    if (this.entryDir === undefined) {
      this.entryDir = path.dirname(absolute);
    }

    this.loadStack.push(absolute);
    try {
      script.runInContext(this.context, { displayErrors: false });
    } finally {
      this.loadStack.pop();
    }
  }

  /**
   * Invokes a named procedure and resolves to its completion status
   */
  async invoke(name: string): Promise<number> {
    const procedure = this.lookupProcedure(name);
    if (!procedure) {
      this.output.stderr(`${name}: command not found\n`);
      return COMMAND_NOT_FOUND_STATUS;
    }

    try {
      const value = procedure();
      return completionStatus(isThenable(value) ? await value : value);
    } catch (error) {
      return this.reportError(error);
    }
  }

  /**
   * Converts a thrown value into a status, writing the error to the output
   */
  reportError(error: unknown): number {
    if (error instanceof ScriptExit) {
      return error.code;
    }
    this.output.stderr(`${describeError(error)}\n`);
    return 1;
  }

  /**
   * Records an error raised after the procedure returned: from a timer
   * callback or a promise nobody handled. The first such failure decides
   * the status reported by settle().
   */
  reportAsyncError(error: unknown): void {
    const status = this.reportError(error);
    if (status !== 0 && this.asyncStatus === 0) {
      this.asyncStatus = status;
    }
  }

  /**
   * Whether a promise was created by code running in this context
   */
  ownsPromise(promise: Promise<unknown>): boolean {
    return Object.getPrototypeOf(promise) === this.promisePrototype;
  }

  /**
   * Waits for pending timers (up to the limit), then one more event loop
   * turn so unhandled rejections surface, and resolves to the status of the
   * first asynchronous failure, or 0
   */
  async settle(limitMs: number = SETTLE_LIMIT_MS): Promise<number> {
    const deadline = Date.now() + limitMs;
    while (this.pendingTimers > 0 && Date.now() < deadline) {
      await delay(SETTLE_POLL_MS);
    }
    await nextTurn();
    return this.asyncStatus;
  }

  get pendingTimers(): number {
    return this.timeouts.size + this.immediates.size;
  }

  /**
   * Names of script-declared functions starting with the prefix
   */
  listProcedures(prefix: string): string[] {
    return Object.keys(this.global).filter(
      (name) => name.startsWith(prefix) && !this.runtimeNames.has(name) && isCallable(Reflect.get(this.global, name))
    );
  }

  /**
   * Resolves and runs a command: mocks, then procedures and builtins, then external programs
   */
  run(command: string, args: readonly unknown[] = []): CommandResult {
    const mock = this.substitutions.resolveCommand(command);
    if (mock) {
      return this.callAsCommand(command, mock, args);
    }

    const procedure = this.lookupProcedure(command);
    if (procedure) {
      return this.callAsCommand(command, procedure, args);
    }

    return this.runExternal(command, args);
  }

  isVariableSet(name: string): boolean {
    if (Object.prototype.hasOwnProperty.call(this.env, name)) {
      return true;
    }
    return this.bindingType(name) !== 'undefined';
  }

  bindingType(name: string): string {
    if (!IDENTIFIER.test(name)) {
      return 'undefined';
    }
    try {
      const result: unknown = vm.runInContext(`typeof ${name}`, this.context);
      return typeof result === 'string' ? result : 'undefined';
    } catch {
      // a let/const binding still in its temporal dead zone
      return 'undefined';
    }
  }

  /**
   * Cancels pending timers, removes all substitutions and finalizes the trace sink
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.timeouts.forEach((handle) => clearTimeout(handle));
    this.timeouts.clear();
    this.immediates.forEach((handle) => clearImmediate(handle));
    this.immediates.clear();
    this.substitutions.unmockAll();
    this.tracing?.sink.finalize();
  }

  private lookupProcedure(name: string): ScriptCallable | undefined {
    const declared = Object.getOwnPropertyDescriptor(this.global, name)?.enumerable ?? false;
    if (!declared && !this.runtimeNames.has(name)) {
      return undefined;
    }
    const value: unknown = Reflect.get(this.global, name);
    return isCallable(value) ? value : undefined;
  }

  private callAsCommand(name: string, implementation: ScriptCallable, args: readonly unknown[]): CommandResult {
    this.output.push();
    let status: number;
    try {
      status = this.commandStatus(name, implementation(...args));
    } catch (error) {
      status = this.reportError(error);
    }
    const frame = this.output.pop();
    return { status, stdout: frame.stdout, stderr: frame.stderr };
  }

  private commandStatus(name: string, value: unknown): number {
    if (typeof value === 'string') {
      this.output.stdout(value);
      return 0;
    }
    if (isThenable(value)) {
      this.output.stderr(`${name}: asynchronous commands are not supported by run()\n`);
      return 1;
    }
    if (typeof value === 'object' && value !== null) {
      const stdout: unknown = Reflect.get(value, 'stdout');
      const stderr: unknown = Reflect.get(value, 'stderr');
      if (typeof stdout === 'string') {
        this.output.stdout(stdout);
      }
      if (typeof stderr === 'string') {
        this.output.stderr(stderr);
      }
      return completionStatus(Reflect.get(value, 'status'));
    }
    return completionStatus(value);
  }

  private runExternal(command: string, args: readonly unknown[]): CommandResult {
    const result = spawnSync(command, args.map(String), {
      cwd: this.cwd,
      env: this.env,
      encoding: 'utf8'
    });

    if (result.error) {
      const code: unknown = Reflect.get(result.error, 'code');
      if (code === 'ENOENT') {
        return { status: COMMAND_NOT_FOUND_STATUS, stdout: '', stderr: `${command}: command not found\n` };
      }
      logger.debug('External command failed to start', { command, error: result.error.message });
      return { status: 126, stdout: '', stderr: `${command}: ${result.error.message}\n` };
    }

    return { status: result.status ?? 1, stdout: result.stdout, stderr: result.stderr };
  }

  private baseDirectory(): string {
    const loading = this.loadStack[this.loadStack.length - 1];
    if (loading) {
      return path.dirname(loading);
    }
    return this.entryDir ?? this.cwd;
  }

  private procedureScope(): ProcedureScope {
    return {
      lookup: (name) => {
        const value: unknown = Reflect.get(this.global, name);
        return isCallable(value) ? value : undefined;
      },
      define: (name, procedure) => {
        Reflect.set(this.global, name, procedure);
      },
      remove: (name) => {
        Reflect.deleteProperty(this.global, name);
      },
      compile: (body) => {
        const compiled: unknown = vm.runInContext(`(function (...args) {\n${body}\n})`, this.context);
        if (!isCallable(compiled)) {
          throw new TypeError('implementation did not compile to a function');
        }
        return compiled;
      }
    };
  }

  private runCallback(callback: ScriptCallable, args: readonly unknown[]): void {
    try {
      callback(...args);
    } catch (error) {
      this.reportAsyncError(error);
    }
  }

  private scheduleTimeout(callback: unknown, wait: unknown, args: readonly unknown[]): NodeJS.Timeout {
    if (!isCallable(callback)) {
      throw new TypeError('setTimeout: callback must be a function');
    }
    const handle = setTimeout(() => {
      this.timeouts.delete(handle);
      this.runCallback(callback, args);
    }, Number(wait ?? 0));
    this.timeouts.add(handle);
    return handle;
  }

  private scheduleImmediate(callback: unknown, args: readonly unknown[]): NodeJS.Immediate {
    if (!isCallable(callback)) {
      throw new TypeError('setImmediate: callback must be a function');
    }
    const handle = setImmediate(() => {
      this.immediates.delete(handle);
      this.runCallback(callback, args);
    });
    this.immediates.add(handle);
    return handle;
  }

  private cancelTimeout(handle: unknown): void {
    for (const timeout of this.timeouts) {
      if (timeout === handle) {
        clearTimeout(timeout);
        this.timeouts.delete(timeout);
      }
    }
  }

  private cancelImmediate(handle: unknown): void {
    for (const immediate of this.immediates) {
      if (immediate === handle) {
        clearImmediate(immediate);
        this.immediates.delete(immediate);
      }
    }
  }

  private registration(action: () => void): number {
    try {
      action();
      return 0;
    } catch (error) {
      if (error instanceof SubstitutionError) {
        this.output.stderr(`${error.message}\n`);
        return 1;
      }
      throw error;
    }
  }

  private createBindings(): Record<string, unknown> {
    const write = (text: string): void => this.output.stdout(text);
    const writeError = (text: string): void => this.output.stderr(text);
    const nameOf = (value: unknown): string => (typeof value === 'string' ? value : '');
    const implementationOf = (value: unknown): Implementation | undefined =>
      isCallable(value) || typeof value === 'string' ? value : undefined;

    const host: AssertionHost = {
      write,
      invoke: (command, args) =>
        isCallable(command) ? this.callAsCommand(command.name || 'function', command, args) : this.run(String(command), args),
      describeCommand: (command, args) =>
        [isCallable(command) ? command.name || '<function>' : String(command), ...args.map((arg) => formatValue(arg))].join(' '),
      resolvePath: (target) => path.resolve(this.cwd, target),
      isVariableSet: (name) => this.isVariableSet(name),
      bindingType: (name) => this.bindingType(name)
    };

    const bindings: Record<string, unknown> = {
      echo: (...values: unknown[]): void => write(`${values.map((value) => formatValue(value)).join(' ')}\n`),
      printf: (template: unknown, ...values: unknown[]): void => write(format(String(template ?? ''), ...values)),
      cd: (dir: unknown): number => {
        const target = dir === undefined ? this.env.HOME ?? this.cwd : String(dir);
        const resolved = path.resolve(this.cwd, target);
        if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
          writeError(`cd: ${target}: No such file or directory\n`);
          return 1;
        }
        this.cwd = resolved;
        this.env.PWD = resolved;
        return 0;
      },
      pwd: (): string => this.cwd,
      source: (file: unknown): void => this.source(String(file)),
      exit: (code?: unknown): never => {
        throw new ScriptExit(toExitCode(code));
      },
      run: (command: unknown, ...args: unknown[]): CommandResult => this.run(String(command), args),
      ENV: this.env,
      setTimeout: (callback: unknown, wait?: unknown, ...args: unknown[]): NodeJS.Timeout =>
        this.scheduleTimeout(callback, wait, args),
      clearTimeout: (handle: unknown): void => this.cancelTimeout(handle),
      setImmediate: (callback: unknown, ...args: unknown[]): NodeJS.Immediate => this.scheduleImmediate(callback, args),
      clearImmediate: (handle: unknown): void => this.cancelImmediate(handle),
      console: {
        log: (...values: unknown[]): void => write(`${formatValues(values)}\n`),
        info: (...values: unknown[]): void => write(`${formatValues(values)}\n`),
        debug: (...values: unknown[]): void => write(`${formatValues(values)}\n`),
        warn: (...values: unknown[]): void => writeError(`${formatValues(values)}\n`),
        error: (...values: unknown[]): void => writeError(`${formatValues(values)}\n`)
      },
      mock_command: (name: unknown, implementation: unknown): number =>
        this.registration(() => this.substitutions.mockCommand(nameOf(name), implementationOf(implementation))),
      unmock_command: (name: unknown): number =>
        this.registration(() => this.substitutions.unmockCommand(nameOf(name))),
      stub_function: (name: unknown, implementation: unknown): number =>
        this.registration(() => this.substitutions.stubFunction(nameOf(name), implementationOf(implementation))),
      unstub_function: (name: unknown): number =>
        this.registration(() => this.substitutions.unstubFunction(nameOf(name))),
      unmock_all: (): number => {
        this.substitutions.unmockAll();
        return 0;
      },
      is_mocked: (name: unknown): boolean => this.substitutions.isMocked(nameOf(name)),
      is_stubbed: (name: unknown): boolean => this.substitutions.isStubbed(nameOf(name)),
      is_substituted: (name: unknown): boolean => this.substitutions.isSubstituted(nameOf(name)),
      list_mocks: (): number => {
        write(`${this.substitutions.formatList()}\n`);
        return 0;
      },
      ...createAssertionBindings(host)
    };

    const sink = this.tracing?.sink;
    if (sink) {
      bindings[TRACE_HOOK] = (fileId: unknown, line: unknown): void => sink.record(Number(fileId), Number(line));
    }

    return bindings;
  }
}

/**
 * Compiles script code; when instrumented code fails to parse, the original
 * source is compiled instead so the syntax error points at the real location
 */
function compileScript(code: string, original: string, filename: string): vm.Script {
  try {
    return new vm.Script(code, { filename });
  } catch (error) {
    if (code !== original) {
      return new vm.Script(original, { filename });
    }
    throw error;
  }
}
