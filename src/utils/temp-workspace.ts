/**
 * Ephemeral per-run storage
 *
 * Each workspace is a uniquely named directory under the OS temp dir. It is
 * removed by dispose(), and any workspace still alive when the process exits
 * (normally or through SIGINT/SIGTERM once exit handlers are installed) is
 * removed then.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from './logger';

const SIGNAL_EXIT_CODES: Record<'SIGINT' | 'SIGTERM', number> = {
  SIGINT: 130,
  SIGTERM: 143
};

export class TempWorkspace {
  private static readonly active = new Set<TempWorkspace>();
  private static exitHookInstalled = false;
  private static signalHooksInstalled = false;

  readonly path: string;
  private disposed = false;

  private constructor(dir: string) {
    this.path = dir;
  }

  /**
   * Create a new workspace directory
   *
   * @param prefix - Directory name prefix, a random suffix is appended
   */
  static create(prefix: string = 'trialrun-'): TempWorkspace {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    const workspace = new TempWorkspace(dir);
    TempWorkspace.active.add(workspace);

    if (!TempWorkspace.exitHookInstalled) {
      process.once('exit', () => TempWorkspace.disposeAll());
      TempWorkspace.exitHookInstalled = true;
    }

    logger.debug('Created temporary workspace', { path: dir });
    return workspace;
  }

  /**
   * Remove live workspaces when the process is interrupted or terminated
   */
  static installSignalHandlers(): void {
    if (TempWorkspace.signalHooksInstalled) {
      return;
    }
    TempWorkspace.signalHooksInstalled = true;

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        TempWorkspace.disposeAll();
        process.exit(SIGNAL_EXIT_CODES[signal]);
      });
    }
  }

  static disposeAll(): void {
    for (const workspace of [...TempWorkspace.active]) {
      workspace.dispose();
    }
  }

  static activeCount(): number {
    return TempWorkspace.active.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Path of a file inside the workspace (not created)
   */
  file(name: string): string {
    return path.join(this.path, name);
  }

  /**
   * Create (if needed) and return a subdirectory of the workspace
   */
  directory(name: string): string {
    const dir = path.join(this.path, name);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    TempWorkspace.active.delete(this);

    try {
      fs.rmSync(this.path, { recursive: true, force: true });
      logger.debug('Removed temporary workspace', { path: this.path });
    } catch (error) {
      logger.warn('Failed to remove temporary workspace', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
