import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TempWorkspace } from './temp-workspace';

describe('TempWorkspace', () => {
  afterEach(() => {
    TempWorkspace.disposeAll();
  });

  it('should create a uniquely named directory under the temp dir', () => {
    const first = TempWorkspace.create('trialrun-test-');
    const second = TempWorkspace.create('trialrun-test-');

    expect(first.path).not.toBe(second.path);
    expect(path.dirname(first.path)).toBe(os.tmpdir());
    expect(path.basename(first.path).startsWith('trialrun-test-')).toBe(true);
    expect(fs.statSync(first.path).isDirectory()).toBe(true);
  });

  it('should create subdirectories on demand', () => {
    const workspace = TempWorkspace.create('trialrun-test-');
    const traces = workspace.directory('traces');

    expect(traces).toBe(path.join(workspace.path, 'traces'));
    expect(fs.statSync(traces).isDirectory()).toBe(true);
    expect(workspace.file('results.jsonl')).toBe(path.join(workspace.path, 'results.jsonl'));
  });

  it('should remove the directory and its contents on dispose', () => {
    const workspace = TempWorkspace.create('trialrun-test-');
    fs.writeFileSync(workspace.file('data.txt'), 'x');

    workspace.dispose();

    expect(fs.existsSync(workspace.path)).toBe(false);
    expect(workspace.isDisposed).toBe(true);
  });

  it('should tolerate repeated dispose calls', () => {
    const workspace = TempWorkspace.create('trialrun-test-');

    workspace.dispose();
    workspace.dispose();

    expect(fs.existsSync(workspace.path)).toBe(false);
  });

  it('should dispose every live workspace at once', () => {
    const before = TempWorkspace.activeCount();
    const a = TempWorkspace.create('trialrun-test-');
    const b = TempWorkspace.create('trialrun-test-');

    expect(TempWorkspace.activeCount()).toBe(before + 2);

    TempWorkspace.disposeAll();

    expect(TempWorkspace.activeCount()).toBe(0);
    expect(fs.existsSync(a.path)).toBe(false);
    expect(fs.existsSync(b.path)).toBe(false);
  });
});
