import { describe, it, expect } from 'vitest';
import { ExecutionStateError } from './execution-state-error';
import { ScriptExit } from './script-exit';

describe('ExecutionStateError', () => {
  it('should name both ends of the transition', () => {
    const error = new ExecutionStateError('passed', 'running');

    expect(error.name).toBe('ExecutionStateError');
    expect(error.message).toBe('Illegal test state transition: passed -> running');
    expect(error.from).toBe('passed');
    expect(error.to).toBe('running');
  });
});

describe('ScriptExit', () => {
  it('should carry the exit code', () => {
    const signal = new ScriptExit(3);

    expect(signal.code).toBe(3);
    expect(signal.message).toBe('exit 3');
  });
});
