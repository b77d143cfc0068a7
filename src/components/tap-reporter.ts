/**
 * TAP version 13 producer
 *
 * Emits the version line, the plan, one test line per result with SKIP/TODO
 * directives, and a YAML diagnostic block after plain failures.
 */

import type { ExecutionPlan, ExecutionResult, TapDiagnostic, TapDirective, TapEvent } from '../types';
import { escapeSingleQuoted, stripAnsi } from '../utils/sanitize';
import type { LineWriter, RunReporter } from './console-reporter';

export const TAP_VERSION_LINE = 'TAP version 13';

function quote(value: string): string {
  return `'${escapeSingleQuoted(value)}'`;
}

/**
 * YAML block lines for a failure; message continuation lines are indented four spaces
 */
export function formatDiagnostic(diagnostic: TapDiagnostic): string[] {
  const message = quote(stripAnsi(diagnostic.message).replace(/\r\n/g, '\n'));
  const [firstLine, ...continuation] = message.split('\n');

  return [
    '  ---',
    `  message: ${firstLine}`,
    ...continuation.map((line) => `    ${line}`),
    '  severity: fail',
    `  file: ${quote(diagnostic.file)}`,
    `  function: ${quote(diagnostic.function)}`,
    `  duration_ms: ${diagnostic.durationMs}`,
    '  ...'
  ];
}

export function formatDirective(directive: TapDirective): string {
  return directive.reason === '' ? ` # ${directive.kind}` : ` # ${directive.kind} ${directive.reason}`;
}

/**
 * Lines for one test event
 */
export function formatEvent(event: TapEvent): string[] {
  const status = event.ok ? 'ok' : 'not ok';
  const directive = event.directive ? formatDirective(event.directive) : '';
  const lines = [`${status} ${event.sequence} - ${event.description}${directive}`];

  if (!event.ok && !event.directive && event.diagnostic) {
    lines.push(...formatDiagnostic(event.diagnostic));
  }
  return lines;
}

/**
 * The TAP event for an execution result
 */
export function toTapEvent(result: ExecutionResult, sequence: number): TapEvent {
  const { testCase } = result;
  const description = testCase.name;

  switch (result.state) {
    case 'skipped':
      return {
        sequence,
        ok: true,
        description,
        directive: { kind: 'SKIP', reason: testCase.directive.kind === 'none' ? '' : testCase.directive.reason }
      };
    case 'expected-fail':
    case 'unexpected-pass':
      return {
        sequence,
        ok: result.state === 'unexpected-pass',
        description,
        directive: { kind: 'TODO', reason: testCase.directive.kind === 'none' ? '' : testCase.directive.reason }
      };
    case 'passed':
      return { sequence, ok: true, description };
    case 'failed':
      return {
        sequence,
        ok: false,
        description,
        diagnostic: {
          message: result.output,
          file: testCase.file.relativePath,
          function: testCase.name,
          durationMs: result.durationMs
        }
      };
  }
}

export class TapReporter implements RunReporter {
  private sequence = 0;

  constructor(private readonly writeLine: LineWriter) {}

  get count(): number {
    return this.sequence;
  }

  start(plan: ExecutionPlan): void {
    this.sequence = 0;
    this.writeLine(TAP_VERSION_LINE);
    for (const failure of plan.loadFailures) {
      this.comment(failure.message);
    }
    this.writeLine(`1..${plan.total}`);
    if (plan.total === 0) {
      this.comment('No tests found.');
    }
  }

  result(result: ExecutionResult): TapEvent {
    this.sequence += 1;
    const event = toTapEvent(result, this.sequence);
    for (const line of formatEvent(event)) {
      this.writeLine(line);
    }
    return event;
  }

  note(text: string): void {
    this.comment(text);
  }

  finish(): void {
    // the plan line already carries the totals
  }

  comment(text: string): void {
    for (const line of text.split('\n')) {
      this.writeLine(line === '' ? '#' : `# ${line}`);
    }
  }
}
