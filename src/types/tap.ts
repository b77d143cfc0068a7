/**
 * TAP version 13 event types
 */

export interface TapDirective {
  readonly kind: 'SKIP' | 'TODO';
  readonly reason: string;
}

export interface TapDiagnostic {
  readonly message: string;
  readonly file: string;
  readonly function: string;
  readonly durationMs: number;
}

export interface TapEvent {
  readonly sequence: number;
  readonly ok: boolean;
  readonly description: string;
  readonly directive?: TapDirective;
  readonly diagnostic?: TapDiagnostic;
}
