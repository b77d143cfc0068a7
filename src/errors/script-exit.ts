/**
 * Thrown by the script runtime's exit() to unwind to the context boundary
 */

export class ScriptExit extends Error {
  public readonly code: number;

  constructor(code: number) {
    super(`exit ${code}`);
    this.name = 'ScriptExit';
    this.code = code;
  }
}
