/**
 * Error recorded when a test file cannot be loaded during discovery
 */

export class DiscoveryError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: Error) {
    super(message, { cause });
    this.name = 'DiscoveryError';
    this.filePath = filePath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DiscoveryError);
    }
  }
}
