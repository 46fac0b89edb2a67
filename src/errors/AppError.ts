/**
 * Base class for every error the toolbox raises on purpose
 *
 * - exitCode: process exit status the CLI uses when the error ends a run
 * - isFatal: true when the error invalidates the whole run (bad global
 *   parameters); false when it only affects one instrument
 */
export class AppError extends Error {
  public readonly exitCode: number;
  public readonly isFatal: boolean;

  constructor(message: string, options: { exitCode?: number; isFatal?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.exitCode = options.exitCode ?? 1;
    this.isFatal = options.isFatal ?? false;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
