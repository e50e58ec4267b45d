/**
 * Raised for an unrecognised project attribute, or for any fault while
 * applying the control file. Fatal to the current `sync`/`build` call only.
 */
export class ConfigurationError extends Error {
  /** Control file being applied when the fault occurred, if any. */
  readonly file?: string;

  constructor(message: string, options: { cause?: unknown; file?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigurationError";
    this.file = options.file;
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
