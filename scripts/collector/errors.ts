export class InventoryError extends Error {
  readonly details: string | null;

  constructor(message: string, details: string | null = null, options?: { cause?: unknown }) {
    super(details ? `${message}: ${details}` : message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export interface ExternalToolFailure {
  argv: readonly string[];
  stderr: string;
  exitCode: number | null;
  timedOut?: boolean;
  cause?: unknown;
}

/** The hosting CLI (or API) refused or failed a call. */
export class ExternalToolError extends InventoryError {
  readonly argv: readonly string[];
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;

  constructor(failure: ExternalToolFailure, message = `Command failed: ${failure.argv.join(" ")}`) {
    super(message, failure.stderr.trim() || null, { cause: failure.cause });
    this.argv = failure.argv;
    this.stderr = failure.stderr;
    this.exitCode = failure.exitCode;
    this.timedOut = failure.timedOut ?? false;
  }
}

export class AuthenticationError extends ExternalToolError {
  constructor(failure: ExternalToolFailure) {
    super(
      failure,
      "Authentication required. Run 'gh auth login' or set GITHUB_TOKEN for the api source"
    );
  }
}

export const PAYLOAD_PREVIEW_LENGTH = 500;

export class DataDecodeError extends InventoryError {
  readonly operation: string;
  readonly payloadPreview: string;

  constructor(operation: string, reason: string, payload: string, options?: { cause?: unknown }) {
    const preview = payload.slice(0, PAYLOAD_PREVIEW_LENGTH);
    super(`Could not decode ${operation}`, `${reason}\nRaw output: ${preview}`, options);
    this.operation = operation;
    this.payloadPreview = preview;
  }
}

export class FileOperationError extends InventoryError {
  readonly filePath: string;
  readonly operation: string;

  constructor(filePath: string, operation: string, cause?: unknown) {
    super(`Could not ${operation} ${filePath}`, cause instanceof Error ? cause.message : null, { cause });
    this.filePath = filePath;
    this.operation = operation;
  }
}

export class ConfigurationError extends InventoryError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
