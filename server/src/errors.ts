/**
 * Error kinds surfaced by the bridge and the automation routes.
 *
 * Each carries the HTTP status the error middleware answers with.
 */

export class RelayError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** A required environment value is missing. */
export class ConfigurationError extends RelayError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** A dispatch arrived before `/init` created a session. */
export class NotInitializedError extends RelayError {
  constructor() {
    super("Coding assistant not initialized", 400);
  }
}

/** A git command exited non-zero. */
export class VersionControlError extends RelayError {
  readonly command: string;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, stdout: string, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || stdout.trim() || "no output";
    super(`Cmd('${command}') failed: ${detail}`, 500);
    this.command = command;
    this.stdout = stdout;
    this.stderr = stderr;
    if (cause !== undefined) this.cause = cause;
  }
}

/** The remote host or the LLM endpoint could not be reached, or refused the call outright. */
export class TransportError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 502);
    if (cause !== undefined) this.cause = cause;
  }
}

/** The LLM reply was not a usable command object. Recovered inside the agent loop. */
export class ProtocolError extends RelayError {
  constructor(message: string) {
    super(message, 422);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A request body failed schema validation. */
export class InvalidRequestError extends RelayError {
  constructor(message: string) {
    super(message, 400);
  }
}
