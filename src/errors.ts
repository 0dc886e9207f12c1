export class LumError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LumError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** No primary instance answers on the control socket. */
export class NoInstanceError extends LumError {
  constructor(message = "no existing server", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NoInstanceError";
  }
}

/** Another live process already holds the control socket. */
export class InstanceRunningError extends LumError {
  constructor(socketPath: string, options?: { cause?: unknown }) {
    super(`another instance is already listening at ${socketPath}`, options);
    this.name = "InstanceRunningError";
  }
}

/** The primary instance answered `ERROR <reason>`. */
export class ControlResponseError extends LumError {
  constructor(public readonly reason: string) {
    super(`server error: ${reason}`);
    this.name = "ControlResponseError";
  }
}

export class ProtocolError extends LumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

export class RegistryError extends LumError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RegistryError";
  }
}

export class UsageError extends LumError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}
