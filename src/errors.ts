// src/errors.ts

export class HstsSyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HstsSyncError";
  }
}

/** Fetching or opening the preload list failed. */
export class AcquisitionError extends HstsSyncError {
  constructor(
    message: string,
    public readonly locator: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AcquisitionError";
  }
}

export class DecodeError extends HstsSyncError {
  constructor(
    message: string,
    public readonly file?: string,
    public readonly line?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class DuplicateKeyError extends DecodeError {
  constructor(
    public readonly key: string,
    file?: string,
    line?: number,
  ) {
    super(`Duplicate key ${key}`, file, line);
    this.name = "DuplicateKeyError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
