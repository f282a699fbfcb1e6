/**
 * Error types raised by the geometry, naming, store and catalog layers.
 */

/**
 * Pass-level failure: no valid templates or no geometries. Raised before any mutation.
 */
export class PreconditionFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionFailure";
  }
}

/**
 * A single template failed its structural checks.
 */
export class ValidationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ValidationFailure";
  }
}

/**
 * A single create, delete or overwrite call against the material store failed.
 */
export class StoreOperationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreOperationError";
  }
}

/**
 * A text file could not be written.
 */
export class IOFailure extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Cannot write file "${path}"`, options);
    this.name = "IOFailure";
    this.path = path;
  }
}

export class GeometryNotFoundError extends Error {
  readonly diameter: number;

  constructor(diameter: number) {
    super(`No bolt geometry registered for M${diameter}`);
    this.name = "GeometryNotFoundError";
    this.diameter = diameter;
  }
}

export class NameCodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NameCodecError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Render an error and its `cause` chain, one entry per line.
 */
export function formatErrorChain(error: unknown): string {
  const lines: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && depth < 10) {
    const prefix = depth === 0 ? "" : "Caused by: ";
    if (current instanceof Error) {
      lines.push(`${prefix}${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(`${prefix}${String(current)}`);
      current = undefined;
    }
    depth++;
  }

  return lines.join("\n");
}
