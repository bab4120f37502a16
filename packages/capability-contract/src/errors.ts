export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Base class of every error the toolkit raises on purpose. `code` follows the
 * JSON-RPC numbering so runtimes can forward it unchanged.
 */
export abstract class ArmoryError extends Error {
  abstract readonly code: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Registration failed: untyped parameter, bad marker or name. */
export class RegistrationError extends ArmoryError {
  readonly code = -32010;

  constructor(
    message: string,
    readonly capability?: string,
    readonly parameter?: string
  ) {
    super(message);
  }
}

/** A declared type has no schema mapping. */
export class SchemaError extends ArmoryError {
  readonly code = -32011;

  constructor(
    message: string,
    readonly parameter: string,
    readonly declaredType: string
  ) {
    super(message);
  }
}

export class NotFoundError extends ArmoryError {
  readonly code = -32601;

  constructor(
    readonly capability: string,
    readonly tool?: string
  ) {
    super(
      tool
        ? `Capability "${capability}" not found on tool "${tool}"`
        : `Capability "${capability}" not found`
    );
  }
}

/** Caller input was rejected before anything ran. */
export class ValidationError extends ArmoryError {
  readonly code = -32602;

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = []
  ) {
    super(message);
  }
}

/** The capability body threw. The original error is kept as `cause`. */
export class ExecutionError extends ArmoryError {
  readonly code = -32000;

  constructor(
    readonly capability: string,
    cause: unknown
  ) {
    super(
      `Capability "${capability}" failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
  }
}

export class CollisionError extends ArmoryError {
  readonly code = -32012;

  constructor(readonly names: string[]) {
    super(`Capability name collision: ${names.join(", ")}`);
  }
}
