import {
  ExecutionError,
  ParameterSpec,
  ValidationError,
  ValidationIssue,
} from "@armory/capability-contract";
import { ExtraArgumentMode, logger } from "@armory/common";
import { ZodError } from "zod";
import { BaseCapability } from "./capability";

export interface UseOptions {
  /** `reject` (default) fails on undeclared arguments, `ignore` drops them */
  extraArguments?: ExtraArgumentMode;
}

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Converts strings that unambiguously hold the declared primitive. Every
 * other value is left for the schema to accept or reject.
 */
export function coerceValue(parameter: ParameterSpec, value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const text = value.trim();

  switch (parameter.type) {
    case "integer":
      if (INTEGER.test(text)) {
        const parsed = Number(text);
        return Number.isSafeInteger(parsed) ? parsed : value;
      }
      return value;
    case "number": {
      if (!DECIMAL.test(text)) {
        return value;
      }
      const parsed = Number(text);
      return Number.isFinite(parsed) ? parsed : value;
    }
    case "boolean":
      if (text === "true") return true;
      if (text === "false") return false;
      return value;
    default:
      return value;
  }
}

function issuesFrom(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path,
    message: issue.message,
  }));
}

/**
 * Checks an argument bag against the capability's declared parameters and
 * returns the parsed bag the handler receives. Nothing runs on failure.
 */
export function validateArguments(
  capability: BaseCapability,
  args: unknown,
  mode: ExtraArgumentMode = "reject"
): Record<string, unknown> {
  const name = capability.name;
  if (!isPlainObject(args)) {
    throw new ValidationError(`Arguments for "${name}" must be an object`, [
      { path: [], message: "Expected object" },
    ]);
  }

  const provided = (key: string) =>
    Object.prototype.hasOwnProperty.call(args, key) && args[key] !== undefined;

  const missing = capability.parameters
    .filter((p) => p.required && !provided(p.name))
    .map((p) => p.name);
  if (missing.length) {
    throw new ValidationError(
      `Missing required argument(s) for "${name}": ${missing.join(", ")}`,
      missing.map((key) => ({ path: [key], message: "Required" }))
    );
  }

  const declared = new Set(capability.parameters.map((p) => p.name));
  const extras = Object.keys(args).filter((key) => !declared.has(key));
  if (extras.length && mode === "reject") {
    throw new ValidationError(
      `Unexpected argument(s) for "${name}": ${extras.join(", ")}`,
      extras.map((key) => ({ path: [key], message: "Unexpected argument" }))
    );
  }

  const input: [string, unknown][] = [];
  for (const parameter of capability.parameters) {
    if (provided(parameter.name)) {
      const value = coerceValue(parameter, args[parameter.name]);
      input.push([parameter.name, value]);
    }
  }

  const parsed = capability.argumentSchema.safeParse(Object.fromEntries(input));
  if (!parsed.success) {
    const issues = issuesFrom(parsed.error);
    throw new ValidationError(
      `Invalid arguments for "${name}": ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      issues
    );
  }
  return parsed.data;
}

/**
 * Validates, then invokes the capability through its owner. The result is
 * returned unchanged; a failure inside the handler, or a rejection of the
 * promise it returns, surfaces as an ExecutionError.
 */
export function dispatch(
  capability: BaseCapability,
  args: unknown,
  options: UseOptions = {}
): unknown {
  const input = validateArguments(
    capability,
    args,
    options.extraArguments ?? "reject"
  );

  logger.debug("Dispatching capability", {
    class: "Dispatcher",
    method: "dispatch",
    capability: capability.name,
    kind: capability.kind,
    arguments: Object.keys(input),
  });

  let result: unknown;
  try {
    result = capability.apply(input);
  } catch (err) {
    throw new ExecutionError(capability.name, err);
  }

  if (isPromiseLike(result)) {
    return result.then(undefined, (err: unknown) => {
      throw new ExecutionError(capability.name, err);
    });
  }
  return result;
}
