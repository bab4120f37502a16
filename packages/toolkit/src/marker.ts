import { CapabilityKind } from "@armory/capability-contract";
import { z, ZodRawShape, ZodTypeAny } from "zod";

export type Arguments<S extends ZodRawShape> = z.output<z.ZodObject<S>>;

/** A method or function that takes the validated argument bag */
export type Handler<S extends ZodRawShape, R> = (
  this: unknown,
  args: Arguments<S>
) => R;

export interface MarkerOptions<S extends ZodRawShape> {
  /** Overrides the handler's own name */
  name?: string;
  /** Overrides the summary taken from `doc` */
  description?: string;
  /**
   * Documentation text. The first sentence of the first line is the summary;
   * `@param name - text` lines describe parameters.
   */
  doc?: string;
  /** Parameter types in declaration order */
  parameters?: S;
  returns?: ZodTypeAny;
}

export interface CapabilityMarker<
  S extends ZodRawShape = ZodRawShape,
  R = unknown
> {
  readonly kind: CapabilityKind;
  /** Checked for callability at registration */
  readonly handler: unknown;
  readonly options: MarkerOptions<S>;
  call(receiver: unknown, args: Arguments<S>): R;
}

function mark<S extends ZodRawShape, R>(
  kind: CapabilityKind,
  handler: Handler<S, R>,
  options: MarkerOptions<S>
): CapabilityMarker<S, R> {
  return {
    kind,
    handler,
    options,
    call: (receiver, args) => handler.call(receiver, args),
  };
}

/** Marks a handler as a capability that may change state. */
export function action<S extends ZodRawShape = {}, R = unknown>(
  handler: Handler<S, R>,
  options: MarkerOptions<S> = {}
): CapabilityMarker<S, R> {
  return mark("action", handler, options);
}

/** Marks a handler as a read-only capability. */
export function observation<S extends ZodRawShape = {}, R = unknown>(
  handler: Handler<S, R>,
  options: MarkerOptions<S> = {}
): CapabilityMarker<S, R> {
  return mark("observation", handler, options);
}
