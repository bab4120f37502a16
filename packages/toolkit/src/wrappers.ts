import { ZodRawShape } from "zod";
import { action, CapabilityMarker, Handler, MarkerOptions } from "./marker";
import { Tool } from "./tool";

export type ToolClass = new () => Tool;

/** Tool wrapping an instance of another class, kept as `instance`. */
export type ClassToolConstructor<A extends unknown[], T extends object> = new (
  ...args: A
) => Tool & { readonly instance: T };

export interface WrapOptions {
  name?: string;
  description?: string;
}

/**
 * Tool class exposing `handler` as its only action. The tool is named after
 * the function, e.g. `convert` becomes `convert_tool`.
 */
export function toolFromFunction<S extends ZodRawShape = {}, R = unknown>(
  handler: Handler<S, R>,
  options: MarkerOptions<S> = {}
): ToolClass {
  const name = `${options.name ?? handler.name}_tool`;
  const marker = action(handler, options);

  return class FunctionTool extends Tool {
    constructor() {
      super({ name, description: options.description, capabilities: [marker] });
    }
  };
}

/**
 * Tool class around an existing class. Constructing it constructs `cls` with
 * the same arguments, and the marked methods run on that instance, so they
 * see the state its own constructor set up.
 */
export function toolFromClass<A extends unknown[], T extends object>(
  cls: new (...args: A) => T,
  markers: readonly CapabilityMarker[],
  options: WrapOptions = {}
): ClassToolConstructor<A, T> {
  const name = options.name ?? cls.name;

  return class ClassTool extends Tool {
    readonly instance: T;

    constructor(...args: A) {
      const instance = new cls(...args);
      super({
        name,
        description: options.description,
        capabilities: markers,
        target: instance,
      });
      this.instance = instance;
    }
  };
}

/**
 * Tool exposing marked methods of an existing object. Capabilities are
 * invoked through `target`, so its own state is what they see.
 */
export function toolFromObject(
  target: object,
  markers: readonly CapabilityMarker[],
  options: WrapOptions = {}
): Tool {
  return new Tool({
    name: options.name ?? `${target.constructor.name}Tool`,
    description: options.description,
    capabilities: markers,
    target,
  });
}

function isClass(value: unknown): value is new (...args: never) => object {
  return (
    typeof value === "function" &&
    /^class[\s{]/.test(Function.prototype.toString.call(value))
  );
}

function isHandler(value: unknown): value is Handler<ZodRawShape, unknown> {
  return typeof value === "function";
}

function isMarkerList(
  value: readonly CapabilityMarker[] | MarkerOptions<ZodRawShape> | undefined
): value is readonly CapabilityMarker[] {
  return Array.isArray(value);
}

/**
 * Picks the wrapper for `input`: a class gives a tool class built with
 * `toolFromClass`, a function a single-action tool class, and any other
 * object a tool instance around it.
 */
export function tool<A extends unknown[], T extends object>(
  cls: new (...args: A) => T,
  markers: readonly CapabilityMarker[],
  options?: WrapOptions
): ClassToolConstructor<A, T>;
export function tool<S extends ZodRawShape = {}, R = unknown>(
  handler: Handler<S, R>,
  options?: MarkerOptions<S>
): ToolClass;
export function tool(
  target: object,
  markers: readonly CapabilityMarker[],
  options?: WrapOptions
): Tool;
export function tool(
  input: object,
  second?: readonly CapabilityMarker[] | MarkerOptions<ZodRawShape>,
  options: WrapOptions = {}
): Tool | (new (...args: never) => Tool) {
  const markers = isMarkerList(second) ? second : [];
  if (isClass(input)) {
    return toolFromClass(input, markers, options);
  }
  if (isHandler(input)) {
    return toolFromFunction(input, isMarkerList(second) ? {} : second);
  }
  return toolFromObject(input, markers, options);
}
