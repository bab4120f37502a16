import {
  CapabilityKind,
  CapabilitySchema,
  NotFoundError,
  ValidationError,
} from "@armory/capability-contract";
import { ZodRawShape } from "zod";
import {
  Action,
  BaseCapability,
  Binding,
  isAction,
  isObservation,
  Observation,
} from "./capability";
import { CollisionPolicy, Placement, planPlacements } from "./collisions";
import { dispatch, UseOptions } from "./dispatcher";
import { action, CapabilityMarker, Handler, MarkerOptions } from "./marker";
import { buildCapability, registerCapabilities } from "./registry";
import { buildSchema } from "./schemaBuilder";

export interface ToolOptions {
  /** Defaults to the class name */
  name?: string;
  /** Documentation of the tool as a whole, returned by `context()` */
  description?: string;
  capabilities?: readonly CapabilityMarker[];
  /** Object the capabilities are invoked through; defaults to the tool */
  target?: object;
}

export interface SchemaOptions {
  only?: CapabilityKind;
}

export interface MergeOptions {
  /** Defaults to `reject` */
  onCollision?: CollisionPolicy;
}

export interface AddActionOptions<S extends ZodRawShape>
  extends MarkerOptions<S>,
    MergeOptions {
  /**
   * `owner` runs the handler with the tool as `this`; `none` (default) runs
   * it unbound.
   */
  bind?: Binding;
}

/**
 * A named collection of capabilities exposed as one schema and dispatch
 * unit. Subclasses pass their markers to the constructor:
 *
 * ```ts
 * class Calculator extends Tool {
 *   constructor() {
 *     super({
 *       capabilities: [
 *         action(Calculator.prototype.add, {
 *           doc: "Add two integers",
 *           parameters: { a: z.number().int(), b: z.number().int() },
 *         }),
 *       ],
 *     });
 *   }
 *
 *   add({ a, b }: { a: number; b: number }) {
 *     return a + b;
 *   }
 * }
 * ```
 */
export class Tool {
  readonly name: string;
  protected readonly table: Map<string, BaseCapability>;
  private readonly documentation: string;
  private closed = false;

  constructor(options: ToolOptions = {}) {
    this.name = options.name ?? new.target.name;
    this.documentation = options.description ?? "";
    this.table = registerCapabilities(
      options.target ?? this,
      options.capabilities ?? [],
      this.name
    );
  }

  /** Documentation of the tool for an LLM prompt */
  context(): string {
    return this.documentation;
  }

  capabilities(): BaseCapability[] {
    return [...this.table.values()];
  }

  actions(): Action[] {
    return this.capabilities().filter(isAction);
  }

  observations(): Observation[] {
    return this.capabilities().filter(isObservation);
  }

  hasAction(name: string): boolean {
    return this.table.has(name);
  }

  /** Exact, case-sensitive lookup of an action or observation. */
  findAction(name: string): BaseCapability {
    const capability = this.table.get(name);
    if (!capability) {
      throw new NotFoundError(name, this.name);
    }
    return capability;
  }

  use(
    capability: BaseCapability | string,
    args: unknown = {},
    options: UseOptions = {}
  ): unknown {
    return dispatch(this.resolve(capability), args, options);
  }

  observe(
    observation: BaseCapability | string,
    args: unknown = {},
    options: UseOptions = {}
  ): unknown {
    const capability = this.resolve(observation);
    if (!isObservation(capability)) {
      throw new ValidationError(
        `"${capability.name}" is an action; perform it with use()`
      );
    }
    return dispatch(capability, args, options);
  }

  jsonSchema(options: SchemaOptions = {}): CapabilitySchema[] {
    return this.capabilities()
      .filter((capability) => !options.only || capability.kind === options.only)
      .map(buildSchema);
  }

  /**
   * Copies the capabilities of `other` into this tool. They stay owned by
   * `other`. Collisions are rejected unless another policy is given.
   */
  merge(other: Tool, options: MergeOptions = {}): this {
    const placements = planPlacements(
      this.table,
      other.capabilities().map((capability) => ({
        capability,
        source: other,
        sourceName: other.name,
      })),
      options.onCollision ?? "reject",
      this.name
    );
    this.place(placements);
    return this;
  }

  /** Wraps a bare function as an action of this tool. */
  addAction<S extends ZodRawShape = {}, R = unknown>(
    handler: Handler<S, R>,
    options: AddActionOptions<S> = {}
  ): BaseCapability {
    const capability = buildCapability(this, action(handler, options), {
      toolName: this.name,
      binding: options.bind ?? "none",
    });
    const [placement] = planPlacements(
      this.table,
      [{ capability, source: this, sourceName: this.name }],
      options.onCollision ?? "reject",
      this.name
    );
    this.place([placement]);
    return placement.capability;
  }

  /**
   * Releases whatever the tool holds. Only the first call runs `release()`;
   * nothing calls it automatically.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.release();
  }

  protected release(): void {}

  protected place(placements: Placement<unknown>[]) {
    for (const { capability, outcome } of placements) {
      if (outcome !== "shadowed") {
        this.table.set(capability.name, capability);
      }
    }
  }

  /** Accepts a name, or a capability object that this tool exposes. */
  protected resolve(capability: BaseCapability | string): BaseCapability {
    if (typeof capability === "string") {
      return this.findAction(capability);
    }
    if (this.table.get(capability.name) !== capability) {
      throw new NotFoundError(capability.name, this.name);
    }
    return capability;
  }
}
