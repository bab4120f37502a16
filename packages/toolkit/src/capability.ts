import {
  Capability,
  CapabilityKind,
  ParameterSpec,
  ReturnType,
} from "@armory/capability-contract";
import { AnyZodObject } from "zod";

/** Whether the handler runs with the owner as `this` or unbound. */
export type Binding = "owner" | "none";

export interface CapabilityInit {
  name: string;
  description: string;
  parameters: readonly ParameterSpec[];
  returnType?: ReturnType;
  owner: object;
  binding: Binding;
  argumentSchema: AnyZodObject;
  call: (receiver: unknown, args: Record<string, unknown>) => unknown;
}

export abstract class BaseCapability implements Capability {
  abstract readonly kind: CapabilityKind;
  abstract readonly mutating: boolean;

  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
  readonly returnType?: ReturnType;
  readonly owner: object;
  readonly binding: Binding;
  /** zod object the argument bag is parsed with before `apply` */
  readonly argumentSchema: AnyZodObject;

  constructor(protected readonly init: CapabilityInit) {
    this.name = init.name;
    this.description = init.description;
    this.parameters = init.parameters;
    this.returnType = init.returnType;
    this.owner = init.owner;
    this.binding = init.binding;
    this.argumentSchema = init.argumentSchema;
  }

  /**
   * Calls the handler through the owner with an already validated bag.
   * Everything outside the dispatcher should go through `Tool.use`.
   */
  apply(args: Record<string, unknown>): unknown {
    return this.init.call(
      this.binding === "owner" ? this.owner : undefined,
      args
    );
  }

  /** Same handler and owner, exposed under another name */
  abstract renamed(name: string): BaseCapability;
}

export class Action extends BaseCapability {
  readonly kind = "action";
  readonly mutating = true;

  renamed(name: string): Action {
    return new Action({ ...this.init, name });
  }
}

export class Observation extends BaseCapability {
  readonly kind = "observation";
  readonly mutating = false;

  renamed(name: string): Observation {
    return new Observation({ ...this.init, name });
  }
}

export const isAction = (capability: BaseCapability): capability is Action =>
  capability instanceof Action;

export const isObservation = (
  capability: BaseCapability
): capability is Observation => capability instanceof Observation;
