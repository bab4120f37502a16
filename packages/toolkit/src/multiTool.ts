import { CapabilitySchema } from "@armory/capability-contract";
import { BaseCapability } from "./capability";
import { CollisionPolicy, Placement, planPlacements } from "./collisions";
import { buildSchema } from "./schemaBuilder";
import { SchemaOptions, Tool } from "./tool";

export interface MultiToolOptions {
  name?: string;
  description?: string;
  /**
   * How constituents sharing a capability name are exposed. Defaults to
   * `keep-first`: the tool listed first wins.
   */
  onCollision?: CollisionPolicy;
}

export interface Resolution {
  tool: Tool;
  capability: BaseCapability;
}

/**
 * Several tools presented as one namespace. Lookup follows the order the
 * tools were given in; what a later tool's duplicate name does is set by
 * `onCollision`.
 */
export class MultiTool extends Tool {
  private readonly members: Tool[];
  private readonly listing: Placement<unknown>[] = [];
  private readonly routes = new Map<string, Tool>();
  private composed = false;

  constructor(tools: Tool[], options: MultiToolOptions = {}) {
    super({
      name: options.name ?? "MultiTool",
      description: options.description,
    });
    this.members = [...tools];

    const placements = planPlacements(
      this.table,
      this.members.flatMap((tool) =>
        tool.capabilities().map((capability) => ({
          capability,
          source: tool,
          sourceName: tool.name,
        }))
      ),
      options.onCollision ?? "keep-first",
      this.name
    );
    // shadowed constituents stay listed
    this.listing.push(...placements);
    this.place(placements);
    this.composed = true;
  }

  tools(): Tool[] {
    return [...this.members];
  }

  /** The constituent tool and capability a name resolves to. */
  resolveAction(name: string): Resolution {
    const capability = this.findAction(name);
    return { tool: this.routes.get(name) ?? this, capability };
  }

  /**
   * Constituent schemas concatenated in constituent order. Capabilities
   * merged or added later are appended, or take the place of the entry they
   * replace.
   */
  jsonSchema(options: SchemaOptions = {}): CapabilitySchema[] {
    return this.listing
      .map((placement) => placement.capability)
      .filter((capability) => !options.only || capability.kind === options.only)
      .map(buildSchema);
  }

  protected place(placements: Placement<unknown>[]) {
    for (const placement of placements) {
      const { capability, source, outcome } = placement;
      if (outcome === "shadowed") {
        continue;
      }
      if (this.composed) {
        this.relist(placement);
      }
      this.routes.set(capability.name, source instanceof Tool ? source : this);
    }
    super.place(placements);
  }

  /** Closes every constituent once, in order. */
  protected release(): void {
    for (const tool of new Set(this.members)) {
      tool.close();
    }
  }

  private relist(placement: Placement<unknown>) {
    const active = this.table.get(placement.capability.name);
    const index =
      placement.outcome === "replaced"
        ? this.listing.findIndex((p) => p.capability === active)
        : -1;
    if (index >= 0) {
      this.listing[index] = placement;
    } else {
      this.listing.push(placement);
    }
  }
}
