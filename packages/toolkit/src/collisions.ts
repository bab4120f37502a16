import { CollisionError } from "@armory/capability-contract";
import { logger } from "@armory/common";
import { BaseCapability } from "./capability";
import { assertCapabilityName } from "./registry";

/**
 * What happens when an incoming capability's name is already taken:
 * - `reject`: throw a CollisionError before anything changes
 * - `keep-first`: the capability already registered wins
 * - `override`: the incoming capability replaces it
 * - `rename`: the incoming capability is exposed as `<source>__<name>`
 */
export type CollisionPolicy = "reject" | "keep-first" | "override" | "rename";

export interface Incoming<S> {
  capability: BaseCapability;
  source: S;
  sourceName: string;
}

export interface Placement<S> {
  /** Capability as exposed, renamed under the `rename` policy */
  capability: BaseCapability;
  source: S;
  outcome: "added" | "replaced" | "renamed" | "shadowed";
}

export const renamedName = (sourceName: string, name: string) =>
  `${sourceName}__${name}`;

/**
 * Decides where each incoming capability lands in `existing`. Pure: the
 * caller applies placements whose outcome is not `shadowed`.
 */
export function planPlacements<S>(
  existing: ReadonlyMap<string, BaseCapability>,
  incoming: readonly Incoming<S>[],
  policy: CollisionPolicy,
  toolName: string
): Placement<S>[] {
  const taken = new Set(existing.keys());

  if (policy === "reject") {
    const seen = new Set(taken);
    const clashes: string[] = [];
    for (const { capability } of incoming) {
      if (seen.has(capability.name)) {
        clashes.push(capability.name);
      }
      seen.add(capability.name);
    }
    if (clashes.length) {
      throw new CollisionError([...new Set(clashes)]);
    }
  }

  return incoming.map(({ capability, source, sourceName }) => {
    if (!taken.has(capability.name)) {
      taken.add(capability.name);
      return { capability, source, outcome: "added" };
    }

    logger.warn("Capability name collision", {
      class: "Composition",
      method: "planPlacements",
      tool: toolName,
      capability: capability.name,
      source: sourceName,
      policy,
    });

    switch (policy) {
      case "override":
        return { capability, source, outcome: "replaced" };
      case "rename": {
        const name = renamedName(sourceName, capability.name);
        assertCapabilityName(name, toolName);
        if (taken.has(name)) {
          throw new CollisionError([name]);
        }
        taken.add(name);
        return {
          capability: capability.renamed(name),
          source,
          outcome: "renamed",
        };
      }
      default:
        return { capability, source, outcome: "shadowed" };
    }
  });
}
