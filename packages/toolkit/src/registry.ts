import {
  ParameterSpec,
  RegistrationError,
} from "@armory/capability-contract";
import { logger } from "@armory/common";
import { z, ZodType, ZodTypeAny } from "zod";
import { Action, BaseCapability, Binding, Observation } from "./capability";
import { parseDoc } from "./doc";
import { CapabilityMarker } from "./marker";
import { describeReturnType, describeType } from "./schemaTypes";

const CAPABILITY_NAME = /^[A-Za-z0-9_-]{1,64}$/;
const PARAMETER_NAME = /^[A-Za-z0-9_.-]{1,64}$/;

export function assertCapabilityName(name: string, toolName: string): void {
  if (!CAPABILITY_NAME.test(name)) {
    throw new RegistrationError(
      name
        ? `Capability name "${name}" on tool "${toolName}" must match ${CAPABILITY_NAME}`
        : `Capability on tool "${toolName}" has no name; pass one explicitly`,
      name || undefined
    );
  }
}

function describeParameter(
  capability: string,
  name: string,
  declared: unknown,
  docText: string | undefined
): ParameterSpec {
  if (!PARAMETER_NAME.test(name)) {
    throw new RegistrationError(
      `Parameter name "${name}" of "${capability}" must match ${PARAMETER_NAME}`,
      capability,
      name
    );
  }
  if (!(declared instanceof ZodType)) {
    throw new RegistrationError(
      `Parameter "${name}" of "${capability}" has no declared type`,
      capability,
      name
    );
  }

  const zodType: ZodTypeAny = declared;
  const { property, required, hasDefault, defaultValue } = describeType(
    zodType,
    name
  );
  if (!property.description && docText) {
    property.description = docText;
  }

  const spec: ParameterSpec = {
    name,
    type: property.type,
    required,
    hasDefault,
    property,
  };
  if (property.description) {
    spec.description = property.description;
  }
  if (hasDefault) {
    spec.default = defaultValue;
  }
  return spec;
}

export interface BuildContext {
  toolName: string;
  binding: Binding;
  /** Position of the marker, used when it cannot be named */
  index?: number;
}

/**
 * Turns one marker into a capability invoked through `owner`. Fails on the
 * first untyped parameter or unmappable type.
 */
export function buildCapability(
  owner: object,
  marker: CapabilityMarker,
  context: BuildContext
): BaseCapability {
  const { handler, options } = marker;
  if (typeof handler !== "function") {
    throw new RegistrationError(
      `Marker ${
        options.name ? `"${options.name}"` : `#${context.index ?? 0}`
      } on tool "${context.toolName}" is not applied to a callable member`,
      options.name
    );
  }

  const name = options.name ?? handler.name;
  assertCapabilityName(name, context.toolName);

  const doc = parseDoc(options.doc);
  const shape = options.parameters ?? {};
  const parameters = Object.entries(shape).map(([param, declared]) =>
    describeParameter(name, param, declared, doc.params.get(param))
  );

  const init = {
    name,
    description: options.description ?? doc.summary,
    parameters,
    returnType: describeReturnType(options.returns, name),
    owner,
    binding: context.binding,
    argumentSchema: z.object(shape),
    call: (receiver: unknown, args: Record<string, unknown>) =>
      marker.call(receiver, args),
  };

  return marker.kind === "action" ? new Action(init) : new Observation(init);
}

/**
 * Registration pass run once when a tool is constructed. Builds the ordered
 * name -> capability table from the markers in declaration order.
 */
export function registerCapabilities(
  owner: object,
  markers: readonly CapabilityMarker[],
  toolName: string
): Map<string, BaseCapability> {
  const table = new Map<string, BaseCapability>();

  markers.forEach((marker, index) => {
    const capability = buildCapability(owner, marker, {
      toolName,
      binding: "owner",
      index,
    });
    if (table.has(capability.name)) {
      throw new RegistrationError(
        `Capability "${capability.name}" is declared twice on tool "${toolName}"`,
        capability.name
      );
    }
    table.set(capability.name, capability);
  });

  logger.debug("Registered capabilities", {
    class: "Registry",
    method: "registerCapabilities",
    tool: toolName,
    capabilities: [...table.keys()],
  });

  return table;
}
