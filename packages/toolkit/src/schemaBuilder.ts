import {
  Capability,
  CapabilitySchema,
  PropertySchema,
} from "@armory/capability-contract";

/**
 * Schema document for one capability in the tool-calling shape model APIs
 * consume. Property and required order follow declaration order; every call
 * returns fresh objects.
 */
export function buildSchema(capability: Capability): CapabilitySchema {
  const properties: [string, PropertySchema][] = [];
  const required: string[] = [];

  for (const parameter of capability.parameters) {
    properties.push([parameter.name, structuredClone(parameter.property)]);
    if (parameter.required) {
      required.push(parameter.name);
    }
  }

  return {
    name: capability.name,
    description: capability.description,
    parameters: {
      type: "object",
      properties: Object.fromEntries(properties),
      required,
    },
  };
}

function signature(capability: Capability): string {
  const params = capability.parameters
    .map((p) => `${p.name}${p.required ? "" : "?"}: ${p.type}`)
    .join(", ");
  const returns = capability.returnType ? ` -> ${capability.returnType}` : "";
  return `${capability.name}(${params})${returns}`;
}

/** Plain-text listing for prompts that do not take JSON schemas. */
export function describeCapabilities(
  capabilities: readonly Capability[]
): string {
  return capabilities
    .map((capability) => {
      const tag = capability.mutating ? "[action]" : "[observation]";
      const line = `${tag} ${signature(capability)}`;
      return capability.description
        ? `${line} - ${capability.description}`
        : line;
    })
    .join("\n");
}
